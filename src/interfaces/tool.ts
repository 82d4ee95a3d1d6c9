export interface AgentIdentity {
  id: string;
}

/**
 * Context supplied by the agent runtime on every tool call.
 */
export interface ToolContext {
  agent?: AgentIdentity | null;
  config?: {
    api_key?: string;
    [key: string]: unknown;
  };
}
