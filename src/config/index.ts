import dotenv from "dotenv";
import fs from "fs";
import { z } from "zod";

dotenv.config({
  quiet: process.env.NODE_ENV === "test",
});

const SECRET_PREFIX = "/run/secrets/";

export class ConfigError extends Error {
  constructor(readonly keys: string[], message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("production"),
  CRYPTOCOMPARE_API_KEY: z.string().default(""),

  VALKEY_HOST: z.string().min(1).default("127.0.0.1"),
  VALKEY_PORT: z.coerce.number().int().positive().default(6379),
  VALKEY_PASSWORD: z.string().optional(),
  VALKEY_PASSWORD_FILE: z.string().optional(),

  NEWS_RATE_LIMIT_MAX_REQUESTS: z.coerce.number().int().positive().default(1),
  NEWS_RATE_LIMIT_INTERVAL_MINUTES: z.coerce.number().positive().default(15),
});

export type Env = z.infer<typeof envSchema>;

export interface ServiceConfig {
  nodeEnv: Env["NODE_ENV"];
  cryptoCompareApiKey: string;
  valkey: {
    host: string;
    port: number;
    password?: string;
  };
  rateLimit: {
    maxRequests: number;
    intervalMinutes: number;
  };
}

/**
 * Values pointing into the Docker secrets mount are read from disk,
 * anything else is taken literally.
 */
export function resolveSecret(value: string | undefined): string | undefined {
  if (!value) return value;
  if (value.startsWith(SECRET_PREFIX)) {
    return fs.readFileSync(value, "utf8").trim();
  }
  return value;
}

function valkeyPassword(env: Env): string | undefined {
  if (env.VALKEY_PASSWORD) return resolveSecret(env.VALKEY_PASSWORD);
  if (env.VALKEY_PASSWORD_FILE) {
    return fs.readFileSync(env.VALKEY_PASSWORD_FILE, "utf8").trim();
  }
  return undefined;
}

export function loadConfig(
  source: NodeJS.ProcessEnv = process.env
): ServiceConfig {
  const parsed = envSchema.safeParse(source);

  if (!parsed.success) {
    const keys = parsed.error.issues.map((issue) => issue.path.join("."));
    throw new ConfigError(
      keys,
      `Invalid environment configuration: ${keys.join(", ")}`
    );
  }

  const env = parsed.data;

  return {
    nodeEnv: env.NODE_ENV,
    cryptoCompareApiKey: resolveSecret(env.CRYPTOCOMPARE_API_KEY) ?? "",
    valkey: {
      host: env.VALKEY_HOST,
      port: env.VALKEY_PORT,
      password: valkeyPassword(env),
    },
    rateLimit: {
      maxRequests: env.NEWS_RATE_LIMIT_MAX_REQUESTS,
      intervalMinutes: env.NEWS_RATE_LIMIT_INTERVAL_MINUTES,
    },
  };
}
