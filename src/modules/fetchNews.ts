import { AxiosInstance, isAxiosError } from "axios";
import { cryptoCompareLimiter } from "./cryptoCompareLimiter";
import { logger } from "../logger";

export const NEWS_URL = "https://min-api.cryptocompare.com/data/v2/news/";

cryptoCompareLimiter.on("queued", () => {
  logger.debug("CryptoCompare request queued");
});

export type FetchNewsParams = {
  axiosClient: AxiosInstance;
  apiKey: string;
  token: string;
  /** Unix seconds; news published up to this instant is returned. */
  timestamp: number;
};

/**
 * Raw call to the CryptoCompare news endpoint. The body is returned
 * undecoded; callers validate it.
 */
export async function fetchNews({
  axiosClient,
  apiKey,
  token,
  timestamp,
}: FetchNewsParams): Promise<unknown> {
  try {
    const res = await cryptoCompareLimiter.schedule(() =>
      axiosClient.get<unknown>(NEWS_URL, {
        headers: {
          Accept: "application/json",
          authorization: `Apikey ${apiKey}`,
        },
        params: {
          lang: "EN",
          lTs: timestamp,
          categories: token,
          sign: true,
        },
      })
    );

    return res.data;
  } catch (err) {
    if (isAxiosError(err) && err.response) {
      throw new Error(
        `CryptoCompare API request failed with status ${err.response.status}`
      );
    }
    throw err;
  }
}
