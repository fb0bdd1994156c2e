import { AxiosInstance, AxiosResponse, isAxiosError } from "axios";
import { ConfigurationError, UpstreamError } from "../errors";
import { GNewsEndpoint, QueryParams } from "../interfaces/news";
import { logger } from "../logger";
import {
  ERROR_BODY_EXCERPT_LEN,
  GNEWS_API_BASE,
  GNEWS_API_KEY_ENV,
  UPSTREAM_TIMEOUT_MS,
} from "../constants/news";

export type GNewsClientDeps = {
  axiosClient: AxiosInstance;
  apiKey?: string;
  baseUrl?: string;
  timeoutMs?: number;
};

function excerpt(body: unknown): string {
  if (body == null) return "";
  const text = typeof body === "string" ? body : JSON.stringify(body);
  return text.slice(0, ERROR_BODY_EXCERPT_LEN);
}

/**
 * Drops parameters with no value; an empty string is still sent.
 */
export function compactParams(params: QueryParams): Record<string, string | number | boolean> {
  const out: Record<string, string | number | boolean> = {};
  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined && value !== null) out[key] = value;
  }
  return out;
}

export class GNewsClient {
  private readonly axiosClient: AxiosInstance;
  private readonly apiKey?: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;

  constructor({
    axiosClient,
    apiKey,
    baseUrl = GNEWS_API_BASE,
    timeoutMs = UPSTREAM_TIMEOUT_MS,
  }: GNewsClientDeps) {
    this.axiosClient = axiosClient;
    this.apiKey = apiKey;
    this.baseUrl = baseUrl.replace(/\/+$/, "");
    this.timeoutMs = timeoutMs;
  }

  /**
   * Single authenticated GET against a GNews endpoint. No retries:
   * every attempt counts against the API quota.
   */
  async fetch(
    endpoint: GNewsEndpoint,
    params: QueryParams,
    signal?: AbortSignal
  ): Promise<unknown> {
    if (!this.apiKey) {
      throw new ConfigurationError(
        `Missing ${GNEWS_API_KEY_ENV} environment variable. Obtain an API key from https://gnews.io/`
      );
    }

    const url = `${this.baseUrl}/${endpoint}`;
    const query = { apikey: this.apiKey, ...compactParams(params) };

    logger.debug({ endpoint, params: compactParams(params) }, "Calling GNews API");

    let response: AxiosResponse<unknown>;
    try {
      response = await this.axiosClient.get<unknown>(url, {
        params: query,
        timeout: this.timeoutMs,
        signal,
        validateStatus: () => true,
      });
    } catch (err) {
      const reason = isAxiosError(err)
        ? err.code === "ECONNABORTED" || err.code === "ETIMEDOUT"
          ? "timeout"
          : err.code === "ERR_CANCELED"
            ? "aborted"
            : err.message
        : err instanceof Error
          ? err.message
          : String(err);

      logger.warn({ endpoint, reason }, "GNews API request failed");
      throw new UpstreamError(`GNews API request failed: ${reason}`, { cause: err });
    }

    if (response.status !== 200) {
      const body = excerpt(response.data);
      logger.warn({ endpoint, status: response.status }, "GNews API returned an error");
      throw new UpstreamError(`GNews API error ${response.status}: ${body}`, {
        status: response.status,
      });
    }

    return response.data;
  }
}
