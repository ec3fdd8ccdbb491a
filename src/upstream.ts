/**
 * Shared GET-and-parse for the public JSON APIs this service aggregates.
 *
 * Every call is independent (no pooling contract) and carries a fixed
 * timeout. A timeout surfaces as an ordinary rejection, like any other
 * transport failure.
 */

import { DEFAULT_SETTINGS } from "./config.js";

export type FetchLike = (url: URL, init: RequestInit) => Promise<Response>;

export interface UpstreamOptions {
  /** Replaced in tests with an in-process fake. */
  fetch?: FetchLike;
  timeoutMs?: number;
  userAgent?: string;
}

/** Non-2xx answer from an upstream API. */
export class UpstreamHttpError extends Error {
  constructor(message: string, public readonly status: number) {
    super(message);
    this.name = "UpstreamHttpError";
  }
}

export class UpstreamClient {
  private readonly fetchImpl: FetchLike;
  private readonly timeoutMs: number;
  private readonly userAgent: string;

  constructor(options: UpstreamOptions = {}) {
    this.fetchImpl = options.fetch ?? fetch;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_SETTINGS.upstreamTimeoutMs;
    this.userAgent = options.userAgent ?? "TravelAggregator/1.0";
  }

  async getJson(url: URL): Promise<unknown> {
    const response = await this.fetchImpl(url, {
      headers: {
        "User-Agent": this.userAgent,
        Accept: "application/json"
      },
      signal: AbortSignal.timeout(this.timeoutMs)
    });

    if (!response.ok) {
      const statusText = response.statusText ? ` ${response.statusText}` : "";
      throw new UpstreamHttpError(
        `HTTP ${response.status}${statusText} from ${url.origin}${url.pathname}`,
        response.status
      );
    }

    const payload: unknown = await response.json();
    return payload;
  }
}

export function joinUrl(baseUrl: string, ...segments: string[]): URL {
  const base = baseUrl.replace(/\/+$/, "");
  const suffix = segments.map((segment) => encodeURIComponent(segment)).join("/");
  return new URL(`${base}/${suffix}`);
}
