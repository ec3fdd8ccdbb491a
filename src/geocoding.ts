import { describeError } from "./errors.js";
import { readRecord } from "./json-fields.js";
import { DEFAULT_SETTINGS } from "./config.js";
import { UpstreamClient } from "./upstream.js";
import type { Coordinates } from "./types.js";

export interface GeocodingClientOptions {
  baseUrl?: string;
  upstream?: UpstreamClient;
}

export class GeocodingClient {
  private readonly baseUrl: string;
  private readonly upstream: UpstreamClient;

  constructor(options: GeocodingClientOptions = {}) {
    this.baseUrl = (options.baseUrl ?? DEFAULT_SETTINGS.geocodingBaseUrl).replace(/\/+$/, "");
    this.upstream = options.upstream ?? new UpstreamClient();
  }

  /**
   * Top-1 search for a place name. Returns null both when nothing matches
   * and when the call fails; the caller decides what absence means.
   */
  async resolve(placeName: string): Promise<Coordinates | null> {
    const url = new URL(`${this.baseUrl}/search`);
    url.searchParams.set("name", placeName);
    url.searchParams.set("count", "1");
    url.searchParams.set("format", "json");

    let payload: unknown;
    try {
      payload = await this.upstream.getJson(url);
    } catch (error) {
      console.warn(`Geocoding lookup failed for "${placeName}": ${describeError(error)}`);
      return null;
    }

    const results = readRecord(payload).results;
    if (!Array.isArray(results) || results.length === 0) {
      return null;
    }
    const first = readRecord(results[0]);
    if (typeof first.latitude !== "number" || typeof first.longitude !== "number") {
      return null;
    }
    return { latitude: first.latitude, longitude: first.longitude };
  }
}
