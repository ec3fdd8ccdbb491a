/**
 * Country metadata from the REST Countries v3.1 API.
 */

import { describeError, NotFoundError, UpstreamUnavailableError } from "./errors.js";
import { readNumber, readRecord, readString, readStringList } from "./json-fields.js";
import { DEFAULT_SETTINGS } from "./config.js";
import { getTravelCatalog } from "./travel-catalog.js";
import { joinUrl, UpstreamClient, UpstreamHttpError } from "./upstream.js";
import type { CountryCodeMatch, Destination } from "./types.js";

const NOT_AVAILABLE = "N/A";
const HINT_SIZE = 5;

export interface CountryDirectoryOptions {
  baseUrl?: string;
  upstream?: UpstreamClient;
  /** Defaults to the travel catalog's popular-destination set. */
  popularCodes?: readonly string[];
}

export class CountryDirectory {
  private readonly baseUrl: string;
  private readonly upstream: UpstreamClient;
  private readonly popularCodes: readonly string[];

  constructor(options: CountryDirectoryOptions = {}) {
    this.baseUrl = (options.baseUrl ?? DEFAULT_SETTINGS.restCountriesBaseUrl).replace(/\/+$/, "");
    this.upstream = options.upstream ?? new UpstreamClient();
    this.popularCodes = options.popularCodes ?? getTravelCatalog().popularDestinations;
  }

  async listPopular(): Promise<Destination[]> {
    const url = joinUrl(this.baseUrl, "alpha");
    url.searchParams.set("codes", this.popularCodes.join(","));

    let payload: unknown;
    try {
      payload = await this.upstream.getJson(url);
    } catch (error) {
      throw new UpstreamUnavailableError(`Failed to fetch country data: ${describeError(error)}`);
    }

    if (!Array.isArray(payload)) {
      throw new UpstreamUnavailableError("Failed to fetch country data: expected a list of countries");
    }
    return payload.map(toDestination);
  }

  async getByCode(code: string): Promise<Destination> {
    const url = joinUrl(this.baseUrl, "alpha", code.trim().toUpperCase());

    let payload: unknown;
    try {
      payload = await this.upstream.getJson(url);
    } catch (error) {
      if (error instanceof UpstreamHttpError && error.status === 404) {
        throw new NotFoundError(`Country ${code} not found`);
      }
      throw new UpstreamUnavailableError(`Failed to fetch country data: ${describeError(error)}`);
    }

    // The single-code endpoint answers with a one-element list.
    const record: unknown = Array.isArray(payload) ? payload[0] : payload;
    if (record === undefined) {
      throw new NotFoundError(`Country ${code} not found`);
    }
    return toDestination(record);
  }

  /**
   * Popular destinations first, then the upstream name search. A failing
   * name search counts as a miss.
   */
  async searchByName(name: string): Promise<CountryCodeMatch> {
    const destinations = await this.listPopular();
    const match = matchDestination(destinations, name);
    if (match) {
      return { country_code: match.country_code, country_name: match.country_name };
    }

    const found = await this.searchUpstream(name);
    if (found) {
      return found;
    }

    throw new NotFoundError(`Country '${name}' not found. Try: ${sampleNames(destinations)}...`);
  }

  private async searchUpstream(name: string): Promise<CountryCodeMatch | null> {
    let payload: unknown;
    try {
      payload = await this.upstream.getJson(joinUrl(this.baseUrl, "name", name));
    } catch (error) {
      console.warn(`Country name search failed for "${name}": ${describeError(error)}`);
      return null;
    }
    if (!Array.isArray(payload) || payload.length === 0) {
      return null;
    }
    const first = toDestination(payload[0]);
    return { country_code: first.country_code, country_name: first.country_name };
  }
}

/**
 * Case-insensitive substring match in either direction, so "japan" finds
 * "Japan" and "United Kingdom of Great Britain" finds "United Kingdom".
 * The first destination in list order wins.
 */
export function matchDestination(destinations: readonly Destination[], name: string): Destination | null {
  const needle = name.toLowerCase();
  return destinations.find((destination) => {
    const candidate = destination.country_name.toLowerCase();
    return candidate.includes(needle) || needle.includes(candidate);
  }) ?? null;
}

export function sampleNames(destinations: readonly Destination[]): string {
  return destinations.slice(0, HINT_SIZE).map((destination) => destination.country_name).join(", ");
}

export function toDestination(raw: unknown): Destination {
  const record = readRecord(raw);
  const currencies = Object.keys(readRecord(record.currencies));
  const languages = Object.values(readRecord(record.languages)).filter(
    (language): language is string => typeof language === "string"
  );
  const capital = readStringList(record.capital)[0];

  return {
    country_code: readString(record.cca2, ""),
    country_name: readString(readRecord(record.name).common, "Unknown"),
    capital: capital ?? NOT_AVAILABLE,
    region: readString(record.region, "Unknown"),
    population: readNumber(record.population, 0),
    currencies: currencies.length > 0 ? currencies : [NOT_AVAILABLE],
    languages: languages.length > 0 ? languages : [NOT_AVAILABLE]
  };
}
