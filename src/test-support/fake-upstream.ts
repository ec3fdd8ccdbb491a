/**
 * In-process stand-in for REST Countries and Open-Meteo, injected through
 * the clients' fetch option. Serves countries.fixture.json.
 */

import fs from "fs-extra";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { isRecord } from "../json-fields.js";
import type { FetchLike } from "../upstream.js";

const __dirname = path.dirname(fileURLToPath(import.meta.url));

export const TEST_SETTINGS = {
  upstreamTimeoutMs: 1000,
  restCountriesBaseUrl: "https://countries.test/v3.1",
  geocodingBaseUrl: "https://geocoding.test/v1",
  weatherBaseUrl: "https://weather.test/v1"
};

export type UpstreamName = "countries" | "geocoding" | "weather";

export interface CurrentConditions {
  temperature_2m?: number;
  relative_humidity_2m?: number;
  weather_code?: number;
  wind_speed_10m?: number;
}

export interface FakeUpstreamOptions {
  countries?: unknown[];
  /** Place name to coordinates; names not listed get an empty result. */
  places?: Record<string, { latitude: number; longitude: number }>;
  current?: CurrentConditions;
  /** HTTP status to answer with, or "network" to reject like a dropped connection. */
  failures?: Partial<Record<UpstreamName, number | "network">>;
}

export interface FakeUpstream {
  fetch: FetchLike;
  calls: URL[];
}

export function loadCountryFixtures(): unknown[] {
  const records: unknown = fs.readJsonSync(path.join(__dirname, "countries.fixture.json"));
  return Array.isArray(records) ? records : [];
}

export const DEFAULT_PLACES = {
  Tokyo: { latitude: 35.6895, longitude: 139.6917 },
  Paris: { latitude: 48.8534, longitude: 2.3488 },
  London: { latitude: 51.5085, longitude: -0.1257 },
  Nairobi: { latitude: -1.2833, longitude: 36.8167 },
  Canberra: { latitude: -35.2835, longitude: 149.1281 }
};

export const DEFAULT_CURRENT: CurrentConditions = {
  temperature_2m: 18.5,
  relative_humidity_2m: 60,
  weather_code: 2,
  wind_speed_10m: 12.4
};

const STATUS_TEXT: Record<number, string> = {
  404: "Not Found",
  500: "Internal Server Error",
  502: "Bad Gateway"
};

export function createFakeUpstream(options: FakeUpstreamOptions = {}): FakeUpstream {
  const countries = options.countries ?? loadCountryFixtures();
  const places = options.places ?? DEFAULT_PLACES;
  const current = options.current ?? DEFAULT_CURRENT;
  const calls: URL[] = [];

  const fakeFetch: FetchLike = async (url) => {
    calls.push(url);
    const service = serviceFor(url);
    const failure = options.failures?.[service];
    if (failure === "network") {
      throw new TypeError("fetch failed");
    }
    if (failure !== undefined) {
      return json({ message: "upstream exploded" }, failure);
    }

    switch (service) {
      case "countries":
        return serveCountries(url, countries);
      case "geocoding": {
        const name = url.searchParams.get("name") ?? "";
        const place = Object.entries(places).find(([placeName]) => placeName === name)?.[1];
        return place
          ? json({ results: [{ name, ...place }], generationtime_ms: 0.5 })
          : json({ generationtime_ms: 0.5 });
      }
      case "weather":
        return json({
          latitude: Number(url.searchParams.get("latitude")),
          longitude: Number(url.searchParams.get("longitude")),
          current
        });
    }
  };

  return { fetch: fakeFetch, calls };
}

function serviceFor(url: URL): UpstreamName {
  switch (url.host) {
    case "countries.test":
      return "countries";
    case "geocoding.test":
      return "geocoding";
    case "weather.test":
      return "weather";
    default:
      throw new Error(`Unexpected upstream request to ${url.href}`);
  }
}

function serveCountries(url: URL, countries: unknown[]): Response {
  const segments = url.pathname.split("/").filter(Boolean).map(decodeURIComponent);
  // ["v3.1", "alpha"] | ["v3.1", "alpha", code] | ["v3.1", "name", name]
  const [, endpoint, argument] = segments;

  if (endpoint === "alpha" && argument === undefined) {
    const codes = (url.searchParams.get("codes") ?? "").split(",");
    const found = codes
      .map((code) => countries.find((country) => codeOf(country) === code))
      .filter((country) => country !== undefined);
    return json(found);
  }

  if (endpoint === "alpha" && argument !== undefined) {
    const found = countries.find((country) => codeOf(country) === argument.toUpperCase());
    return found ? json([found]) : json({ status: 404, message: "Not Found" }, 404);
  }

  if (endpoint === "name" && argument !== undefined) {
    const needle = argument.toLowerCase();
    const found = countries.filter((country) => nameOf(country).toLowerCase().includes(needle));
    return found.length > 0 ? json(found) : json({ status: 404, message: "Not Found" }, 404);
  }

  return json({ status: 400, message: "Bad Request" }, 400);
}

function codeOf(country: unknown): string | undefined {
  return isRecord(country) && typeof country.cca2 === "string" ? country.cca2 : undefined;
}

function nameOf(country: unknown): string {
  if (isRecord(country) && isRecord(country.name) && typeof country.name.common === "string") {
    return country.name.common;
  }
  return "";
}

function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    statusText: STATUS_TEXT[status] ?? (status === 200 ? "OK" : ""),
    headers: { "Content-Type": "application/json" }
  });
}
