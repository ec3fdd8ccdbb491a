import { CountryDirectory } from "./country-directory.js";
import { GeocodingClient } from "./geocoding.js";
import { WeatherClient } from "./weather.js";
import { TravelSummaryService } from "./travel-summary.js";
import { UpstreamClient, type FetchLike } from "./upstream.js";
import type { Settings } from "./config.js";

export interface TravelServices {
  directory: CountryDirectory;
  summaries: TravelSummaryService;
}

export function createServices(
  settings: Omit<Settings, "port" | "logRequests">,
  fetchImpl?: FetchLike
): TravelServices {
  const upstream = new UpstreamClient({ fetch: fetchImpl, timeoutMs: settings.upstreamTimeoutMs });
  const directory = new CountryDirectory({ baseUrl: settings.restCountriesBaseUrl, upstream });
  const geocoding = new GeocodingClient({ baseUrl: settings.geocodingBaseUrl, upstream });
  const weather = new WeatherClient({ baseUrl: settings.weatherBaseUrl, upstream });

  return {
    directory,
    summaries: new TravelSummaryService({ directory, geocoding, weather })
  };
}
