import { describeError, UpstreamUnavailableError } from "./errors.js";
import { readNumber, readRecord } from "./json-fields.js";
import { DEFAULT_SETTINGS } from "./config.js";
import { UpstreamClient } from "./upstream.js";
import type { Weather } from "./types.js";

const CURRENT_FIELDS = "temperature_2m,relative_humidity_2m,weather_code,wind_speed_10m";

// WMO weather interpretation codes as reported by Open-Meteo.
const WEATHER_CODES: ReadonlyMap<number, string> = new Map([
  [0, "Clear sky"],
  [1, "Mainly clear"],
  [2, "Partly cloudy"],
  [3, "Overcast"],
  [45, "Foggy"],
  [48, "Depositing rime fog"],
  [51, "Light drizzle"],
  [53, "Moderate drizzle"],
  [55, "Dense drizzle"],
  [61, "Slight rain"],
  [63, "Moderate rain"],
  [65, "Heavy rain"],
  [71, "Slight snow"],
  [73, "Moderate snow"],
  [75, "Heavy snow"],
  [80, "Slight rain showers"],
  [81, "Moderate rain showers"],
  [82, "Violent rain showers"],
  [95, "Thunderstorm"]
]);

export function describeWeatherCode(code: number): string {
  return WEATHER_CODES.get(code) ?? "Unknown";
}

export interface WeatherClientOptions {
  baseUrl?: string;
  upstream?: UpstreamClient;
}

/**
 * Current conditions from the Open-Meteo forecast API. Unlike geocoding,
 * every failure here propagates.
 */
export class WeatherClient {
  private readonly baseUrl: string;
  private readonly upstream: UpstreamClient;

  constructor(options: WeatherClientOptions = {}) {
    this.baseUrl = (options.baseUrl ?? DEFAULT_SETTINGS.weatherBaseUrl).replace(/\/+$/, "");
    this.upstream = options.upstream ?? new UpstreamClient();
  }

  async currentWeather(latitude: number, longitude: number, locationLabel: string): Promise<Weather> {
    const url = new URL(`${this.baseUrl}/forecast`);
    url.searchParams.set("latitude", String(latitude));
    url.searchParams.set("longitude", String(longitude));
    url.searchParams.set("current", CURRENT_FIELDS);

    let payload: unknown;
    try {
      payload = await this.upstream.getJson(url);
    } catch (error) {
      throw new UpstreamUnavailableError(`Failed to fetch weather data: ${describeError(error)}`);
    }

    const current = readRecord(readRecord(payload).current);
    return {
      location: locationLabel,
      temperature_celsius: readNumber(current.temperature_2m, 0),
      weather_description: describeWeatherCode(readNumber(current.weather_code, 0)),
      humidity: readNumber(current.relative_humidity_2m, 0),
      wind_speed_kmh: readNumber(current.wind_speed_10m, 0)
    };
  }
}
