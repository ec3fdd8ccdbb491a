/**
 * Wire types. Field names are snake_case because they are serialized as-is.
 */

export interface Destination {
  country_code: string;
  country_name: string;
  capital: string;
  region: string;
  population: number;
  /** Currency codes, or ["N/A"] when the directory has none. */
  currencies: string[];
  /** Language names, or ["N/A"] when the directory has none. */
  languages: string[];
}

export interface Weather {
  location: string;
  temperature_celsius: number;
  weather_description: string;
  humidity: number;
  wind_speed_kmh: number;
}

export interface TravelSummary extends Destination {
  current_weather: Weather;
  travel_tips: string[];
  best_time_to_visit: string;
}

export interface CountryCodeMatch {
  country_code: string;
  country_name: string;
}

export interface Coordinates {
  latitude: number;
  longitude: number;
}
