/**
 * Builds a travel summary as a straight pipeline:
 * resolve code, fetch country, geocode capital, fetch weather, enrich.
 * Calls run one after another; any failure ends the request.
 */

import { InvalidInputError, NotFoundError, UpstreamUnavailableError } from "./errors.js";
import { bestTimeToVisit, travelTips } from "./enrichment.js";
import { matchDestination, sampleNames, type CountryDirectory } from "./country-directory.js";
import type { GeocodingClient } from "./geocoding.js";
import type { WeatherClient } from "./weather.js";
import type { TravelSummary } from "./types.js";

export interface TravelSummaryDeps {
  directory: CountryDirectory;
  geocoding: GeocodingClient;
  weather: WeatherClient;
}

export class TravelSummaryService {
  constructor(private readonly deps: TravelSummaryDeps) {}

  async summaryByCode(code: string | null | undefined): Promise<TravelSummary> {
    const countryCode = code?.trim().toUpperCase();
    if (!countryCode) {
      throw new InvalidInputError("country_code is required");
    }
    return this.buildSummary(countryCode);
  }

  /**
   * Resolves the name against the popular destinations only; unlike
   * CountryDirectory.searchByName there is no upstream name search here.
   */
  async summaryByName(name: string): Promise<TravelSummary> {
    const countryName = name.trim();
    // An empty needle would match every destination.
    if (!countryName) {
      throw new InvalidInputError("country_name is required");
    }
    const destinations = await this.deps.directory.listPopular();
    const match = matchDestination(destinations, countryName);

    if (!match) {
      throw new NotFoundError(
        `Country '${countryName}' not found in destinations. Available countries: ${sampleNames(destinations)}...`
      );
    }

    return this.buildSummary(match.country_code);
  }

  private async buildSummary(countryCode: string): Promise<TravelSummary> {
    const destination = await this.deps.directory.getByCode(countryCode);

    const coordinates = await this.deps.geocoding.resolve(destination.capital);
    if (!coordinates) {
      throw new UpstreamUnavailableError(`Could not find coordinates for ${destination.capital}`);
    }

    const weather = await this.deps.weather.currentWeather(
      coordinates.latitude,
      coordinates.longitude,
      destination.capital
    );

    return {
      ...destination,
      current_weather: weather,
      travel_tips: travelTips(destination.country_name, destination.region, weather),
      best_time_to_visit: bestTimeToVisit(destination.region, countryCode)
    };
  }
}
