/**
 * Static travel advice. Pure functions over the read-only travel catalog.
 */

import { getTravelCatalog, type TravelCatalog } from "./travel-catalog.js";
import type { Weather } from "./types.js";

const HOT_THRESHOLD_CELSIUS = 30;
const COLD_THRESHOLD_CELSIUS = 10;

const HOT_WEATHER_TIPS = ["Pack light, breathable clothing - it's hot!", "Stay hydrated and use sunscreen"];
const COLD_WEATHER_TIPS = ["Bring warm layers - it's cold!", "Pack a good jacket and warm accessories"];
const MILD_WEATHER_TIP = "Weather is mild - pack versatile clothing";
const WET_WEATHER_TIP = "Bring an umbrella or rain jacket";

/**
 * Tips in a fixed order: temperature band, wet weather, region, then the
 * customs reminder. Callers and clients rely on that order.
 */
export function travelTips(
  countryName: string,
  region: string,
  weather: Pick<Weather, "temperature_celsius" | "weather_description">,
  catalog: TravelCatalog = getTravelCatalog()
): string[] {
  const tips: string[] = [];

  if (weather.temperature_celsius > HOT_THRESHOLD_CELSIUS) {
    tips.push(...HOT_WEATHER_TIPS);
  } else if (weather.temperature_celsius < COLD_THRESHOLD_CELSIUS) {
    tips.push(...COLD_WEATHER_TIPS);
  } else {
    tips.push(MILD_WEATHER_TIP);
  }

  const description = weather.weather_description.toLowerCase();
  if (description.includes("rain") || description.includes("drizzle")) {
    tips.push(WET_WEATHER_TIP);
  }

  const regionTip = catalog.regionTips.get(region);
  if (regionTip) {
    tips.push(regionTip);
  }

  tips.push(`Research local customs and etiquette for ${countryName}`);
  return tips;
}

export function bestTimeToVisit(
  region: string,
  countryCode: string,
  catalog: TravelCatalog = getTravelCatalog()
): string {
  return catalog.bestTimeToVisit.get(countryCode) ?? `Research the best season for ${region}`;
}
