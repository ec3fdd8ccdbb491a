import { afterEach, describe, expect, it, vi } from "vitest";
import { InvalidInputError, NotFoundError, UpstreamUnavailableError } from "./errors.js";
import { createServices } from "./services.js";
import { createFakeUpstream, TEST_SETTINGS, type FakeUpstreamOptions } from "./test-support/fake-upstream.js";

function createSummaries(options: FakeUpstreamOptions = {}) {
  const fake = createFakeUpstream(options);
  const { summaries } = createServices(TEST_SETTINGS, fake.fetch);
  return { fake, summaries };
}

describe("TravelSummaryService.summaryByCode", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("aggregates country, weather and advice", async () => {
    const { summaries } = createSummaries();

    const summary = await summaries.summaryByCode("jp");

    expect(summary).toEqual({
      country_code: "JP",
      country_name: "Japan",
      capital: "Tokyo",
      region: "Asia",
      population: 125000000,
      currencies: ["JPY"],
      languages: ["Japanese"],
      current_weather: {
        location: "Tokyo",
        temperature_celsius: 18.5,
        weather_description: "Partly cloudy",
        humidity: 60,
        wind_speed_kmh: 12.4
      },
      travel_tips: [
        "Weather is mild - pack versatile clothing",
        "Learn a few local phrases - it's appreciated!",
        "Research local customs and etiquette for Japan"
      ],
      best_time_to_visit: "March-May (cherry blossoms) or October-November (autumn colors)"
    });
  });

  it("calls country, geocoding and weather one after another", async () => {
    const { fake, summaries } = createSummaries();

    await summaries.summaryByCode("FR");

    expect(fake.calls.map((url) => url.host + url.pathname)).toEqual([
      "countries.test/v3.1/alpha/FR",
      "geocoding.test/v1/search",
      "weather.test/v1/forecast"
    ]);
    expect(fake.calls[1].searchParams.get("name")).toBe("Paris");
    expect(fake.calls[2].searchParams.get("latitude")).toBe("48.8534");
    expect(fake.calls[2].searchParams.get("longitude")).toBe("2.3488");
  });

  it("derives tips from the live weather", async () => {
    const { summaries } = createSummaries({
      current: { temperature_2m: 32, relative_humidity_2m: 80, weather_code: 61, wind_speed_10m: 20 }
    });

    const summary = await summaries.summaryByCode("AU");

    expect(summary.current_weather.weather_description).toBe("Slight rain");
    expect(summary.travel_tips).toEqual([
      "Pack light, breathable clothing - it's hot!",
      "Stay hydrated and use sunscreen",
      "Bring an umbrella or rain jacket",
      "Don't forget reef-safe sunscreen for beach visits",
      "Research local customs and etiquette for Australia"
    ]);
    expect(summary.best_time_to_visit).toBe("September-November (spring) or March-May (autumn)");
  });

  it("falls back to a region hint outside the best-time table", async () => {
    const { summaries } = createSummaries();

    const summary = await summaries.summaryByCode("KE");

    expect(summary.best_time_to_visit).toBe("Research the best season for Africa");
    expect(summary.travel_tips).toContain("Consult a travel health clinic for vaccinations");
  });

  it("rejects a missing code before any upstream call", async () => {
    const { fake, summaries } = createSummaries();

    await expect(summaries.summaryByCode("")).rejects.toBeInstanceOf(InvalidInputError);
    await expect(summaries.summaryByCode(undefined)).rejects.toThrow("country_code is required");
    expect(fake.calls).toHaveLength(0);
  });

  it("trims a padded code before every lookup", async () => {
    const { fake, summaries } = createSummaries();

    const summary = await summaries.summaryByCode(" jp ");

    expect(summary.country_code).toBe("JP");
    expect(summary.best_time_to_visit).toBe("March-May (cherry blossoms) or October-November (autumn colors)");
    expect(fake.calls[0].pathname).toBe("/v3.1/alpha/JP");
  });

  it("rejects a blank code before any upstream call", async () => {
    const { fake, summaries } = createSummaries();

    const error = await summaries.summaryByCode("   ").catch((err: unknown) => err);

    expect(error).toBeInstanceOf(InvalidInputError);
    expect(error).toHaveProperty("message", "country_code is required");
    expect(fake.calls).toHaveLength(0);
  });

  it("fails as not found for an unknown code and stops there", async () => {
    const { fake, summaries } = createSummaries();

    const error = await summaries.summaryByCode("ZZ").catch((err: unknown) => err);

    expect(error).toBeInstanceOf(NotFoundError);
    expect(error).toHaveProperty("message", "Country ZZ not found");
    expect(fake.calls).toHaveLength(1);
  });

  it("fails as upstream unavailable when the capital cannot be geocoded", async () => {
    const { fake, summaries } = createSummaries();

    const error = await summaries.summaryByCode("IT").catch((err: unknown) => err);

    expect(error).toBeInstanceOf(UpstreamUnavailableError);
    expect(error).toHaveProperty("message", "Could not find coordinates for Rome");
    expect(fake.calls.some((url) => url.host === "weather.test")).toBe(false);
  });

  it("drops the geocoding error detail", async () => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    const { summaries } = createSummaries({ failures: { geocoding: 500 } });

    await expect(summaries.summaryByCode("JP")).rejects.toThrow(/^Could not find coordinates for Tokyo$/);
  });

  it("passes weather failures through with their detail", async () => {
    const { summaries } = createSummaries({ failures: { weather: 500 } });

    await expect(summaries.summaryByCode("JP")).rejects.toThrow(
      "Failed to fetch weather data: HTTP 500 Internal Server Error from https://weather.test/v1/forecast"
    );
  });
});

describe("TravelSummaryService.summaryByName", () => {
  it("resolves a trimmed name among the popular destinations", async () => {
    const { fake, summaries } = createSummaries();

    const summary = await summaries.summaryByName("  United Kingdom ");

    expect(summary.country_code).toBe("GB");
    expect(summary.capital).toBe("London");
    expect(summary.travel_tips).toEqual([
      "Weather is mild - pack versatile clothing",
      "Consider getting a travel adapter for EU plugs",
      "Research local customs and etiquette for United Kingdom"
    ]);
    expect(summary.best_time_to_visit).toBe("May-September for warmer weather");
    expect(fake.calls[1].pathname).toBe("/v3.1/alpha/GB");
  });

  it("rejects a blank name before any upstream call", async () => {
    const { fake, summaries } = createSummaries();

    await expect(summaries.summaryByName("   ")).rejects.toBeInstanceOf(InvalidInputError);
    expect(fake.calls).toHaveLength(0);
  });

  it("does not fall back to the upstream name search", async () => {
    const { fake, summaries } = createSummaries();

    const error = await summaries.summaryByName(" Kenya ").catch((err: unknown) => err);

    expect(error).toBeInstanceOf(NotFoundError);
    expect(error).toHaveProperty(
      "message",
      "Country 'Kenya' not found in destinations. Available countries: Japan, France, Italy, Spain, Thailand..."
    );
    expect(fake.calls.map((url) => url.pathname)).toEqual(["/v3.1/alpha"]);
  });

  it("fails as upstream unavailable when the directory is down", async () => {
    const { summaries } = createSummaries({ failures: { countries: "network" } });

    await expect(summaries.summaryByName("Japan")).rejects.toThrow("Failed to fetch country data: fetch failed");
  });
});
