/**
 * HTTP surface tests. Upstream APIs are served by the in-process fake.
 */

import { afterEach, describe, expect, it, vi } from "vitest";
import request from "supertest";
import { createApp } from "./app.js";
import { createServices } from "./services.js";
import { createFakeUpstream, TEST_SETTINGS, type FakeUpstreamOptions } from "./test-support/fake-upstream.js";

function createTestApp(options: FakeUpstreamOptions = {}) {
  const fake = createFakeUpstream(options);
  return createApp(createServices(TEST_SETTINGS, fake.fetch), { logRequests: false });
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe("GET /", () => {
  it("describes the service", async () => {
    const res = await request(createTestApp()).get("/");

    expect(res.status).toBe(200);
    expect(res.body.message).toBe("Travel Data Aggregator API");
    expect(res.body.endpoints.travel_summary).toBe("POST /travel-summary - Get aggregated travel summary with weather");
  });

  it("allows cross-origin callers", async () => {
    const res = await request(createTestApp()).get("/").set("Origin", "http://example.test");

    expect(res.headers["access-control-allow-origin"]).toBe("*");
  });
});

describe("/ping", () => {
  it("returns pong", async () => {
    const res = await request(createTestApp()).get("/ping");

    expect(res.status).toBe(200);
    expect(res.text).toBe("pong");
  });
});

describe("GET /destinations", () => {
  it("lists the popular destinations", async () => {
    const res = await request(createTestApp()).get("/destinations");

    expect(res.status).toBe(200);
    expect(res.body).toHaveLength(10);
    expect(res.body[0]).toEqual({
      country_code: "JP",
      country_name: "Japan",
      capital: "Tokyo",
      region: "Asia",
      population: 125000000,
      currencies: ["JPY"],
      languages: ["Japanese"]
    });
  });

  it("answers 503 when the directory is down", async () => {
    vi.spyOn(console, "warn").mockImplementation(() => {});

    const res = await request(createTestApp({ failures: { countries: 500 } })).get("/destinations");

    expect(res.status).toBe(503);
    expect(res.body).toEqual({
      ok: false,
      error: "Failed to fetch country data: HTTP 500 Internal Server Error from https://countries.test/v3.1/alpha"
    });
  });
});

describe("GET /destinations/search", () => {
  it("returns the code for a country name", async () => {
    const res = await request(createTestApp()).get("/destinations/search").query({ country: "Japan" });

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ country_code: "JP", country_name: "Japan" });
  });

  it("requires the country parameter", async () => {
    const res = await request(createTestApp()).get("/destinations/search");

    expect(res.status).toBe(400);
    expect(res.body).toEqual({ ok: false, error: 'Query parameter "country" is required' });
  });

  it("answers 404 with a hint for unknown names", async () => {
    vi.spyOn(console, "warn").mockImplementation(() => {});

    const res = await request(createTestApp()).get("/destinations/search").query({ country: "Atlantis" });

    expect(res.status).toBe(404);
    expect(res.body.error).toBe("Country 'Atlantis' not found. Try: Japan, France, Italy, Spain, Thailand...");
  });
});

describe("GET /destinations/:code", () => {
  it("returns one destination", async () => {
    const res = await request(createTestApp()).get("/destinations/fr");

    expect(res.status).toBe(200);
    expect(res.body.country_code).toBe("FR");
    expect(res.body.capital).toBe("Paris");
  });

  it("answers 404 for unknown codes", async () => {
    const res = await request(createTestApp()).get("/destinations/ZZ");

    expect(res.status).toBe(404);
    expect(res.body).toEqual({ ok: false, error: "Country ZZ not found" });
  });
});

describe("POST /travel-summary", () => {
  it("returns the aggregated summary", async () => {
    const res = await request(createTestApp()).post("/travel-summary").send({ country_code: "jp" });

    expect(res.status).toBe(200);
    expect(res.body.country_code).toBe("JP");
    expect(res.body.current_weather.location).toBe("Tokyo");
    expect(res.body.travel_tips).toHaveLength(3);
    expect(res.body.best_time_to_visit).toBe("March-May (cherry blossoms) or October-November (autumn colors)");
  });

  it("answers 400 without a country code", async () => {
    const res = await request(createTestApp()).post("/travel-summary").send({});

    expect(res.status).toBe(400);
    expect(res.body).toEqual({ ok: false, error: "country_code is required" });
  });

  it("answers 400 for a blank country code", async () => {
    const res = await request(createTestApp()).post("/travel-summary").send({ country_code: "   " });

    expect(res.status).toBe(400);
    expect(res.body).toEqual({ ok: false, error: "country_code is required" });
  });

  it("answers 400 when the body is missing", async () => {
    const res = await request(createTestApp()).post("/travel-summary");

    expect(res.status).toBe(400);
    expect(res.body.error).toBe("country_code is required");
  });

  it("answers 400 for a non-string country code", async () => {
    const res = await request(createTestApp()).post("/travel-summary").send({ country_code: 42 });

    expect(res.status).toBe(400);
    expect(res.body.error).toBe("country_code must be a string");
  });

  it("answers 404 for unknown codes", async () => {
    const res = await request(createTestApp()).post("/travel-summary").send({ country_code: "ZZ" });

    expect(res.status).toBe(404);
    expect(res.body.error).toBe("Country ZZ not found");
  });

  it("answers 503 when the capital cannot be geocoded", async () => {
    vi.spyOn(console, "warn").mockImplementation(() => {});

    const res = await request(createTestApp()).post("/travel-summary").send({ country_code: "IT" });

    expect(res.status).toBe(503);
    expect(res.body).toEqual({ ok: false, error: "Could not find coordinates for Rome" });
  });

  it("answers 400 for malformed JSON", async () => {
    const res = await request(createTestApp())
      .post("/travel-summary")
      .set("Content-Type", "application/json")
      .send('{"country_code": ');

    expect(res.status).toBe(400);
    expect(res.body).toEqual({ ok: false, error: "Malformed JSON body" });
  });
});

describe("POST /travel-summary-by-name", () => {
  it("returns the summary for a popular destination", async () => {
    const res = await request(createTestApp()).post("/travel-summary-by-name").send({ country_name: "japan" });

    expect(res.status).toBe(200);
    expect(res.body.country_code).toBe("JP");
    expect(res.body.country_name).toBe("Japan");
  });

  it("answers 400 without a name", async () => {
    const res = await request(createTestApp()).post("/travel-summary-by-name").send({});

    expect(res.status).toBe(400);
    expect(res.body.error).toBe("country_name is required");
  });

  it("answers 400 for a blank name", async () => {
    const res = await request(createTestApp()).post("/travel-summary-by-name").send({ country_name: "   " });

    expect(res.status).toBe(400);
    expect(res.body).toEqual({ ok: false, error: "country_name is required" });
  });

  it("answers 404 for names outside the popular set", async () => {
    const res = await request(createTestApp()).post("/travel-summary-by-name").send({ country_name: "Kenya" });

    expect(res.status).toBe(404);
    expect(res.body.error).toBe(
      "Country 'Kenya' not found in destinations. Available countries: Japan, France, Italy, Spain, Thailand..."
    );
  });
});

describe("unknown routes", () => {
  it("answer 404", async () => {
    const res = await request(createTestApp()).get("/nowhere");

    expect(res.status).toBe(404);
    expect(res.body).toEqual({ ok: false, error: "Not found" });
  });
});
