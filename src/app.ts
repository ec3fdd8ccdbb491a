import cors from "cors";
import express, { type Application, type NextFunction, type Request, type Response } from "express";
import morgan from "morgan";
import { ServiceError } from "./errors.js";
import { createDestinationsRouter } from "./routes/destinations.js";
import { createTravelSummaryRouter } from "./routes/travel-summary.js";
import { createMcpRouter } from "./routes/mcp.js";
import type { TravelServices } from "./services.js";

export interface AppOptions {
  /** Request logging with morgan; off in tests. */
  logRequests?: boolean;
}

export const SERVICE_DESCRIPTOR = {
  message: "Travel Data Aggregator API",
  description: "Aggregates data from multiple public APIs to provide travel information",
  data_sources: [
    "REST Countries API - Country information",
    "Open-Meteo API - Weather data"
  ],
  endpoints: {
    destinations: "GET /destinations - List popular travel destinations",
    destination_search: "GET /destinations/search?country=NAME - Find a country code by name",
    destination_info: "GET /destinations/{country_code} - Get detailed country info",
    travel_summary: "POST /travel-summary - Get aggregated travel summary with weather",
    travel_summary_by_name: "POST /travel-summary-by-name - Same, looked up by country name",
    mcp: "POST /mcp - Model Context Protocol endpoint for agents"
  }
};

/**
 * Create and configure the Express application
 */
export function createApp(services: TravelServices, options: AppOptions = {}): Application {
  const app = express();

  app.use(cors());
  app.use(express.json({ limit: "100kb" }));
  if (options.logRequests ?? true) {
    app.use(morgan("dev"));
  }

  app.get("/", (_req, res) => {
    res.json(SERVICE_DESCRIPTOR);
  });

  app.get("/ping", (_req, res) => {
    res.send("pong");
  });

  app.use("/destinations", createDestinationsRouter(services.directory));
  app.use("/", createTravelSummaryRouter(services.summaries));
  app.use("/mcp", createMcpRouter(services));

  app.use((_req, res) => {
    res.status(404).json({ ok: false, error: "Not found" });
  });

  app.use(handleError);

  return app;
}

function handleError(error: unknown, req: Request, res: Response, next: NextFunction): void {
  if (res.headersSent) {
    next(error);
    return;
  }

  if (error instanceof ServiceError) {
    if (error.statusCode >= 500) {
      console.warn(`${req.method} ${req.originalUrl} failed: ${error.message}`);
    }
    res.status(error.statusCode).json({ ok: false, error: error.message });
    return;
  }

  // body-parser rejects malformed JSON with a SyntaxError
  if (error instanceof SyntaxError) {
    res.status(400).json({ ok: false, error: "Malformed JSON body" });
    return;
  }

  console.error(`${req.method} ${req.originalUrl} failed`, error);
  res.status(500).json({ ok: false, error: "Internal server error" });
}
