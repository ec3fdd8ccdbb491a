import { createApp } from "./app.js";
import { loadConfig, resolveSettings } from "./config.js";
import { createServices } from "./services.js";
import { getTravelCatalog, getTravelCatalogPath } from "./travel-catalog.js";

async function bootstrap() {
  const config = await loadConfig();
  const settings = resolveSettings(config);

  const catalog = getTravelCatalog();
  console.log(`Loaded ${catalog.popularDestinations.length} popular destinations from ${getTravelCatalogPath()}`);

  const services = createServices(settings);
  const app = createApp(services, { logRequests: settings.logRequests });

  const server = app.listen(settings.port, () => {
    console.log(`Travel aggregator listening on http://localhost:${settings.port}`);
    console.log(`Upstream timeout ${settings.upstreamTimeoutMs}ms`);
  });

  // Graceful shutdown handler
  const shutdown = (signal: string) => {
    console.log(`\nReceived ${signal}, shutting down gracefully...`);

    server.close(() => {
      console.log("Server closed");
      process.exit(0);
    });

    // Force exit after 10 seconds
    setTimeout(() => {
      console.error("Forced shutdown after timeout");
      process.exit(1);
    }, 10000).unref();
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

bootstrap().catch((error) => {
  console.error("Failed to start server", error);
  process.exitCode = 1;
});
