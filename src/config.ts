/**
 * Server configuration module.
 *
 * Loads config from dataConfig/config.{TRAVEL_CONFIG}.json and fills in
 * defaults for anything the file leaves out.
 */

import fs from "fs-extra";
import path from "node:path";
import { Paths } from "./data-paths.js";

export interface ServerConfig {
  port?: number;
  logRequests?: boolean;
  upstreamTimeoutMs?: number;
  restCountriesBaseUrl?: string;
  geocodingBaseUrl?: string;
  weatherBaseUrl?: string;
}

export type Settings = Required<ServerConfig>;

export const DEFAULT_SETTINGS: Settings = {
  port: 8080,
  logRequests: true,
  upstreamTimeoutMs: 30_000,
  restCountriesBaseUrl: "https://restcountries.com/v3.1",
  geocodingBaseUrl: "https://geocoding-api.open-meteo.com/v1",
  weatherBaseUrl: "https://api.open-meteo.com/v1"
};

let cachedConfig: ServerConfig | null = null;

/**
 * Load configuration from file. Safe to call multiple times.
 */
export async function loadConfig(): Promise<ServerConfig> {
  if (cachedConfig) {
    return cachedConfig;
  }

  const configEnv = process.env.TRAVEL_CONFIG ?? "dev";
  const configFileName = `config.${configEnv}.json`;

  try {
    const configPath = path.join(Paths.dataConfig, configFileName);
    const raw: unknown = await fs.readJson(configPath);
    cachedConfig = parseConfig(raw);
    console.log(`Loaded config from ${configFileName}`);
  } catch (error) {
    console.warn(`Config file ${configFileName} not usable, using defaults`, error);
    cachedConfig = {};
  }

  return cachedConfig;
}

/**
 * Get configuration synchronously (must call loadConfig first during bootstrap).
 */
export function getConfig(): ServerConfig {
  return cachedConfig ?? {};
}

export function resolveSettings(config: ServerConfig = getConfig()): Settings {
  return {
    port: Number(process.env.PORT ?? config.port ?? DEFAULT_SETTINGS.port),
    logRequests: config.logRequests ?? DEFAULT_SETTINGS.logRequests,
    upstreamTimeoutMs: config.upstreamTimeoutMs ?? DEFAULT_SETTINGS.upstreamTimeoutMs,
    restCountriesBaseUrl: config.restCountriesBaseUrl ?? DEFAULT_SETTINGS.restCountriesBaseUrl,
    geocodingBaseUrl: config.geocodingBaseUrl ?? DEFAULT_SETTINGS.geocodingBaseUrl,
    weatherBaseUrl: config.weatherBaseUrl ?? DEFAULT_SETTINGS.weatherBaseUrl
  };
}

export function parseConfig(raw: unknown): ServerConfig {
  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
    throw new Error("Config file must contain a JSON object");
  }
  const entries = new Map(Object.entries(raw));
  const config: ServerConfig = {};

  const port = entries.get("port");
  if (port !== undefined) {
    config.port = requirePositiveNumber("port", port);
  }
  const timeout = entries.get("upstreamTimeoutMs");
  if (timeout !== undefined) {
    config.upstreamTimeoutMs = requirePositiveNumber("upstreamTimeoutMs", timeout);
  }
  const logRequests = entries.get("logRequests");
  if (logRequests !== undefined) {
    if (typeof logRequests !== "boolean") {
      throw new Error("logRequests must be true or false");
    }
    config.logRequests = logRequests;
  }
  for (const key of ["restCountriesBaseUrl", "geocodingBaseUrl", "weatherBaseUrl"] as const) {
    const value = entries.get(key);
    if (value !== undefined) {
      config[key] = requireUrl(key, value);
    }
  }

  return config;
}

function requirePositiveNumber(key: string, value: unknown): number {
  if (typeof value !== "number" || !Number.isFinite(value) || value <= 0) {
    throw new Error(`${key} must be a positive number`);
  }
  return value;
}

function requireUrl(key: string, value: unknown): string {
  if (typeof value !== "string") {
    throw new Error(`${key} must be an absolute URL`);
  }
  try {
    new URL(value);
  } catch {
    throw new Error(`${key} must be an absolute URL, got "${value}"`);
  }
  return value.replace(/\/+$/, "");
}
