import fs from "fs-extra";
import path from "node:path";
import { Paths } from "./data-paths.js";
import { isRecord, readStringList } from "./json-fields.js";

export interface TravelCatalog {
  /** Alpha-2 codes of the fixed popular-destination set, in listing order. */
  popularDestinations: readonly string[];
  bestTimeToVisit: ReadonlyMap<string, string>;
  regionTips: ReadonlyMap<string, string>;
}

const catalogPath = path.join(Paths.catalog, "travel-catalog.json");

const catalog: TravelCatalog = readCatalogFromDisk();

function readCatalogFromDisk(): TravelCatalog {
  let raw: unknown;
  try {
    raw = fs.readJsonSync(catalogPath);
  } catch (error) {
    throw new Error(`Failed to read travel catalog at ${catalogPath}`, { cause: error });
  }
  return parseTravelCatalog(raw);
}

export function parseTravelCatalog(raw: unknown): TravelCatalog {
  if (!isRecord(raw)) {
    throw new Error("Travel catalog must be a JSON object");
  }
  const popularDestinations = readStringList(raw.popularDestinations).map((code) => code.trim().toUpperCase());
  if (popularDestinations.length === 0) {
    throw new Error("Travel catalog lists no popular destinations");
  }
  return {
    popularDestinations: Object.freeze(popularDestinations),
    bestTimeToVisit: toStringMap(raw.bestTimeToVisit, "bestTimeToVisit"),
    regionTips: toStringMap(raw.regionTips, "regionTips")
  };
}

function toStringMap(value: unknown, label: string): ReadonlyMap<string, string> {
  if (!isRecord(value)) {
    throw new Error(`Travel catalog field ${label} must be an object`);
  }
  const map = new Map<string, string>();
  for (const [key, text] of Object.entries(value)) {
    if (typeof text !== "string") {
      throw new Error(`Travel catalog entry ${label}.${key} must be a string`);
    }
    map.set(key, text);
  }
  return map;
}

export function getTravelCatalog(): TravelCatalog {
  return catalog;
}

export function getTravelCatalogPath(): string {
  return catalogPath;
}
