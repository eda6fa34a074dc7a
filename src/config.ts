import dotenv from "dotenv";
import fs from "fs";
import path from "path";
import { fileURLToPath } from "url";
import { extractRing, createGeoPredicate, GeoPredicate } from "./geo.js";
import { FirstPingBaseline } from "./types.js";

dotenv.config();

const defaultPolygonPath = fileURLToPath(new URL("../data/runway-polygon.json", import.meta.url));

function parseBaseline(value: string | undefined): FirstPingBaseline {
  return value === "none" ? "none" : "outside";
}

export const config = {
  dbPath: process.env.DB_PATH || "data/runway.db",
  port: Number(process.env.PORT ?? 3000),
  altitudeCeiling: Number(process.env.ALTITUDE_CEILING ?? 5000),
  polygonPath: process.env.RUNWAY_POLYGON_PATH || defaultPolygonPath,
  firstPingBaseline: parseBaseline(process.env.FIRST_PING_BASELINE),
  enrichOnStart: (process.env.ENRICH_ON_START ?? "true") !== "false",
  // Aircraft lookup page; the flight id goes in the fragment as hex
  lookupUrl: "https://www.flightradar24.com/data/aircraft/",
};

/** Reads the runway ring from disk and builds the containment predicate. Throws on a bad file. */
export function loadGeoPredicate(polygonPath = config.polygonPath, ceiling = config.altitudeCeiling): GeoPredicate {
  const source = path.basename(polygonPath);
  const doc: unknown = JSON.parse(fs.readFileSync(polygonPath, "utf8"));
  return createGeoPredicate(extractRing(doc), ceiling, source);
}
