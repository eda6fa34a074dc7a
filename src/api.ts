import { Router, Request, Response } from "express";
import { DB } from "./db.js";
import {
  getEvents,
  getFlightMetadata,
  getFlightPings,
  insertPings,
  isRunwayEvent,
  upsertFlights,
} from "./dbHelpers.js";
import { RunwayEventEngine } from "./engine.js";
import { EmptyPingSetError, GeometryUnavailableError } from "./errors.js";
import { GeoPredicate } from "./geo.js";
import { enrichStoredPings } from "./pipeline.js";
import { busiestFlights, eventCounts, missedFlights, touchAndGoByRegistration } from "./reports.js";
import { FlightMetadata, RawPing } from "./types.js";
import { getAltitudeRejection } from "./utils/altitudeFilter.js";
import { parseSince } from "./utils/parseSince.js";

function optionalNumber(value: unknown): number | null | undefined {
  if (value === undefined || value === null || value === "") return null;
  const n = Number(value);
  return Number.isFinite(n) ? n : undefined;
}

/**
 * Flight ids arrive as JSON numbers, or as strings holding the hex id used in
 * track file names (with or without 0x). Strings are always read as hex.
 */
export function parseFlightId(value: unknown): number | undefined {
  if (typeof value === "number") return Number.isSafeInteger(value) ? value : undefined;
  if (typeof value !== "string") return undefined;
  const match = value.trim().toLowerCase().match(/^(?:0x)?([0-9a-f]+)$/);
  if (!match) return undefined;
  const n = parseInt(match[1], 16);
  return Number.isSafeInteger(n) ? n : undefined;
}

/** Epoch seconds (number or all-digit string), or an ISO date string */
export function parseTimestamp(value: unknown): number | undefined {
  if (typeof value === "number") return Number.isFinite(value) ? value : undefined;
  if (typeof value !== "string") return undefined;
  const text = value.trim();
  if (/^\d+$/.test(text)) return Number(text);
  const ms = Date.parse(text);
  return Number.isNaN(ms) ? undefined : Math.floor(ms / 1000);
}

/** Validates one ping payload. Returns a message instead of throwing so the batch can report it. */
export function parseRawPing(body: unknown): RawPing | string {
  if (typeof body !== "object" || body === null) return "ping must be an object";
  const input: Record<string, unknown> = { ...body };

  const flightId = parseFlightId(input.flightId);
  if (flightId === undefined) return "flightId is required";

  const timestamp = parseTimestamp(input.timestamp);
  if (timestamp === undefined) return "timestamp must be epoch seconds or an ISO date";

  const fields = {
    longitude: optionalNumber(input.longitude),
    latitude: optionalNumber(input.latitude),
    altitude: optionalNumber(input.altitude),
    groundSpeed: optionalNumber(input.groundSpeed),
    verticalSpeed: optionalNumber(input.verticalSpeed),
    heading: optionalNumber(input.heading),
  };
  for (const [key, value] of Object.entries(fields)) {
    if (value === undefined) return `${key} must be a number`;
  }

  return {
    flightId,
    timestamp,
    longitude: fields.longitude ?? null,
    latitude: fields.latitude ?? null,
    altitude: fields.altitude ?? null,
    groundSpeed: fields.groundSpeed ?? null,
    verticalSpeed: fields.verticalSpeed ?? null,
    heading: fields.heading ?? null,
    squawk: input.squawk == null ? null : String(input.squawk),
  };
}

function parseFlight(body: unknown): FlightMetadata | string {
  if (typeof body !== "object" || body === null) return "flight must be an object";
  const input: Record<string, unknown> = { ...body };
  const flightId = parseFlightId(input.flightId);
  if (flightId === undefined) return "flightId is required";

  const text = (v: unknown) => (typeof v === "string" && v.trim() !== "" ? v.trim() : null);
  const statusTime = input.statusTime == null ? null : parseTimestamp(input.statusTime);
  if (statusTime === undefined) return "statusTime must be epoch seconds or an ISO date";

  return {
    flightId,
    registration: text(input.registration),
    origin: text(input.origin)?.toUpperCase() ?? null,
    destination: text(input.destination)?.toUpperCase() ?? null,
    statusTime,
  };
}

function asArray(body: unknown, key: string): unknown[] | undefined {
  if (Array.isArray(body)) return body;
  if (typeof body === "object" && body !== null && key in body) {
    const value: unknown = Object.getOwnPropertyDescriptor(body, key)?.value;
    return Array.isArray(value) ? value : undefined;
  }
  return undefined;
}

export function createApi(db: DB, engine: RunwayEventEngine, region: GeoPredicate): Router {
  const router = Router();

  // ---------- ingestion ----------
  router.post("/pings", (req: Request, res: Response) => {
    const items = asArray(req.body, "pings");
    if (!items || items.length === 0) {
      return res.status(400).json({ error: "Expected a non-empty array of pings" });
    }

    const pings: RawPing[] = [];
    for (const [index, item] of items.entries()) {
      const parsed = parseRawPing(item);
      if (typeof parsed === "string") {
        return res.status(400).json({ error: `Ping ${index}: ${parsed}` });
      }
      pings.push(parsed);
    }

    const stored = insertPings(db, pings);
    console.log(`Stored ${stored.length} pings (ids ${stored[0].id}-${stored[stored.length - 1].id})`);
    res.status(201).json({ count: stored.length, firstId: stored[0].id, lastId: stored[stored.length - 1].id });
  });

  router.post("/flights", (req: Request, res: Response) => {
    const items = asArray(req.body, "flights");
    if (!items || items.length === 0) {
      return res.status(400).json({ error: "Expected a non-empty array of flights" });
    }

    const flights: FlightMetadata[] = [];
    for (const [index, item] of items.entries()) {
      const parsed = parseFlight(item);
      if (typeof parsed === "string") {
        return res.status(400).json({ error: `Flight ${index}: ${parsed}` });
      }
      flights.push(parsed);
    }

    res.status(201).json({ count: upsertFlights(db, flights) });
  });

  // ---------- classification ----------
  router.post("/enrich", (_req: Request, res: Response) => {
    try {
      res.json(enrichStoredPings(db, engine));
    } catch (err) {
      if (err instanceof EmptyPingSetError) {
        return res.status(409).json({ error: err.message });
      }
      if (err instanceof GeometryUnavailableError) {
        console.error("Enrichment aborted:", err.message);
        return res.status(500).json({ error: err.message });
      }
      throw err;
    }
  });

  router.get("/region", (_req: Request, res: Response) => {
    res.json({ polygon: region.polygon, altitudeCeiling: region.altitudeCeiling });
  });

  router.get("/region/check", (req: Request, res: Response) => {
    const longitude = optionalNumber(req.query.lon);
    const latitude = optionalNumber(req.query.lat);
    const altitude = optionalNumber(req.query.alt);
    if (longitude === undefined || latitude === undefined || altitude === undefined) {
      return res.status(400).json({ error: "lon, lat and alt must be numbers" });
    }

    const point = { longitude, latitude };
    res.json({
      inRegion: region.contains(point, altitude),
      altitude: getAltitudeRejection(altitude, region.altitudeCeiling) ?? "ok",
    });
  });

  // ---------- flights & events ----------
  router.get("/flights/:id/pings", (req: Request, res: Response) => {
    const flightId = parseFlightId(req.params.id);
    if (flightId === undefined) {
      return res.status(400).json({ error: "Invalid flight ID" });
    }

    const pings = getFlightPings(db, flightId);
    if (pings.length === 0) {
      return res.status(404).json({ error: "Flight not found" });
    }

    res.json({ flight: getFlightMetadata(db, flightId) ?? null, pings });
  });

  router.get("/events", (req: Request, res: Response) => {
    const sinceRaw = typeof req.query.since === "string" ? req.query.since : undefined;
    let since: number | undefined;
    if (sinceRaw) {
      since = parseSince(sinceRaw) ?? parseTimestamp(sinceRaw);
      if (since === undefined) {
        return res.status(400).json({ error: "Invalid since value" });
      }
    }

    const event = req.query.event;
    if (event !== undefined && !isRunwayEvent(event)) {
      return res.status(400).json({ error: "event must be takeoff, landing or touch-n-go" });
    }

    const flightId = req.query.flightId === undefined ? undefined : parseFlightId(req.query.flightId);
    if (req.query.flightId !== undefined && flightId === undefined) {
      return res.status(400).json({ error: "Invalid flight ID" });
    }

    const limit = req.query.limit === undefined ? undefined : Number(req.query.limit);
    if (limit !== undefined && !(Number.isSafeInteger(limit) && limit > 0)) {
      return res.status(400).json({ error: "limit must be a positive integer" });
    }

    res.json(getEvents(db, { since, event, flightId, limit }));
  });

  // ---------- reports ----------
  router.get("/reports/touch-and-go", (_req: Request, res: Response) => {
    res.json(touchAndGoByRegistration(db));
  });

  router.get("/reports/busiest-flights", (req: Request, res: Response) => {
    const limit = Number(req.query.limit ?? 20);
    res.json(busiestFlights(db, Number.isSafeInteger(limit) && limit > 0 ? limit : 20));
  });

  router.get("/reports/missed-flights", (req: Request, res: Response) => {
    const airport = typeof req.query.airport === "string" ? req.query.airport.trim().toUpperCase() : "";
    if (!airport) {
      return res.status(400).json({ error: "airport is required" });
    }
    res.json(missedFlights(db, airport));
  });

  router.get("/reports/event-counts", (_req: Request, res: Response) => {
    res.json(eventCounts(db));
  });

  return router;
}
