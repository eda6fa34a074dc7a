import { config } from "./config.js";
import { DB } from "./db.js";
import { PingIdAllocator } from "./idAllocator.js";
import {
  EnrichedPing,
  FlightMetadata,
  FlightRow,
  Ping,
  PingRow,
  RawPing,
  RunwayEvent,
  Transition,
} from "./types.js";

export interface StoredPing extends Ping {
  inRegion: boolean | null;
  transition: Transition | null;
  event: RunwayEvent | null;
}

interface EventQuery {
  since?: number; // epoch seconds
  event?: RunwayEvent;
  flightId?: number;
  limit?: number;
}

export interface EventResult {
  pingId: number;
  flightId: number;
  event: RunwayEvent;
  timestamp: number;
  time: string;
  longitude: number | null;
  latitude: number | null;
  altitude: number | null;
  registration?: string;
  url?: string;
}

export const RUNWAY_EVENTS: readonly RunwayEvent[] = ["takeoff", "landing", "touch-n-go"];

export function isRunwayEvent(value: unknown): value is RunwayEvent {
  return RUNWAY_EVENTS.some((e) => e === value);
}

function toTransition(value: number | null): Transition | null {
  if (value === -1 || value === 0 || value === 1) return value;
  return null;
}

function rowToPing(row: PingRow): StoredPing {
  return {
    id: row.id,
    flightId: row.flight_id,
    timestamp: row.timestamp,
    longitude: row.longitude,
    latitude: row.latitude,
    altitude: row.altitude,
    groundSpeed: row.ground_speed,
    verticalSpeed: row.vertical_speed,
    heading: row.heading,
    squawk: row.squawk,
    inRegion: row.in_region === null ? null : row.in_region === 1,
    transition: toTransition(row.transition),
    event: isRunwayEvent(row.event) ? row.event : null,
  };
}

/** Aircraft page for a registration, with the flight id as a hex fragment */
export function flightUrl(registration: string | null, flightId: number, base = config.lookupUrl): string | undefined {
  if (!registration) return undefined;
  return `${base}${registration.toLowerCase()}#${flightId.toString(16)}`;
}

/**
 * Stores a batch of pings, giving each one the next id after the highest stored one.
 * Runs in one transaction so a failed batch leaves no partial ids behind.
 */
export function insertPings(db: DB, pings: readonly RawPing[]): Ping[] {
  const { last } = db.prepare("SELECT COALESCE(MAX(id), 0) AS last FROM pings").get() as { last: number };
  const ids = new PingIdAllocator(last);

  const insert = db.prepare(`
    INSERT INTO pings (id, flight_id, timestamp, longitude, latitude, altitude, ground_speed, vertical_speed, heading, squawk)
    VALUES (@id, @flightId, @timestamp, @longitude, @latitude, @altitude, @groundSpeed, @verticalSpeed, @heading, @squawk)
  `);

  const run = db.transaction((batch: readonly RawPing[]) =>
    batch.map((raw) => {
      const ping: Ping = {
        id: ids.next(),
        flightId: raw.flightId,
        timestamp: raw.timestamp,
        longitude: raw.longitude,
        latitude: raw.latitude,
        altitude: raw.altitude,
        groundSpeed: raw.groundSpeed ?? null,
        verticalSpeed: raw.verticalSpeed ?? null,
        heading: raw.heading ?? null,
        squawk: raw.squawk ?? null,
      };
      insert.run(ping);
      return ping;
    })
  );

  return run(pings);
}

export function upsertFlights(db: DB, flights: readonly FlightMetadata[]): number {
  const upsert = db.prepare(`
    INSERT INTO flights (flight_id, registration, origin, destination, status_time)
    VALUES (@flightId, @registration, @origin, @destination, @statusTime)
    ON CONFLICT(flight_id) DO UPDATE SET
      registration = excluded.registration,
      origin = excluded.origin,
      destination = excluded.destination,
      status_time = excluded.status_time
  `);

  const run = db.transaction((batch: readonly FlightMetadata[]) => {
    for (const flight of batch) upsert.run(flight);
    return batch.length;
  });
  return run(flights);
}

export function loadPings(db: DB): StoredPing[] {
  const rows = db.prepare("SELECT * FROM pings ORDER BY id").all() as PingRow[];
  return rows.map(rowToPing);
}

export function getFlightPings(db: DB, flightId: number): StoredPing[] {
  const rows = db
    .prepare("SELECT * FROM pings WHERE flight_id = ? ORDER BY timestamp, id")
    .all(flightId) as PingRow[];
  return rows.map(rowToPing);
}

/** Writes the three derived columns back in a single transaction */
export function saveEnrichment(db: DB, pings: readonly EnrichedPing[]): number {
  const update = db.prepare(
    "UPDATE pings SET in_region = @inRegion, transition = @transition, event = @event WHERE id = @id"
  );

  const run = db.transaction((batch: readonly EnrichedPing[]) => {
    let changes = 0;
    for (const ping of batch) {
      changes += update.run({
        id: ping.id,
        inRegion: ping.inRegion ? 1 : 0,
        transition: ping.transition,
        event: ping.event,
      }).changes;
    }
    return changes;
  });

  return run(pings);
}

export function getFlightMetadata(db: DB, flightId: number): (FlightMetadata & { url?: string }) | undefined {
  const row = db
    .prepare("SELECT flight_id, registration, origin, destination, status_time FROM flights WHERE flight_id = ?")
    .get(flightId) as FlightRow | undefined;
  if (!row) return undefined;

  return {
    flightId: row.flight_id,
    registration: row.registration,
    origin: row.origin,
    destination: row.destination,
    statusTime: row.status_time,
    url: flightUrl(row.registration, row.flight_id),
  };
}

export function getEvents(db: DB, params: EventQuery): EventResult[] {
  const queryParams: Record<string, string | number> = {};
  const whereConditions: string[] = ["p.event IS NOT NULL"];
  let limitClause = "";

  if (params.since !== undefined) {
    whereConditions.push("p.timestamp >= @since");
    queryParams.since = params.since;
  }

  if (params.event) {
    whereConditions.push("p.event = @event");
    queryParams.event = params.event;
  }

  if (params.flightId !== undefined) {
    whereConditions.push("p.flight_id = @flightId");
    queryParams.flightId = params.flightId;
  }

  if (params.limit !== undefined) {
    limitClause = "LIMIT @limit";
    queryParams.limit = params.limit;
  }

  const query = `
    SELECT
      p.id,
      p.flight_id,
      p.event,
      p.timestamp,
      p.longitude,
      p.latitude,
      p.altitude,
      f.registration
    FROM pings p
    LEFT JOIN flights f ON f.flight_id = p.flight_id
    WHERE ${whereConditions.join(" AND ")}
    ORDER BY p.timestamp DESC, p.id DESC
    ${limitClause}
  `;

  const rows = db.prepare(query).all(queryParams) as (Pick<
    PingRow,
    "id" | "flight_id" | "event" | "timestamp" | "longitude" | "latitude" | "altitude"
  > & { registration: string | null })[];

  return rows.flatMap((row) => {
    if (!isRunwayEvent(row.event)) return [];
    return [
      {
        pingId: row.id,
        flightId: row.flight_id,
        event: row.event,
        timestamp: row.timestamp,
        time: new Date(row.timestamp * 1000).toISOString(),
        longitude: row.longitude,
        latitude: row.latitude,
        altitude: row.altitude,
        registration: row.registration || undefined,
        url: flightUrl(row.registration, row.flight_id),
      },
    ];
  });
}
