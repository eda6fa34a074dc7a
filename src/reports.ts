import { DB } from "./db.js";
import { flightUrl, isRunwayEvent } from "./dbHelpers.js";
import { RunwayEvent } from "./types.js";

export interface RegistrationCount {
  registration: string | null;
  count: number;
}

export interface FlightCrossings {
  flightId: number;
  registration: string | null;
  firstCrossing: string;
  crossings: number;
  url?: string;
}

export interface MissedFlight {
  flightId: number;
  registration: string | null;
  origin: string | null;
  destination: string | null;
  statusTime: string | null;
  url?: string;
}

/** Touch-and-go count per aircraft registration, most active first */
export function touchAndGoByRegistration(db: DB): RegistrationCount[] {
  return db
    .prepare(
      `
    SELECT f.registration, COUNT(*) AS count
    FROM pings p
    INNER JOIN flights f ON f.flight_id = p.flight_id
    WHERE p.event = 'touch-n-go'
    GROUP BY f.registration
    ORDER BY count DESC, f.registration
  `
    )
    .all() as RegistrationCount[];
}

/** Flights with the most region crossings */
export function busiestFlights(db: DB, limit = 20): FlightCrossings[] {
  const rows = db
    .prepare(
      `
    SELECT p.flight_id, f.registration, MIN(p.timestamp) AS first_crossing, COUNT(*) AS crossings
    FROM pings p
    LEFT JOIN flights f ON f.flight_id = p.flight_id
    WHERE p.transition != 0
    GROUP BY p.flight_id
    ORDER BY crossings DESC, p.flight_id
    LIMIT ?
  `
    )
    .all(limit) as { flight_id: number; registration: string | null; first_crossing: number; crossings: number }[];

  return rows.map((row) => ({
    flightId: row.flight_id,
    registration: row.registration,
    firstCrossing: new Date(row.first_crossing * 1000).toISOString(),
    crossings: row.crossings,
    url: flightUrl(row.registration, row.flight_id),
  }));
}

/**
 * Flights scheduled to or from an airport that never pinged inside the runway region.
 * These usually point at a track gap or a polygon that is too tight.
 */
export function missedFlights(db: DB, airport: string): MissedFlight[] {
  const rows = db
    .prepare(
      `
    SELECT p.flight_id, f.registration, f.origin, f.destination, f.status_time
    FROM pings p
    INNER JOIN flights f ON f.flight_id = p.flight_id
    WHERE f.origin = @airport OR f.destination = @airport
    GROUP BY p.flight_id
    HAVING SUM(COALESCE(p.in_region, 0)) = 0
    ORDER BY p.flight_id
  `
    )
    .all({ airport }) as {
    flight_id: number;
    registration: string | null;
    origin: string | null;
    destination: string | null;
    status_time: number | null;
  }[];

  return rows.map((row) => ({
    flightId: row.flight_id,
    registration: row.registration,
    origin: row.origin,
    destination: row.destination,
    statusTime: row.status_time === null ? null : new Date(row.status_time * 1000).toISOString(),
    url: flightUrl(row.registration, row.flight_id),
  }));
}

export function eventCounts(db: DB): Record<RunwayEvent, number> {
  const counts: Record<RunwayEvent, number> = { takeoff: 0, landing: 0, "touch-n-go": 0 };
  const rows = db
    .prepare("SELECT event, COUNT(*) AS count FROM pings WHERE event IS NOT NULL GROUP BY event")
    .all() as { event: string; count: number }[];

  for (const row of rows) {
    if (isRunwayEvent(row.event)) counts[row.event] = row.count;
  }
  return counts;
}
