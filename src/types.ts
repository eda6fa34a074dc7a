/** Geographic coordinate, longitude first like the runway ring */
export type LonLat = [number, number];

/** Closed ring of [lon, lat] pairs describing the runway-proximity region */
export type Polygon = LonLat[];

export type RunwayEvent = "takeoff" | "landing" | "touch-n-go";

export type Transition = -1 | 0 | 1;

/**
 * How the first ping of a flight is compared.
 * "outside" treats the missing predecessor as not in region,
 * "none" gives the first ping no edge at all.
 */
export type FirstPingBaseline = "outside" | "none";

/** Telemetry sample as received from the track files, before an id is allocated */
export interface RawPing {
  flightId: number;
  timestamp: number; // epoch seconds
  longitude: number | null;
  latitude: number | null;
  altitude: number | null; // feet
  groundSpeed?: number | null; // knots
  verticalSpeed?: number | null; // ft/min
  heading?: number | null;
  squawk?: string | null;
}

export interface Ping extends RawPing {
  id: number;
}

export interface EnrichedPing extends Ping {
  inRegion: boolean;
  transition: Transition;
  event: RunwayEvent | null;
}

export interface FlightMetadata {
  flightId: number;
  registration: string | null;
  origin: string | null;
  destination: string | null;
  statusTime: number | null; // epoch seconds
}

export type PingRow = {
  id: number;
  flight_id: number;
  timestamp: number;
  longitude: number | null;
  latitude: number | null;
  altitude: number | null;
  ground_speed: number | null;
  vertical_speed: number | null;
  heading: number | null;
  squawk: string | null;
  in_region: number | null;
  transition: number | null;
  event: string | null;
};

export type FlightRow = {
  flight_id: number;
  registration: string | null;
  origin: string | null;
  destination: string | null;
  status_time: number | null;
};
