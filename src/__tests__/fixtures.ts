import { LonLat, Ping, RawPing } from "../types.js";

// Runway reference point and a spot east of the airfield
export const INSIDE: LonLat = [1.3642, 43.6287];
export const OUTSIDE: LonLat = [1.45, 43.63];

export const BLAGNAC: LonLat[] = [
  [1.374827, 43.610997],
  [1.357907, 43.61213],
  [1.345193, 43.631459],
  [1.34177, 43.642005],
  [1.340938, 43.644966],
  [1.315268, 43.669529],
  [1.32317, 43.673883],
  [1.345539, 43.652474],
  [1.352039, 43.654319],
  [1.362308, 43.655522],
  [1.36358, 43.643775],
  [1.390182, 43.623388],
  [1.393312, 43.616874],
  [1.385374, 43.614351],
  [1.413062, 43.587853],
  [1.405172, 43.583499],
  [1.376035, 43.611381],
  [1.374827, 43.610997],
];

/** Raw pings for one flight, 10s apart, from a list of in/out positions */
export function track(flightId: number, positions: boolean[], altitude = 1000, start = 1_700_000_000): RawPing[] {
  return positions.map((inside, i) => {
    const [longitude, latitude] = inside ? INSIDE : OUTSIDE;
    return { flightId, timestamp: start + i * 10, longitude, latitude, altitude };
  });
}

/** Same as track() but with ids assigned from `firstId` */
export function pings(flightId: number, positions: boolean[], firstId = 1, altitude = 1000): Ping[] {
  return track(flightId, positions, altitude).map((raw, i) => ({ ...raw, id: firstId + i }));
}
