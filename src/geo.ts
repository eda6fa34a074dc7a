import { InvalidGeometryError } from "./errors.js";
import { LonLat, Polygon } from "./types.js";
import { checkAltitudeCeiling } from "./utils/altitudeFilter.js";

// Ray‑casting algorithm — returns true if (lon,lat) is inside the [lon,lat] ring
export function insidePolygon(lon: number, lat: number, poly: Polygon): boolean {
  let inside = false;
  for (let i = 0, j = poly.length - 1; i < poly.length; j = i++) {
    const [lonI, latI] = poly[i];
    const [lonJ, latJ] = poly[j];
    const intersect = latI > lat !== latJ > lat && lon < ((lonJ - lonI) * (lat - latI)) / (latJ - latI) + lonI;
    if (intersect) inside = !inside;
  }
  return inside;
}

function isCoordinate(lon: unknown, lat: unknown): boolean {
  return (
    typeof lon === "number" &&
    typeof lat === "number" &&
    Number.isFinite(lon) &&
    Number.isFinite(lat) &&
    lon >= -180 &&
    lon <= 180 &&
    lat >= -90 &&
    lat <= 90
  );
}

function orientation(a: LonLat, b: LonLat, c: LonLat): number {
  const cross = (b[0] - a[0]) * (c[1] - a[1]) - (b[1] - a[1]) * (c[0] - a[0]);
  return Math.sign(cross);
}

function onSegment(a: LonLat, b: LonLat, p: LonLat): boolean {
  return (
    Math.min(a[0], b[0]) <= p[0] &&
    p[0] <= Math.max(a[0], b[0]) &&
    Math.min(a[1], b[1]) <= p[1] &&
    p[1] <= Math.max(a[1], b[1])
  );
}

export function segmentsIntersect(p1: LonLat, p2: LonLat, p3: LonLat, p4: LonLat): boolean {
  const d1 = orientation(p3, p4, p1);
  const d2 = orientation(p3, p4, p2);
  const d3 = orientation(p1, p2, p3);
  const d4 = orientation(p1, p2, p4);

  if (d1 * d2 < 0 && d3 * d4 < 0) return true;

  // Collinear overlaps
  if (d1 === 0 && onSegment(p3, p4, p1)) return true;
  if (d2 === 0 && onSegment(p3, p4, p2)) return true;
  if (d3 === 0 && onSegment(p1, p2, p3)) return true;
  if (d4 === 0 && onSegment(p1, p2, p4)) return true;
  return false;
}

/**
 * Checks a ring and returns it without the closing vertex.
 * Throws InvalidGeometryError for fewer than 3 distinct vertices,
 * out-of-range coordinates or crossing edges.
 */
export function validatePolygon(ring: unknown, source?: string): Polygon {
  if (!Array.isArray(ring)) {
    throw new InvalidGeometryError("ring must be an array of [lon, lat] pairs", source);
  }

  const vertices: Polygon = [];
  ring.forEach((pair: unknown, index) => {
    if (!Array.isArray(pair) || pair.length < 2 || !isCoordinate(pair[0], pair[1])) {
      throw new InvalidGeometryError(`vertex ${index} is not a valid [lon, lat] pair`, source);
    }
    vertices.push([Number(pair[0]), Number(pair[1])]);
  });

  const first = vertices[0];
  const last = vertices[vertices.length - 1];
  if (vertices.length > 1 && first[0] === last[0] && first[1] === last[1]) {
    vertices.pop();
  }

  const distinct = new Set(vertices.map(([lon, lat]) => `${lon},${lat}`));
  if (distinct.size < 3) {
    throw new InvalidGeometryError(`needs at least 3 distinct vertices, got ${distinct.size}`, source);
  }

  const n = vertices.length;
  for (let i = 0; i < n; i++) {
    for (let j = i + 1; j < n; j++) {
      // Adjacent edges share a vertex
      if (j === i + 1 || (i === 0 && j === n - 1)) continue;
      if (segmentsIntersect(vertices[i], vertices[(i + 1) % n], vertices[j], vertices[(j + 1) % n])) {
        throw new InvalidGeometryError(`edges ${i} and ${j} intersect`, source);
      }
    }
  }

  return vertices;
}

/**
 * Extracts the outer ring from a polygon document. Accepts a bare ring,
 * `{ ring: [...] }`, a GeoJSON Polygon, Feature or FeatureCollection.
 */
export function extractRing(doc: unknown): unknown {
  if (Array.isArray(doc)) return doc;
  if (typeof doc !== "object" || doc === null) return undefined;

  if ("ring" in doc) return doc.ring;

  if ("type" in doc) {
    if (doc.type === "FeatureCollection" && "features" in doc && Array.isArray(doc.features)) {
      return extractRing(doc.features[0]);
    }
    if (doc.type === "Feature" && "geometry" in doc) {
      return extractRing(doc.geometry);
    }
    if (doc.type === "Polygon" && "coordinates" in doc && Array.isArray(doc.coordinates)) {
      return doc.coordinates[0];
    }
  }
  return undefined;
}

export interface GeoPredicate {
  readonly polygon: Polygon;
  readonly altitudeCeiling: number;
  contains(point: { longitude: number | null; latitude: number | null }, altitude: number | null | undefined): boolean;
}

/**
 * Builds the runway containment test: inside the ring AND strictly below the ceiling.
 * Anything missing or non-finite resolves to false.
 */
export function createGeoPredicate(ring: unknown, altitudeCeiling: number, source?: string): GeoPredicate {
  const polygon = validatePolygon(ring, source);
  if (!Number.isFinite(altitudeCeiling)) {
    throw new InvalidGeometryError(`altitude ceiling must be a finite number, got ${altitudeCeiling}`, source);
  }

  return {
    polygon,
    altitudeCeiling,
    contains(point, altitude) {
      const { longitude, latitude } = point;
      if (longitude == null || latitude == null || !isCoordinate(longitude, latitude)) return false;
      return checkAltitudeCeiling(altitude, altitudeCeiling) && insidePolygon(longitude, latitude, polygon);
    },
  };
}
