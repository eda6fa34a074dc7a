import { describe, expect, it } from "vitest";
import { InvalidGeometryError } from "../errors.js";
import { createGeoPredicate, extractRing, insidePolygon, validatePolygon } from "../geo.js";
import { LonLat } from "../types.js";
import { BLAGNAC, INSIDE, OUTSIDE } from "./fixtures.js";

const square: LonLat[] = [
  [0, 0],
  [0, 10],
  [10, 10],
  [10, 0],
];

describe("insidePolygon()", () => {
  it("returns true for point inside", () => {
    expect(insidePolygon(5, 5, square)).toBe(true);
  });

  it("returns false for point outside", () => {
    expect(insidePolygon(15, 5, square)).toBe(false);
    expect(insidePolygon(5, -1, square)).toBe(false);
  });

  describe("for the Blagnac runway polygon", () => {
    it("returns true for the airport reference point", () => {
      expect(insidePolygon(INSIDE[0], INSIDE[1], BLAGNAC)).toBe(true);
    });
    it("returns true near the south-east threshold", () => {
      expect(insidePolygon(1.4, 43.6, BLAGNAC)).toBe(true);
    });
    it("returns false east of the runway", () => {
      expect(insidePolygon(OUTSIDE[0], OUTSIDE[1], BLAGNAC)).toBe(false);
      expect(insidePolygon(1.3, 43.7, BLAGNAC)).toBe(false);
    });
  });
});

describe("validatePolygon()", () => {
  it("drops the closing vertex", () => {
    expect(validatePolygon(BLAGNAC)).toHaveLength(17);
    expect(validatePolygon(square)).toHaveLength(4);
  });

  it("rejects fewer than 3 distinct vertices", () => {
    expect(() => validatePolygon([[0, 0], [1, 1], [0, 0]])).toThrow(InvalidGeometryError);
    expect(() => validatePolygon([])).toThrow("needs at least 3 distinct vertices, got 0");
  });

  it("rejects a self-intersecting ring", () => {
    const bowtie = [
      [0, 0],
      [10, 10],
      [10, 0],
      [0, 10],
    ];
    expect(() => validatePolygon(bowtie, "bowtie.json")).toThrow(
      "Invalid runway polygon (bowtie.json): edges 0 and 2 intersect"
    );
  });

  it("rejects malformed and out-of-range vertices", () => {
    expect(() => validatePolygon([[0, 0], [0, 10], [200, 10]])).toThrow("vertex 2 is not a valid [lon, lat] pair");
    expect(() => validatePolygon([[0, 0], [0, "x"], [10, 10]])).toThrow("vertex 1 is not a valid [lon, lat] pair");
    expect(() => validatePolygon("POLYGON ((0 0))")).toThrow(InvalidGeometryError);
  });
});

describe("extractRing()", () => {
  it("reads a bare ring and a { ring } document", () => {
    expect(extractRing(square)).toBe(square);
    expect(extractRing({ ring: square })).toBe(square);
  });

  it("reads GeoJSON polygons, features and collections", () => {
    const geometry = { type: "Polygon", coordinates: [square] };
    expect(extractRing(geometry)).toBe(square);
    expect(extractRing({ type: "Feature", geometry })).toBe(square);
    expect(extractRing({ type: "FeatureCollection", features: [{ type: "Feature", geometry }] })).toBe(square);
  });

  it("returns undefined for anything else", () => {
    expect(extractRing(null)).toBeUndefined();
    expect(extractRing({ type: "Point", coordinates: [0, 0] })).toBeUndefined();
  });
});

describe("createGeoPredicate()", () => {
  const region = createGeoPredicate(BLAGNAC, 5000);
  const inside = { longitude: INSIDE[0], latitude: INSIDE[1] };
  const outside = { longitude: OUTSIDE[0], latitude: OUTSIDE[1] };

  it("is true inside the polygon below the ceiling", () => {
    expect(region.contains(inside, 0)).toBe(true);
    expect(region.contains(inside, 4999)).toBe(true);
  });

  it("is false at or above the ceiling", () => {
    expect(region.contains(inside, 5000)).toBe(false);
    expect(region.contains(inside, 35000)).toBe(false);
  });

  it("is false outside the polygon whatever the altitude", () => {
    expect(region.contains(outside, 0)).toBe(false);
    expect(region.contains(outside, 1000)).toBe(false);
    expect(region.contains(outside, 10000)).toBe(false);
  });

  it("defaults to false on missing or degenerate telemetry", () => {
    expect(region.contains(inside, null)).toBe(false);
    expect(region.contains(inside, undefined)).toBe(false);
    expect(region.contains(inside, NaN)).toBe(false);
    expect(region.contains({ longitude: null, latitude: INSIDE[1] }, 1000)).toBe(false);
    expect(region.contains({ longitude: NaN, latitude: NaN }, 1000)).toBe(false);
    expect(region.contains({ longitude: 500, latitude: 43.6 }, 1000)).toBe(false);
  });

  it("refuses a non-finite ceiling", () => {
    expect(() => createGeoPredicate(BLAGNAC, NaN)).toThrow("altitude ceiling must be a finite number, got NaN");
  });
});
