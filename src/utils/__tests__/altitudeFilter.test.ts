import { describe, it, expect } from "vitest";
import { checkAltitudeCeiling, getAltitudeRejection } from "../altitudeFilter.js";

describe("checkAltitudeCeiling", () => {
  it("should reject pings with no altitude data", () => {
    expect(checkAltitudeCeiling(undefined, 5000)).toBe(false);
    expect(checkAltitudeCeiling(null, 5000)).toBe(false);
    expect(checkAltitudeCeiling(NaN, 5000)).toBe(false);
  });

  it("should allow altitudes below the ceiling", () => {
    expect(checkAltitudeCeiling(0, 5000)).toBe(true);
    expect(checkAltitudeCeiling(4999, 5000)).toBe(true);
    expect(checkAltitudeCeiling(-100, 5000)).toBe(true);
  });

  it("should reject altitude exactly at the ceiling", () => {
    expect(checkAltitudeCeiling(5000, 5000)).toBe(false);
  });

  it("should reject altitudes above the ceiling", () => {
    expect(checkAltitudeCeiling(5001, 5000)).toBe(false);
    expect(checkAltitudeCeiling(38000, 5000)).toBe(false);
  });
});

describe("getAltitudeRejection", () => {
  it("should explain missing altitude", () => {
    expect(getAltitudeRejection(null, 5000)).toBe("no altitude data");
  });

  it("should explain altitude at or above the ceiling", () => {
    expect(getAltitudeRejection(5000, 5000)).toBe("at or above ceiling (5000ft >= 5000ft)");
    expect(getAltitudeRejection(6000, 5000)).toBe("at or above ceiling (6000ft >= 5000ft)");
  });

  it("should return null when altitude passes", () => {
    expect(getAltitudeRejection(1200, 5000)).toBeNull();
  });
});
