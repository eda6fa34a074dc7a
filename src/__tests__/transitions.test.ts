import { describe, expect, it } from "vitest";
import { detectTransitions } from "../transitions.js";

describe("detectTransitions", () => {
  it("marks entries and exits along the timeline", () => {
    expect(detectTransitions([false, false, true, true, false])).toEqual([0, 0, 1, 0, -1]);
  });

  it("treats a missing predecessor as outside by default", () => {
    expect(detectTransitions([true, false, true, false])).toEqual([1, -1, 1, -1]);
    expect(detectTransitions([true])).toEqual([1]);
    expect(detectTransitions([false])).toEqual([0]);
  });

  it("gives the first ping no edge with the 'none' baseline", () => {
    expect(detectTransitions([true, true, false], "none")).toEqual([0, 0, -1]);
    expect(detectTransitions([true], "none")).toEqual([0]);
  });

  it("equals the first difference of the containment flags", () => {
    const flags = [true, true, false, true, false, false, true];
    const ints = flags.map((f) => (f ? 1 : 0));
    const expected = ints.map((v, i) => v - (i === 0 ? 0 : ints[i - 1]));
    expect(detectTransitions(flags)).toEqual(expected);
  });

  it("returns nothing for an empty flight", () => {
    expect(detectTransitions([])).toEqual([]);
  });

  it("is all zeros when the flight never enters the region", () => {
    expect(detectTransitions([false, false, false])).toEqual([0, 0, 0]);
  });
});
