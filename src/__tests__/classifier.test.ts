import { describe, expect, it } from "vitest";
import { classifyEvents, labelCrossing } from "../classifier.js";

describe("labelCrossing", () => {
  it("labels an exit after an entry as a touch-n-go", () => {
    expect(labelCrossing(-1, 1, undefined)).toBe("touch-n-go");
    expect(labelCrossing(-1, 1, 1)).toBe("touch-n-go");
  });

  it("labels the final entry as a landing", () => {
    expect(labelCrossing(1, -1, undefined)).toBe("landing");
    expect(labelCrossing(1, undefined, undefined)).toBe("landing");
  });

  it("labels a first crossing that is an exit as a takeoff", () => {
    expect(labelCrossing(-1, undefined, 1)).toBe("takeoff");
    expect(labelCrossing(-1, undefined, undefined)).toBe("takeoff");
  });

  it("leaves intermediate entries unlabelled", () => {
    expect(labelCrossing(1, undefined, -1)).toBeNull();
    expect(labelCrossing(1, -1, -1)).toBeNull();
  });
});

describe("classifyEvents", () => {
  it("only labels non-zero transitions", () => {
    expect(classifyEvents([0, 1, 0, -1, 0, 1])).toEqual([null, null, null, "touch-n-go", null, "landing"]);
  });

  it("looks up neighbours among crossings, not raw pings", () => {
    expect(classifyEvents([0, 0, -1, 0, 0, 0, 1, 0])).toEqual([null, null, "takeoff", null, null, null, "landing", null]);
  });

  it("labels an enter-exit-enter-exit flight", () => {
    expect(classifyEvents([1, -1, 1, -1])).toEqual([null, "touch-n-go", null, "touch-n-go"]);
  });

  it("labels a lone entry as a landing", () => {
    expect(classifyEvents([1])).toEqual(["landing"]);
  });

  it("labels nothing when there are no crossings", () => {
    expect(classifyEvents([0, 0, 0])).toEqual([null, null, null]);
    expect(classifyEvents([])).toEqual([]);
  });
});
