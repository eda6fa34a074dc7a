import { RunwayEvent, Transition } from "./types.js";

/**
 * Labels one crossing from its neighbours in the non-zero subsequence.
 * Rules are checked in order; the first match wins.
 */
export function labelCrossing(current: Transition, prev: Transition | undefined, next: Transition | undefined): RunwayEvent | null {
  if (current === -1 && prev === 1) return "touch-n-go";
  if (current === 1 && next === undefined) return "landing";
  if (current === -1 && prev === undefined) return "takeoff";
  return null;
}

/**
 * Assigns runway events to a flight's transitions (in time order).
 * Only non-zero transitions can carry a label, and prev/next are looked up
 * among the other non-zero transitions, not the raw timeline.
 */
export function classifyEvents(transitions: readonly Transition[]): (RunwayEvent | null)[] {
  const events: (RunwayEvent | null)[] = transitions.map(() => null);
  const crossings: number[] = [];
  transitions.forEach((t, index) => {
    if (t !== 0) crossings.push(index);
  });

  crossings.forEach((index, k) => {
    const prev = k > 0 ? transitions[crossings[k - 1]] : undefined;
    const next = k < crossings.length - 1 ? transitions[crossings[k + 1]] : undefined;
    events[index] = labelCrossing(transitions[index], prev, next);
  });

  return events;
}
