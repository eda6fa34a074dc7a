import { FirstPingBaseline, Transition } from "./types.js";

/**
 * Signed edge of the containment signal along one flight's ordered pings:
 * +1 on entry, -1 on exit, 0 otherwise.
 */
export function detectTransitions(inRegion: readonly boolean[], baseline: FirstPingBaseline = "outside"): Transition[] {
  const transitions: Transition[] = [];
  let previous: boolean | undefined = baseline === "outside" ? false : undefined;

  for (const current of inRegion) {
    transitions.push(previous === undefined ? 0 : edge(previous, current));
    previous = current;
  }

  return transitions;
}

function edge(previous: boolean, current: boolean): Transition {
  if (previous === current) return 0;
  return current ? 1 : -1;
}
