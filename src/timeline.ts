import { Ping } from "./types.js";

/** Timestamp ascending, then ingestion id so equal timestamps still have a stable order */
export function comparePings(a: Ping, b: Ping): number {
  return a.timestamp - b.timestamp || a.id - b.id;
}

/**
 * Pings grouped per flight and sorted in time. Lookups of neighbours are
 * scoped to the ping's own flight.
 */
export class PingTimeline<P extends Ping = Ping> {
  private flights: Map<number, P[]> = new Map();
  private positions: Map<number, number> = new Map(); // ping id -> index in its flight
  private duplicates = 0;

  constructor(pings: Iterable<P>) {
    for (const ping of pings) {
      if (!this.flights.has(ping.flightId)) {
        this.flights.set(ping.flightId, []);
      }
      this.flights.get(ping.flightId)?.push(ping);
    }

    for (const timeline of this.flights.values()) {
      timeline.sort(comparePings);
      timeline.forEach((ping, index) => {
        this.positions.set(ping.id, index);
        if (index > 0 && timeline[index - 1].timestamp === ping.timestamp) {
          this.duplicates++;
        }
      });
    }
  }

  flightIds(): number[] {
    return Array.from(this.flights.keys());
  }

  timelineFor(flightId: number): readonly P[] {
    return this.flights.get(flightId) ?? [];
  }

  previous(ping: Ping): P | undefined {
    return this.neighbour(ping, -1);
  }

  next(ping: Ping): P | undefined {
    return this.neighbour(ping, 1);
  }

  /** Pings sharing a timestamp with their predecessor in the same flight */
  get duplicateTimestamps(): number {
    return this.duplicates;
  }

  private neighbour(ping: Ping, offset: number): P | undefined {
    const index = this.positions.get(ping.id);
    const timeline = this.flights.get(ping.flightId);
    if (index === undefined || !timeline || timeline[index]?.id !== ping.id) return undefined;
    return timeline[index + offset];
  }
}
