import { classifyEvents } from "./classifier.js";
import { EmptyPingSetError, GeometryUnavailableError } from "./errors.js";
import { GeoPredicate } from "./geo.js";
import { PingTimeline } from "./timeline.js";
import { detectTransitions } from "./transitions.js";
import { EnrichedPing, FirstPingBaseline, Ping, RunwayEvent } from "./types.js";

export interface EngineOptions {
  baseline?: FirstPingBaseline;
  /** Throw EmptyPingSetError instead of returning an empty result */
  requirePings?: boolean;
  quiet?: boolean;
}

export interface EnrichmentDiagnostics {
  flights: number;
  pings: number;
  inRegion: number;
  crossings: number;
  missingTelemetry: number;
  duplicateTimestamps: number;
  events: Record<RunwayEvent, number>;
}

export interface EnrichmentResult {
  pings: EnrichedPing[];
  diagnostics: EnrichmentDiagnostics;
}

function hasTelemetry(ping: Ping): boolean {
  return [ping.longitude, ping.latitude, ping.altitude].every((v) => typeof v === "number" && Number.isFinite(v));
}

export class RunwayEventEngine {
  private readonly baseline: FirstPingBaseline;
  private readonly requirePings: boolean;
  private readonly quiet: boolean;

  constructor(private readonly predicate: GeoPredicate, options: EngineOptions = {}) {
    this.baseline = options.baseline ?? "outside";
    this.requirePings = options.requirePings ?? false;
    this.quiet = options.quiet ?? false;
  }

  /**
   * Enriches one flight's pings. The caller passes them in any order;
   * the result is in timeline order.
   */
  enrichFlight(pings: readonly Ping[]): EnrichedPing[] {
    this.assertGeometry();
    const timeline = new PingTimeline(pings);
    return timeline.flightIds().flatMap((flightId) => this.classifyTimeline(timeline.timelineFor(flightId)));
  }

  /** Runs all three passes over every flight. Output keeps the input order. */
  enrich(pings: readonly Ping[]): EnrichmentResult {
    this.assertGeometry();
    if (pings.length === 0 && this.requirePings) {
      throw new EmptyPingSetError();
    }

    const timeline = new PingTimeline(pings);
    const byId = new Map<number, EnrichedPing>();
    const diagnostics: EnrichmentDiagnostics = {
      flights: 0,
      pings: pings.length,
      inRegion: 0,
      crossings: 0,
      missingTelemetry: 0,
      duplicateTimestamps: timeline.duplicateTimestamps,
      events: { takeoff: 0, landing: 0, "touch-n-go": 0 },
    };

    for (const flightId of timeline.flightIds()) {
      diagnostics.flights++;
      for (const enriched of this.classifyTimeline(timeline.timelineFor(flightId))) {
        byId.set(enriched.id, enriched);
        if (!hasTelemetry(enriched)) diagnostics.missingTelemetry++;
        if (enriched.inRegion) diagnostics.inRegion++;
        if (enriched.transition !== 0) diagnostics.crossings++;
        if (enriched.event) diagnostics.events[enriched.event]++;
      }
    }

    const result = pings.map((ping) => byId.get(ping.id) ?? { ...ping, inRegion: false, transition: 0 as const, event: null });
    this.report(diagnostics);
    return { pings: result, diagnostics };
  }

  private classifyTimeline(ordered: readonly Ping[]): EnrichedPing[] {
    const inRegion = ordered.map((ping) => this.predicate.contains(ping, ping.altitude));
    const transitions = detectTransitions(inRegion, this.baseline);
    const events = classifyEvents(transitions);

    return ordered.map((ping, i) => ({
      ...ping,
      inRegion: inRegion[i],
      transition: transitions[i],
      event: events[i],
    }));
  }

  private assertGeometry(): void {
    if (typeof this.predicate?.contains !== "function") {
      throw new GeometryUnavailableError();
    }
  }

  private report(d: EnrichmentDiagnostics): void {
    if (this.quiet) return;
    console.log(
      `Classified ${d.pings} pings across ${d.flights} flights: ${d.crossings} crossings, ` +
        `${d.events.takeoff} takeoffs, ${d.events.landing} landings, ${d.events["touch-n-go"]} touch-n-gos`
    );
    if (d.missingTelemetry > 0) {
      console.warn(`${d.missingTelemetry} pings had no position or altitude and were treated as outside the region`);
    }
    if (d.duplicateTimestamps > 0) {
      console.warn(`${d.duplicateTimestamps} pings share a timestamp with their predecessor; ordered by ingestion id`);
    }
  }
}
