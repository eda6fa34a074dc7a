import { DB } from "./db.js";
import { loadPings, saveEnrichment } from "./dbHelpers.js";
import { EnrichmentDiagnostics, RunwayEventEngine } from "./engine.js";

export interface EnrichmentRun extends EnrichmentDiagnostics {
  updated: number;
  durationMs: number;
}

/** Re-derives in_region, transition and event for every stored ping */
export function enrichStoredPings(db: DB, engine: RunwayEventEngine): EnrichmentRun {
  const started = Date.now();
  const pings = loadPings(db);
  console.log(`Loaded ${pings.length} pings for classification`);

  const { pings: enriched, diagnostics } = engine.enrich(pings);
  const updated = saveEnrichment(db, enriched);

  return { ...diagnostics, updated, durationMs: Date.now() - started };
}
