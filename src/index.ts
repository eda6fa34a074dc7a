import { createServer } from "http";
import { createApp } from "./app.js";
import { config, loadGeoPredicate } from "./config.js";
import { openDatabase } from "./db.js";
import { RunwayEventEngine } from "./engine.js";
import { EmptyPingSetError } from "./errors.js";
import { enrichStoredPings } from "./pipeline.js";

// A bad polygon is fatal: nothing downstream can be trusted without it
const region = loadGeoPredicate();
console.log(
  `Runway region loaded from ${config.polygonPath}: ${region.polygon.length} vertices, ceiling ${region.altitudeCeiling}ft`
);

const db = openDatabase(config.dbPath);
const engine = new RunwayEventEngine(region, { baseline: config.firstPingBaseline, requirePings: true });

if (config.enrichOnStart) {
  try {
    const run = enrichStoredPings(db, engine);
    console.log(`Startup enrichment updated ${run.updated} pings in ${run.durationMs}ms`);
  } catch (err) {
    if (!(err instanceof EmptyPingSetError)) throw err;
    console.log("No pings stored yet, skipping startup enrichment");
  }
}

const app = createApp(db, engine, region);
const server = createServer(app);

server.listen(config.port, () => console.log(`Server listening on :${config.port}`));
