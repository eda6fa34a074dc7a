import express, { NextFunction, Request, Response } from "express";
import bodyParser from "body-parser";
import { createApi } from "./api.js";
import { DB } from "./db.js";
import { RunwayEventEngine } from "./engine.js";
import { GeoPredicate } from "./geo.js";

export function createApp(db: DB, engine: RunwayEventEngine, region: GeoPredicate) {
  const app = express();

  app.use(bodyParser.json({ limit: "50mb" }));
  app.use(createApi(db, engine, region));

  // body-parser rejects malformed or oversized bodies with a 4xx status;
  // anything else reaching here is a structural failure
  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    const status = "status" in err && typeof err.status === "number" && err.status >= 400 ? err.status : 500;
    if (status >= 500) {
      console.error("Request failed:", err.message);
    }
    res.status(status).json({ error: err.message });
  });

  return app;
}
