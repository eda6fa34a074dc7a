import Database from "better-sqlite3";
import fs from "fs";
import path from "path";

export type DB = Database.Database;

/** Opens (or creates) the tracker database and makes sure the schema is there */
export function openDatabase(dbPath: string): DB {
  if (dbPath !== ":memory:") {
    // Ensure parent dir exists
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  }

  const db = new Database(dbPath);
  if (dbPath !== ":memory:") {
    db.pragma("journal_mode = WAL");
  }

  db.exec(`
CREATE TABLE IF NOT EXISTS flights (
  flight_id    INTEGER PRIMARY KEY,
  registration TEXT,
  origin       TEXT,  -- ICAO code of departure airport
  destination  TEXT,  -- ICAO code of arrival airport
  status_time  INTEGER -- epoch seconds
);

CREATE TABLE IF NOT EXISTS pings (
  id             INTEGER PRIMARY KEY,
  flight_id      INTEGER NOT NULL,
  timestamp      INTEGER NOT NULL, -- epoch seconds
  longitude      REAL,
  latitude       REAL,
  altitude       INTEGER,          -- feet
  ground_speed   INTEGER,
  vertical_speed INTEGER,
  heading        INTEGER,
  squawk         TEXT,
  in_region      INTEGER,          -- derived: 0/1
  transition     INTEGER,          -- derived: -1/0/1
  event          TEXT              -- derived: takeoff, landing, touch-n-go
);

CREATE INDEX IF NOT EXISTS pings_flight_time ON pings (flight_id, timestamp, id);
CREATE INDEX IF NOT EXISTS pings_event ON pings (event) WHERE event IS NOT NULL;
`);

  return db;
}
