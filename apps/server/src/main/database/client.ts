import Database from "better-sqlite3";
import {
  type BetterSQLite3Database,
  drizzle,
} from "drizzle-orm/better-sqlite3";
import { mkdirSync } from "node:fs";
import path from "node:path";
import {
  ALERT_EVENTS_TABLE,
  SESSIONS_TABLE,
  VIOLATIONS_TABLE,
  schema,
} from "./schema";

export type SiteWatchDatabase = BetterSQLite3Database<typeof schema>;

export const IN_MEMORY_DATABASE = ":memory:";

type DatabaseHandle = {
  db: SiteWatchDatabase;
  close: () => void;
};

let handle: DatabaseHandle | null = null;

const applySchema = (sqlite: Database.Database): void => {
  sqlite
    .prepare(
      `
        CREATE TABLE IF NOT EXISTS ${VIOLATIONS_TABLE} (
          id TEXT PRIMARY KEY NOT NULL,
          session_id TEXT NOT NULL,
          track_id INTEGER NOT NULL,
          worker_id TEXT,
          violation_type TEXT NOT NULL,
          missing_ppe TEXT NOT NULL,
          detected_ppe TEXT NOT NULL,
          severity TEXT NOT NULL,
          started_at INTEGER NOT NULL,
          last_seen_at INTEGER NOT NULL,
          ended_at INTEGER,
          duration_ms INTEGER NOT NULL DEFAULT 0,
          evidence_ref TEXT,
          bounding_box TEXT NOT NULL,
          frame_id TEXT NOT NULL,
          close_reason TEXT
        )
      `,
    )
    .run();
  // at most one open violation per (session, track, item)
  sqlite
    .prepare(
      `
        CREATE UNIQUE INDEX IF NOT EXISTS violations_open_key_idx
        ON ${VIOLATIONS_TABLE}(session_id, track_id, violation_type)
        WHERE ended_at IS NULL
      `,
    )
    .run();
  sqlite
    .prepare(
      `
        CREATE INDEX IF NOT EXISTS violations_started_at_idx
        ON ${VIOLATIONS_TABLE}(started_at)
      `,
    )
    .run();
  sqlite
    .prepare(
      `
        CREATE INDEX IF NOT EXISTS violations_worker_idx
        ON ${VIOLATIONS_TABLE}(worker_id)
      `,
    )
    .run();

  sqlite
    .prepare(
      `
        CREATE TABLE IF NOT EXISTS ${ALERT_EVENTS_TABLE} (
          id TEXT PRIMARY KEY NOT NULL,
          config_id TEXT NOT NULL,
          violation_ids TEXT NOT NULL,
          channel TEXT NOT NULL,
          destination TEXT NOT NULL,
          severity TEXT NOT NULL,
          subject TEXT NOT NULL,
          message TEXT NOT NULL,
          status TEXT NOT NULL,
          error_message TEXT,
          dispatched_at INTEGER NOT NULL
        )
      `,
    )
    .run();
  sqlite
    .prepare(
      `
        CREATE INDEX IF NOT EXISTS alert_events_config_dispatched_idx
        ON ${ALERT_EVENTS_TABLE}(config_id, dispatched_at)
      `,
    )
    .run();

  sqlite
    .prepare(
      `
        CREATE TABLE IF NOT EXISTS ${SESSIONS_TABLE} (
          session_id TEXT PRIMARY KEY NOT NULL,
          status TEXT NOT NULL,
          camera_id TEXT,
          location TEXT,
          started_at INTEGER,
          ended_at INTEGER,
          frame_count INTEGER NOT NULL DEFAULT 0,
          skipped_frames INTEGER NOT NULL DEFAULT 0,
          violation_count INTEGER NOT NULL DEFAULT 0
        )
      `,
    )
    .run();
};

/** Opens (creating if needed) a database at `databasePath`, or in memory. */
export const createDatabase = (
  databasePath: string = IN_MEMORY_DATABASE,
): DatabaseHandle => {
  if (databasePath !== IN_MEMORY_DATABASE) {
    mkdirSync(path.dirname(path.resolve(databasePath)), { recursive: true });
  }

  const sqlite = new Database(databasePath);
  if (databasePath !== IN_MEMORY_DATABASE) {
    sqlite.pragma("journal_mode = WAL");
  }
  applySchema(sqlite);

  return {
    db: drizzle(sqlite, { schema }),
    close: () => {
      sqlite.close();
    },
  };
};

export const initializeDatabase = (databasePath?: string): SiteWatchDatabase => {
  if (handle) {
    return handle.db;
  }
  handle = createDatabase(databasePath);
  return handle.db;
};

export const getDatabase = (): SiteWatchDatabase => {
  if (!handle) {
    throw new Error("Database has not been initialized");
  }
  return handle.db;
};

export const closeDatabase = (): void => {
  handle?.close();
  handle = null;
};
