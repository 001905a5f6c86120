/**
 * Database connection for the metrics store. better-sqlite3 + drizzle.
 * Pass ":memory:" for an in-process database (tests).
 */

import Database from "better-sqlite3";
import { drizzle, type BetterSQLite3Database } from "drizzle-orm/better-sqlite3";
import { mkdirSync } from "fs";
import { dirname } from "path";
import * as schema from "./schema.js";

export const IN_MEMORY = ":memory:";

export type MetricsDb = BetterSQLite3Database<typeof schema>;

export interface DbHandle {
  sqlite: Database.Database;
  db: MetricsDb;
}

export function openDb(dbPath: string): DbHandle {
  if (dbPath !== IN_MEMORY) {
    mkdirSync(dirname(dbPath), { recursive: true });
  }
  const sqlite = new Database(dbPath);
  if (dbPath !== IN_MEMORY) {
    sqlite.pragma("journal_mode = WAL");
    sqlite.pragma("synchronous = NORMAL");
  }
  sqlite.pragma("busy_timeout = 5000");
  return { sqlite, db: drizzle(sqlite, { schema }) };
}

export function applySchema(sqlite: Database.Database): void {
  sqlite.exec(schema.SCHEMA_DDL);
}
