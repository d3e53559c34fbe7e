import { drizzle, type BetterSQLite3Database } from "drizzle-orm/better-sqlite3";
import { Database } from "@conda-count/db-client";
import * as schema from "./schema";

export type DbConnection = BetterSQLite3Database<typeof schema>;

// Mirrors ./schema/conda.ts
const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS entity (
  key_path TEXT PRIMARY KEY NOT NULL,
  parent_path TEXT,
  depth INTEGER NOT NULL,
  name TEXT NOT NULL,
  current_breakdown TEXT,
  recent_breakdown TEXT,
  updated_at INTEGER NOT NULL
);
CREATE INDEX IF NOT EXISTS entity_parent_idx ON entity (parent_path);
CREATE TABLE IF NOT EXISTS daily_total (
  key_path TEXT NOT NULL REFERENCES entity (key_path) ON DELETE CASCADE,
  date TEXT NOT NULL,
  total INTEGER NOT NULL,
  PRIMARY KEY (key_path, date)
);
`;

export function migrate(database: Database): void {
  database.withTransaction((connection) => {
    connection.exec(SCHEMA_SQL);
  });
}

/**
 * Creates the tables if needed and wraps the connection in drizzle.
 */
export function createDb(database: Database): DbConnection {
  migrate(database);
  return drizzle(database.getDB(), { schema });
}
