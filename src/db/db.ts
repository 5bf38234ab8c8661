import { drizzle, type SQLJsDatabase } from 'drizzle-orm/sql-js';
import fs from 'node:fs';
import path from 'node:path';
import initSqlJs from 'sql.js';
import * as schema from './schema';

export type SignageDb = SQLJsDatabase<typeof schema>;

/**
 * sql.js keeps the database in memory. `save` writes it back to `file`;
 * `close` releases it without saving.
 */
export type DbHandle = { db: SignageDb; save: () => void; close: () => void };

// No migration tooling ships with the service; tables are created in place.
const DDL = `
CREATE TABLE IF NOT EXISTS logs (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  ts INTEGER NOT NULL,
  level TEXT NOT NULL,
  message TEXT NOT NULL
);
CREATE TABLE IF NOT EXISTS reconcile_runs (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  ts INTEGER NOT NULL,
  folder TEXT NOT NULL,
  fingerprint TEXT NOT NULL,
  mode TEXT NOT NULL,
  entries INTEGER NOT NULL,
  created INTEGER NOT NULL,
  removed INTEGER NOT NULL,
  failures INTEGER NOT NULL,
  orphans_removed INTEGER NOT NULL
);
CREATE TABLE IF NOT EXISTS schedule_changes (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  ts INTEGER NOT NULL,
  window_name TEXT NOT NULL,
  folder TEXT NOT NULL,
  transition TEXT NOT NULL,
  transition_offset REAL NOT NULL
);
`;

/** Opens the service database, loading `file` when it exists; pass ':memory:' for a throwaway one. */
export async function openDatabase(file: string): Promise<DbHandle> {
  const SQL = await initSqlJs();
  const persistent = file !== ':memory:';
  const sqlite = persistent && fs.existsSync(file) ? new SQL.Database(fs.readFileSync(file)) : new SQL.Database();
  sqlite.exec(DDL);

  const save = () => {
    if (!persistent) return;
    fs.mkdirSync(path.dirname(file), { recursive: true });
    const tmp = `${file}.tmp`;
    fs.writeFileSync(tmp, sqlite.export());
    fs.renameSync(tmp, file);
  };

  return { db: drizzle(sqlite, { schema }), save, close: () => sqlite.close() };
}
