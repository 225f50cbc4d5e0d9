// ============================================
// VOTESHIELD - Database Configuration
// ============================================

import Database from 'better-sqlite3';
import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import path from 'path';
import { env } from './env.js';
import * as schema from '../db/schema/index.js';
import { applySchema } from '../db/ddl.js';

export type DrizzleDb = BetterSQLite3Database<typeof schema>;

export interface DatabaseHandle {
  sqlite: Database.Database;
  db: DrizzleDb;
}

export function getDbPath(): string {
  if (env.DB_PATH === ':memory:' || path.isAbsolute(env.DB_PATH)) {
    return env.DB_PATH;
  }
  return path.join(process.cwd(), env.DB_PATH);
}

/**
 * Open a connection, apply pragmas and make sure every table exists.
 */
export function openDatabase(dbPath: string = getDbPath()): DatabaseHandle {
  const sqlite = new Database(dbPath, { timeout: env.DB_BUSY_TIMEOUT_MS });
  if (dbPath !== ':memory:') {
    sqlite.pragma('journal_mode = WAL');
  }
  sqlite.pragma('foreign_keys = ON');
  applySchema(sqlite);
  return { sqlite, db: drizzle(sqlite, { schema }) };
}
