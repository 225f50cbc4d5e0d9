// ============================================
// VOTESHIELD - Base Repository
// ============================================

import { randomUUID } from 'crypto';
import { sql, type SQL } from 'drizzle-orm';
import type { SQLiteTable } from 'drizzle-orm/sqlite-core';
import Database from 'better-sqlite3';
import type { DrizzleDb } from '../db/drizzle.js';

export abstract class BaseRepository<TTable extends SQLiteTable> {
  constructor(
    protected db: DrizzleDb,
    protected table: TTable
  ) {}

  protected async count(where?: SQL): Promise<number> {
    const query = this.db
      .select({ count: sql<number>`COUNT(*)` })
      .from(this.table);
    const results = where ? await query.where(where) : await query;
    return results[0]?.count ?? 0;
  }

  protected generateId(): string {
    return randomUUID();
  }

  protected now(): Date {
    return new Date();
  }

  protected isUniqueViolation(error: unknown): boolean {
    return error instanceof Database.SqliteError
      && (error.code === 'SQLITE_CONSTRAINT_UNIQUE' || error.code === 'SQLITE_CONSTRAINT_PRIMARYKEY');
  }
}
