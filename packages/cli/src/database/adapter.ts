/**
 * SQLite Database Adapter using better-sqlite3
 *
 * better-sqlite3 is synchronous; every method wraps its call in a Promise so
 * repositories stay driver-agnostic.
 */

import Database from 'better-sqlite3';
import type { DatabaseAdapter } from '@chronicle/shared';

/** Path that opens a private in-memory database */
export const IN_MEMORY = ':memory:';

export class BetterSqliteAdapter implements DatabaseAdapter {
  private db: Database.Database | null = null;

  constructor(private readonly dbPath: string) {}

  // eslint-disable-next-line @typescript-eslint/require-await
  async initialize(): Promise<void> {
    this.db = new Database(this.dbPath);
    this.db.pragma('foreign_keys = ON');
    if (this.dbPath !== IN_MEMORY) {
      this.db.pragma('journal_mode = WAL');
    }
  }

  // eslint-disable-next-line @typescript-eslint/require-await
  async close(): Promise<void> {
    if (this.db) {
      this.db.close();
      this.db = null;
    }
  }

  // eslint-disable-next-line @typescript-eslint/require-await
  async exec(sql: string, params: unknown[] = []): Promise<void> {
    const db = this.connection();
    // exec() takes multiple statements but no parameters
    if (params.length > 0) {
      db.prepare(sql).run(...params);
    } else {
      db.exec(sql);
    }
  }

  // eslint-disable-next-line @typescript-eslint/require-await
  async run(sql: string, params: unknown[] = []): Promise<{ changes: number; lastInsertRowid: number }> {
    const result = this.connection()
      .prepare(sql)
      .run(...params);
    return { changes: result.changes, lastInsertRowid: Number(result.lastInsertRowid) };
  }

  // eslint-disable-next-line @typescript-eslint/require-await
  async get<T>(sql: string, params: unknown[] = []): Promise<T | null> {
    const row = this.connection()
      .prepare<unknown[], T>(sql)
      .get(...params);
    return row ?? null;
  }

  // eslint-disable-next-line @typescript-eslint/require-await
  async all<T>(sql: string, params: unknown[] = []): Promise<T[]> {
    return this.connection()
      .prepare<unknown[], T>(sql)
      .all(...params);
  }

  // eslint-disable-next-line @typescript-eslint/require-await
  async beginTransaction(): Promise<void> {
    this.connection().exec('BEGIN TRANSACTION');
  }

  // eslint-disable-next-line @typescript-eslint/require-await
  async commit(): Promise<void> {
    this.connection().exec('COMMIT');
  }

  // eslint-disable-next-line @typescript-eslint/require-await
  async rollback(): Promise<void> {
    this.connection().exec('ROLLBACK');
  }

  private connection(): Database.Database {
    if (!this.db) {
      throw new Error('Database not initialized. Call initialize() first.');
    }
    return this.db;
  }
}
