/**
 * Schema Repository
 * Creates tables and tracks the schema version
 */

import { SCHEMA_SQL, SCHEMA_VERSION } from '@chronicle/shared';
import type { DatabaseAdapter, SchemaVersionRecord } from '@chronicle/shared';

export class SchemaRepository {
  constructor(private readonly adapter: DatabaseAdapter) {}

  async getCurrentVersion(): Promise<number | null> {
    const row = await this.adapter.get<{ version: number }>(
      'SELECT version FROM schema_version ORDER BY version DESC LIMIT 1'
    );

    return row?.version ?? null;
  }

  async getVersionHistory(): Promise<SchemaVersionRecord[]> {
    const rows = await this.adapter.all<{
      version: number;
      applied_at: number;
      description: string;
    }>('SELECT * FROM schema_version ORDER BY version DESC');

    return rows.map((row) => ({
      version: row.version,
      appliedAt: row.applied_at,
      description: row.description,
    }));
  }

  async recordVersion(version: number, description: string): Promise<void> {
    await this.adapter.exec(
      'INSERT OR IGNORE INTO schema_version (version, applied_at, description) VALUES (?, ?, ?)',
      [version, Date.now(), description]
    );
  }

  /**
   * Create tables in foreign-key order
   */
  async createSchema(): Promise<void> {
    await this.adapter.exec(SCHEMA_SQL.version);
    await this.adapter.exec(SCHEMA_SQL.documents);
    await this.adapter.exec(SCHEMA_SQL.sentences);
  }

  async ensureSchemaVersion(): Promise<void> {
    const current = await this.getCurrentVersion();
    if (current === null) {
      await this.recordVersion(SCHEMA_VERSION, 'Initial schema: documents and sentences');
    }
  }
}
