/**
 * Database schema definitions
 * Rows of the metadata store; instants are epoch milliseconds
 */

/**
 * Document row
 */
export interface DocumentRow {
  id: number;
  filename: string;
  created_at: number;
  last_modified: number;
  author: string;
  last_modified_by: string;
}

/**
 * Sentence row
 */
export interface SentenceRow {
  id: number;
  document_id: number;
  position: number;
  sentence_text: string;
  created_at: number;
  modified_at: number;
  author: string;
  revision_id: number;
}

/**
 * Schema version record
 */
export interface SchemaVersionRecord {
  version: number;
  appliedAt: number;
  description: string;
}

/**
 * Current schema version
 */
export const SCHEMA_VERSION = 1;

/**
 * SQL statements to create the database schema
 */
export const SCHEMA_SQL = {
  documents: `
    CREATE TABLE IF NOT EXISTS documents (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      filename TEXT NOT NULL UNIQUE,
      created_at INTEGER NOT NULL,
      last_modified INTEGER NOT NULL,
      author TEXT NOT NULL,
      last_modified_by TEXT NOT NULL
    );
  `,

  sentences: `
    CREATE TABLE IF NOT EXISTS sentences (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      document_id INTEGER NOT NULL REFERENCES documents(id) ON DELETE CASCADE,
      position INTEGER NOT NULL,
      sentence_text TEXT NOT NULL,
      created_at INTEGER NOT NULL,
      modified_at INTEGER NOT NULL,
      author TEXT NOT NULL,
      revision_id INTEGER NOT NULL,
      UNIQUE (document_id, position)
    );

    CREATE INDEX IF NOT EXISTS idx_sentences_document_id ON sentences(document_id);
  `,

  version: `
    CREATE TABLE IF NOT EXISTS schema_version (
      version INTEGER PRIMARY KEY,
      applied_at INTEGER NOT NULL,
      description TEXT NOT NULL
    );
  `,
} as const;
