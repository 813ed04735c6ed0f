/**
 * Database abstraction types
 * The Node.js implementation (better-sqlite3) lives in the cli package
 */

import type { DocumentRecord, RandomSource, SentenceRecord } from '../types';

/**
 * Database adapter interface
 * Abstracts SQLite operations so repositories can be tested against any driver
 */
export interface DatabaseAdapter {
  /**
   * Initialize database and create schema
   */
  initialize(): Promise<void>;

  /**
   * Close database connection
   */
  close(): Promise<void>;

  /**
   * Run a statement or script that doesn't return data
   */
  exec(sql: string, params?: unknown[]): Promise<void>;

  /**
   * Run a query that returns the number of changes and the last inserted row id
   */
  run(sql: string, params?: unknown[]): Promise<{ changes: number; lastInsertRowid: number }>;

  /**
   * Run a query that returns a single row
   */
  get<T>(sql: string, params?: unknown[]): Promise<T | null>;

  /**
   * Run a query that returns multiple rows
   */
  all<T>(sql: string, params?: unknown[]): Promise<T[]>;

  beginTransaction(): Promise<void>;

  commit(): Promise<void>;

  rollback(): Promise<void>;
}

/**
 * A document is addressed by its filename or its numeric id
 */
export type DocumentKey = string | number;

export interface CreateDocumentOptions {
  author?: string;
  start?: Date;
  minIntervalSeconds?: number;
  maxIntervalSeconds?: number;
  random?: RandomSource;
}

export interface UpdateSentenceOptions {
  /** Give the sentence max(revisionId) + 1 to record a new edit event */
  bumpRevision?: boolean;
}

/**
 * Summary printed by `info`
 */
export interface DocumentMetadata {
  id: number;
  filename: string;
  author: string;
  lastModifiedBy: string;
  createdAt: string;
  lastModified: string;
  sentenceCount: number;
  sentences: Array<{
    position: number;
    text: string;
    createdAt: string;
    modifiedAt: string;
    author: string;
    revisionId: number;
  }>;
}

/**
 * Document listing entry
 */
export interface DocumentSummary {
  id: number;
  filename: string;
  author: string;
  createdAt: Date;
  lastModified: Date;
  sentenceCount: number;
}

/**
 * Persistent record of documents and their sentence timelines
 */
export interface MetadataStore {
  /**
   * Generate a timeline and store it, replacing any document with the same filename
   */
  createDocument(filename: string, sentences: readonly string[], options?: CreateDocumentOptions): Promise<DocumentRecord>;

  getDocument(key: DocumentKey): Promise<DocumentRecord | null>;

  /**
   * Set one sentence's modification instant and recompute lastModified
   */
  updateSentenceTimestamp(
    key: DocumentKey,
    position: number,
    instant: Date,
    options?: UpdateSentenceOptions
  ): Promise<SentenceRecord>;

  listDocuments(): Promise<DocumentSummary[]>;

  /**
   * @returns whether a document was deleted
   */
  deleteDocument(key: DocumentKey): Promise<boolean>;

  getDocumentMetadata(key: DocumentKey): Promise<DocumentMetadata | null>;

  /**
   * Run `fn` atomically; a rejection rolls back every store change it made.
   * Nested calls join the outer transaction.
   */
  transaction<T>(fn: () => Promise<T>): Promise<T>;
}
