/**
 * SQLite Metadata Store
 *
 * Implements MetadataStore over the DatabaseAdapter, delegating row access to
 * the repositories. Multi-row changes run in a single transaction.
 */

import {
  InputError,
  SilentLogger,
  StoreError,
  generateTimeline,
  toDocumentMetadata,
  truncateToSecond,
  DEFAULT_AUTHOR,
} from '@chronicle/shared';
import type {
  CreateDocumentOptions,
  DatabaseAdapter,
  DocumentKey,
  DocumentMetadata,
  DocumentRecord,
  DocumentRow,
  DocumentSummary,
  Logger,
  MetadataStore,
  SchemaVersionRecord,
  SentenceRecord,
  UpdateSentenceOptions,
} from '@chronicle/shared';

import { DocumentRepository } from './document-repository';
import { SchemaRepository } from './schema-repository';
import { SentenceRepository } from './sentence-repository';

export class SqliteMetadataStore implements MetadataStore {
  private readonly documentRepo: DocumentRepository;
  private readonly sentenceRepo: SentenceRepository;
  private readonly schemaRepo: SchemaRepository;
  private readonly logger: Logger;
  private transactionDepth = 0;

  constructor(
    private readonly adapter: DatabaseAdapter,
    logger?: Logger
  ) {
    this.documentRepo = new DocumentRepository(adapter);
    this.sentenceRepo = new SentenceRepository(adapter);
    this.schemaRepo = new SchemaRepository(adapter);
    this.logger = logger?.child('store') ?? new SilentLogger();
  }

  async initialize(): Promise<void> {
    await this.adapter.initialize();
    await this.schemaRepo.createSchema();
    await this.schemaRepo.ensureSchemaVersion();
  }

  async close(): Promise<void> {
    await this.adapter.close();
  }

  async transaction<T>(fn: () => Promise<T>): Promise<T> {
    if (this.transactionDepth > 0) {
      return fn();
    }

    await this.adapter.beginTransaction();
    this.transactionDepth++;
    try {
      const result = await fn();
      await this.adapter.commit();
      return result;
    } catch (error) {
      await this.adapter.rollback();
      throw error;
    } finally {
      this.transactionDepth--;
    }
  }

  async getCurrentVersion(): Promise<number | null> {
    return this.schemaRepo.getCurrentVersion();
  }

  async getVersionHistory(): Promise<SchemaVersionRecord[]> {
    return this.schemaRepo.getVersionHistory();
  }

  async createDocument(
    filename: string,
    sentences: readonly string[],
    options: CreateDocumentOptions = {}
  ): Promise<DocumentRecord> {
    const author = options.author ?? DEFAULT_AUTHOR;
    // Validates intervals and sentences before anything is written
    const records = generateTimeline(sentences, {
      start: options.start,
      author,
      minIntervalSeconds: options.minIntervalSeconds,
      maxIntervalSeconds: options.maxIntervalSeconds,
      random: options.random,
    });

    const createdAt = records[0]?.createdAt ?? truncateToSecond(new Date());
    const lastModified = new Date(Math.max(...records.map((r) => r.modifiedAt.getTime())));

    const id = await this.transaction(async () => {
      const existing = await this.documentRepo.find(filename);
      if (existing) {
        await this.documentRepo.delete(existing.id);
        this.logger.info('Replacing existing document', { filename, id: existing.id });
      }

      const documentId = await this.documentRepo.insert({
        filename,
        createdAt,
        lastModified,
        author,
        lastModifiedBy: author,
      });
      for (const record of records) {
        await this.sentenceRepo.insert(documentId, record);
      }
      return documentId;
    });

    this.logger.debug('Stored document', { filename, id, sentences: records.length });
    return {
      id,
      filename,
      createdAt,
      lastModified,
      author,
      lastModifiedBy: author,
      sentences: records,
    };
  }

  async getDocument(key: DocumentKey): Promise<DocumentRecord | null> {
    const row = await this.documentRepo.find(key);
    if (!row) return null;
    return this.toRecord(row, await this.sentenceRepo.findByDocument(row.id));
  }

  async updateSentenceTimestamp(
    key: DocumentKey,
    position: number,
    instant: Date,
    options: UpdateSentenceOptions = {}
  ): Promise<SentenceRecord> {
    const row = await this.requireDocument(key, 'updateSentenceTimestamp');
    const sentence = await this.sentenceRepo.find(row.id, position);
    if (!sentence) {
      throw new StoreError('SentenceNotFound', `Document ${row.filename} has no sentence at position ${position}`, {
        operation: 'updateSentenceTimestamp',
        component: 'metadata-store',
        data: { filename: row.filename, position },
      });
    }

    const modifiedAt = truncateToSecond(instant);
    if (modifiedAt.getTime() < sentence.createdAt.getTime()) {
      throw new InputError(
        'InvalidTimestamp',
        `Sentence ${position} cannot be modified before it was created (${sentence.createdAt.toISOString()})`,
        {
          operation: 'updateSentenceTimestamp',
          component: 'metadata-store',
          data: { position, instant: instant.toISOString() },
        }
      );
    }

    return this.transaction(async () => {
      const revisionId = options.bumpRevision
        ? (await this.sentenceRepo.maxRevisionId(row.id)) + 1
        : sentence.revisionId;

      await this.sentenceRepo.update(row.id, position, { modifiedAt, revisionId });
      const lastModified = (await this.sentenceRepo.maxModifiedAt(row.id)) ?? modifiedAt;
      await this.documentRepo.setLastModified(row.id, lastModified);

      this.logger.debug('Updated sentence timestamp', {
        filename: row.filename,
        position,
        modifiedAt: modifiedAt.toISOString(),
        revisionId,
      });
      return { ...sentence, modifiedAt, revisionId };
    });
  }

  async listDocuments(): Promise<DocumentSummary[]> {
    const rows = await this.documentRepo.findAll();
    const summaries: DocumentSummary[] = [];
    for (const row of rows) {
      summaries.push({
        id: row.id,
        filename: row.filename,
        author: row.author,
        createdAt: new Date(row.created_at),
        lastModified: new Date(row.last_modified),
        sentenceCount: await this.sentenceRepo.countByDocument(row.id),
      });
    }
    return summaries;
  }

  async deleteDocument(key: DocumentKey): Promise<boolean> {
    const row = await this.documentRepo.find(key);
    if (!row) return false;
    const deleted = await this.documentRepo.delete(row.id);
    this.logger.debug('Deleted document', { filename: row.filename, deleted });
    return deleted;
  }

  async getDocumentMetadata(key: DocumentKey): Promise<DocumentMetadata | null> {
    const document = await this.getDocument(key);
    return document ? toDocumentMetadata(document) : null;
  }

  private async requireDocument(key: DocumentKey, operation: string): Promise<DocumentRow> {
    const row = await this.documentRepo.find(key);
    if (!row) {
      throw new StoreError('DocumentNotFound', `No stored document for ${String(key)}`, {
        operation,
        component: 'metadata-store',
        data: { key },
      });
    }
    return row;
  }

  private toRecord(row: DocumentRow, sentences: SentenceRecord[]): DocumentRecord {
    return {
      id: row.id,
      filename: row.filename,
      createdAt: new Date(row.created_at),
      lastModified: new Date(row.last_modified),
      author: row.author,
      lastModifiedBy: row.last_modified_by,
      sentences,
    };
  }
}
