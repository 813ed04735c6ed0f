/**
 * Sentence Repository
 * Rows of the sentences table, always read in position order
 */

import type { DatabaseAdapter, SentenceRecord, SentenceRow } from '@chronicle/shared';

export function rowToSentence(row: SentenceRow): SentenceRecord {
  return {
    position: row.position,
    text: row.sentence_text,
    createdAt: new Date(row.created_at),
    modifiedAt: new Date(row.modified_at),
    author: row.author,
    revisionId: row.revision_id,
  };
}

export class SentenceRepository {
  constructor(private readonly adapter: DatabaseAdapter) {}

  async insert(documentId: number, sentence: SentenceRecord): Promise<void> {
    await this.adapter.exec(
      `INSERT INTO sentences
         (document_id, position, sentence_text, created_at, modified_at, author, revision_id)
       VALUES (?, ?, ?, ?, ?, ?, ?)`,
      [
        documentId,
        sentence.position,
        sentence.text,
        sentence.createdAt.getTime(),
        sentence.modifiedAt.getTime(),
        sentence.author,
        sentence.revisionId,
      ]
    );
  }

  async findByDocument(documentId: number): Promise<SentenceRecord[]> {
    const rows = await this.adapter.all<SentenceRow>(
      'SELECT * FROM sentences WHERE document_id = ? ORDER BY position',
      [documentId]
    );
    return rows.map(rowToSentence);
  }

  async find(documentId: number, position: number): Promise<SentenceRecord | null> {
    const row = await this.adapter.get<SentenceRow>(
      'SELECT * FROM sentences WHERE document_id = ? AND position = ?',
      [documentId, position]
    );
    return row ? rowToSentence(row) : null;
  }

  async countByDocument(documentId: number): Promise<number> {
    const row = await this.adapter.get<{ count: number }>(
      'SELECT COUNT(*) AS count FROM sentences WHERE document_id = ?',
      [documentId]
    );
    return row?.count ?? 0;
  }

  async maxRevisionId(documentId: number): Promise<number> {
    const row = await this.adapter.get<{ max: number | null }>(
      'SELECT MAX(revision_id) AS max FROM sentences WHERE document_id = ?',
      [documentId]
    );
    return row?.max ?? 0;
  }

  async maxModifiedAt(documentId: number): Promise<Date | null> {
    const row = await this.adapter.get<{ max: number | null }>(
      'SELECT MAX(modified_at) AS max FROM sentences WHERE document_id = ?',
      [documentId]
    );
    return row?.max != null ? new Date(row.max) : null;
  }

  async update(
    documentId: number,
    position: number,
    changes: { modifiedAt: Date; revisionId: number }
  ): Promise<void> {
    await this.adapter.exec(
      'UPDATE sentences SET modified_at = ?, revision_id = ? WHERE document_id = ? AND position = ?',
      [changes.modifiedAt.getTime(), changes.revisionId, documentId, position]
    );
  }
}
