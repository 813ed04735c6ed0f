/**
 * Document Repository
 * Rows of the documents table
 */

import type { DatabaseAdapter, DocumentKey, DocumentRow } from '@chronicle/shared';

export interface NewDocumentRow {
  filename: string;
  createdAt: Date;
  lastModified: Date;
  author: string;
  lastModifiedBy: string;
}

export class DocumentRepository {
  constructor(private readonly adapter: DatabaseAdapter) {}

  async insert(row: NewDocumentRow): Promise<number> {
    const result = await this.adapter.run(
      `INSERT INTO documents (filename, created_at, last_modified, author, last_modified_by)
       VALUES (?, ?, ?, ?, ?)`,
      [row.filename, row.createdAt.getTime(), row.lastModified.getTime(), row.author, row.lastModifiedBy]
    );
    return result.lastInsertRowid;
  }

  async find(key: DocumentKey): Promise<DocumentRow | null> {
    return typeof key === 'number'
      ? this.adapter.get<DocumentRow>('SELECT * FROM documents WHERE id = ?', [key])
      : this.adapter.get<DocumentRow>('SELECT * FROM documents WHERE filename = ?', [key]);
  }

  async findAll(): Promise<DocumentRow[]> {
    return this.adapter.all<DocumentRow>('SELECT * FROM documents ORDER BY created_at DESC, id DESC');
  }

  async setLastModified(id: number, lastModified: Date): Promise<void> {
    await this.adapter.exec('UPDATE documents SET last_modified = ? WHERE id = ?', [lastModified.getTime(), id]);
  }

  /**
   * @returns whether a row was deleted; sentences cascade
   */
  async delete(id: number): Promise<boolean> {
    const result = await this.adapter.run('DELETE FROM documents WHERE id = ?', [id]);
    return result.changes > 0;
  }
}
