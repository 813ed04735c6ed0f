import { SCHEMA_SQL, SCHEMA_VERSION } from '../schema';
import { toDocumentMetadata } from '../metadata';
import type { DocumentRecord } from '../../types';

describe('Database Schema', () => {
  it('should be at version 1', () => {
    expect(SCHEMA_VERSION).toBe(1);
  });

  it('should define every table', () => {
    expect(Object.keys(SCHEMA_SQL)).toEqual(['documents', 'sentences', 'version']);
    expect(SCHEMA_SQL.documents).toContain('CREATE TABLE IF NOT EXISTS documents');
    expect(SCHEMA_SQL.sentences).toContain('CREATE TABLE IF NOT EXISTS sentences');
    expect(SCHEMA_SQL.version).toContain('CREATE TABLE IF NOT EXISTS schema_version');
  });

  it('should cascade sentence deletion and keep positions unique', () => {
    expect(SCHEMA_SQL.sentences).toContain('REFERENCES documents(id) ON DELETE CASCADE');
    expect(SCHEMA_SQL.sentences).toContain('UNIQUE (document_id, position)');
  });

  it('should keep filenames unique', () => {
    expect(SCHEMA_SQL.documents).toContain('filename TEXT NOT NULL UNIQUE');
  });
});

describe('toDocumentMetadata', () => {
  const document: DocumentRecord = {
    id: 7,
    filename: '/tmp/report.docx',
    createdAt: new Date('2024-01-01T10:00:00Z'),
    lastModified: new Date('2024-01-01T10:01:30Z'),
    author: 'Ada',
    lastModifiedBy: 'Ada',
    sentences: [
      {
        position: 0,
        text: 'First.',
        createdAt: new Date('2024-01-01T10:00:00Z'),
        modifiedAt: new Date('2024-01-01T10:00:00Z'),
        author: 'Ada',
        revisionId: 1,
      },
      {
        position: 1,
        text: 'Second.',
        createdAt: new Date('2024-01-01T10:01:30Z'),
        modifiedAt: new Date('2024-01-01T10:01:30Z'),
        author: 'Ada',
        revisionId: 2,
      },
    ],
  };

  it('should render instants as display strings', () => {
    expect(toDocumentMetadata(document)).toEqual({
      id: 7,
      filename: '/tmp/report.docx',
      author: 'Ada',
      lastModifiedBy: 'Ada',
      createdAt: '2024-01-01 10:00:00',
      lastModified: '2024-01-01 10:01:30',
      sentenceCount: 2,
      sentences: [
        {
          position: 0,
          text: 'First.',
          createdAt: '2024-01-01 10:00:00',
          modifiedAt: '2024-01-01 10:00:00',
          author: 'Ada',
          revisionId: 1,
        },
        {
          position: 1,
          text: 'Second.',
          createdAt: '2024-01-01 10:01:30',
          modifiedAt: '2024-01-01 10:01:30',
          author: 'Ada',
          revisionId: 2,
        },
      ],
    });
  });

  it('should survive JSON serialization', () => {
    expect(JSON.parse(JSON.stringify(toDocumentMetadata(document)))).toEqual(toDocumentMetadata(document));
  });
});
