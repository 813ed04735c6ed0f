/**
 * JSON-ready view of a stored document
 */

import type { DocumentRecord } from '../types';
import { formatDisplayTimestamp } from '../utils/timestamp';
import type { DocumentMetadata } from './types';

export function toDocumentMetadata(document: DocumentRecord): DocumentMetadata {
  return {
    id: document.id,
    filename: document.filename,
    author: document.author,
    lastModifiedBy: document.lastModifiedBy,
    createdAt: formatDisplayTimestamp(document.createdAt),
    lastModified: formatDisplayTimestamp(document.lastModified),
    sentenceCount: document.sentences.length,
    sentences: document.sentences.map((sentence) => ({
      position: sentence.position,
      text: sentence.text,
      createdAt: formatDisplayTimestamp(sentence.createdAt),
      modifiedAt: formatDisplayTimestamp(sentence.modifiedAt),
      author: sentence.author,
      revisionId: sentence.revisionId,
    })),
  };
}
