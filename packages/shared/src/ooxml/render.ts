/**
 * Build a baseline package and inject revisions in one step
 */

import type { Logger } from '../logging';
import type { DocumentProperties, DocxPackage, SentenceRecord } from '../types';
import { buildPlainDocument, type BuildOptions } from './document-builder';
import { injectRevisions } from './revision-injector';

export interface RenderOptions extends BuildOptions {
  logger?: Logger;
}

export function renderDocument(
  records: readonly SentenceRecord[],
  properties: DocumentProperties,
  author: string,
  options: RenderOptions = {}
): DocxPackage {
  const ordered = [...records].sort((a, b) => a.position - b.position);
  const baseline = buildPlainDocument(ordered, properties, author, options);
  return injectRevisions(baseline, ordered, properties.mode, { logger: options.logger });
}
