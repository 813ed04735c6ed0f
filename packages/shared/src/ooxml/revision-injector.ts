/**
 * Revision Injector - rewrites the body of a baseline package so each
 * sentence becomes a tracked insertion (or stays plain in clean mode)
 */

import { InputError } from '../errors';
import { SilentLogger, type Logger } from '../logging';
import { isRenderMode, type DocxPackage, type RenderMode, type SentenceRecord } from '../types';
import { formatOoxmlDate } from '../utils/timestamp';
import { CONTENT_TYPE, NS, PART, RELATIONSHIP_TYPE } from './namespaces';
import { readPartText, requirePartText, withPart } from './package-io';
import { normalizeAuthor } from './properties';
import { ensureContentTypeOverride, ensureRelationship, renderRelationshipsXml } from './relationships';
import { applyRenderModeSettings, renderSettingsXml } from './settings';
import {
  childElements,
  createTextRun,
  createW,
  findChild,
  isInNamespace,
  parseXmlPart,
  removeElement,
  serializeXml,
  setW,
} from './xml';

export interface InjectOptions {
  logger?: Logger;
}

function assertUniqueRevisionIds(records: readonly SentenceRecord[]): void {
  const seen = new Set<number>();
  for (const record of records) {
    if (seen.has(record.revisionId)) {
      throw new InputError('DuplicateRevisionId', `Revision id ${record.revisionId} is used more than once`, {
        operation: 'injectRevisions',
        component: 'revision-injector',
        data: { revisionId: record.revisionId, position: record.position },
      });
    }
    seen.add(record.revisionId);
  }
}

/**
 * Replace a paragraph's content with one run, keeping its w:pPr
 */
function rebuildParagraph(doc: Document, paragraph: Element, record: SentenceRecord, mode: RenderMode): void {
  for (const child of childElements(paragraph)) {
    if (!isInNamespace(child, NS.w, 'pPr')) {
      removeElement(child);
    }
  }

  const run = createTextRun(doc, record.text);
  if (mode === 'clean') {
    paragraph.appendChild(run);
    return;
  }

  const ins = createW(doc, 'ins');
  setW(ins, 'id', String(record.revisionId));
  setW(ins, 'author', normalizeAuthor(record.author));
  setW(ins, 'date', formatOoxmlDate(record.modifiedAt));
  ins.appendChild(run);
  paragraph.appendChild(ins);
}

function injectBody(xml: string, records: readonly SentenceRecord[], mode: RenderMode): string {
  const doc = parseXmlPart(PART.document, xml, 'document');
  const body = findChild(doc.documentElement, NS.w, 'body');
  const paragraphs = body ? childElements(body).filter((el) => isInNamespace(el, NS.w, 'p')) : [];

  if (!body || paragraphs.length !== records.length) {
    throw new InputError(
      'RecordCountMismatch',
      `Body has ${paragraphs.length} paragraphs but ${records.length} records were given`,
      {
        operation: 'injectRevisions',
        component: 'revision-injector',
        data: { paragraphs: paragraphs.length, records: records.length },
      }
    );
  }

  paragraphs.forEach((paragraph, index) => {
    const record = records[index];
    if (record) {
      rebuildParagraph(doc, paragraph, record, mode);
    }
  });

  return serializeXml(doc);
}

/**
 * Settings part for `mode`; a package without one gets a fresh part that is
 * registered in the content types and the document relationships
 */
function injectSettings(pkg: DocxPackage, mode: RenderMode): DocxPackage {
  let next = pkg;
  let xml = readPartText(pkg, PART.settings);

  if (xml === null) {
    xml = renderSettingsXml();
    const types = readPartText(pkg, PART.contentTypes);
    if (types !== null) {
      next = withPart(next, PART.contentTypes, ensureContentTypeOverride(types, PART.settings, CONTENT_TYPE.settings));
    }
    const rels = readPartText(pkg, PART.documentRels);
    next = withPart(
      next,
      PART.documentRels,
      rels === null
        ? renderRelationshipsXml([{ id: 'rId1', type: RELATIONSHIP_TYPE.settings, target: 'settings.xml' }])
        : ensureRelationship(rels, PART.documentRels, RELATIONSHIP_TYPE.settings, 'settings.xml')
    );
  }

  const doc = parseXmlPart(PART.settings, xml, 'settings');
  applyRenderModeSettings(doc, mode);
  return withPart(next, PART.settings, serializeXml(doc));
}

export function injectRevisions(
  pkg: DocxPackage,
  records: readonly SentenceRecord[],
  mode: RenderMode,
  options: InjectOptions = {}
): DocxPackage {
  const logger = options.logger ?? new SilentLogger();

  if (!isRenderMode(mode)) {
    throw new InputError('UnsupportedMode', `Unsupported render mode: ${String(mode)}`, {
      operation: 'injectRevisions',
      component: 'revision-injector',
      data: { mode },
    });
  }
  assertUniqueRevisionIds(records);

  const body = injectBody(requirePartText(pkg, PART.document, 'injectRevisions'), records, mode);
  const result = injectSettings(withPart(pkg, PART.document, body), mode);

  logger.debug('Injected revisions', { mode, records: records.length });
  return result;
}
