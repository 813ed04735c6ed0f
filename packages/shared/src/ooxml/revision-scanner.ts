/**
 * Read-only inspection of revision markup and document properties
 */

import type { DocumentProperties, DocxPackage, RenderMode, RevisionKind, RevisionTag } from '../types';
import { parseOoxmlDate } from '../utils/timestamp';
import { NS, PART } from './namespaces';
import { readPartText, requirePartText } from './package-io';
import { readAppProperties, readCoreProperties } from './properties';
import { findChild, findDescendants, getW, parseXmlPart, textOf } from './xml';

const KIND_BY_ELEMENT: Record<string, RevisionKind> = {
  ins: 'insertion',
  del: 'deletion',
  moveFrom: 'move-from',
  moveTo: 'move-to',
};

/**
 * Tracked-change wrappers in the body, in document order
 */
export function scanRevisions(pkg: DocxPackage): RevisionTag[] {
  const doc = parseXmlPart(PART.document, requirePartText(pkg, PART.document, 'scanRevisions'), 'document');

  return findDescendants(doc, NS.w, Object.keys(KIND_BY_ELEMENT)).map((el) => {
    const id = Number.parseInt(getW(el, 'id') ?? '', 10);
    return {
      kind: KIND_BY_ELEMENT[el.localName] ?? 'insertion',
      id: Number.isNaN(id) ? null : id,
      author: getW(el, 'author') ?? '',
      date: parseOoxmlDate(getW(el, 'date')),
      text: findDescendants(el, NS.w, ['r']).map((run) => textOf(run)),
    };
  });
}

export function isTrackingEnabled(pkg: DocxPackage): boolean {
  const xml = readPartText(pkg, PART.settings);
  if (xml === null) return false;

  const settings = parseXmlPart(PART.settings, xml, 'settings').documentElement;
  const flag = findChild(settings, NS.w, 'trackRevisions');
  if (!flag) return false;

  // <w:trackRevisions w:val="false"/> switches it off explicitly
  const val = getW(flag, 'val');
  return val === null || !['0', 'false', 'off'].includes(val);
}

export function detectRenderMode(pkg: DocxPackage): RenderMode {
  const hasInsertions = scanRevisions(pkg).some((tag) => tag.kind === 'insertion');
  if (!hasInsertions) return 'clean';
  return isTrackingEnabled(pkg) ? 'suggestions' : 'final';
}

/**
 * Recover the properties a package was built with
 */
export function readDocumentProperties(pkg: DocxPackage): DocumentProperties {
  const core = readCoreProperties(pkg);
  const app = readAppProperties(pkg);
  const present = (value: string | null): string | undefined => (value ? value : undefined);

  return {
    title: present(core.title),
    subject: present(core.subject),
    keywords: present(core.keywords),
    comments: present(core.description),
    company: present(app.company),
    manager: present(app.manager),
    totalEditTimeMinutes: app.totalTime ?? undefined,
    mode: detectRenderMode(pkg),
  };
}
