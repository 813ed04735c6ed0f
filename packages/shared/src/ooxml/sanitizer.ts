/**
 * Sanitizer - strips tracked-change markup and neutralizes document metadata
 *
 * The result is a fixed point: sanitizing a sanitized package changes
 * nothing.
 */

import { SilentLogger, type Logger } from '../logging';
import type { DocxPackage } from '../types';
import { formatOoxmlDate } from '../utils/timestamp';
import { NS, PART } from './namespaces';
import { readPartText, requirePartText, withPart } from './package-io';
import { DEFAULT_APPLICATION, DEFAULT_APP_VERSION, normalizeAuthor } from './properties';
import { removeSettings } from './settings';
import {
  childElements,
  createW,
  findChild,
  findDescendants,
  hasAncestorIn,
  isInNamespace,
  parseXmlPart,
  removeElement,
  serializeXml,
  setText,
  unwrapElement,
} from './xml';

export const DEFAULT_NEUTRAL_AUTHOR = 'Anonymous';

/** Wrappers whose content stays in the document */
const UNWRAPPED = ['ins', 'moveTo'] as const;

/** Revision records removed together with their content */
const REMOVED = [
  'del',
  'moveFrom',
  'rPrChange',
  'pPrChange',
  'sectPrChange',
  'tblPrChange',
  'trPrChange',
  'tcPrChange',
  'numberingChange',
  'moveFromRangeStart',
  'moveFromRangeEnd',
  'moveToRangeStart',
  'moveToRangeEnd',
] as const;

export interface SanitizeOptions {
  neutralAuthor?: string;
  /** false empties the body to one paragraph plus its section properties */
  keepContent?: boolean;
  removeTrackChanges?: boolean;
  removeMetadata?: boolean;
  application?: string;
  appVersion?: string;
  logger?: Logger;
}

export interface SanitizeStats {
  unwrapped: number;
  removed: number;
}

function sanitizeBody(xml: string, keepContent: boolean, removeTrackChanges: boolean): { xml: string; stats: SanitizeStats } {
  const doc = parseXmlPart(PART.document, xml, 'document');
  const stats: SanitizeStats = { unwrapped: 0, removed: 0 };

  if (removeTrackChanges) {
    // Removal first, so content nested under a deletion is never unwrapped
    const doomed = findDescendants(doc, NS.w, REMOVED);
    const doomedSet = new Set<Node>(doomed);
    const outermost = doomed.filter((el) => !hasAncestorIn(el, doomedSet));
    outermost.forEach(removeElement);
    stats.removed = outermost.length;
    for (const el of findDescendants(doc, NS.w, UNWRAPPED)) {
      unwrapElement(el);
      stats.unwrapped++;
    }
  }

  if (!keepContent) {
    const body = findChild(doc.documentElement, NS.w, 'body');
    if (body) {
      for (const child of childElements(body)) {
        if (!isInNamespace(child, NS.w, 'sectPr')) {
          removeElement(child);
        }
      }
      body.insertBefore(createW(doc, 'p'), body.firstChild);
    }
  }

  return { xml: serializeXml(doc), stats };
}

function sanitizeSettings(xml: string): string {
  const doc = parseXmlPart(PART.settings, xml, 'settings');
  return removeSettings(doc.documentElement, ['trackRevisions', 'revisionView']) > 0 ? serializeXml(doc) : xml;
}

/**
 * Set the text of a child, creating it at the end when missing
 */
function upsertChild(doc: Document, namespace: string, qualifiedName: string, value: string): Element {
  const root = doc.documentElement;
  const localName = qualifiedName.slice(qualifiedName.indexOf(':') + 1);
  let child = findChild(root, namespace, localName);
  if (!child) {
    child = doc.createElementNS(namespace, qualifiedName);
    root.appendChild(child);
  }
  setText(child, value);
  return child;
}

function clearIfPresent(root: Element, namespace: string, localName: string): void {
  const child = findChild(root, namespace, localName);
  if (child) setText(child, '');
}

function sanitizeCore(xml: string, author: string, instant: string): string {
  const doc = parseXmlPart(PART.core, xml, 'coreProperties');
  const root = doc.documentElement;

  upsertChild(doc, NS.dc, 'dc:creator', author);
  upsertChild(doc, NS.cp, 'cp:lastModifiedBy', author);
  clearIfPresent(root, NS.dc, 'title');
  clearIfPresent(root, NS.dc, 'subject');
  clearIfPresent(root, NS.dc, 'description');
  clearIfPresent(root, NS.cp, 'keywords');
  upsertChild(doc, NS.cp, 'cp:revision', '1');

  for (const name of ['created', 'modified']) {
    const date = upsertChild(doc, NS.dcterms, `dcterms:${name}`, instant);
    date.setAttributeNS(NS.xsi, 'xsi:type', 'dcterms:W3CDTF');
  }

  const printed = findChild(root, NS.cp, 'lastPrinted');
  if (printed) removeElement(printed);

  return serializeXml(doc);
}

function sanitizeApp(xml: string, application: string, appVersion: string): string {
  const doc = parseXmlPart(PART.app, xml, 'Properties');
  const root = doc.documentElement;

  clearIfPresent(root, NS.ep, 'Company');
  clearIfPresent(root, NS.ep, 'Manager');
  clearIfPresent(root, NS.ep, 'HyperlinkBase');
  upsertChild(doc, NS.ep, 'Application', application);
  upsertChild(doc, NS.ep, 'AppVersion', appVersion);
  upsertChild(doc, NS.ep, 'TotalTime', '0');

  return serializeXml(doc);
}

export function sanitizePackage(pkg: DocxPackage, neutralInstant: Date, options: SanitizeOptions = {}): DocxPackage {
  const logger = options.logger ?? new SilentLogger();
  const removeTrackChanges = options.removeTrackChanges ?? true;
  const removeMetadata = options.removeMetadata ?? true;
  const keepContent = options.keepContent ?? true;

  let result = pkg;

  const body = sanitizeBody(requirePartText(pkg, PART.document, 'sanitizePackage'), keepContent, removeTrackChanges);
  result = withPart(result, PART.document, body.xml);
  logger.debug('Sanitized body', { ...body.stats });

  const settings = readPartText(pkg, PART.settings);
  if (removeTrackChanges && settings !== null) {
    result = withPart(result, PART.settings, sanitizeSettings(settings));
  }

  if (removeMetadata) {
    const author = normalizeAuthor(options.neutralAuthor ?? DEFAULT_NEUTRAL_AUTHOR);
    result = withPart(
      result,
      PART.core,
      sanitizeCore(requirePartText(pkg, PART.core, 'sanitizePackage'), author, formatOoxmlDate(neutralInstant))
    );

    const app = readPartText(pkg, PART.app);
    if (app !== null) {
      result = withPart(
        result,
        PART.app,
        sanitizeApp(app, options.application ?? DEFAULT_APPLICATION, options.appVersion ?? DEFAULT_APP_VERSION)
      );
    }
  }

  return result;
}
