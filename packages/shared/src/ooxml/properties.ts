/**
 * Core (docProps/core.xml) and extended (docProps/app.xml) properties
 */

import type { DocxPackage } from '../types';
import { formatOoxmlDate, parseOoxmlDate } from '../utils/timestamp';
import { NS, PART } from './namespaces';
import { readPartText, requirePartText } from './package-io';
import { XML_DECLARATION, escapeXml, findChild, parseXmlPart, stripInvalidXmlChars, textOf } from './xml';

export const DEFAULT_APPLICATION = 'Microsoft Office Word';
export const DEFAULT_APP_VERSION = '16.0000';

/** Longest author string written to any attribute or property */
export const MAX_AUTHOR_LENGTH = 255;

export interface CoreProperties {
  title: string | null;
  subject: string | null;
  creator: string | null;
  keywords: string | null;
  description: string | null;
  lastModifiedBy: string | null;
  revision: number | null;
  created: Date | null;
  modified: Date | null;
  lastPrinted: Date | null;
}

export interface AppProperties {
  application: string | null;
  appVersion: string | null;
  totalTime: number | null;
  pages: number | null;
  words: number | null;
  characters: number | null;
  charactersWithSpaces: number | null;
  paragraphs: number | null;
  lines: number | null;
  company: string | null;
  manager: string | null;
  hyperlinkBase: string | null;
}

export interface TextStatistics {
  pages: number;
  words: number;
  characters: number;
  charactersWithSpaces: number;
  paragraphs: number;
  lines: number;
}

const WORDS_PER_PAGE = 500;

/**
 * Author label safe for XML, at most MAX_AUTHOR_LENGTH characters
 */
export function normalizeAuthor(author: string): string {
  return Array.from(stripInvalidXmlChars(author)).slice(0, MAX_AUTHOR_LENGTH).join('');
}

/**
 * Counts for app.xml, one paragraph per entry
 */
export function computeTextStatistics(paragraphs: readonly string[]): TextStatistics {
  let words = 0;
  let characters = 0;
  let charactersWithSpaces = 0;

  for (const text of paragraphs) {
    const tokens = text.split(/\s+/).filter((token) => token.length > 0);
    words += tokens.length;
    characters += tokens.reduce((sum, token) => sum + token.length, 0);
    charactersWithSpaces += text.length;
  }

  return {
    pages: Math.max(1, Math.ceil(words / WORDS_PER_PAGE)),
    words,
    characters,
    charactersWithSpaces,
    paragraphs: paragraphs.length,
    lines: paragraphs.length,
  };
}

export interface CorePropertiesInput {
  title?: string;
  subject?: string;
  keywords?: string;
  description?: string;
  creator: string;
  lastModifiedBy: string;
  revision: number;
  created: Date;
  modified: Date;
}

function element(name: string, value: string | undefined): string {
  if (value === undefined || value.length === 0) return '';
  return `<${name}>${escapeXml(stripInvalidXmlChars(value))}</${name}>`;
}

export function renderCoreXml(core: CorePropertiesInput): string {
  return [
    XML_DECLARATION,
    `<cp:coreProperties xmlns:cp="${NS.cp}" xmlns:dc="${NS.dc}" xmlns:dcterms="${NS.dcterms}" xmlns:dcmitype="${NS.dcmitype}" xmlns:xsi="${NS.xsi}">`,
    element('dc:title', core.title),
    element('dc:subject', core.subject),
    element('dc:creator', normalizeAuthor(core.creator)),
    element('cp:keywords', core.keywords),
    element('dc:description', core.description),
    element('cp:lastModifiedBy', normalizeAuthor(core.lastModifiedBy)),
    `<cp:revision>${core.revision}</cp:revision>`,
    `<dcterms:created xsi:type="dcterms:W3CDTF">${formatOoxmlDate(core.created)}</dcterms:created>`,
    `<dcterms:modified xsi:type="dcterms:W3CDTF">${formatOoxmlDate(core.modified)}</dcterms:modified>`,
    '</cp:coreProperties>',
  ].join('');
}

export interface AppPropertiesInput {
  application?: string;
  appVersion?: string;
  totalTimeMinutes: number;
  statistics: TextStatistics;
  company?: string;
  manager?: string;
}

export function renderAppXml(app: AppPropertiesInput): string {
  const stats = app.statistics;
  return [
    XML_DECLARATION,
    `<Properties xmlns="${NS.ep}" xmlns:vt="${NS.vt}">`,
    '<Template>Normal.dotm</Template>',
    `<TotalTime>${app.totalTimeMinutes}</TotalTime>`,
    `<Pages>${stats.pages}</Pages>`,
    `<Words>${stats.words}</Words>`,
    `<Characters>${stats.characters}</Characters>`,
    element('Application', app.application ?? DEFAULT_APPLICATION),
    '<DocSecurity>0</DocSecurity>',
    `<Lines>${stats.lines}</Lines>`,
    `<Paragraphs>${stats.paragraphs}</Paragraphs>`,
    '<ScaleCrop>false</ScaleCrop>',
    element('Manager', app.manager),
    element('Company', app.company),
    '<LinksUpToDate>false</LinksUpToDate>',
    `<CharactersWithSpaces>${stats.charactersWithSpaces}</CharactersWithSpaces>`,
    '<SharedDoc>false</SharedDoc>',
    '<HyperlinksChanged>false</HyperlinksChanged>',
    element('AppVersion', app.appVersion ?? DEFAULT_APP_VERSION),
    '</Properties>',
  ].join('');
}

function childText(parent: Element, namespace: string, localName: string): string | null {
  const child = findChild(parent, namespace, localName);
  return child ? textOf(child) : null;
}

function childNumber(parent: Element, namespace: string, localName: string): number | null {
  const text = childText(parent, namespace, localName);
  if (text === null || text.trim() === '') return null;
  const value = Number(text.trim());
  return Number.isFinite(value) ? value : null;
}

export function readCoreProperties(pkg: DocxPackage): CoreProperties {
  const doc = parseXmlPart(PART.core, requirePartText(pkg, PART.core, 'readCoreProperties'), 'coreProperties');
  const root = doc.documentElement;

  return {
    title: childText(root, NS.dc, 'title'),
    subject: childText(root, NS.dc, 'subject'),
    creator: childText(root, NS.dc, 'creator'),
    keywords: childText(root, NS.cp, 'keywords'),
    description: childText(root, NS.dc, 'description'),
    lastModifiedBy: childText(root, NS.cp, 'lastModifiedBy'),
    revision: childNumber(root, NS.cp, 'revision'),
    created: parseOoxmlDate(childText(root, NS.dcterms, 'created')),
    modified: parseOoxmlDate(childText(root, NS.dcterms, 'modified')),
    lastPrinted: parseOoxmlDate(childText(root, NS.cp, 'lastPrinted')),
  };
}

/**
 * Extended properties; every field is null when the part is absent
 */
export function readAppProperties(pkg: DocxPackage): AppProperties {
  const xml = readPartText(pkg, PART.app);
  if (xml === null) {
    return {
      application: null,
      appVersion: null,
      totalTime: null,
      pages: null,
      words: null,
      characters: null,
      charactersWithSpaces: null,
      paragraphs: null,
      lines: null,
      company: null,
      manager: null,
      hyperlinkBase: null,
    };
  }

  const root = parseXmlPart(PART.app, xml, 'Properties').documentElement;
  return {
    application: childText(root, NS.ep, 'Application'),
    appVersion: childText(root, NS.ep, 'AppVersion'),
    totalTime: childNumber(root, NS.ep, 'TotalTime'),
    pages: childNumber(root, NS.ep, 'Pages'),
    words: childNumber(root, NS.ep, 'Words'),
    characters: childNumber(root, NS.ep, 'Characters'),
    charactersWithSpaces: childNumber(root, NS.ep, 'CharactersWithSpaces'),
    paragraphs: childNumber(root, NS.ep, 'Paragraphs'),
    lines: childNumber(root, NS.ep, 'Lines'),
    company: childText(root, NS.ep, 'Company'),
    manager: childText(root, NS.ep, 'Manager'),
    hyperlinkBase: childText(root, NS.ep, 'HyperlinkBase'),
  };
}
