/**
 * [Content_Types].xml and *.rels parts
 */

import { CONTENT_TYPE, NS } from './namespaces';
import { XML_DECLARATION, childElements, escapeXml, parseXmlPart, serializeXml } from './xml';

export interface Relationship {
  id: string;
  type: string;
  target: string;
}

export interface ContentTypeOverride {
  partName: string; // without the leading slash
  contentType: string;
}

export function renderContentTypesXml(overrides: readonly ContentTypeOverride[]): string {
  return [
    XML_DECLARATION,
    `<Types xmlns="${NS.contentTypes}">`,
    `<Default Extension="rels" ContentType="${CONTENT_TYPE.relationships}"/>`,
    `<Default Extension="xml" ContentType="${CONTENT_TYPE.xml}"/>`,
    ...overrides.map(
      (o) => `<Override PartName="/${escapeXml(o.partName)}" ContentType="${escapeXml(o.contentType)}"/>`
    ),
    '</Types>',
  ].join('');
}

export function renderRelationshipsXml(relationships: readonly Relationship[]): string {
  return [
    XML_DECLARATION,
    `<Relationships xmlns="${NS.packageRels}">`,
    ...relationships.map(
      (r) => `<Relationship Id="${escapeXml(r.id)}" Type="${escapeXml(r.type)}" Target="${escapeXml(r.target)}"/>`
    ),
    '</Relationships>',
  ].join('');
}

/**
 * Add an Override for `partName` unless one exists; returns the new XML
 */
export function ensureContentTypeOverride(xml: string, partName: string, contentType: string): string {
  const doc = parseXmlPart('[Content_Types].xml', xml, 'Types');
  const root = doc.documentElement;
  const wanted = `/${partName}`;

  const exists = childElements(root).some(
    (el) => el.localName === 'Override' && el.getAttribute('PartName') === wanted
  );
  if (exists) return xml;

  const override = doc.createElementNS(NS.contentTypes, 'Override');
  override.setAttribute('PartName', wanted);
  override.setAttribute('ContentType', contentType);
  root.appendChild(override);
  return serializeXml(doc);
}

/**
 * Add a relationship of `type` unless one exists; returns the new XML
 */
export function ensureRelationship(xml: string, partName: string, type: string, target: string): string {
  const doc = parseXmlPart(partName, xml, 'Relationships');
  const root = doc.documentElement;
  const existing = childElements(root).filter((el) => el.localName === 'Relationship');

  if (existing.some((el) => el.getAttribute('Type') === type)) return xml;

  const ids = new Set(existing.map((el) => el.getAttribute('Id')));
  let n = existing.length + 1;
  while (ids.has(`rId${n}`)) n++;

  const rel = doc.createElementNS(NS.packageRels, 'Relationship');
  rel.setAttribute('Id', `rId${n}`);
  rel.setAttribute('Type', type);
  rel.setAttribute('Target', target);
  root.appendChild(rel);
  return serializeXml(doc);
}
