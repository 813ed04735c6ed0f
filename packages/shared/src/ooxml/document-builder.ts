/**
 * Plain Document Builder
 *
 * Emits a minimal package with one plain paragraph per sentence record and
 * no revision markup. Revision markup is added afterwards by the injector.
 */

import { differenceInSeconds } from 'date-fns';
import { InputError } from '../errors';
import type { DocumentProperties, DocxPackage, SentenceRecord } from '../types';
import { CONTENT_TYPE, NS, PART, RELATIONSHIP_TYPE } from './namespaces';
import { computeTextStatistics, renderAppXml, renderCoreXml } from './properties';
import { renderContentTypesXml, renderRelationshipsXml } from './relationships';
import { renderSettingsXml } from './settings';
import { XML_DECLARATION, encodeXml, escapeXml, stripInvalidXmlChars } from './xml';

export interface BuildOptions {
  application?: string;
  appVersion?: string;
}

/** US Letter, 1-inch margins, in twentieths of a point */
const SECTION_PROPERTIES =
  '<w:sectPr>' +
  '<w:pgSz w:w="12240" w:h="15840"/>' +
  '<w:pgMar w:top="1440" w:right="1440" w:bottom="1440" w:left="1440" w:header="720" w:footer="720" w:gutter="0"/>' +
  '<w:cols w:space="720"/>' +
  '</w:sectPr>';

function renderParagraph(text: string): string {
  const clean = stripInvalidXmlChars(text);
  const space = clean !== clean.trim() ? ' xml:space="preserve"' : '';
  return `<w:p><w:r><w:t${space}>${escapeXml(clean)}</w:t></w:r></w:p>`;
}

export function renderDocumentXml(records: readonly SentenceRecord[]): string {
  return [
    XML_DECLARATION,
    `<w:document xmlns:w="${NS.w}" xmlns:r="${NS.r}">`,
    '<w:body>',
    ...records.map((record) => renderParagraph(record.text)),
    SECTION_PROPERTIES,
    '</w:body>',
    '</w:document>',
  ].join('');
}

/**
 * Whole minutes from the first creation to the last modification, rounded up
 */
export function timelineSpanMinutes(records: readonly SentenceRecord[]): number {
  const first = Math.min(...records.map((r) => r.createdAt.getTime()));
  const last = Math.max(...records.map((r) => r.modifiedAt.getTime()));
  return Math.max(0, Math.ceil(differenceInSeconds(last, first) / 60));
}

export function buildPlainDocument(
  records: readonly SentenceRecord[],
  properties: DocumentProperties,
  author: string,
  options: BuildOptions = {}
): DocxPackage {
  const first = records[0];
  if (!first) {
    throw new InputError('EmptyDocument', 'Cannot build a document without sentences', {
      operation: 'buildPlainDocument',
      component: 'document-builder',
    });
  }

  const modified = new Date(Math.max(...records.map((r) => r.modifiedAt.getTime())));
  const revision = Math.max(...records.map((r) => r.revisionId));

  const parts = new Map<string, Uint8Array>();
  const put = (name: string, xml: string): void => {
    parts.set(name, encodeXml(xml));
  };

  put(
    PART.contentTypes,
    renderContentTypesXml([
      { partName: PART.document, contentType: CONTENT_TYPE.document },
      { partName: PART.settings, contentType: CONTENT_TYPE.settings },
      { partName: PART.core, contentType: CONTENT_TYPE.core },
      { partName: PART.app, contentType: CONTENT_TYPE.app },
    ])
  );
  put(
    PART.rootRels,
    renderRelationshipsXml([
      { id: 'rId1', type: RELATIONSHIP_TYPE.officeDocument, target: PART.document },
      { id: 'rId2', type: RELATIONSHIP_TYPE.coreProperties, target: PART.core },
      { id: 'rId3', type: RELATIONSHIP_TYPE.extendedProperties, target: PART.app },
    ])
  );
  put(
    PART.documentRels,
    renderRelationshipsXml([{ id: 'rId1', type: RELATIONSHIP_TYPE.settings, target: 'settings.xml' }])
  );
  put(PART.document, renderDocumentXml(records));
  put(PART.settings, renderSettingsXml());
  put(
    PART.core,
    renderCoreXml({
      title: properties.title,
      subject: properties.subject,
      keywords: properties.keywords,
      description: properties.comments,
      creator: author,
      lastModifiedBy: author,
      revision,
      created: first.createdAt,
      modified,
    })
  );
  put(
    PART.app,
    renderAppXml({
      application: options.application,
      appVersion: options.appVersion,
      totalTimeMinutes: properties.totalEditTimeMinutes ?? timelineSpanMinutes(records),
      statistics: computeTextStatistics(records.map((r) => r.text)),
      company: properties.company,
      manager: properties.manager,
    })
  );

  return parts;
}
