export { NS, PART, REQUIRED_PARTS, CONTENT_TYPE, RELATIONSHIP_TYPE } from './namespaces';
export {
  unpackPackage,
  repackPackage,
  readPartText,
  requirePartText,
  withPart,
  withoutPart,
  partOrder,
  FIXED_ENTRY_DATE,
} from './package-io';
export {
  buildPlainDocument,
  renderDocumentXml,
  timelineSpanMinutes,
  type BuildOptions,
} from './document-builder';
export { injectRevisions, type InjectOptions } from './revision-injector';
export {
  sanitizePackage,
  DEFAULT_NEUTRAL_AUTHOR,
  type SanitizeOptions,
  type SanitizeStats,
} from './sanitizer';
export { scanRevisions, isTrackingEnabled, detectRenderMode, readDocumentProperties } from './revision-scanner';
export {
  readCoreProperties,
  readAppProperties,
  computeTextStatistics,
  normalizeAuthor,
  DEFAULT_APPLICATION,
  DEFAULT_APP_VERSION,
  MAX_AUTHOR_LENGTH,
  type CoreProperties,
  type AppProperties,
  type TextStatistics,
} from './properties';
export { renderDocument, type RenderOptions } from './render';
export { escapeXml, stripInvalidXmlChars, parseXmlPart, serializeXml } from './xml';
