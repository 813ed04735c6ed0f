/**
 * Database module exports
 */

export * from './types';
export * from './schema';
export { toDocumentMetadata } from './metadata';
