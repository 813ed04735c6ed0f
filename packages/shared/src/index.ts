/**
 * @chronicle/shared
 *
 * Revision engine for word-processing packages. This package must stay
 * environment-agnostic: no file system, no database driver, no console.
 */

export * from './types';
export * from './errors';
export * from './logging';
export * from './utils';
export * from './text';
export * from './timeline';
export * from './ooxml';
export * from './database';
