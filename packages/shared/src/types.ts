/**
 * Shared types for docx-chronicle
 */

/**
 * How sentence timestamps are rendered into the body part
 * - final: insertions present but displayed as plain text
 * - suggestions: insertions present and shown as live track changes
 * - clean: no per-sentence revision markup at all
 */
export type RenderMode = 'final' | 'suggestions' | 'clean';

export const RENDER_MODES: readonly RenderMode[] = ['final', 'suggestions', 'clean'];

export function isRenderMode(value: unknown): value is RenderMode {
  return RENDER_MODES.some((mode) => mode === value);
}

/**
 * One sentence and the moment it was (supposedly) written
 */
export interface SentenceRecord {
  position: number; // 0-indexed, contiguous within a document
  text: string;
  createdAt: Date;
  modifiedAt: Date; // >= createdAt
  author: string;
  revisionId: number; // unique within a document, starts at 1
}

/**
 * A document and its ordered sentences
 */
export interface DocumentRecord {
  id: number;
  filename: string;
  createdAt: Date;
  lastModified: Date; // max of sentence modifiedAt
  author: string;
  lastModifiedBy: string;
  sentences: SentenceRecord[];
}

/**
 * Document-level properties; these live only in the package
 */
export interface DocumentProperties {
  title?: string;
  subject?: string;
  keywords?: string;
  comments?: string;
  company?: string;
  manager?: string;
  totalEditTimeMinutes?: number;
  mode: RenderMode;
}

export type RevisionKind = 'insertion' | 'deletion' | 'move-from' | 'move-to';

/**
 * A tracked-change construct found in (or written to) the body part
 */
export interface RevisionTag {
  kind: RevisionKind;
  id: number | null;
  author: string;
  date: Date | null;
  text: string[]; // text of each wrapped run, in order
}

/**
 * An unpacked package: part name -> raw bytes
 * Transforms never mutate a package; they return a new map
 */
export type DocxPackage = ReadonlyMap<string, Uint8Array>;

/**
 * Random source in [0, 1), injectable for deterministic tests
 */
export type RandomSource = () => number;
