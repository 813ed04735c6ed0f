/**
 * Builders shared by the package tests
 */

import { AppError } from '../../logging/types';
import type { DocxPackage, SentenceRecord } from '../../types';
import { NS } from '../namespaces';
import { readPartText } from '../package-io';
import { encodeXml, parseXmlPart } from '../xml';

export const W = `xmlns:w="${NS.w}"`;

export function sentence(position: number, text: string, iso: string, overrides: Partial<SentenceRecord> = {}): SentenceRecord {
  const at = new Date(iso);
  return {
    position,
    text,
    createdAt: at,
    modifiedAt: at,
    author: 'Ada',
    revisionId: position + 1,
    ...overrides,
  };
}

export const THREE_SENTENCES: SentenceRecord[] = [
  sentence(0, 'Alpha.', '2024-01-01T10:00:00Z'),
  sentence(1, 'Beta.', '2024-01-01T10:01:00Z'),
  sentence(2, 'Gamma.', '2024-01-01T10:02:30Z'),
];

export function packageOf(parts: Record<string, string>): DocxPackage {
  return new Map(Object.entries(parts).map(([name, xml]) => [name, encodeXml(xml)]));
}

export function partText(pkg: DocxPackage, name: string): string {
  const text = readPartText(pkg, name);
  if (text === null) {
    throw new Error(`missing part ${name}`);
  }
  return text;
}

export function partRoot(pkg: DocxPackage, name: string): Element {
  return parseXmlPart(name, partText(pkg, name)).documentElement;
}

/**
 * Engine error code thrown by `fn`, or undefined when it returns
 */
export function thrownCode(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (error) {
    if (error instanceof AppError && 'code' in error && typeof error.code === 'string') {
      return error.code;
    }
    throw error;
  }
  return undefined;
}
