/**
 * Package I/O - zip container <-> part map
 *
 * Repacking is deterministic: [Content_Types].xml first, remaining parts in
 * lexicographic order, every entry stamped with the same date.
 */

import JSZip from 'jszip';
import { FormatError } from '../errors';
import type { DocxPackage } from '../types';
import { PART, REQUIRED_PARTS } from './namespaces';
import { decodeXml, encodeXml } from './xml';

/**
 * Date stamped on every zip entry
 */
export const FIXED_ENTRY_DATE = new Date(Date.UTC(2000, 0, 1, 0, 0, 0));

/**
 * Read a zip container into a part map
 */
export async function unpackPackage(bytes: Uint8Array): Promise<DocxPackage> {
  let zip: JSZip;
  try {
    zip = await JSZip.loadAsync(bytes);
  } catch (error) {
    throw new FormatError(
      'NotAPackage',
      'Input is not a zip container',
      { operation: 'unpackPackage', component: 'package-io', data: { size: bytes.length } },
      error instanceof Error ? error : undefined
    );
  }

  const parts = new Map<string, Uint8Array>();
  for (const entry of Object.values(zip.files)) {
    if (entry.dir) continue;
    try {
      parts.set(entry.name, await entry.async('uint8array'));
    } catch (error) {
      throw new FormatError(
        'CorruptPackage',
        `Entry ${entry.name} cannot be decompressed`,
        { operation: 'unpackPackage', component: 'package-io', data: { partName: entry.name } },
        error instanceof Error ? error : undefined
      );
    }
  }

  for (const required of REQUIRED_PARTS) {
    if (!parts.has(required)) {
      throw missingPart(required, 'unpackPackage');
    }
  }

  return parts;
}

/**
 * Order in which parts are written
 */
export function partOrder(pkg: DocxPackage): string[] {
  const names = [...pkg.keys()].filter((name) => name !== PART.contentTypes).sort();
  return pkg.has(PART.contentTypes) ? [PART.contentTypes, ...names] : names;
}

/**
 * Write a part map back into a zip container
 */
export async function repackPackage(pkg: DocxPackage): Promise<Uint8Array> {
  const zip = new JSZip();
  for (const name of partOrder(pkg)) {
    const data = pkg.get(name);
    if (data) {
      zip.file(name, data, { binary: true, date: FIXED_ENTRY_DATE, createFolders: false });
    }
  }

  return zip.generateAsync({
    type: 'uint8array',
    compression: 'DEFLATE',
    compressionOptions: { level: 6 },
  });
}

export function readPartText(pkg: DocxPackage, partName: string): string | null {
  const bytes = pkg.get(partName);
  return bytes ? decodeXml(bytes) : null;
}

/**
 * Like readPartText, but a missing part is a MissingRequiredPart failure
 */
export function requirePartText(pkg: DocxPackage, partName: string, operation: string): string {
  const text = readPartText(pkg, partName);
  if (text === null) {
    throw missingPart(partName, operation);
  }
  return text;
}

/**
 * Copy of `pkg` with one part added or replaced
 */
export function withPart(pkg: DocxPackage, partName: string, content: string | Uint8Array): DocxPackage {
  const next = new Map(pkg);
  next.set(partName, typeof content === 'string' ? encodeXml(content) : content);
  return next;
}

export function withoutPart(pkg: DocxPackage, partName: string): DocxPackage {
  const next = new Map(pkg);
  next.delete(partName);
  return next;
}

function missingPart(partName: string, operation: string): FormatError {
  return new FormatError('MissingRequiredPart', `Package has no ${partName}`, {
    operation,
    component: 'package-io',
    data: { partName },
  });
}
