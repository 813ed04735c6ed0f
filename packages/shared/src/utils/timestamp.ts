/**
 * Timestamp parsing and formatting
 *
 * All instants are handled as UTC. Naive input ("2024-01-01 10:00") is read
 * as UTC wall-clock time, never as host-local time.
 */

import { isValid, parse, parseISO, startOfSecond } from 'date-fns';
import { InputError } from '../errors';

/**
 * Naive formats accepted on the command line, tried in order
 */
const NAIVE_FORMATS = [
  'yyyy-MM-dd HH:mm:ss',
  "yyyy-MM-dd'T'HH:mm:ss",
  'yyyy-MM-dd HH:mm',
  'yyyy-MM-dd',
  'yyyy/MM/dd HH:mm:ss',
  'yyyy/MM/dd',
];

const ZONE_SUFFIX = /(?:Z|[+-]\d{2}:?\d{2})$/i;

const REFERENCE_DATE = new Date(0);

/**
 * Reinterpret a host-local wall-clock reading as UTC
 */
function localReadingAsUtc(local: Date): Date {
  return new Date(local.getTime() - local.getTimezoneOffset() * 60_000);
}

/**
 * Parse a timestamp given as ISO-8601 (with zone) or one of the naive formats
 */
export function parseTimestamp(value: string): Date {
  const trimmed = value.trim();

  if (ZONE_SUFFIX.test(trimmed)) {
    const zoned = parseISO(trimmed);
    if (isValid(zoned)) {
      return zoned;
    }
  }

  for (const format of NAIVE_FORMATS) {
    const local = parse(trimmed, format, REFERENCE_DATE);
    if (isValid(local)) {
      return localReadingAsUtc(local);
    }
  }

  throw new InputError('InvalidTimestamp', `Could not parse timestamp: ${value}`, {
    operation: 'parseTimestamp',
    component: 'timestamp',
    data: { value },
  });
}

/**
 * Drop sub-second precision
 */
export function truncateToSecond(date: Date): Date {
  return startOfSecond(date);
}

/**
 * Render the wire format used by w:date and dcterms: 2024-01-01T10:00:00Z
 */
export function formatOoxmlDate(date: Date): string {
  return truncateToSecond(date).toISOString().replace(/\.\d{3}Z$/, 'Z');
}

/**
 * Parse a wire-format date; null when absent or unreadable
 */
export function parseOoxmlDate(value: string | null | undefined): Date | null {
  if (!value) {
    return null;
  }
  const parsed = parseISO(value.trim());
  return isValid(parsed) ? parsed : null;
}

/**
 * Human-readable UTC form for CLI output: 2024-01-01 10:00:00
 */
export function formatDisplayTimestamp(date: Date): string {
  return formatOoxmlDate(date).replace('T', ' ').replace(/Z$/, '');
}
