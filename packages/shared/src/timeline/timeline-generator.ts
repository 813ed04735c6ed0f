/**
 * Timeline Generator - turns an ordered list of sentences into a plausible
 * writing history
 *
 * Each sentence gets a creation instant that trails the previous one by a
 * random whole number of seconds in [minIntervalSeconds, maxIntervalSeconds],
 * plus a sequential revision id and an author label.
 */

import { addSeconds } from 'date-fns';
import { InputError } from '../errors';
import type { RandomSource, SentenceRecord } from '../types';
import { truncateToSecond } from '../utils/timestamp';

export const DEFAULT_AUTHOR = 'Chronicle';

/**
 * Interval configuration between consecutive sentences
 */
export interface IntervalConfig {
  minIntervalSeconds: number;
  maxIntervalSeconds: number;
}

export const DEFAULT_INTERVAL_CONFIG: IntervalConfig = {
  minIntervalSeconds: 30,
  maxIntervalSeconds: 300,
};

export interface TimelineOptions extends Partial<IntervalConfig> {
  /** Instant of the first sentence; defaults to now */
  start?: Date;
  author?: string;
  random?: RandomSource;
}

/**
 * Uniform integer in [min, max], both inclusive
 */
export function randomIntInclusive(min: number, max: number, random: RandomSource = Math.random): number {
  const span = max - min + 1;
  const offset = Math.floor(random() * span);
  // A source returning exactly 1 would overshoot
  return min + Math.min(offset, span - 1);
}

/**
 * Validate interval bounds
 */
export function assertValidInterval(minSeconds: number, maxSeconds: number): void {
  let problem: string | null = null;
  if (!Number.isInteger(minSeconds) || !Number.isInteger(maxSeconds)) {
    problem = 'interval bounds must be whole seconds';
  } else if (minSeconds < 0 || maxSeconds < 0) {
    problem = 'interval bounds must not be negative';
  } else if (minSeconds > maxSeconds) {
    problem = 'minimum interval exceeds maximum interval';
  }

  if (problem) {
    throw new InputError('InvalidInterval', `Invalid interval [${minSeconds}, ${maxSeconds}]: ${problem}`, {
      operation: 'generateTimeline',
      component: 'timeline',
      data: { minSeconds, maxSeconds },
    });
  }
}

/**
 * Generate `count` random gaps in seconds
 */
export function generateRandomIntervals(
  count: number,
  minSeconds: number,
  maxSeconds: number,
  random: RandomSource = Math.random
): number[] {
  assertValidInterval(minSeconds, maxSeconds);
  return Array.from({ length: count }, () => randomIntInclusive(minSeconds, maxSeconds, random));
}

/**
 * Build one SentenceRecord per sentence
 */
export function generateTimeline(sentences: readonly string[], options: TimelineOptions = {}): SentenceRecord[] {
  const minSeconds = options.minIntervalSeconds ?? DEFAULT_INTERVAL_CONFIG.minIntervalSeconds;
  const maxSeconds = options.maxIntervalSeconds ?? DEFAULT_INTERVAL_CONFIG.maxIntervalSeconds;
  assertValidInterval(minSeconds, maxSeconds);

  if (sentences.length === 0) {
    throw new InputError('EmptyInput', 'No sentences to build a timeline from', {
      operation: 'generateTimeline',
      component: 'timeline',
    });
  }

  const blank = sentences.findIndex((sentence) => sentence.trim().length === 0);
  if (blank !== -1) {
    throw new InputError('EmptyInput', `Sentence ${blank} is empty`, {
      operation: 'generateTimeline',
      component: 'timeline',
      data: { position: blank },
    });
  }

  const author = options.author ?? DEFAULT_AUTHOR;
  const start = truncateToSecond(options.start ?? new Date());
  const gaps = generateRandomIntervals(sentences.length - 1, minSeconds, maxSeconds, options.random);

  let current = start;
  return sentences.map((text, position) => {
    if (position > 0) {
      current = addSeconds(current, gaps[position - 1] ?? minSeconds);
      if (Number.isNaN(current.getTime())) {
        throw new InputError('InvalidArgument', `Sentence ${position} falls outside the representable date range`, {
          operation: 'generateTimeline',
          component: 'timeline',
          data: { position, minSeconds, maxSeconds },
        });
      }
    }

    return {
      position,
      text,
      createdAt: current,
      modifiedAt: current,
      author,
      revisionId: position + 1,
    };
  });
}
