/**
 * Static API key matching
 *
 * Keys live in a plain list, never in a Map: a lookup's hit/miss is a timing
 * signal. Every match walks the whole list and compares every entry.
 */

import { createHash, timingSafeEqual } from 'crypto';

/**
 * API key mapped to an identity
 */
export interface ApiKeyEntry {
  key: string;
  subject: string;
  role: string;
}

/** Fixed-time equality over two strings */
export type KeyComparator = (presented: string, configured: string) => boolean;

function digest(value: string): Buffer {
  return createHash('sha256').update(value).digest();
}

/**
 * Compare two strings in time that depends only on their lengths.
 *
 * Both sides are hashed first so the buffers handed to timingSafeEqual are
 * always 32 bytes, whatever the input lengths.
 */
export function constantTimeEquals(presented: string, configured: string): boolean {
  return timingSafeEqual(digest(presented), digest(configured));
}

/**
 * Find the entry whose key equals the presented key.
 *
 * Performs exactly `entries.length` comparisons whether or not a key matches,
 * and the position of the match is selected with arithmetic instead of a branch.
 * If keys are duplicated the last match wins.
 *
 * @param compare Injected for instrumentation; defaults to constantTimeEquals
 */
export function matchApiKey(
  presented: string,
  entries: readonly ApiKeyEntry[],
  compare: KeyComparator = constantTimeEquals
): ApiKeyEntry | null {
  let matchedIndex = -1;

  for (let i = 0; i < entries.length; i++) {
    // mask is -1 (all bits) on a match and 0 otherwise
    const mask = -Number(compare(presented, entries[i].key));
    matchedIndex = (matchedIndex & ~mask) | (i & mask);
  }

  return matchedIndex >= 0 ? entries[matchedIndex] : null;
}

/**
 * Parse "key:subject:role" triples.
 *
 * Splits on the first two colons, so a role may itself contain colons.
 * Entries without three parts or with an empty key are skipped.
 */
export function parseApiKeyEntries(values: readonly string[]): ApiKeyEntry[] {
  const result: ApiKeyEntry[] = [];

  for (const value of values) {
    const first = value.indexOf(':');
    const second = first === -1 ? -1 : value.indexOf(':', first + 1);
    if (second === -1) {
      continue;
    }

    const key = value.slice(0, first).trim();
    if (key === '') {
      continue;
    }

    result.push({
      key,
      subject: value.slice(first + 1, second).trim(),
      role: value.slice(second + 1).trim(),
    });
  }

  return result;
}
