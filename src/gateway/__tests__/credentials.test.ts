/**
 * API key matching tests
 */

import { describe, it, expect } from 'vitest';
import {
  ApiKeyEntry,
  constantTimeEquals,
  matchApiKey,
  parseApiKeyEntries,
} from '../credentials.js';

const entries: ApiKeyEntry[] = [
  { key: 'test-key-a', subject: 'alice', role: 'admin' },
  { key: 'test-key-b', subject: 'bob', role: 'viewer' },
  { key: 'test-key-c', subject: 'carol', role: 'operator' },
  { key: 'test-key-d', subject: 'dave', role: 'viewer' },
  { key: 'test-key-e', subject: 'erin', role: 'admin' },
];

function countingComparator() {
  const counter = { calls: 0 };
  const compare = (presented: string, configured: string): boolean => {
    counter.calls++;
    return constantTimeEquals(presented, configured);
  };
  return { counter, compare };
}

describe('constantTimeEquals', () => {
  it('should match identical strings', () => {
    expect(constantTimeEquals('test-key-a', 'test-key-a')).toBe(true);
  });

  it('should not match strings of different length', () => {
    expect(constantTimeEquals('test-key', 'test-key-a')).toBe(false);
  });

  it('should not match strings differing in the last character', () => {
    expect(constantTimeEquals('test-key-a', 'test-key-b')).toBe(false);
  });
});

describe('matchApiKey', () => {
  it('should return the matching entry', () => {
    expect(matchApiKey('test-key-c', entries)).toEqual(entries[2]);
  });

  it('should return null for an unknown key', () => {
    expect(matchApiKey('test-key-z', entries)).toBeNull();
  });

  it('should return null for an empty list', () => {
    expect(matchApiKey('test-key-a', [])).toBeNull();
  });

  it.each([
    ['first entry', 'test-key-a'],
    ['last entry', 'test-key-e'],
    ['no entry', 'not-a-key'],
    ['empty key', ''],
  ])('should compare against every entry when matching the %s', (_label, key) => {
    const { counter, compare } = countingComparator();
    matchApiKey(key, entries, compare);
    expect(counter.calls).toBe(entries.length);
  });

  it('should return the last match when keys repeat', () => {
    const duplicated: ApiKeyEntry[] = [
      { key: 'shared', subject: 'first', role: 'viewer' },
      { key: 'other', subject: 'second', role: 'viewer' },
      { key: 'shared', subject: 'third', role: 'admin' },
    ];
    expect(matchApiKey('shared', duplicated)?.subject).toBe('third');
  });
});

describe('parseApiKeyEntries', () => {
  it('should parse key:subject:role triples and skip invalid ones', () => {
    const parsed = parseApiKeyEntries([
      'k1:alice:admin',
      ' k2 : bob : viewer ',
      'bad',
      'k4:dave',
      ':nokey:admin',
      'k3:carol:ops:readonly',
    ]);

    expect(parsed).toEqual([
      { key: 'k1', subject: 'alice', role: 'admin' },
      { key: 'k2', subject: 'bob', role: 'viewer' },
      { key: 'k3', subject: 'carol', role: 'ops:readonly' },
    ]);
  });

  it('should allow an empty role', () => {
    expect(parseApiKeyEntries(['k1:alice:'])).toEqual([
      { key: 'k1', subject: 'alice', role: '' },
    ]);
  });
});
