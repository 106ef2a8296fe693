import { readFile } from 'node:fs/promises';
import { MarqueeError } from '@marquee/shared';

export type SearchCriteria = Record<string, unknown>;

/** Produces the full result sequence for a search; paging happens afterwards. */
export type SearchSource = (criteria: SearchCriteria) => Promise<unknown[]>;

function matchesValue(actual: unknown, expected: unknown): boolean {
  if (typeof expected === 'string') {
    const needle = expected.toLowerCase();
    if (typeof actual === 'string') return actual.toLowerCase().includes(needle);
    if (Array.isArray(actual)) {
      return actual.some(item => typeof item === 'string' && item.toLowerCase().includes(needle));
    }
    return false;
  }
  if (typeof expected === 'number' || typeof expected === 'boolean') {
    if (Array.isArray(actual)) return actual.includes(expected);
    return actual === expected;
  }
  return false;
}

function matches(record: Record<string, unknown>, criteria: SearchCriteria): boolean {
  return Object.entries(criteria).every(([key, expected]) => matchesValue(record[key], expected));
}

/**
 * Search over records held in memory. Strings match case-insensitively as
 * substrings, numbers and booleans by equality; every criterion must match.
 */
export function createFixtureSearch(records: readonly Record<string, unknown>[]): SearchSource {
  return async criteria => records.filter(r => matches(r, criteria));
}

export async function loadFixtureRecords(path: string): Promise<Record<string, unknown>[]> {
  const raw: unknown = JSON.parse(await readFile(path, 'utf-8'));
  if (!Array.isArray(raw)) {
    throw new MarqueeError(`Fixture ${path} must contain a JSON array`);
  }
  return raw.filter((r): r is Record<string, unknown> => typeof r === 'object' && r !== null && !Array.isArray(r));
}
