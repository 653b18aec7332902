/**
 * Unit tests for the in-memory result store.
 */

import { beforeEach, describe, it, expect } from 'vitest';
import { ResultStore } from '../../../src/domains/email-analysis/repo/result-store.js';
import { toAnalyzedEmail } from '../../../src/domains/email-analysis/service/analyzer.js';
import { normalizeMessage } from '../../../src/domains/email-analysis/service/normalizer.js';
import { TIERS, type AnalyzedEmail, type BatchSummary, type Tier } from '../../../src/domains/email-analysis/types.js';
import { rawMessage } from '../../mocks/providers.js';

function entry(id: string, tier: Tier, deadlines: string[] = [], summary = `summary ${id}`): AnalyzedEmail {
  return toAnalyzedEmail(normalizeMessage(rawMessage(id)), { tier, summary, deadlines, links: [] }, 'ANALYZED');
}

const SUMMARY: BatchSummary = {
  total: 5,
  analyzed: 5,
  fallback: 0,
  failed: 0,
  startedAt: '2024-05-06T09:00:00.000Z',
  completedAt: '2024-05-06T09:00:02.000Z',
  durationMs: 2000,
};

describe('ResultStore', () => {
  let store: ResultStore;

  beforeEach(() => {
    store = new ResultStore();
    store.replace([
      entry('a', 'VERY_IMPORTANT', ['2024-05-07']),
      entry('b', 'IMPORTANT'),
      entry('c', 'UNIMPORTANT'),
      entry('d', 'SPAM'),
      entry('e', 'IMPORTANT', ['2024-05-09']),
    ], SUMMARY);
  });

  it('starts empty', () => {
    const empty = new ResultStore();

    expect(empty.all()).toEqual([]);
    expect(empty.size).toBe(0);
    expect(empty.lastRun).toBeNull();
  });

  it('keeps insertion order', () => {
    expect(store.all().map((e) => e.id)).toEqual(['a', 'b', 'c', 'd', 'e']);
    expect(store.lastRun).toEqual(SUMMARY);
  });

  it('partitions all entries across the four tiers', () => {
    const partitions = TIERS.map((tier) => store.filterByTier(tier).map((e) => e.id));

    expect(partitions).toEqual([['a'], ['b', 'e'], ['c'], ['d']]);
    expect(partitions.flat().sort()).toEqual(store.all().map((e) => e.id).sort());
  });

  it('filters by deadline presence', () => {
    expect(store.filterByDeadline(true).map((e) => e.id)).toEqual(['a', 'e']);
    expect(store.filterByDeadline(false).map((e) => e.id)).toEqual(['b', 'c', 'd']);
  });

  it('combines criteria', () => {
    expect(store.filter({ tier: 'IMPORTANT', hasDeadline: true }).map((e) => e.id)).toEqual(['e']);
    expect(store.filter({ tier: 'IMPORTANT', hasDeadline: false }).map((e) => e.id)).toEqual(['b']);
    expect(store.filter({}).map((e) => e.id)).toEqual(['a', 'b', 'c', 'd', 'e']);
  });

  it('looks entries up by id', () => {
    expect(store.get('c')?.verdict.tier).toBe('UNIMPORTANT');
    expect(store.get('missing')).toBeUndefined();
  });

  it('collapses duplicate ids to the first position and the last value', () => {
    store.replace([
      entry('x', 'SPAM', [], 'first'),
      entry('y', 'IMPORTANT'),
      entry('x', 'IMPORTANT', [], 'second'),
    ]);

    expect(store.all().map((e) => e.id)).toEqual(['x', 'y']);
    expect(store.get('x')?.verdict.summary).toBe('second');
    expect(store.size).toBe(2);
  });

  it('replaces the whole snapshot without touching earlier reads', () => {
    const before = store.all();

    store.replace([entry('z', 'SPAM')]);

    expect(before.map((e) => e.id)).toEqual(['a', 'b', 'c', 'd', 'e']);
    expect(store.all().map((e) => e.id)).toEqual(['z']);
    expect(store.get('a')).toBeUndefined();
    expect(store.lastRun).toBeNull();
  });

  it('exposes a frozen snapshot', () => {
    expect(Object.isFrozen(store.all())).toBe(true);
  });

  it('empties on clear', () => {
    store.clear();

    expect(store.size).toBe(0);
    expect(store.lastRun).toBeNull();
  });
});
