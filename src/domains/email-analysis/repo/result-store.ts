/**
 * @fileoverview In-memory result store for the current analysis run.
 *
 * Holds one immutable snapshot at a time. replace() swaps the snapshot in
 * a single assignment, so readers see either the previous run or the new
 * one, never a mix.
 */

import type { AnalyzedEmail, BatchSummary, EmailFilter, Tier } from '../types.js';

type Snapshot = {
  readonly entries: readonly AnalyzedEmail[];
  readonly byId: ReadonlyMap<string, AnalyzedEmail>;
  readonly lastRun: BatchSummary | null;
};

const EMPTY_SNAPSHOT: Snapshot = Object.freeze({
  entries: Object.freeze([]),
  byId: new Map<string, AnalyzedEmail>(),
  lastRun: null,
});

/**
 * Collapse duplicate ids: each id keeps the position where it first
 * appeared and the value it was last given.
 */
function buildSnapshot(batch: readonly AnalyzedEmail[], lastRun: BatchSummary | null): Snapshot {
  const byId = new Map<string, AnalyzedEmail>();
  for (const entry of batch) {
    byId.set(entry.id, entry);
  }
  return Object.freeze({
    entries: Object.freeze([...byId.values()]),
    byId,
    lastRun,
  });
}

export class ResultStore {
  private snapshot: Snapshot = EMPTY_SNAPSHOT;

  /** All entries of the current run, in insertion order. */
  all(): readonly AnalyzedEmail[] {
    return this.snapshot.entries;
  }

  get size(): number {
    return this.snapshot.entries.length;
  }

  get lastRun(): BatchSummary | null {
    return this.snapshot.lastRun;
  }

  get(id: string): AnalyzedEmail | undefined {
    return this.snapshot.byId.get(id);
  }

  filterByTier(tier: Tier): AnalyzedEmail[] {
    return this.snapshot.entries.filter((entry) => entry.verdict.tier === tier);
  }

  filterByDeadline(hasDeadline: boolean): AnalyzedEmail[] {
    return this.snapshot.entries.filter((entry) => (entry.verdict.deadlines.length > 0) === hasDeadline);
  }

  /** Conjunction of the given criteria; no criteria returns everything. */
  filter(criteria: EmailFilter): AnalyzedEmail[] {
    const { entries } = this.snapshot;
    return entries.filter((entry) =>
      (criteria.tier === undefined || entry.verdict.tier === criteria.tier) &&
      (criteria.hasDeadline === undefined || (entry.verdict.deadlines.length > 0) === criteria.hasDeadline),
    );
  }

  /**
   * Replace the store's contents with a new run's results.
   */
  replace(batch: readonly AnalyzedEmail[], lastRun: BatchSummary | null = null): void {
    this.snapshot = buildSnapshot(batch, lastRun);
  }

  clear(): void {
    this.snapshot = EMPTY_SNAPSHOT;
  }
}
