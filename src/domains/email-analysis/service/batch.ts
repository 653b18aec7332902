/**
 * @fileoverview Bounded fan-out over a batch of messages.
 *
 * A fixed number of workers pull messages off a shared cursor; each
 * message's pipeline runs independently. Results keep input order
 * regardless of completion order.
 */

import { errorMessage } from '../../../utils/errors.js';
import type { AnalyzedEmail, RawMessage } from '../types.js';
import { failedWithoutAnalysis } from './analyzer.js';

export const BATCH_BUDGET_EXHAUSTED = 'batch time budget exhausted';

export type BatchAnalyzer = {
  /** `signal` aborts once the batch stops waiting; no new model calls may start after that. */
  analyze(raw: RawMessage, signal?: AbortSignal): Promise<AnalyzedEmail>;
};

export type BatchOptions = {
  concurrency: number;
  /** Overall budget for the batch; 0 or undefined means unbounded. */
  batchTimeoutMs?: number;
  bodyCharBudget?: number;
};

const TIMED_OUT = Symbol('timed-out');

/**
 * Resolve with `promise`, or with TIMED_OUT once `ms` has elapsed.
 * The losing promise keeps running; its result is dropped.
 */
async function raceBudget<T>(promise: Promise<T>, ms: number): Promise<T | typeof TIMED_OUT> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<typeof TIMED_OUT>((resolve) => {
    timer = setTimeout(() => resolve(TIMED_OUT), Math.max(0, ms));
  });
  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Analyze every message with at most `concurrency` analyses in flight.
 *
 * When a batch budget is set and runs out, messages not yet started are
 * marked FAILED without a model call, and analyses still in flight are
 * marked FAILED and their eventual results discarded. The signal handed
 * to each analysis is aborted at that point, and again when the batch
 * returns, so abandoned analyses stop retrying.
 */
export async function runAnalysisBatch(
  messages: readonly RawMessage[],
  analyzer: BatchAnalyzer,
  options: BatchOptions,
): Promise<AnalyzedEmail[]> {
  const results: AnalyzedEmail[] = new Array<AnalyzedEmail>(messages.length);
  const budgetMs = options.batchTimeoutMs ?? 0;
  const deadline = budgetMs > 0 ? Date.now() + budgetMs : Number.POSITIVE_INFINITY;
  const exhausted = (raw: RawMessage) =>
    failedWithoutAnalysis(raw, BATCH_BUDGET_EXHAUSTED, options.bodyCharBudget);

  let cursor = 0;
  let budgetSpent = false;
  const cancellation = new AbortController();

  const analyzeOne = (raw: RawMessage): Promise<AnalyzedEmail> =>
    analyzer.analyze(raw, cancellation.signal).catch((error: unknown) =>
      failedWithoutAnalysis(raw, errorMessage(error), options.bodyCharBudget),
    );

  const worker = async (): Promise<void> => {
    while (cursor < messages.length) {
      const index = cursor++;
      const raw = messages[index];

      if (budgetSpent || Date.now() >= deadline) {
        results[index] = exhausted(raw);
        continue;
      }

      if (deadline === Number.POSITIVE_INFINITY) {
        results[index] = await analyzeOne(raw);
        continue;
      }

      const outcome = await raceBudget(analyzeOne(raw), deadline - Date.now());
      if (outcome === TIMED_OUT) {
        budgetSpent = true;
        cancellation.abort();
        results[index] = exhausted(raw);
      } else {
        results[index] = outcome;
      }
    }
  };

  const workerCount = Math.max(1, Math.min(options.concurrency, messages.length));
  try {
    await Promise.all(Array.from({ length: workerCount }, () => worker()));
  } finally {
    cancellation.abort();
  }

  return results;
}
