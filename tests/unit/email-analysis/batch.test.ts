/**
 * Unit tests for the bounded batch runner.
 */

import { describe, it, expect, vi } from 'vitest';
import { EmailAnalyzer, toAnalyzedEmail } from '../../../src/domains/email-analysis/service/analyzer.js';
import { BATCH_BUDGET_EXHAUSTED, runAnalysisBatch } from '../../../src/domains/email-analysis/service/batch.js';
import { normalizeMessage } from '../../../src/domains/email-analysis/service/normalizer.js';
import type { AnalyzedEmail, RawMessage } from '../../../src/domains/email-analysis/types.js';
import { createUnreachableLlm, rawMessage } from '../../mocks/providers.js';

const VERDICT = { tier: 'UNIMPORTANT' as const, summary: 'ok', deadlines: [], links: [] };

function analyzed(raw: RawMessage): AnalyzedEmail {
  return toAnalyzedEmail(normalizeMessage(raw), VERDICT, 'ANALYZED');
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe('runAnalysisBatch', () => {
  it('returns results in input order regardless of completion order', async () => {
    const delays: Record<string, number> = { m1: 30, m2: 5, m3: 15 };
    const analyzer = {
      analyze: vi.fn(async (raw: RawMessage) => {
        await delay(delays[raw.id]);
        return analyzed(raw);
      }),
    };

    const results = await runAnalysisBatch(
      [rawMessage('m1'), rawMessage('m2'), rawMessage('m3')],
      analyzer,
      { concurrency: 3 },
    );

    expect(results.map((r) => r.id)).toEqual(['m1', 'm2', 'm3']);
  });

  it('never runs more analyses at once than the concurrency limit', async () => {
    let inFlight = 0;
    let maxInFlight = 0;
    const analyzer = {
      analyze: vi.fn(async (raw: RawMessage) => {
        inFlight++;
        maxInFlight = Math.max(maxInFlight, inFlight);
        await delay(5);
        inFlight--;
        return analyzed(raw);
      }),
    };

    const messages = ['a', 'b', 'c', 'd', 'e'].map((id) => rawMessage(id));
    const results = await runAnalysisBatch(messages, analyzer, { concurrency: 2 });

    expect(results).toHaveLength(5);
    expect(analyzer.analyze).toHaveBeenCalledTimes(5);
    expect(maxInFlight).toBe(2);
  });

  it('turns a rejected analysis into a FAILED entry', async () => {
    const analyzer = {
      analyze: vi.fn(async (raw: RawMessage) => {
        if (raw.id === 'bad') throw new Error('unexpected');
        return analyzed(raw);
      }),
    };

    const results = await runAnalysisBatch([rawMessage('ok'), rawMessage('bad')], analyzer, { concurrency: 1 });

    expect(results[0].status).toBe('ANALYZED');
    expect(results[1]).toMatchObject({ id: 'bad', status: 'FAILED', error: 'unexpected' });
  });

  it('marks work as failed once the batch budget is spent', async () => {
    const analyzer = {
      analyze: vi.fn((raw: RawMessage): Promise<AnalyzedEmail> =>
        raw.id === 'slow' ? new Promise<AnalyzedEmail>(() => {}) : Promise.resolve(analyzed(raw))
      ),
    };

    const results = await runAnalysisBatch(
      [rawMessage('slow'), rawMessage('next')],
      analyzer,
      { concurrency: 1, batchTimeoutMs: 30 },
    );

    expect(analyzer.analyze).toHaveBeenCalledTimes(1);
    expect(results.map((r) => [r.id, r.status, r.error])).toEqual([
      ['slow', 'FAILED', BATCH_BUDGET_EXHAUSTED],
      ['next', 'FAILED', BATCH_BUDGET_EXHAUSTED],
    ]);
  });

  it('makes no model calls after the budget is spent', async () => {
    const { llm, generate } = createUnreachableLlm();
    const analyzer = new EmailAnalyzer({ llm, retry: { maxRetries: 3, retryDelaysMs: [30] } });

    const results = await runAnalysisBatch([rawMessage('late')], analyzer, { concurrency: 1, batchTimeoutMs: 10 });

    expect(results[0]).toMatchObject({ status: 'FAILED', error: BATCH_BUDGET_EXHAUSTED });
    expect(generate).toHaveBeenCalledTimes(1);

    await delay(150);
    expect(generate).toHaveBeenCalledTimes(1);
  });

  it('hands every analysis a signal that is aborted when the batch returns', async () => {
    const signals: AbortSignal[] = [];
    const analyzer = {
      analyze: vi.fn(async (raw: RawMessage, signal?: AbortSignal) => {
        if (signal) signals.push(signal);
        return analyzed(raw);
      }),
    };

    await runAnalysisBatch([rawMessage('a'), rawMessage('b')], analyzer, { concurrency: 2 });

    expect(signals).toHaveLength(2);
    expect(signals.every((signal) => signal.aborted)).toBe(true);
  });

  it('handles an empty batch', async () => {
    const analyzer = { analyze: vi.fn(async (raw: RawMessage) => analyzed(raw)) };

    await expect(runAnalysisBatch([], analyzer, { concurrency: 4 })).resolves.toEqual([]);
    expect(analyzer.analyze).not.toHaveBeenCalled();
  });
});
