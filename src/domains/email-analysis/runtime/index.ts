/**
 * @fileoverview Email analysis service lifecycle.
 *
 * Owns the process-wide result store and runs one analysis batch at a
 * time: fetch unread mail, analyze through the worker pool, then swap the
 * store's snapshot once. A run requested while another is in flight is
 * rejected with BatchInProgressError.
 */

import config from '../../../config.js';
import { BatchInProgressError, errorMessage } from '../../../utils/errors.js';
import { createLogger, createRunId, withLogContext, type AppLogger } from '../../../utils/observability/index.js';
import { GmailMailbox } from '../providers/gmail.js';
import { OllamaClient, type LlmHealth } from '../providers/ollama.js';
import { ResultStore } from '../repo/result-store.js';
import { EmailAnalyzer } from '../service/analyzer.js';
import { runAnalysisBatch, type BatchAnalyzer } from '../service/batch.js';
import {
  ANALYSIS_STATUSES,
  type AnalysisStatus,
  type AnalyzedEmail,
  type BatchSummary,
  type EmailFilter,
  type MailboxProvider,
  type RawMessage,
} from '../types.js';

// Re-export domain public API
export { EmailAnalyzer, FALLBACK_SUMMARY, FALLBACK_VERDICT } from '../service/analyzer.js';
export { runAnalysisBatch, BATCH_BUDGET_EXHAUSTED } from '../service/batch.js';
export { ResultStore } from '../repo/result-store.js';
export { GmailMailbox } from '../providers/gmail.js';
export { OllamaClient } from '../providers/ollama.js';
export type { LlmHealth } from '../providers/ollama.js';
export { isTier, TIERS } from '../types.js';
export type * from '../types.js';

export type ServiceStatus = {
  running: boolean;
  lastRun: BatchSummary | null;
  llm: { enabled: boolean; reachable: boolean; models: string[]; model?: string; error?: string };
};

export type EmailAnalysisServiceOptions = {
  mailbox: MailboxProvider;
  analyzer: BatchAnalyzer;
  /** Model health probe; absent when the model is disabled. */
  llmHealth?: () => Promise<LlmHealth>;
  llmModel?: string;
  store?: ResultStore;
  batchSize?: number;
  concurrency?: number;
  batchTimeoutMs?: number;
  bodyCharBudget?: number;
  logger?: AppLogger;
  now?: () => number;
};

/** Count entries by status over distinct ids, last value winning. */
export function summarizeRun(
  results: readonly AnalyzedEmail[],
  startedAt: number,
  completedAt: number,
): BatchSummary {
  const distinct = new Map<string, AnalyzedEmail>();
  for (const result of results) {
    distinct.set(result.id, result);
  }

  const counts = new Map<AnalysisStatus, number>(ANALYSIS_STATUSES.map((status) => [status, 0]));
  for (const entry of distinct.values()) {
    counts.set(entry.status, (counts.get(entry.status) ?? 0) + 1);
  }

  return {
    total: distinct.size,
    analyzed: counts.get('ANALYZED') ?? 0,
    fallback: counts.get('FALLBACK') ?? 0,
    failed: counts.get('FAILED') ?? 0,
    startedAt: new Date(startedAt).toISOString(),
    completedAt: new Date(completedAt).toISOString(),
    durationMs: completedAt - startedAt,
  };
}

export class EmailAnalysisService {
  private readonly store: ResultStore;
  private readonly log: AppLogger;
  private readonly now: () => number;
  private running = false;

  constructor(private readonly options: EmailAnalysisServiceOptions) {
    this.store = options.store ?? new ResultStore();
    this.log = options.logger ?? createLogger({ domain: 'email-analysis' });
    this.now = options.now ?? Date.now;
  }

  isRunning(): boolean {
    return this.running;
  }

  /**
   * Fetch, analyze and publish one batch.
   *
   * @throws BatchInProgressError when a run is already in flight
   * @throws MailboxAuthError | MailboxTransportError when the mailbox cannot be read;
   *   the previous snapshot is left untouched
   */
  async runBatch(maxCount?: number): Promise<BatchSummary> {
    if (this.running) {
      throw new BatchInProgressError();
    }
    this.running = true;

    try {
      return await withLogContext({ runId: createRunId() }, () =>
        this.execute(maxCount ?? this.options.batchSize ?? config.analysis.batchSize)
      );
    } finally {
      this.running = false;
    }
  }

  getAll(): readonly AnalyzedEmail[] {
    return this.store.all();
  }

  getFiltered(criteria: EmailFilter): AnalyzedEmail[] {
    return this.store.filter(criteria);
  }

  getById(id: string): AnalyzedEmail | undefined {
    return this.store.get(id);
  }

  getLastRun(): BatchSummary | null {
    return this.store.lastRun;
  }

  async getStatus(): Promise<ServiceStatus> {
    const base = { running: this.running, lastRun: this.store.lastRun };
    if (!this.options.llmHealth) {
      return { ...base, llm: { enabled: false, reachable: false, models: [] } };
    }
    const health = await this.options.llmHealth();
    return {
      ...base,
      llm: { enabled: true, model: this.options.llmModel, ...health },
    };
  }

  private async execute(maxCount: number): Promise<BatchSummary> {
    const startedAt = this.now();
    this.log.info('batch_started', { maxCount });

    let messages: RawMessage[];
    try {
      messages = (await this.options.mailbox.fetchUnread(maxCount)).slice(0, maxCount);
    } catch (error) {
      this.log.error('batch_aborted', {
        error: errorMessage(error),
        errorCode: error instanceof Error && 'code' in error ? error.code : undefined,
      });
      throw error;
    }

    const results = await runAnalysisBatch(messages, this.options.analyzer, {
      concurrency: this.options.concurrency ?? config.analysis.concurrency,
      batchTimeoutMs: this.options.batchTimeoutMs ?? config.analysis.batchTimeoutMs,
      bodyCharBudget: this.options.bodyCharBudget ?? config.analysis.bodyCharBudget,
    });

    const summary = summarizeRun(results, startedAt, this.now());
    this.store.replace(results, summary);

    this.log.info('batch_completed', {
      fetched: messages.length,
      total: summary.total,
      analyzed: summary.analyzed,
      fallback: summary.fallback,
      failed: summary.failed,
      durationMs: summary.durationMs,
    });

    return summary;
  }
}

let instance: EmailAnalysisService | null = null;

/**
 * Build the service from configuration: Gmail mailbox, and the local
 * model when enabled (keyword analysis otherwise).
 */
export function createEmailAnalysisService(): EmailAnalysisService {
  const llm = config.llm.enabled
    ? new OllamaClient({
        baseUrl: config.llm.baseUrl,
        model: config.llm.model,
        timeoutMs: config.llm.timeoutMs,
        temperature: config.llm.temperature,
      })
    : null;

  const analyzer = new EmailAnalyzer({
    llm,
    retry: { maxRetries: config.llm.maxRetries, retryDelaysMs: config.llm.retryDelaysMs },
    bodyCharBudget: config.analysis.bodyCharBudget,
  });

  return new EmailAnalysisService({
    mailbox: new GmailMailbox(),
    analyzer,
    llmHealth: llm ? () => llm.checkHealth() : undefined,
    llmModel: llm?.model,
  });
}

export function getEmailAnalysisService(): EmailAnalysisService {
  if (!instance) {
    instance = createEmailAnalysisService();
  }
  return instance;
}

/** Replace (or with null, drop) the process-wide service. */
export function setEmailAnalysisService(service: EmailAnalysisService | null): void {
  instance = service;
}
