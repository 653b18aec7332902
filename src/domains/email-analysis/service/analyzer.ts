/**
 * @fileoverview Per-message analysis pipeline.
 *
 * normalize → prompt → model call (with bounded retry) → parse.
 * analyze() never rejects: every failure becomes a FAILED entry carrying
 * the fallback verdict.
 */

import { errorMessage, isTransientLlmError, MalformedResponseError } from '../../../utils/errors.js';
import { createLogger, type AppLogger } from '../../../utils/observability/index.js';
import type {
  AnalysisStatus,
  AnalyzedEmail,
  LlmProvider,
  NormalizedUnit,
  RawMessage,
  Verdict,
} from '../types.js';
import { analyzeByKeywords } from './keyword-analyzer.js';
import { normalizeMessage } from './normalizer.js';
import { parseVerdict } from './parser.js';
import { buildAnalysisPrompt } from './prompt.js';

export const FALLBACK_SUMMARY = 'Analysis failed: this email could not be analyzed automatically.';

export const FALLBACK_VERDICT: Verdict = Object.freeze({
  tier: 'UNIMPORTANT',
  summary: FALLBACK_SUMMARY,
  deadlines: Object.freeze([]),
  links: Object.freeze([]),
});

export type RetryPolicy = {
  /** Extra attempts after the first failed call. */
  maxRetries: number;
  /** Wait before retry n is `retryDelaysMs[n - 1]`, the last entry repeating. */
  retryDelaysMs: number[];
};

export type EmailAnalyzerOptions = {
  /** Model client; when null, keyword analysis is used and results are tagged FALLBACK. */
  llm: LlmProvider | null;
  retry?: RetryPolicy;
  bodyCharBudget?: number;
  logger?: AppLogger;
  sleep?: (ms: number) => Promise<void>;
};

const DEFAULT_RETRY: RetryPolicy = { maxRetries: 1, retryDelaysMs: [500] };

async function sleep(ms: number): Promise<void> {
  await new Promise((resolve) => setTimeout(resolve, ms));
}

function delayFor(retry: number, retryDelaysMs: number[]): number {
  if (retryDelaysMs.length === 0) return 0;
  return retryDelaysMs[Math.min(retry - 1, retryDelaysMs.length - 1)];
}

/**
 * Pair a message with a verdict. Identity fields come from the normalized
 * unit so they are never absent.
 */
export function toAnalyzedEmail(
  unit: NormalizedUnit,
  verdict: Verdict,
  status: AnalysisStatus,
  error?: string,
): AnalyzedEmail {
  return Object.freeze({
    id: unit.id,
    sender: unit.sender,
    subject: unit.subject,
    date: unit.date,
    verdict,
    status,
    isImportant: verdict.tier === 'VERY_IMPORTANT' || verdict.tier === 'IMPORTANT',
    hasDeadline: verdict.deadlines.length > 0,
    ...(error !== undefined ? { error } : {}),
  });
}

/** FAILED entry for a message that was never sent to the model. */
export function failedWithoutAnalysis(raw: RawMessage, reason: string, bodyCharBudget?: number): AnalyzedEmail {
  return toAnalyzedEmail(normalizeMessage(raw, { bodyCharBudget }), FALLBACK_VERDICT, 'FAILED', reason);
}

export class EmailAnalyzer {
  private readonly retry: RetryPolicy;
  private readonly log: AppLogger;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(private readonly options: EmailAnalyzerOptions) {
    this.retry = options.retry ?? DEFAULT_RETRY;
    this.log = options.logger ?? createLogger({ domain: 'email-analyzer' });
    this.sleep = options.sleep ?? sleep;
  }

  get usesModel(): boolean {
    return this.options.llm !== null;
  }

  /**
   * Analyze one message. Always resolves.
   *
   * Once `signal` is aborted no further model call is made: a pending
   * retry gives up with the last error.
   */
  async analyze(raw: RawMessage, signal?: AbortSignal): Promise<AnalyzedEmail> {
    const unit = normalizeMessage(raw, { bodyCharBudget: this.options.bodyCharBudget });
    const log = this.log.child({ messageId: unit.id });
    const llm = this.options.llm;

    if (!llm) {
      return toAnalyzedEmail(unit, analyzeByKeywords(unit), 'FALLBACK');
    }

    try {
      const prompt = buildAnalysisPrompt(unit);
      const reply = await this.callWithRetry(llm, prompt, log, signal);
      const verdict = parseVerdict(reply);
      log.debug('message_analyzed', { tier: verdict.tier, deadlineCount: verdict.deadlines.length });
      return toAnalyzedEmail(unit, verdict, 'ANALYZED');
    } catch (error) {
      if (error instanceof MalformedResponseError) {
        log.warn('response_malformed', { reason: error.message, replySnippet: error.rawSnippet });
      } else {
        log.warn('message_analysis_failed', {
          error: errorMessage(error),
          errorCode: error instanceof Error && 'code' in error ? error.code : undefined,
        });
      }
      return toAnalyzedEmail(unit, FALLBACK_VERDICT, 'FAILED', errorMessage(error));
    }
  }

  /**
   * Call the model, retrying transient failures up to `maxRetries` times.
   * Non-transient errors, and any error once `signal` is aborted, are
   * rethrown immediately.
   */
  private async callWithRetry(
    llm: LlmProvider,
    prompt: string,
    log: AppLogger,
    signal?: AbortSignal,
  ): Promise<string> {
    const totalAttempts = Math.max(0, this.retry.maxRetries) + 1;

    for (let attempt = 1; ; attempt++) {
      try {
        return await llm.generate(prompt);
      } catch (error) {
        if (attempt >= totalAttempts || !isTransientLlmError(error) || signal?.aborted) {
          throw error;
        }
        const waitMs = delayFor(attempt, this.retry.retryDelaysMs);
        log.warn('llm_call_retrying', {
          error: error.message,
          errorCode: error.code,
          attempt,
          totalAttempts,
          retryInMs: waitMs,
        });
        await this.sleep(waitMs);
        if (signal?.aborted) {
          log.debug('llm_retry_cancelled', { attempt });
          throw error;
        }
      }
    }
  }
}
