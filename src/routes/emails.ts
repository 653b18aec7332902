/**
 * @fileoverview JSON API for running analyses and reading results.
 *
 * POST /api/process-emails  - run one batch
 * GET  /api/emails          - list results, optionally filtered
 * GET  /api/emails/:id      - one result
 * GET  /api/status          - run state and model reachability
 */

import { Router, type Request, type Response } from 'express';
import { getEmailAnalysisService, isTier, type EmailFilter } from '../domains/email-analysis/runtime/index.js';
import { AppError, errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/observability/index.js';

const router = Router();
const log = createLogger({ domain: 'api' });

export const MAX_COUNT_LIMIT = 100;

/** HTTP status for each error code that may leave a run. */
const STATUS_BY_CODE: Record<string, number> = {
  MAILBOX_AUTH: 401,
  BATCH_IN_PROGRESS: 409,
  MAILBOX_TRANSPORT: 502,
};

function sendError(res: Response, error: unknown): void {
  if (error instanceof AppError && STATUS_BY_CODE[error.code] !== undefined) {
    res.status(STATUS_BY_CODE[error.code]).json({
      success: false,
      error: error.message,
      code: error.code,
    });
    return;
  }
  log.error('request_failed', { error: errorMessage(error) });
  res.status(500).json({ success: false, error: 'Internal server error' });
}

type Parsed<T> = { ok: true; value: T } | { ok: false; error: string };

function parseMaxCount(body: unknown): Parsed<number | undefined> {
  if (!body || typeof body !== 'object' || !('maxCount' in body) || body.maxCount === undefined || body.maxCount === null) {
    return { ok: true, value: undefined };
  }
  const raw = body.maxCount;
  const value = typeof raw === 'string' && raw.trim() !== '' ? Number(raw) : raw;
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 1 || value > MAX_COUNT_LIMIT) {
    return { ok: false, error: `maxCount must be an integer between 1 and ${MAX_COUNT_LIMIT}` };
  }
  return { ok: true, value };
}

/**
 * Read `tier` and `hasDeadline` from the query string. Empty values and
 * `tier=ALL` mean no constraint.
 */
export function parseFilter(query: Request['query']): Parsed<EmailFilter> {
  const filter: EmailFilter = {};

  const tier = query.tier;
  if (tier !== undefined && tier !== '') {
    const normalized = typeof tier === 'string' ? tier.trim().toUpperCase() : '';
    if (normalized !== 'ALL') {
      if (!isTier(normalized)) {
        return { ok: false, error: 'tier must be one of VERY_IMPORTANT, IMPORTANT, UNIMPORTANT, SPAM' };
      }
      filter.tier = normalized;
    }
  }

  const hasDeadline = query.hasDeadline;
  if (hasDeadline !== undefined && hasDeadline !== '') {
    if (hasDeadline === 'true') filter.hasDeadline = true;
    else if (hasDeadline === 'false') filter.hasDeadline = false;
    else return { ok: false, error: 'hasDeadline must be true or false' };
  }

  return { ok: true, value: filter };
}

function describeRun(summary: { total: number; analyzed: number; fallback: number; failed: number }): string {
  if (summary.total === 0) return 'No unread emails to analyze.';
  const parts = [`Processed ${summary.total} email${summary.total === 1 ? '' : 's'}`];
  if (summary.fallback > 0) parts.push(`${summary.fallback} by keyword analysis`);
  if (summary.failed > 0) parts.push(`${summary.failed} of ${summary.total} could not be analyzed`);
  return `${parts.join('; ')}.`;
}

router.post('/api/process-emails', async (req, res) => {
  const maxCount = parseMaxCount(req.body);
  if (!maxCount.ok) {
    res.status(400).json({ success: false, error: maxCount.error });
    return;
  }

  try {
    const summary = await getEmailAnalysisService().runBatch(maxCount.value);
    res.json({ success: true, summary, message: describeRun(summary) });
  } catch (error) {
    sendError(res, error);
  }
});

router.get('/api/emails', (req, res) => {
  const filter = parseFilter(req.query);
  if (!filter.ok) {
    res.status(400).json({ success: false, error: filter.error });
    return;
  }

  const service = getEmailAnalysisService();
  res.json({
    success: true,
    emails: service.getFiltered(filter.value),
    lastRun: service.getLastRun(),
  });
});

router.get('/api/emails/:id', (req: Request<{ id: string }>, res: Response) => {
  const email = getEmailAnalysisService().getById(req.params.id);
  if (!email) {
    res.status(404).json({ success: false, error: 'Email not found' });
    return;
  }
  res.json({ success: true, email });
});

router.get('/api/status', async (_req, res) => {
  try {
    res.json(await getEmailAnalysisService().getStatus());
  } catch (error) {
    sendError(res, error);
  }
});

export default router;
