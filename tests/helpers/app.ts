/**
 * Test app factory.
 *
 * Builds the Express app without listening, with a fresh analysis
 * service wired to the given stubs.
 */

import type express from 'express';
import { createApp } from '../../src/app.js';
import {
  EmailAnalysisService,
  EmailAnalyzer,
  setEmailAnalysisService,
  type EmailAnalysisServiceOptions,
} from '../../src/domains/email-analysis/runtime/index.js';
import type { LlmProvider, MailboxProvider } from '../../src/domains/email-analysis/types.js';

export type TestAppOptions = {
  mailbox: MailboxProvider;
  llm: LlmProvider | null;
} & Partial<Omit<EmailAnalysisServiceOptions, 'mailbox' | 'analyzer'>>;

export function createTestApp(options: TestAppOptions): {
  app: express.Application;
  service: EmailAnalysisService;
} {
  const { mailbox, llm, ...rest } = options;
  const analyzer = new EmailAnalyzer({
    llm,
    retry: { maxRetries: 1, retryDelaysMs: [0] },
    sleep: async () => {},
  });
  const service = new EmailAnalysisService({ concurrency: 2, batchTimeoutMs: 0, ...rest, mailbox, analyzer });
  setEmailAnalysisService(service);
  return { app: createApp(), service };
}
