/**
 * @fileoverview Email analysis type definitions.
 *
 * Shared types for the normalizer, prompt builder, parser, orchestrator
 * and result store, plus the two capabilities the pipeline consumes.
 */

export const TIERS = ['VERY_IMPORTANT', 'IMPORTANT', 'UNIMPORTANT', 'SPAM'] as const;

/** Importance class assigned to an email. */
export type Tier = (typeof TIERS)[number];

export const ANALYSIS_STATUSES = ['ANALYZED', 'FALLBACK', 'FAILED'] as const;

/**
 * ANALYZED: the model produced a valid verdict.
 * FALLBACK: the model is disabled and keyword analysis produced the verdict.
 * FAILED: the model call or parse failed; the verdict is the placeholder.
 */
export type AnalysisStatus = (typeof ANALYSIS_STATUSES)[number];

export type AttachmentDescriptor = {
  filename: string;
  mimeType: string;
  sizeBytes: number;
};

/** Message as yielded by a mailbox provider. Only `id` is guaranteed. */
export type RawMessage = {
  id: string;
  sender?: string | null;
  subject?: string | null;
  date?: string | null;
  body?: string | null;
  attachments?: ReadonlyArray<AttachmentDescriptor> | null;
  links?: ReadonlyArray<string> | null;
};

/** Plain-text analysis unit derived from a RawMessage. */
export type NormalizedUnit = {
  readonly id: string;
  readonly sender: string;
  readonly subject: string;
  readonly date: string;
  readonly body: string;
  readonly hasAttachment: boolean;
  readonly hasLink: boolean;
  readonly attachmentNames: readonly string[];
  readonly links: readonly string[];
};

export type Verdict = {
  readonly tier: Tier;
  readonly summary: string;
  readonly deadlines: readonly string[];
  readonly links: readonly string[];
};

/** One analyzed email; the unit held by the result store. */
export type AnalyzedEmail = {
  readonly id: string;
  readonly sender: string;
  readonly subject: string;
  readonly date: string;
  readonly verdict: Verdict;
  readonly status: AnalysisStatus;
  readonly isImportant: boolean;
  readonly hasDeadline: boolean;
  readonly error?: string;
};

export type EmailFilter = {
  tier?: Tier;
  hasDeadline?: boolean;
};

export type BatchSummary = {
  total: number;
  analyzed: number;
  fallback: number;
  failed: number;
  startedAt: string;
  completedAt: string;
  durationMs: number;
};

/**
 * Mailbox capability.
 * @throws MailboxAuthError when credentials are missing or rejected
 * @throws MailboxTransportError when the mailbox cannot be read
 */
export interface MailboxProvider {
  fetchUnread(maxCount: number): Promise<RawMessage[]>;
}

/**
 * Language model capability: prompt text in, generated text out.
 * @throws LlmUnavailableError when the endpoint cannot be reached
 * @throws LlmTimeoutError when no reply arrives within the call timeout
 */
export interface LlmProvider {
  generate(prompt: string): Promise<string>;
}

export function isTier(value: string): value is Tier {
  return TIERS.some((tier) => tier === value);
}
