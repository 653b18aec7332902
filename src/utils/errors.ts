/**
 * @fileoverview Standardized error types.
 *
 * AppError is the base class; the subclasses below are the failure modes
 * the analysis pipeline distinguishes:
 * - Mailbox errors abort a run and reach the caller
 * - LLM and parse errors are absorbed per message into a FAILED verdict
 */

/**
 * Base class for application-specific errors.
 * Includes error code, recoverability flag, and optional context.
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly recoverable: boolean = false,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AppError';
  }
}

/** Mailbox credentials are missing, expired or rejected. */
export class MailboxAuthError extends AppError {
  constructor(message = 'Mailbox is not connected. Connect your Google account first.', context?: Record<string, unknown>) {
    super(message, 'MAILBOX_AUTH', false, context);
    this.name = 'MailboxAuthError';
  }
}

/** Mailbox could not be reached or returned an unexpected failure. */
export class MailboxTransportError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'MAILBOX_TRANSPORT', false, context);
    this.name = 'MailboxTransportError';
  }
}

/** Model endpoint unreachable (connection refused, bad status, unreadable reply). */
export class LlmUnavailableError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'LLM_UNAVAILABLE', true, context);
    this.name = 'LlmUnavailableError';
  }
}

/** Model endpoint did not answer within the call timeout. */
export class LlmTimeoutError extends AppError {
  constructor(timeoutMs: number) {
    super(`Model did not respond within ${timeoutMs}ms`, 'LLM_TIMEOUT', true, { timeoutMs });
    this.name = 'LlmTimeoutError';
  }
}

/** Model reply could not be decomposed into a valid verdict. */
export class MalformedResponseError extends AppError {
  constructor(message: string, public readonly rawSnippet: string) {
    super(message, 'MALFORMED_RESPONSE', true);
    this.name = 'MalformedResponseError';
  }
}

/** A run is already in flight; only one may run at a time. */
export class BatchInProgressError extends AppError {
  constructor() {
    super('An analysis run is already in progress', 'BATCH_IN_PROGRESS', true);
    this.name = 'BatchInProgressError';
  }
}

/** True for model-call failures that are worth retrying. */
export function isTransientLlmError(error: unknown): error is LlmUnavailableError | LlmTimeoutError {
  return error instanceof LlmUnavailableError || error instanceof LlmTimeoutError;
}

/** Message text of any thrown value. */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
