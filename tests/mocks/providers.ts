/**
 * Deterministic stand-ins for the mailbox and model capabilities.
 */

import { vi } from 'vitest';
import type { LlmProvider, MailboxProvider, RawMessage } from '../../src/domains/email-analysis/types.js';
import { LlmUnavailableError } from '../../src/utils/errors.js';

/** Canonical reply used across tests. */
export const IMPORTANT_REPLY = 'TIER: IMPORTANT\nSUMMARY: Pay invoice\nDEADLINE: 2024-05-01\nLINKS: none';

export function rawMessage(id: string, overrides: Partial<RawMessage> = {}): RawMessage {
  return {
    id,
    sender: `Sender ${id} <${id}@example.com>`,
    subject: `Subject ${id}`,
    date: 'Mon, 6 May 2024 09:00:00 +0000',
    body: `Body of message ${id}.`,
    ...overrides,
  };
}

/**
 * Model stub. `replies` maps a marker found in the prompt to a reply or an
 * error; prompts matching no marker get `fallbackReply`.
 */
export function createStubLlm(
  replies: Record<string, string | Error> = {},
  fallbackReply: string = IMPORTANT_REPLY,
) {
  const generate = vi.fn(async (prompt: string): Promise<string> => {
    for (const [marker, reply] of Object.entries(replies)) {
      if (prompt.includes(marker)) {
        if (reply instanceof Error) throw reply;
        return reply;
      }
    }
    return fallbackReply;
  });
  const llm: LlmProvider = { generate };
  return { llm, generate };
}

/** Model stub that is never reachable. */
export function createUnreachableLlm() {
  const generate = vi.fn(async (): Promise<string> => {
    throw new LlmUnavailableError('Model endpoint unreachable (ECONNREFUSED)');
  });
  const llm: LlmProvider = { generate };
  return { llm, generate };
}

export function createStubMailbox(messages: RawMessage[] | Error) {
  const fetchUnread = vi.fn(async (maxCount: number): Promise<RawMessage[]> => {
    if (messages instanceof Error) throw messages;
    return messages.slice(0, maxCount);
  });
  const mailbox: MailboxProvider = { fetchUnread };
  return { mailbox, fetchUnread };
}
