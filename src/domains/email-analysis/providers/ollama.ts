/**
 * @fileoverview Local language model client (Ollama-compatible HTTP API).
 *
 * One prompt in, one block of generated text out. Failures are mapped to
 * LlmUnavailableError / LlmTimeoutError; retry policy lives with the caller.
 */

import { LlmTimeoutError, LlmUnavailableError } from '../../../utils/errors.js';
import type { LlmProvider } from '../types.js';

export type OllamaClientOptions = {
  baseUrl: string;
  model: string;
  timeoutMs: number;
  temperature?: number;
};

export type LlmHealth = {
  reachable: boolean;
  models: string[];
  error?: string;
};

/** Network error codes surfaced by undici/fetch when the endpoint is down. */
const UNREACHABLE_ERROR_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'EHOSTUNREACH',
  'ENOTFOUND',
  'EAI_AGAIN',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_SOCKET',
]);

/**
 * Extract network error code from a fetch error's cause when available.
 */
function getErrorCode(error: unknown): string | undefined {
  if (!(error instanceof Error) || !('cause' in error)) {
    return undefined;
  }
  const cause = error.cause;
  if (!cause || typeof cause !== 'object' || !('code' in cause)) {
    return undefined;
  }
  return typeof cause.code === 'string' ? cause.code : undefined;
}

function isAbortError(error: unknown): boolean {
  return error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError');
}

function describeFetchFailure(error: unknown): string {
  const code = getErrorCode(error);
  if (code && UNREACHABLE_ERROR_CODES.has(code)) {
    return `Model endpoint unreachable (${code})`;
  }
  return `Model endpoint request failed: ${error instanceof Error ? error.message : String(error)}`;
}

function trimTrailingSlash(url: string): string {
  return url.replace(/\/+$/, '');
}

export class OllamaClient implements LlmProvider {
  private readonly baseUrl: string;

  constructor(private readonly options: OllamaClientOptions) {
    this.baseUrl = trimTrailingSlash(options.baseUrl);
  }

  get model(): string {
    return this.options.model;
  }

  /**
   * Send one prompt and return the generated text.
   *
   * @throws LlmTimeoutError when no reply arrives within `timeoutMs`
   * @throws LlmUnavailableError on connection failure, non-2xx status or an unreadable reply
   */
  async generate(prompt: string): Promise<string> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.options.timeoutMs);

    try {
      const response = await this.post('/api/generate', {
        model: this.options.model,
        prompt,
        stream: false,
        options: { temperature: this.options.temperature ?? 0.1 },
      }, controller.signal);

      if (!response.ok) {
        const detail = await response.text().catch(() => '');
        throw new LlmUnavailableError(`Model endpoint returned HTTP ${response.status}`, {
          status: response.status,
          detail: detail.slice(0, 200),
        });
      }

      const payload: unknown = await response.json().catch((error: unknown) => {
        // The timeout can fire while the body is still streaming in
        if (controller.signal.aborted) throw error;
        return null;
      });
      if (
        !payload ||
        typeof payload !== 'object' ||
        !('response' in payload) ||
        typeof payload.response !== 'string'
      ) {
        throw new LlmUnavailableError('Model endpoint returned an unreadable reply');
      }
      return payload.response;
    } catch (error) {
      if (error instanceof LlmUnavailableError) throw error;
      if (isAbortError(error) || controller.signal.aborted) {
        throw new LlmTimeoutError(this.options.timeoutMs);
      }
      throw new LlmUnavailableError(describeFetchFailure(error), { errorCode: getErrorCode(error) });
    } finally {
      clearTimeout(timer);
    }
  }

  /**
   * Probe the endpoint and list installed models. Never throws.
   */
  async checkHealth(): Promise<LlmHealth> {
    try {
      const response = await fetch(`${this.baseUrl}/api/tags`, {
        method: 'GET',
        signal: AbortSignal.timeout(Math.min(this.options.timeoutMs, 5000)),
      });
      if (!response.ok) {
        return { reachable: false, models: [], error: `HTTP ${response.status}` };
      }
      const payload: unknown = await response.json();
      return { reachable: true, models: readModelNames(payload) };
    } catch (error) {
      return { reachable: false, models: [], error: describeFetchFailure(error) };
    }
  }

  private post(path: string, body: unknown, signal: AbortSignal): Promise<Response> {
    return fetch(`${this.baseUrl}${path}`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(body),
      signal,
    });
  }
}

function readModelNames(payload: unknown): string[] {
  if (!payload || typeof payload !== 'object' || !('models' in payload) || !Array.isArray(payload.models)) {
    return [];
  }
  const names: string[] = [];
  for (const entry of payload.models) {
    if (entry && typeof entry === 'object' && 'name' in entry && typeof entry.name === 'string') {
      names.push(entry.name);
    }
  }
  return names;
}
