/**
 * @fileoverview One-time OAuth state values.
 *
 * Each authorization redirect carries a fresh random state that the
 * callback must present exactly once before it expires.
 */

import crypto from 'crypto';

export const STATE_EXPIRY_MS = 10 * 60 * 1000; // 10 minutes

export class OAuthStateStore {
  private readonly states = new Map<string, number>();

  constructor(private readonly now: () => number = Date.now) {}

  /** Create and register a new state value. */
  issue(): string {
    this.prune();
    const state = crypto.randomBytes(24).toString('base64url');
    this.states.set(state, this.now() + STATE_EXPIRY_MS);
    return state;
  }

  /** True once for a state that was issued and has not expired. */
  consume(state: string): boolean {
    const expiresAt = this.states.get(state);
    this.states.delete(state);
    return expiresAt !== undefined && expiresAt >= this.now();
  }

  clear(): void {
    this.states.clear();
  }

  private prune(): void {
    const now = this.now();
    for (const [state, expiresAt] of this.states.entries()) {
      if (expiresAt < now) {
        this.states.delete(state);
      }
    }
  }
}

let instance: OAuthStateStore | null = null;

export function getOAuthStateStore(): OAuthStateStore {
  if (!instance) {
    instance = new OAuthStateStore();
  }
  return instance;
}
