/**
 * @fileoverview In-memory credential store for tests.
 *
 * No encryption. Contents are lost on restart. Entries are copied on the
 * way in and out, so callers never share a credential object.
 */

import type { CredentialStore, StoredCredential } from './types.js';

export class MemoryCredentialStore implements CredentialStore {
  private store = new Map<string, StoredCredential>();

  private key(account: string, provider: string): string {
    return `${account}:${provider}`;
  }

  async get(account: string, provider: string): Promise<StoredCredential | null> {
    const credential = this.store.get(this.key(account, provider));
    return credential ? { ...credential } : null;
  }

  async set(account: string, provider: string, credential: StoredCredential): Promise<void> {
    this.store.set(this.key(account, provider), { ...credential });
  }

  async delete(account: string, provider: string): Promise<void> {
    this.store.delete(this.key(account, provider));
  }

  clear(): void {
    this.store.clear();
  }
}
