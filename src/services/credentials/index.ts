/**
 * @fileoverview Credential store factory.
 *
 * Singleton chosen by CREDENTIAL_STORE_PROVIDER:
 * - 'sqlite': encrypted SQLite file (default)
 * - 'memory': in-process map, for tests
 */

import config from '../../config.js';
import type { CredentialStore } from './types.js';
import { SqliteCredentialStore } from './sqlite.js';
import { MemoryCredentialStore } from './memory.js';

export type { CredentialStore, StoredCredential } from './types.js';

/** The single mailbox account this service reads. */
export const MAILBOX_ACCOUNT = 'default';
export const GOOGLE_PROVIDER = 'google';

let instance: CredentialStore | null = null;

export function getCredentialStore(): CredentialStore {
  if (instance) {
    return instance;
  }

  switch (config.credentials.provider) {
    case 'sqlite': {
      if (!config.credentials.encryptionKey) {
        throw new Error('CREDENTIAL_ENCRYPTION_KEY is required for sqlite credential store');
      }
      instance = new SqliteCredentialStore(config.credentials.sqlitePath, config.credentials.encryptionKey);
      break;
    }
    case 'memory':
      instance = new MemoryCredentialStore();
      break;
    default:
      throw new Error(
        `Invalid CREDENTIAL_STORE_PROVIDER: ${config.credentials.provider}. Expected 'sqlite' or 'memory'.`
      );
  }

  return instance;
}

/** Close the backing database, if any, and drop the singleton. */
export function closeCredentialStore(): void {
  if (instance instanceof SqliteCredentialStore) {
    instance.close();
  }
  instance = null;
}

/** Drop the singleton so the next call builds a fresh store. */
export function resetCredentialStore(): void {
  instance = null;
}
