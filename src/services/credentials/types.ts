/**
 * @fileoverview Credential store interface for mailbox OAuth tokens.
 *
 * Tokens are keyed by account and provider (e.g. 'default' / 'google').
 * Implementations handle encryption; callers work with plain credentials.
 */

/**
 * OAuth credential stored for a mailbox account.
 */
export interface StoredCredential {
  accessToken: string;
  refreshToken: string;
  expiresAt: number; // Unix timestamp in milliseconds
}

/**
 * Interface for credential storage backends.
 *
 * Methods return Promises although the SQLite backend is synchronous, so an
 * async backend can be swapped in without touching callers.
 */
export interface CredentialStore {
  /** @returns Credentials, or null if none are stored. */
  get(account: string, provider: string): Promise<StoredCredential | null>;

  /** Store credentials, overwriting any existing entry. */
  set(account: string, provider: string, credential: StoredCredential): Promise<void>;

  /** No-op if nothing is stored. */
  delete(account: string, provider: string): Promise<void>;
}

export function isStoredCredential(value: unknown): value is StoredCredential {
  return (
    typeof value === 'object' &&
    value !== null &&
    'accessToken' in value &&
    typeof value.accessToken === 'string' &&
    'refreshToken' in value &&
    typeof value.refreshToken === 'string' &&
    'expiresAt' in value &&
    typeof value.expiresAt === 'number'
  );
}
