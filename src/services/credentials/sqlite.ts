/**
 * @fileoverview SQLite credential store with AES-256-GCM encryption.
 *
 * Tokens are encrypted at rest with CREDENTIAL_ENCRYPTION_KEY, each row
 * under its own IV.
 */

import Database from 'better-sqlite3';
import crypto from 'crypto';
import path from 'path';
import fs from 'fs';
import { createLogger } from '../../utils/observability/index.js';
import { isStoredCredential, type CredentialStore, type StoredCredential } from './types.js';

const ALGORITHM = 'aes-256-gcm';
const IV_LENGTH = 16;

const log = createLogger({ domain: 'credentials' });

type EncryptedRow = {
  encrypted_data: Buffer;
  iv: Buffer;
  auth_tag: Buffer;
};

function isEncryptedRow(row: unknown): row is EncryptedRow {
  return (
    typeof row === 'object' &&
    row !== null &&
    'encrypted_data' in row &&
    Buffer.isBuffer(row.encrypted_data) &&
    'iv' in row &&
    Buffer.isBuffer(row.iv) &&
    'auth_tag' in row &&
    Buffer.isBuffer(row.auth_tag)
  );
}

export class SqliteCredentialStore implements CredentialStore {
  private db: Database.Database;
  private encryptionKey: Buffer;

  /**
   * @param dbPath Path to the SQLite file, or ':memory:'
   * @param encryptionKey 64-character hex string (32 bytes)
   */
  constructor(dbPath: string, encryptionKey: string) {
    if (!/^[0-9a-fA-F]{64}$/.test(encryptionKey)) {
      throw new Error('CREDENTIAL_ENCRYPTION_KEY must be a 64-character hex string (32 bytes)');
    }
    this.encryptionKey = Buffer.from(encryptionKey, 'hex');

    if (dbPath !== ':memory:') {
      const dir = path.dirname(dbPath);
      if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
      }
    }

    this.db = new Database(dbPath);
    this.initSchema();
  }

  private initSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS mailbox_credentials (
        account TEXT NOT NULL,
        provider TEXT NOT NULL,
        encrypted_data BLOB NOT NULL,
        iv BLOB NOT NULL,
        auth_tag BLOB NOT NULL,
        created_at INTEGER NOT NULL,
        updated_at INTEGER NOT NULL,
        PRIMARY KEY (account, provider)
      )
    `);
  }

  private encrypt(data: string): { encrypted: Buffer; iv: Buffer; authTag: Buffer } {
    const iv = crypto.randomBytes(IV_LENGTH);
    const cipher = crypto.createCipheriv(ALGORITHM, this.encryptionKey, iv);
    const encrypted = Buffer.concat([cipher.update(data, 'utf8'), cipher.final()]);
    return { encrypted, iv, authTag: cipher.getAuthTag() };
  }

  private decrypt(row: EncryptedRow): string {
    const decipher = crypto.createDecipheriv(ALGORITHM, this.encryptionKey, row.iv);
    decipher.setAuthTag(row.auth_tag);
    return Buffer.concat([decipher.update(row.encrypted_data), decipher.final()]).toString('utf8');
  }

  async get(account: string, provider: string): Promise<StoredCredential | null> {
    const row: unknown = this.db
      .prepare(
        `SELECT encrypted_data, iv, auth_tag FROM mailbox_credentials
         WHERE account = ? AND provider = ?`
      )
      .get(account, provider);

    if (!isEncryptedRow(row)) {
      return null;
    }

    try {
      const parsed: unknown = JSON.parse(this.decrypt(row));
      return isStoredCredential(parsed) ? parsed : null;
    } catch (error) {
      // Corrupted row or a different key; treat as not connected.
      log.warn('credential_decrypt_failed', {
        provider,
        error: error instanceof Error ? error.message : String(error),
      });
      return null;
    }
  }

  async set(account: string, provider: string, credential: StoredCredential): Promise<void> {
    const { encrypted, iv, authTag } = this.encrypt(JSON.stringify(credential));
    const now = Date.now();

    this.db
      .prepare(
        `INSERT INTO mailbox_credentials (account, provider, encrypted_data, iv, auth_tag, created_at, updated_at)
         VALUES (?, ?, ?, ?, ?, ?, ?)
         ON CONFLICT (account, provider) DO UPDATE SET
           encrypted_data = excluded.encrypted_data,
           iv = excluded.iv,
           auth_tag = excluded.auth_tag,
           updated_at = excluded.updated_at`
      )
      .run(account, provider, encrypted, iv, authTag, now, now);
  }

  async delete(account: string, provider: string): Promise<void> {
    this.db
      .prepare('DELETE FROM mailbox_credentials WHERE account = ? AND provider = ?')
      .run(account, provider);
  }

  close(): void {
    this.db.close();
  }
}
