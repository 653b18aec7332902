/**
 * @fileoverview Centralized application configuration.
 *
 * All environment variables are loaded and validated here. This provides
 * a single source of truth for configuration and makes it easy to see
 * what external configuration the application requires.
 *
 * @see .env.example for the full list of variables
 */

import 'dotenv/config';
import { isLogLevel } from './utils/observability/index.js';

// ---------------------------------------------------------------------------
// Config helpers: required vs optional is explicit at each call site
// ---------------------------------------------------------------------------

/** Read a required env var. Returns undefined if missing (caught by validateConfig). */
function required(key: string): string | undefined {
  return process.env[key];
}

/** Read an optional string env var with a default. */
function optional(key: string, defaultValue: string): string {
  return process.env[key] || defaultValue;
}

/** Read an optional integer env var with a default. */
function optionalInt(key: string, defaultValue: number): number {
  const raw = process.env[key];
  return raw ? parseInt(raw, 10) : defaultValue;
}

/** Read an optional float env var with a default. */
function optionalFloat(key: string, defaultValue: number): number {
  const raw = process.env[key];
  return raw ? parseFloat(raw) : defaultValue;
}

/** Read an optional boolean env var (defaults to `defaultValue`). */
function optionalBool(key: string, defaultValue: boolean): boolean {
  const raw = process.env[key];
  if (raw === undefined) return defaultValue;
  return raw !== (defaultValue ? 'false' : 'true') ? defaultValue : !defaultValue;
}

/** Read an optional comma-separated list of integers. */
function optionalIntList(key: string, defaultValue: number[]): number[] {
  const raw = process.env[key];
  if (!raw) return defaultValue;
  return raw
    .split(',')
    .map((part) => part.trim())
    .filter((part) => part.length > 0)
    .map((part) => parseInt(part, 10));
}

/** Return a path that differs between dev and production. */
function dbPath(envKey: string, prodPath: string, devPath: string): string {
  return process.env[envKey] || (process.env.NODE_ENV === 'production' ? prodPath : devPath);
}

// ---------------------------------------------------------------------------
// Config object
// ---------------------------------------------------------------------------

const config = {
  port: optionalInt('PORT', 3000),
  nodeEnv: optional('NODE_ENV', 'development'),
  baseUrl: optional('BASE_URL', 'http://localhost:3000'),

  /** Local language model endpoint (Ollama-compatible) */
  llm: {
    enabled: optionalBool('LLM_ENABLED', true),
    baseUrl: optional('LLM_BASE_URL', 'http://127.0.0.1:11434'),
    model: optional('LLM_MODEL', 'llama3'),
    timeoutMs: optionalInt('LLM_TIMEOUT_MS', 60000),
    temperature: optionalFloat('LLM_TEMPERATURE', 0.1),
    maxRetries: optionalInt('LLM_MAX_RETRIES', 1),
    retryDelaysMs: optionalIntList('LLM_RETRY_DELAYS_MS', [500]),
  },

  /** Batch analysis tuning */
  analysis: {
    batchSize: optionalInt('ANALYSIS_BATCH_SIZE', 10),
    concurrency: optionalInt('ANALYSIS_CONCURRENCY', 2),
    bodyCharBudget: optionalInt('ANALYSIS_BODY_CHAR_BUDGET', 3000),
    /** Overall time budget for one run; 0 disables the budget */
    batchTimeoutMs: optionalInt('ANALYSIS_BATCH_TIMEOUT_MS', 0),
  },

  /** Google OAuth configuration for the mailbox */
  google: {
    clientId: required('GOOGLE_CLIENT_ID'),
    clientSecret: required('GOOGLE_CLIENT_SECRET'),
    redirectUri: optional('GOOGLE_REDIRECT_URI', 'http://localhost:3000/auth/google/callback'),
  },

  /** Credential storage configuration */
  credentials: {
    /** 'sqlite' (default) or 'memory' */
    provider: optional('CREDENTIAL_STORE_PROVIDER', 'sqlite'),
    sqlitePath: dbPath('CREDENTIAL_STORE_SQLITE_PATH', '/app/data/credentials.db', './data/credentials.db'),
    encryptionKey: required('CREDENTIAL_ENCRYPTION_KEY'),
  },
};

/**
 * Validate critical configuration at startup.
 * Throws if required values are missing or invalid.
 */
export function validateConfig(): void {
  const errors: string[] = [];

  // Google OAuth (required to read the mailbox)
  if (!config.google.clientId) errors.push('GOOGLE_CLIENT_ID is required');
  if (!config.google.clientSecret) errors.push('GOOGLE_CLIENT_SECRET is required');

  // Credential store
  if (config.credentials.provider !== 'sqlite' && config.credentials.provider !== 'memory') {
    errors.push(`CREDENTIAL_STORE_PROVIDER must be 'sqlite' or 'memory', got ${config.credentials.provider}`);
  }
  if (config.credentials.provider === 'sqlite') {
    if (!config.credentials.encryptionKey) {
      errors.push('CREDENTIAL_ENCRYPTION_KEY is required for the sqlite credential store');
    } else if (!/^[0-9a-fA-F]{64}$/.test(config.credentials.encryptionKey)) {
      errors.push('CREDENTIAL_ENCRYPTION_KEY must be a 64-character hex string (32 bytes)');
    }
  }

  // Numeric bounds
  if (!(config.port >= 1 && config.port <= 65535)) {
    errors.push(`PORT must be 1-65535, got ${config.port}`);
  }
  if (!(config.llm.timeoutMs >= 1000)) {
    errors.push(`LLM_TIMEOUT_MS must be >= 1000, got ${config.llm.timeoutMs}`);
  }
  if (!(config.llm.maxRetries >= 0 && config.llm.maxRetries <= 5)) {
    errors.push(`LLM_MAX_RETRIES must be 0-5, got ${config.llm.maxRetries}`);
  }
  if (config.llm.retryDelaysMs.some((delay) => !(delay >= 0))) {
    errors.push('LLM_RETRY_DELAYS_MS must be a comma-separated list of non-negative integers');
  }
  if (!(config.llm.temperature >= 0 && config.llm.temperature <= 2)) {
    errors.push(`LLM_TEMPERATURE must be 0-2, got ${config.llm.temperature}`);
  }
  if (!(config.analysis.batchSize >= 1 && config.analysis.batchSize <= 100)) {
    errors.push(`ANALYSIS_BATCH_SIZE must be 1-100, got ${config.analysis.batchSize}`);
  }
  if (!(config.analysis.concurrency >= 1 && config.analysis.concurrency <= 16)) {
    errors.push(`ANALYSIS_CONCURRENCY must be 1-16, got ${config.analysis.concurrency}`);
  }
  if (!(config.analysis.bodyCharBudget >= 200)) {
    errors.push(`ANALYSIS_BODY_CHAR_BUDGET must be >= 200, got ${config.analysis.bodyCharBudget}`);
  }
  const logLevel = process.env.LOG_LEVEL;
  if (logLevel && !isLogLevel(logLevel)) {
    errors.push(`LOG_LEVEL must be one of debug, info, warn, error, got ${logLevel}`);
  }
  if (!(config.analysis.batchTimeoutMs >= 0)) {
    errors.push(`ANALYSIS_BATCH_TIMEOUT_MS must be >= 0, got ${config.analysis.batchTimeoutMs}`);
  }

  if (errors.length > 0) {
    console.error(JSON.stringify({
      level: 'fatal',
      message: 'Configuration validation failed',
      errors,
      timestamp: new Date().toISOString(),
    }));
    throw new Error(`Configuration validation failed:\n  - ${errors.join('\n  - ')}`);
  }
}

export default config;
