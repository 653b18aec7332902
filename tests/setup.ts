/**
 * Global test setup for Vitest.
 *
 * Runs before all tests: sets the environment the config module reads and
 * resets mocks between tests.
 */

import { beforeEach, vi } from 'vitest';

// Set test environment variables before any imports
process.env.NODE_ENV = 'test';
process.env.BASE_URL = 'http://localhost:3000';
process.env.LLM_ENABLED = 'true';
process.env.LLM_BASE_URL = 'http://127.0.0.1:11434';
process.env.LLM_MODEL = 'test-model';
process.env.LLM_RETRY_DELAYS_MS = '0';
process.env.CREDENTIAL_STORE_PROVIDER = 'memory';
process.env.CREDENTIAL_ENCRYPTION_KEY = '0123456789abcdef0123456789abcdef0123456789abcdef0123456789abcdef';
process.env.GOOGLE_CLIENT_ID = 'test-client-id';
process.env.GOOGLE_CLIENT_SECRET = 'test-client-secret';
process.env.GOOGLE_REDIRECT_URI = 'http://localhost:3000/auth/google/callback';

// Import mocks
import './mocks/googleapis.js';

// Reset mocks before each test
beforeEach(() => {
  vi.clearAllMocks();
});
