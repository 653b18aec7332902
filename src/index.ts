/**
 * @fileoverview Server entry point for the inbox triage service.
 *
 * Validates configuration, builds the Express app and listens. On
 * SIGTERM/SIGINT the server stops accepting connections and the
 * credential store is closed.
 */

import config, { validateConfig } from './config.js';

// Fail fast if critical configuration is missing
validateConfig();

import { createApp } from './app.js';
import { closeCredentialStore } from './services/credentials/index.js';
import { getEmailAnalysisService } from './domains/email-analysis/runtime/index.js';
import { createLogger, initObservability } from './utils/observability/index.js';

initObservability();

const log = createLogger({ domain: 'server' });
const app = createApp();

// Build the analysis service up front so wiring errors surface at boot
getEmailAnalysisService();

const server = app.listen(config.port, () => {
  log.info('server_started', {
    port: config.port,
    env: config.nodeEnv,
    llmEnabled: config.llm.enabled,
    llmBaseUrl: config.llm.baseUrl,
    llmModel: config.llm.model,
    concurrency: config.analysis.concurrency,
  });

  log.info('config_check', {
    hasCredentialEncryptionKey: !!config.credentials.encryptionKey,
    credentialStore: config.credentials.provider,
    hasGoogleClientId: !!config.google.clientId,
    hasGoogleClientSecret: !!config.google.clientSecret,
    googleRedirectUri: config.google.redirectUri,
  });
});

let isShuttingDown = false;

function shutdown(signal: string): void {
  if (isShuttingDown) {
    return;
  }
  isShuttingDown = true;
  log.info('shutdown_signal_received', {
    signal,
    runInFlight: getEmailAnalysisService().isRunning(),
  });

  const forceExitTimer = setTimeout(() => {
    log.warn('force_exit_after_timeout');
    process.exit(1);
  }, 10000);

  server.close(() => {
    clearTimeout(forceExitTimer);
    closeCredentialStore();
    log.info('server_closed');
    process.exit(0);
  });
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
