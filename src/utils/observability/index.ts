export type * from './types.js';
export { isLogLevel, LOG_LEVELS } from './types.js';

export {
  createRequestId,
  createRunId,
  withLogContext,
  getLogContext,
} from './context.js';

export {
  createLogger,
  initObservability,
} from './logger.js';

export {
  redactEmailAddress,
  redactSecrets,
  safeSnippet,
} from './redaction.js';
