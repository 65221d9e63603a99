/**
 * @profilescout/core - shared policies, configuration, logging and I/O helpers
 */

export const APP_NAME = 'ProfileScout';

export { sleep, systemClock, type Sleep, type Clock } from './timing.js';
export {
  withRetry,
  exponentialBackoff,
  linearBackoff,
  type RetryPolicy,
} from './retry.js';
export { FixedIntervalThrottle, type ThrottleOptions } from './throttle.js';
export {
  ConfigError,
  InputError,
  errorMessage,
  describeError,
  formatUserMessage,
  type ErrorDetail,
} from './errors.js';
export {
  createLogger,
  log,
  getLogs,
  clearLogs,
  setLogLevel,
  type Logger,
  type LogLevel,
  type LogEntry,
} from './logger.js';
export {
  loadConfig,
  DEFAULT_LLM_BASE_URL,
  DEFAULT_LLM_MODEL,
  type AppConfig,
  type SearchConfig,
  type LlmConfig,
  type BatchConfig,
} from './config.js';
export {
  listColumns,
  readEntityColumn,
  readEntityCsvFile,
  recordsToCsv,
  CsvFileSink,
  type RecordSink,
} from './csv.js';
