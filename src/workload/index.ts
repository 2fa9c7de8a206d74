/**
 * Managed-service access: workload adapter, retry policy and logging
 */

export type { ServicePaths, Workload } from './types.js';
export { buildServicePaths } from './types.js';
export { FileWorkload, type FileWorkloadOptions } from './client.js';
export {
  DEFAULT_RETRY_POLICY,
  calculateDelay,
  resolvePolicy,
  sleep,
  withRetry,
  withTimeout,
  type RetryOptions,
  type RetryPolicy,
  type RetryResult,
} from './retry.js';
export {
  OperatorLogger,
  createLogger,
  createSilentLogger,
  logger,
  parseLogLevel,
  redactObject,
  redactPatterns,
  redactString,
  type LogEntry,
  type LogLevel,
  type LoggerConfig,
} from './logger.js';
