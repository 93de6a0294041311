/**
 * Cluster API module
 *
 * Provides:
 * - Transport contract and the Kubernetes implementation
 * - Retry logic with exponential backoff
 * - JSON logging with secret redaction
 */

// Transport
export {
  NOT_FOUND,
  TransportError,
  isTransportError,
  reasonFromStatus,
  buildMergePatch,
  applyMergePatch,
} from './transport.js';

export type {
  NotFound,
  Transport,
  TransportErrorReason,
  TransportOperation,
  PatchOptions,
  ListSelector,
} from './transport.js';

export {
  KubernetesTransport,
  buildKubeConfig,
  contextNamespace,
  groupVersionPath,
  parseResourceList,
  responseError,
  toTransportError,
} from './kubernetes.js';

export type { KubernetesTransportOptions } from './kubernetes.js';

// Retry utilities
export {
  withRetry,
  calculateDelay,
  isRetryableError,
  parseRetryAfter,
  sleep,
  DEFAULT_RETRY_CONFIG,
} from './retry.js';

export type { RetryOptions } from './retry.js';

// Logger utilities
export {
  logger,
  createLogger,
  parseLogLevel,
  ApiLogger,
  redactString,
  redactPatterns,
  redactValue,
  redactObject,
} from './logger.js';

export type { LogLevel, LogEntry, LoggerConfig, LogSink } from './logger.js';

// Types
export type { RetryConfig, RetryResult, RetrySettings, ClusterConnection } from './types.js';
