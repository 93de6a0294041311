/**
 * Type definitions for the control-plane client layer
 */

// =============================================================================
// Retry Types
// =============================================================================

/**
 * Retry configuration
 */
export interface RetryConfig {
  /** Maximum number of retry attempts (default: 4) */
  maxRetries?: number;
  /** Base delay in milliseconds (default: 250) */
  baseDelayMs?: number;
  /** Maximum delay in milliseconds (default: 8000) */
  maxDelayMs?: number;
  /** Jitter factor (0-1) to add randomness (default: 0.1) */
  jitterFactor?: number;
}

/**
 * Retry configuration as passed through the engine
 */
export type RetrySettings = RetryConfig & {
  /** Replaces the backoff sleep (tests) */
  sleep?: (ms: number) => Promise<void>;
};

/**
 * Result of a retry operation
 */
export type RetryResult<T> =
  | {
      success: true;
      data: T;
      /** Number of attempts made */
      attempts: number;
      /** Total time spent including backoff (ms) */
      totalTimeMs: number;
    }
  | {
      success: false;
      error: Error;
      attempts: number;
      totalTimeMs: number;
    };

// =============================================================================
// Cluster Connection
// =============================================================================

/**
 * Connection settings handed to a transport constructor.
 * Resolved once by the config layer; transports never read ambient state.
 */
export interface ClusterConnection {
  /** API server URL (e.g. http://localhost:8001 behind `kubectl proxy`) */
  server?: string;
  /** Path to a kubeconfig file */
  kubeconfig?: string;
  /** Kubeconfig context to select */
  context?: string;
  /** Field manager recorded on writes */
  fieldManager: string;
}
