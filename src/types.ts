/**
 * Shared types for the kubeconverge CLI
 */

import type { ClusterConfigResult } from './config/index.js';
import type { ManifestSource } from './manifests/loader.js';
import type { Transport } from './api/transport.js';
import type { ApiLogger } from './api/logger.js';

// ============================================================================
// Global Options and Context
// ============================================================================

/**
 * Global options available to all commands
 */
export interface GlobalOptions {
  /** API server address, e.g. localhost:8001 */
  server?: string;
  /** Namespace for namespaced manifests without one */
  namespace?: string;
  /** kubeconfig context */
  context?: string;
  /** kubeconfig file */
  kubeconfig?: string;
  /** Output JSON for CI/automation */
  json: boolean;
  /** Enable verbose logging */
  verbose: boolean;
}

/**
 * Where the desired manifests come from
 */
export interface ManifestInputOptions {
  /** Manifest files or directories */
  file?: string[];
  /** Inline YAML or JSON document */
  exec?: string;
}

/**
 * Result of a command execution
 */
export interface CommandResult<T = unknown> {
  success: boolean;
  message: string;
  data?: T;
  errors?: string[];
}

/**
 * Output format type
 */
export type OutputFormat = 'human' | 'json';

/**
 * Command context passed to command handlers
 */
export interface CommandContext {
  /** Parsed global CLI options */
  options: GlobalOptions;
  /** Output format for results */
  outputFormat: OutputFormat;
  /** Resolved cluster configuration */
  cluster: ClusterConfigResult;
  logger: ApiLogger;
  /** Builds the transport on first use; commands that stay local never call it */
  transport: () => Transport;
  /** Namespace for namespaced manifests without one: --namespace, else the kubeconfig context's, else `default` */
  defaultNamespace: () => string;
  /** Builds the manifest source from input options */
  source: (input: ManifestInputOptions) => ManifestSource;
  /** Cancelled on SIGINT */
  signal?: AbortSignal;
}
