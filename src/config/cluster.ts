/**
 * Cluster configuration resolution
 *
 * Resolves connection and execution settings from:
 * - CLI flags
 * - Environment (KUBECONVERGE_SERVER, KUBECONVERGE_CONTEXT, KUBECONVERGE_NAMESPACE, KUBECONFIG)
 * - Project file (.kubeconverge/config.json, searched upward from cwd)
 * - Defaults
 *
 * The resolved config is passed explicitly to the transport; nothing reads
 * ambient state after resolution.
 */

import { existsSync, readFileSync } from 'node:fs';
import { delimiter, dirname, isAbsolute, resolve } from 'node:path';
import type { ClusterConnection } from '../api/types.js';
import { getNumber, getObject, getString, toJsonObject } from '../reconcile/json.js';
import type { JsonObject } from '../reconcile/types.js';

/** Project config file, relative to a project directory */
export const PROJECT_CONFIG_FILE = '.kubeconverge/config.json';

/** Environment variable names */
export const ENV_SERVER = 'KUBECONVERGE_SERVER';
export const ENV_CONTEXT = 'KUBECONVERGE_CONTEXT';
export const ENV_NAMESPACE = 'KUBECONVERGE_NAMESPACE';
export const ENV_KUBECONFIG = 'KUBECONFIG';

export const DEFAULT_CLUSTER_SETTINGS = {
  concurrency: 4,
  timeoutMs: 300_000,
  pollIntervalMs: 2000,
  fieldManager: 'kubeconverge',
} as const;

// =============================================================================
// Types
// =============================================================================

/**
 * Where a setting came from (highest priority first)
 */
export type ConfigSource = 'cli' | 'env' | 'project_file' | 'default';

export interface ClusterConfig extends ClusterConnection {
  /** Namespace applied to namespaced manifests without one */
  namespace?: string;
  /** Steps in flight per tier */
  concurrency: number;
  /** Wait deadline in milliseconds */
  timeoutMs: number;
  /** Wait poll interval in milliseconds */
  pollIntervalMs: number;
  /** Declared kind ordering: kind -> kinds it must follow */
  kindDependencies: Record<string, string[]>;
}

export type ClusterSetting = keyof ClusterConfig;

/**
 * Settings supplied on the command line
 */
export interface ClusterFlags {
  server?: string;
  kubeconfig?: string;
  context?: string;
  namespace?: string;
  concurrency?: number;
  timeoutMs?: number;
  pollIntervalMs?: number;
  fieldManager?: string;
}

export interface ClusterConfigOptions {
  flags?: ClusterFlags;
  env?: NodeJS.ProcessEnv;
  /** Directory to start the project file search from */
  cwd?: string;
  /** Explicit project file; skips the search */
  configPath?: string;
}

export interface ClusterConfigResult {
  config: ClusterConfig;
  /** Which source supplied each setting */
  sources: Partial<Record<ClusterSetting, ConfigSource>>;
  /** Project file used, if any */
  configPath?: string;
}

/**
 * Invalid configuration value or unreadable project file
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly setting?: string,
    public readonly source?: ConfigSource
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

// =============================================================================
// Project File
// =============================================================================

/**
 * Find the project config file by walking up the directory tree
 */
export function findProjectConfig(startDir: string): string | null {
  let currentDir = resolve(startDir);

  for (;;) {
    const candidate = resolve(currentDir, PROJECT_CONFIG_FILE);
    if (existsSync(candidate)) {
      return candidate;
    }
    const parent = dirname(currentDir);
    if (parent === currentDir) {
      return null;
    }
    currentDir = parent;
  }
}

/**
 * Settings as read from a project file
 */
export interface ProjectFileSettings {
  server?: string;
  kubeconfig?: string;
  context?: string;
  namespace?: string;
  concurrency?: number;
  timeoutMs?: number;
  pollIntervalMs?: number;
  fieldManager?: string;
  kindDependencies?: Record<string, string[]>;
}

/**
 * Load and check a project config file.
 * Relative kubeconfig paths are resolved against the project directory.
 *
 * @throws ConfigError when the file cannot be read or has invalid fields
 */
export function loadProjectConfig(configPath: string): ProjectFileSettings {
  let raw: JsonObject | undefined;
  try {
    raw = toJsonObject(JSON.parse(readFileSync(configPath, 'utf-8')));
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Cannot read ${configPath}: ${detail}`, undefined, 'project_file');
  }
  if (raw === undefined) {
    throw new ConfigError(`${configPath} must contain a JSON object`, undefined, 'project_file');
  }

  const settings: ProjectFileSettings = {};
  const projectDir = dirname(dirname(configPath));

  for (const key of ['server', 'kubeconfig', 'context', 'namespace', 'fieldManager'] as const) {
    if (raw[key] === undefined) continue;
    const value = getString(raw, [key]);
    if (value === undefined) {
      throw new ConfigError(`${key} in ${configPath} must be a string`, key, 'project_file');
    }
    settings[key] = value;
  }

  if (settings.kubeconfig !== undefined && !isAbsolute(settings.kubeconfig)) {
    settings.kubeconfig = resolve(projectDir, settings.kubeconfig);
  }

  if (raw.concurrency !== undefined) {
    settings.concurrency = requireNumber(raw, 'concurrency', configPath);
  }
  if (raw.timeoutSeconds !== undefined) {
    settings.timeoutMs = requireNumber(raw, 'timeoutSeconds', configPath) * 1000;
  }
  if (raw.pollIntervalSeconds !== undefined) {
    settings.pollIntervalMs = requireNumber(raw, 'pollIntervalSeconds', configPath) * 1000;
  }

  if (raw.kindDependencies !== undefined) {
    settings.kindDependencies = parseKindDependencies(getObject(raw, ['kindDependencies']), configPath);
  }

  return settings;
}

function requireNumber(raw: JsonObject, key: string, configPath: string): number {
  const value = getNumber(raw, [key]);
  if (value === undefined) {
    throw new ConfigError(`${key} in ${configPath} must be a number`, key, 'project_file');
  }
  return value;
}

function parseKindDependencies(value: JsonObject | undefined, configPath: string): Record<string, string[]> {
  if (value === undefined) {
    throw new ConfigError(`kindDependencies in ${configPath} must be an object`, 'kindDependencies', 'project_file');
  }

  const result: Record<string, string[]> = {};
  for (const [kind, dependsOn] of Object.entries(value)) {
    if (!Array.isArray(dependsOn) || !dependsOn.every((entry) => typeof entry === 'string')) {
      throw new ConfigError(
        `kindDependencies.${kind} in ${configPath} must be a list of kinds`,
        'kindDependencies',
        'project_file'
      );
    }
    result[kind] = dependsOn.filter((entry): entry is string => typeof entry === 'string');
  }
  return result;
}

// =============================================================================
// Resolution
// =============================================================================

/**
 * Add a scheme to a bare host:port server address
 *
 * @example
 * normalizeServer('localhost:8001') // 'http://localhost:8001'
 */
export function normalizeServer(server: string): string {
  return /^[a-z][a-z0-9+.-]*:\/\//i.test(server) ? server : `http://${server}`;
}

const DNS_LABEL = /^[a-z0-9]([-a-z0-9]*[a-z0-9])?$/;

function pick<T>(
  setting: ClusterSetting,
  candidates: Array<[ConfigSource, T | undefined]>,
  sources: Partial<Record<ClusterSetting, ConfigSource>>
): T | undefined {
  for (const [source, value] of candidates) {
    if (value !== undefined && value !== '') {
      sources[setting] = source;
      return value;
    }
  }
  return undefined;
}

/**
 * Resolve cluster configuration from all sources
 *
 * @throws ConfigError when a value is invalid
 */
export function resolveClusterConfig(options: ClusterConfigOptions = {}): ClusterConfigResult {
  const flags = options.flags ?? {};
  const env = options.env ?? process.env;
  const configPath = options.configPath ?? findProjectConfig(options.cwd ?? process.cwd()) ?? undefined;
  const file: ProjectFileSettings = configPath ? loadProjectConfig(configPath) : {};
  const sources: Partial<Record<ClusterSetting, ConfigSource>> = {};

  // KUBECONFIG may list several files; the client library merges those itself
  const envKubeconfig = env[ENV_KUBECONFIG]?.includes(delimiter) ? undefined : env[ENV_KUBECONFIG];

  const server = pick('server', [['cli', flags.server], ['env', env[ENV_SERVER]], ['project_file', file.server]], sources);
  const kubeconfig = pick(
    'kubeconfig',
    [['cli', flags.kubeconfig], ['env', envKubeconfig], ['project_file', file.kubeconfig]],
    sources
  );
  const context = pick('context', [['cli', flags.context], ['env', env[ENV_CONTEXT]], ['project_file', file.context]], sources);
  const namespace = pick(
    'namespace',
    [['cli', flags.namespace], ['env', env[ENV_NAMESPACE]], ['project_file', file.namespace]],
    sources
  );

  const concurrency =
    pick('concurrency', [['cli', flags.concurrency], ['project_file', file.concurrency]], sources) ??
    withDefault('concurrency', DEFAULT_CLUSTER_SETTINGS.concurrency, sources);
  const timeoutMs =
    pick('timeoutMs', [['cli', flags.timeoutMs], ['project_file', file.timeoutMs]], sources) ??
    withDefault('timeoutMs', DEFAULT_CLUSTER_SETTINGS.timeoutMs, sources);
  const pollIntervalMs =
    pick('pollIntervalMs', [['cli', flags.pollIntervalMs], ['project_file', file.pollIntervalMs]], sources) ??
    withDefault('pollIntervalMs', DEFAULT_CLUSTER_SETTINGS.pollIntervalMs, sources);
  const fieldManager =
    pick('fieldManager', [['cli', flags.fieldManager], ['project_file', file.fieldManager]], sources) ??
    withDefault('fieldManager', DEFAULT_CLUSTER_SETTINGS.fieldManager, sources);

  const kindDependencies =
    pick('kindDependencies', [['project_file', file.kindDependencies]], sources) ??
    withDefault<Record<string, string[]>>('kindDependencies', {}, sources);

  const config: ClusterConfig = {
    ...(server !== undefined ? { server: normalizeServer(server) } : {}),
    ...(kubeconfig !== undefined ? { kubeconfig } : {}),
    ...(context !== undefined ? { context } : {}),
    ...(namespace !== undefined ? { namespace } : {}),
    concurrency,
    timeoutMs,
    pollIntervalMs,
    fieldManager,
    kindDependencies,
  };

  validateClusterConfig(config, sources);

  return { config, sources, ...(configPath !== undefined ? { configPath } : {}) };
}

function withDefault<T>(
  setting: ClusterSetting,
  value: T,
  sources: Partial<Record<ClusterSetting, ConfigSource>>
): T {
  sources[setting] = 'default';
  return value;
}

/**
 * @throws ConfigError on the first invalid value
 */
export function validateClusterConfig(
  config: ClusterConfig,
  sources: Partial<Record<ClusterSetting, ConfigSource>> = {}
): void {
  if (config.server !== undefined) {
    try {
      new URL(config.server);
    } catch {
      throw new ConfigError(`Invalid server address: ${config.server}`, 'server', sources.server);
    }
  }

  if (config.namespace !== undefined && !DNS_LABEL.test(config.namespace)) {
    throw new ConfigError(`Invalid namespace: ${config.namespace}`, 'namespace', sources.namespace);
  }

  if (!Number.isInteger(config.concurrency) || config.concurrency < 1) {
    throw new ConfigError(
      `Concurrency must be a positive integer, got ${config.concurrency}`,
      'concurrency',
      sources.concurrency
    );
  }

  if (!Number.isFinite(config.timeoutMs) || config.timeoutMs <= 0) {
    throw new ConfigError(`Timeout must be positive, got ${config.timeoutMs}ms`, 'timeoutMs', sources.timeoutMs);
  }

  if (!Number.isFinite(config.pollIntervalMs) || config.pollIntervalMs <= 0) {
    throw new ConfigError(
      `Poll interval must be positive, got ${config.pollIntervalMs}ms`,
      'pollIntervalMs',
      sources.pollIntervalMs
    );
  }

  if (config.fieldManager.trim() === '') {
    throw new ConfigError('Field manager must not be empty', 'fieldManager', sources.fieldManager);
  }
}

/**
 * Format resolved settings with their sources, one per line
 */
export function describeClusterConfig(result: ClusterConfigResult): string[] {
  const { config, sources } = result;
  const lines: string[] = [];
  const entries: Array<[ClusterSetting, string | number | undefined]> = [
    ['server', config.server],
    ['kubeconfig', config.kubeconfig],
    ['context', config.context],
    ['namespace', config.namespace],
    ['concurrency', config.concurrency],
    ['timeoutMs', config.timeoutMs],
    ['pollIntervalMs', config.pollIntervalMs],
    ['fieldManager', config.fieldManager],
  ];
  for (const [setting, value] of entries) {
    if (value === undefined) continue;
    lines.push(`${setting}: ${value} (${sources[setting] ?? 'default'})`);
  }
  return lines;
}
