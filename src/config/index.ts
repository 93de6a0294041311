/**
 * Configuration module exports
 */

export {
  resolveClusterConfig,
  validateClusterConfig,
  describeClusterConfig,
  findProjectConfig,
  loadProjectConfig,
  normalizeServer,
  ConfigError,
  PROJECT_CONFIG_FILE,
  DEFAULT_CLUSTER_SETTINGS,
  type ClusterConfig,
  type ClusterConfigOptions,
  type ClusterConfigResult,
  type ClusterFlags,
  type ClusterSetting,
  type ConfigSource,
  type ProjectFileSettings,
} from './cluster.js';
