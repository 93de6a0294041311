/**
 * kubeconverge library entrypoint
 *
 * The CLI lives in cli.ts; this module exposes the engine for programmatic use.
 */

export * from './reconcile/index.js';
export * from './api/index.js';
export * from './config/index.js';
export {
  FileManifestSource,
  InlineManifestSource,
  parseManifestText,
  MANIFEST_EXTENSIONS,
  type ManifestSource,
  type FileManifestSourceOptions,
} from './manifests/loader.js';
export {
  emitManifests,
  emitJson,
  emitYamlDocuments,
  parseOutputFormat,
  UnknownOutputFormatError,
  OUTPUT_FORMATS,
  type OutputFormat,
} from './manifests/emit.js';
export {
  validateManifests,
  getValidationSummary,
  isValidSubdomain,
  isValidLabelValue,
  type ValidationIssue,
  type ValidationResult,
} from './manifests/validator.js';
