/**
 * Local manifest validation
 *
 * Checks a normalized manifest set without contacting the cluster:
 * 1. apiVersion present
 * 2. Names are DNS-1123 subdomains
 * 3. Cluster-scoped kinds carry no namespace (warning)
 * 4. Label values are valid
 * 5. Namespaces used are declared in the set or built in (warning)
 */

import { formatIdentity, isClusterScopedKind, resolveIdentity } from '../reconcile/identity.js';
import { getObject, getString } from '../reconcile/json.js';
import type { Manifest } from '../reconcile/types.js';

// =============================================================================
// Types
// =============================================================================

export type ValidationErrorCode =
  | 'MISSING_API_VERSION'
  | 'INVALID_NAME'
  | 'NAMESPACE_ON_CLUSTER_SCOPED'
  | 'INVALID_LABEL_VALUE'
  | 'NAMESPACE_NOT_DECLARED';

export type ValidationSeverity = 'error' | 'warning';

export interface ValidationIssue {
  code: ValidationErrorCode;
  severity: ValidationSeverity;
  message: string;
  /** Object the issue was found on, e.g. "Deployment/web/frontend" */
  path: string;
  suggestions?: string[];
}

export interface ValidationResult {
  /** No error-level issues */
  valid: boolean;
  issues: ValidationIssue[];
  errors: ValidationIssue[];
  warnings: ValidationIssue[];
}

export const BUILTIN_NAMESPACES: ReadonlySet<string> = new Set(['default', 'kube-system', 'kube-public']);

const DNS_SUBDOMAIN = /^[a-z0-9]([-a-z0-9]*[a-z0-9])?(\.[a-z0-9]([-a-z0-9]*[a-z0-9])?)*$/;
const LABEL_VALUE = /^(([A-Za-z0-9][-A-Za-z0-9_.]*)?[A-Za-z0-9])?$/;
const MAX_SUBDOMAIN_LENGTH = 253;
const MAX_LABEL_VALUE_LENGTH = 63;

// =============================================================================
// Result Helpers
// =============================================================================

export function validationResult(issues: ValidationIssue[]): ValidationResult {
  const errors = issues.filter((issue) => issue.severity === 'error');
  const warnings = issues.filter((issue) => issue.severity === 'warning');
  return { valid: errors.length === 0, issues, errors, warnings };
}

export function isValidSubdomain(name: string): boolean {
  return name.length <= MAX_SUBDOMAIN_LENGTH && DNS_SUBDOMAIN.test(name);
}

export function isValidLabelValue(value: string): boolean {
  return value.length <= MAX_LABEL_VALUE_LENGTH && LABEL_VALUE.test(value);
}

// =============================================================================
// Rules
// =============================================================================

function checkManifest(manifest: Manifest, declaredNamespaces: ReadonlySet<string>): ValidationIssue[] {
  const identity = resolveIdentity(manifest);
  const path = formatIdentity(identity);
  const issues: ValidationIssue[] = [];

  if (identity.apiVersion === '') {
    issues.push({
      code: 'MISSING_API_VERSION',
      severity: 'error',
      message: 'apiVersion is missing',
      path,
      suggestions: [`Add apiVersion, e.g. "v1" or "apps/v1" for ${identity.kind}`],
    });
  }

  if (!isValidSubdomain(identity.name)) {
    issues.push({
      code: 'INVALID_NAME',
      severity: 'error',
      message: `Name "${identity.name}" is not a valid DNS-1123 subdomain`,
      path,
      suggestions: ['Use lowercase letters, digits, "-" and "."; start and end with a letter or digit'],
    });
  }

  if (identity.namespace !== undefined && isClusterScopedKind(identity.kind)) {
    issues.push({
      code: 'NAMESPACE_ON_CLUSTER_SCOPED',
      severity: 'warning',
      message: `${identity.kind} is cluster-scoped; namespace "${identity.namespace}" is ignored by the server`,
      path,
    });
  }

  const labels = getObject(manifest, ['metadata', 'labels']) ?? {};
  for (const key of Object.keys(labels)) {
    const value = getString(labels, [key]);
    if (value === undefined || !isValidLabelValue(value)) {
      issues.push({
        code: 'INVALID_LABEL_VALUE',
        severity: 'error',
        message: `Label "${key}" has an invalid value ${JSON.stringify(labels[key])}`,
        path,
        suggestions: ['Label values are strings of at most 63 alphanumerics, "-", "_" or "."'],
      });
    }
  }

  if (
    identity.namespace !== undefined &&
    !isClusterScopedKind(identity.kind) &&
    !declaredNamespaces.has(identity.namespace) &&
    !BUILTIN_NAMESPACES.has(identity.namespace)
  ) {
    issues.push({
      code: 'NAMESPACE_NOT_DECLARED',
      severity: 'warning',
      message: `Namespace "${identity.namespace}" is not part of this manifest set`,
      path,
      suggestions: [`Add a Namespace named "${identity.namespace}" or make sure it already exists`],
    });
  }

  return issues;
}

/**
 * Validate a normalized manifest set
 */
export function validateManifests(manifests: readonly Manifest[]): ValidationResult {
  const declaredNamespaces = new Set(
    manifests
      .map((manifest) => resolveIdentity(manifest))
      .filter((identity) => identity.kind === 'Namespace')
      .map((identity) => identity.name)
  );

  return validationResult(manifests.flatMap((manifest) => checkManifest(manifest, declaredNamespaces)));
}

/**
 * e.g. "2 error(s), 1 warning(s)"
 */
export function getValidationSummary(result: ValidationResult): string {
  if (result.issues.length === 0) {
    return 'No issues found';
  }
  return `${result.errors.length} error(s), ${result.warnings.length} warning(s)`;
}
