/**
 * Object identity resolution
 *
 * Identity is (apiVersion, kind, namespace, name); namespace is absent for
 * cluster-scoped objects.
 */

import { InputError } from './errors.js';
import { getString, isJsonObject } from './json.js';
import type { JsonValue, ResourceIdentity } from './types.js';

/**
 * Kinds that never live in a namespace
 */
export const CLUSTER_SCOPED_KINDS: ReadonlySet<string> = new Set([
  'Namespace',
  'CustomResourceDefinition',
  'ClusterRole',
  'ClusterRoleBinding',
  'PersistentVolume',
  'StorageClass',
  'PriorityClass',
  'Node',
  'APIService',
  'MutatingWebhookConfiguration',
  'ValidatingWebhookConfiguration',
]);

export function isClusterScopedKind(kind: string): boolean {
  return CLUSTER_SCOPED_KINDS.has(kind);
}

/**
 * Resolve the identity of a manifest or live object
 *
 * @throws InputError (MISSING_IDENTITY_FIELD) when kind or metadata.name is absent
 */
export function resolveIdentity(object: JsonValue): ResourceIdentity {
  if (!isJsonObject(object)) {
    throw new InputError('Object is not a mapping', 'MISSING_IDENTITY_FIELD');
  }

  const kind = getString(object, ['kind']);
  if (!kind) {
    throw new InputError('Object has no kind', 'MISSING_IDENTITY_FIELD');
  }

  const name = getString(object, ['metadata', 'name']);
  if (!name) {
    throw new InputError(
      `${kind} has no metadata.name`,
      'MISSING_IDENTITY_FIELD',
      'Set metadata.name on every object'
    );
  }

  const apiVersion = getString(object, ['apiVersion']) ?? '';
  const namespace = getString(object, ['metadata', 'namespace']);

  return namespace ? { apiVersion, kind, namespace, name } : { apiVersion, kind, name };
}

/**
 * Canonical key: apiVersion/kind/namespace/name, empty namespace when cluster-scoped
 */
export function identityKey(identity: ResourceIdentity): string {
  return `${identity.apiVersion}/${identity.kind}/${identity.namespace ?? ''}/${identity.name}`;
}

export function sameIdentity(a: ResourceIdentity, b: ResourceIdentity): boolean {
  return (
    a.apiVersion === b.apiVersion &&
    a.kind === b.kind &&
    a.namespace === b.namespace &&
    a.name === b.name
  );
}

/**
 * Human form: Kind/namespace/name, or Kind/name when cluster-scoped
 */
export function formatIdentity(identity: ResourceIdentity): string {
  return identity.namespace
    ? `${identity.kind}/${identity.namespace}/${identity.name}`
    : `${identity.kind}/${identity.name}`;
}

/**
 * API group of an apiVersion ('' for the core group)
 *
 * @example
 * apiGroupOf('apps/v1') // 'apps'
 * apiGroupOf('v1') // ''
 */
export function apiGroupOf(apiVersion: string): string {
  const slash = apiVersion.indexOf('/');
  return slash === -1 ? '' : apiVersion.slice(0, slash);
}
