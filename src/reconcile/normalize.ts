/**
 * Manifest set normalization
 *
 * Flattens the document tree produced by a manifest source into a flat,
 * ordered list of frozen resource manifests. Arrays and List kinds are
 * expanded depth-first in the order they are encountered.
 */

import { DuplicateIdentityError, InputError, MalformedManifestError } from './errors.js';
import { formatIdentity, identityKey, isClusterScopedKind, resolveIdentity } from './identity.js';
import { deepClone, deepFreeze, getArray, getObject, getString, isJsonObject, setPath, toJsonValue } from './json.js';
import type { JsonValue, Manifest, ResourceIdentity } from './types.js';

// =============================================================================
// Types
// =============================================================================

/** Namespace used when neither the manifest nor the caller names one */
export const DEFAULT_NAMESPACE = 'default';

export interface NormalizeOptions {
  /** Namespace applied to namespaced manifests that declare none */
  defaultNamespace?: string;
}

// =============================================================================
// Normalization
// =============================================================================

/**
 * A List-shaped object: kind `List` or any `*List` kind carrying items
 */
export function isListObject(node: JsonValue): boolean {
  if (!isJsonObject(node)) return false;
  const kind = getString(node, ['kind']);
  return kind !== undefined && kind.endsWith('List') && getArray(node, ['items']) !== undefined;
}

/**
 * Flatten a manifest tree into resource manifests
 *
 * @throws MalformedManifestError for non-object nodes or objects without kind
 * @throws DuplicateIdentityError when two manifests share an identity
 */
export function normalizeManifests(tree: unknown, options: NormalizeOptions = {}): Manifest[] {
  const root = toJsonValue(tree);
  if (root === undefined) {
    throw new MalformedManifestError('$', 'document is not JSON data');
  }

  const collected: Array<{ manifest: Manifest; treePath: string }> = [];
  flatten(root, '$', collected);

  const seen = new Map<string, string>();
  const manifests: Manifest[] = [];
  const clusterScoped = definedClusterScopedKinds(collected.map((entry) => entry.manifest));

  for (const { manifest, treePath } of collected) {
    const withNamespace = applyDefaultNamespace(manifest, options.defaultNamespace, clusterScoped);
    const identity = identityAt(withNamespace, treePath);
    const key = identityKey(identity);

    const previousPath = seen.get(key);
    if (previousPath !== undefined) {
      throw new DuplicateIdentityError(formatIdentity(identity), [previousPath, treePath]);
    }
    seen.set(key, treePath);

    manifests.push(deepFreeze(deepClone(withNamespace)));
  }

  return manifests;
}

function flatten(
  node: JsonValue,
  treePath: string,
  out: Array<{ manifest: Manifest; treePath: string }>
): void {
  if (Array.isArray(node)) {
    node.forEach((item, index) => flatten(item, `${treePath}[${index}]`, out));
    return;
  }

  if (!isJsonObject(node)) {
    throw new MalformedManifestError(treePath, `expected an object, found ${describeNode(node)}`);
  }

  if (isListObject(node)) {
    const items = getArray(node, ['items']) ?? [];
    items.forEach((item, index) => flatten(item, `${treePath}.items[${index}]`, out));
    return;
  }

  if (typeof node.kind !== 'string' || node.kind === '') {
    throw new MalformedManifestError(treePath, 'object has no kind');
  }

  out.push({ manifest: node, treePath });
}

function identityAt(manifest: Manifest, treePath: string): ResourceIdentity {
  try {
    return resolveIdentity(manifest);
  } catch (error) {
    if (error instanceof InputError) {
      throw new InputError(`${error.message} (at ${treePath})`, error.code, error.suggestion, {
        cause: error,
      });
    }
    throw error;
  }
}

/**
 * Kinds declared cluster-scoped by CustomResourceDefinitions in the set.
 * Custom kinds defined elsewhere are treated as namespaced.
 */
function definedClusterScopedKinds(manifests: readonly Manifest[]): Set<string> {
  const kinds = new Set<string>();
  for (const manifest of manifests) {
    if (getString(manifest, ['kind']) !== 'CustomResourceDefinition') continue;
    if (getString(manifest, ['spec', 'scope']) !== 'Cluster') continue;
    const kind = getString(manifest, ['spec', 'names', 'kind']);
    if (kind) kinds.add(kind);
  }
  return kinds;
}

function applyDefaultNamespace(
  manifest: Manifest,
  defaultNamespace: string | undefined,
  clusterScoped: ReadonlySet<string>
): Manifest {
  if (!defaultNamespace) return manifest;

  const kind = getString(manifest, ['kind']) ?? '';
  if (isClusterScopedKind(kind) || clusterScoped.has(kind)) return manifest;
  if (getString(getObject(manifest, ['metadata']), ['namespace'])) return manifest;

  return setPath(manifest, ['metadata', 'namespace'], defaultNamespace);
}

function describeNode(node: JsonValue): string {
  if (node === null) return 'null';
  return typeof node;
}
