/**
 * Diff Engine
 *
 * Three-way comparison of a desired manifest, the live object and the
 * baseline recorded on the live object at the previous apply.
 *
 * Rules, per field:
 * - a desired value the live value already satisfies needs nothing
 *   (live may carry server defaults inside desired structures)
 * - a field with no baseline value is set to the desired value
 * - a field whose live value still matches the baseline is set cleanly
 * - a field changed outside the baseline and not matching desired is a
 *   conflict, or a forced set when `force` is on
 * - a field in the baseline but no longer desired is removed when live
 *   still matches the baseline, otherwise it is a conflict
 * - fields in neither desired nor baseline are left alone
 */

import { formatPath, getObject, getString, isJsonObject, removePath, setPath, toJsonObject } from './json.js';
import type {
  DiffResult,
  FieldOperation,
  FieldPath,
  JsonObject,
  JsonValue,
  LiveObject,
  Manifest,
  ResourceIdentity,
} from './types.js';

// =============================================================================
// Constants
// =============================================================================

/**
 * Annotation holding the JSON of the manifest applied last
 */
export const BASELINE_ANNOTATION = 'kubeconverge.io/last-applied-configuration';

/**
 * Label marking objects this tool created or patched
 */
export const MANAGED_BY_LABEL = 'app.kubernetes.io/managed-by';
export const MANAGED_BY_VALUE = 'kubeconverge';

const SERVER_METADATA_FIELDS: ReadonlySet<string> = new Set([
  'uid',
  'resourceVersion',
  'generation',
  'creationTimestamp',
  'deletionTimestamp',
  'deletionGracePeriodSeconds',
  'managedFields',
  'selfLink',
]);

// =============================================================================
// Types
// =============================================================================

export interface DiffOptions {
  /** Delete live objects that are no longer desired */
  prune?: boolean;
  /** Override fields changed outside the baseline instead of reporting a conflict */
  force?: boolean;
}

interface DiffContext {
  force: boolean;
  operations: FieldOperation[];
  conflicts: string[];
  baseChanged: boolean;
}

// =============================================================================
// Baseline
// =============================================================================

/**
 * Parse the baseline stored on a live object.
 * Absent or unparseable annotations yield undefined.
 */
export function readBaseline(live: LiveObject): JsonObject | undefined {
  const raw = getString(live, ['metadata', 'annotations', BASELINE_ANNOTATION]);
  if (raw === undefined) return undefined;

  try {
    return toJsonObject(JSON.parse(raw));
  } catch {
    return undefined;
  }
}

/**
 * The manifest as recorded in the baseline: without the baseline annotation
 */
export function stripBaseline(manifest: Manifest): JsonObject {
  const stripped = removePath(manifest, ['metadata', 'annotations', BASELINE_ANNOTATION]);
  const annotations = getObject(stripped, ['metadata', 'annotations']);
  if (annotations !== undefined && Object.keys(annotations).length === 0) {
    return removePath(stripped, ['metadata', 'annotations']);
  }
  return stripped;
}

/**
 * Copy of a manifest carrying its own baseline annotation and the managed-by label
 */
export function withBaseline(manifest: Manifest): Manifest {
  const baseline = JSON.stringify(stripBaseline(manifest));
  const annotated = setPath(manifest, ['metadata', 'annotations', BASELINE_ANNOTATION], baseline);
  return setPath(annotated, ['metadata', 'labels', MANAGED_BY_LABEL], MANAGED_BY_VALUE);
}

/**
 * Operations that record a new baseline on a patched object
 */
export function baselineOperations(manifest: Manifest): FieldOperation[] {
  return [
    {
      op: 'set',
      path: ['metadata', 'annotations', BASELINE_ANNOTATION],
      value: JSON.stringify(stripBaseline(manifest)),
    },
    { op: 'set', path: ['metadata', 'labels', MANAGED_BY_LABEL], value: MANAGED_BY_VALUE },
  ];
}

// =============================================================================
// Comparison
// =============================================================================

/**
 * True when `live` satisfies `desired`: objects by subset, arrays
 * element-wise with equal length, scalars by equality
 */
export function isSubset(desired: JsonValue, live: JsonValue | undefined): boolean {
  if (live === undefined) return false;

  if (Array.isArray(desired)) {
    return (
      Array.isArray(live) &&
      live.length === desired.length &&
      desired.every((item, index) => isSubset(item, live[index]))
    );
  }

  if (isJsonObject(desired)) {
    return (
      isJsonObject(live) &&
      Object.keys(desired).every((key) => isSubset(desired[key], member(live, key)))
    );
  }

  return desired === live;
}

function member(object: JsonObject | undefined, key: string): JsonValue | undefined {
  return object !== undefined && Object.hasOwn(object, key) ? object[key] : undefined;
}

function isIgnored(path: FieldPath): boolean {
  if (path.length === 1) {
    return path[0] === 'status';
  }
  if (path[0] !== 'metadata') return false;
  if (path.length === 2) {
    return SERVER_METADATA_FIELDS.has(path[1]);
  }
  return path.length === 3 && path[1] === 'annotations' && path[2] === BASELINE_ANNOTATION;
}

/**
 * Live still holds what the baseline recorded
 */
function matchesBaseline(baseline: JsonValue, live: JsonValue | undefined): boolean {
  return isSubset(baseline, live);
}

function diffObject(
  path: FieldPath,
  desired: JsonObject,
  baseline: JsonObject | undefined,
  live: JsonObject,
  ctx: DiffContext
): void {
  const keys = new Set([...Object.keys(desired), ...Object.keys(baseline ?? {})]);

  for (const key of keys) {
    const childPath = [...path, key];
    if (isIgnored(childPath)) continue;

    const d = member(desired, key);
    const b = member(baseline, key);
    const l = member(live, key);

    if (d !== undefined) {
      diffDesiredField(childPath, d, b, l, ctx);
    } else if (b !== undefined) {
      diffDroppedField(childPath, b, l, ctx);
    }
  }
}

function diffDesiredField(
  path: FieldPath,
  desired: JsonValue,
  baseline: JsonValue | undefined,
  live: JsonValue | undefined,
  ctx: DiffContext
): void {
  if (isJsonObject(desired) && isJsonObject(live)) {
    diffObject(path, desired, isJsonObject(baseline) ? baseline : undefined, live, ctx);
    return;
  }

  if (isSubset(desired, live)) return;

  const operation: FieldOperation =
    live === undefined ? { op: 'set', path, value: desired } : { op: 'set', path, value: desired, previous: live };

  if (baseline === undefined || matchesBaseline(baseline, live)) {
    ctx.operations.push(operation);
    return;
  }

  recordConflict(path, operation, ctx);
}

function diffDroppedField(
  path: FieldPath,
  baseline: JsonValue,
  live: JsonValue | undefined,
  ctx: DiffContext
): void {
  if (live === undefined) return;

  const operation: FieldOperation = { op: 'remove', path, previous: live };

  if (matchesBaseline(baseline, live)) {
    ctx.operations.push(operation);
    return;
  }

  recordConflict(path, operation, ctx);
}

function recordConflict(path: FieldPath, operation: FieldOperation, ctx: DiffContext): void {
  if (ctx.force) {
    ctx.operations.push(operation);
    ctx.baseChanged = true;
  } else {
    ctx.conflicts.push(formatPath(path));
  }
}

// =============================================================================
// Diff
// =============================================================================

/**
 * Compare the desired and live state of one identity
 *
 * @param manifest - desired manifest, undefined when the identity is no longer desired
 * @param live - live object, undefined when absent from the cluster
 * @returns the diff, or undefined when there is nothing to consider
 *   (absent on both sides, or live-only without prune)
 */
export function diffResource(
  identity: ResourceIdentity,
  manifest: Manifest | undefined,
  live: LiveObject | undefined,
  options: DiffOptions = {}
): DiffResult | undefined {
  if (manifest === undefined) {
    if (live !== undefined && options.prune) {
      return { type: 'delete', identity };
    }
    return undefined;
  }

  if (live === undefined) {
    return { type: 'create', identity, manifest };
  }

  const ctx: DiffContext = {
    force: options.force ?? false,
    operations: [],
    conflicts: [],
    baseChanged: false,
  };

  diffObject([], manifest, readBaseline(live), live, ctx);

  if (ctx.conflicts.length > 0) {
    return {
      type: 'conflict',
      identity,
      manifest,
      reason: `changed outside of kubeconverge: ${ctx.conflicts.join(', ')}`,
      fields: ctx.conflicts,
    };
  }

  if (ctx.operations.length === 0) {
    return { type: 'noop', identity, manifest };
  }

  const resourceVersion = getString(live, ['metadata', 'resourceVersion']);
  return {
    type: 'patch',
    identity,
    manifest,
    operations: ctx.operations,
    baseChanged: ctx.baseChanged,
    ...(resourceVersion !== undefined ? { resourceVersion } : {}),
  };
}

/**
 * Apply field operations to a JSON object (used to preview a patch)
 */
export function applyOperations(target: JsonObject, operations: readonly FieldOperation[]): JsonObject {
  return operations.reduce<JsonObject>(
    (result, operation) =>
      operation.op === 'set' ? setPath(result, operation.path, operation.value) : removePath(result, operation.path),
    target
  );
}
