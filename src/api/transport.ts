/**
 * Control-plane transport contract
 *
 * Every transport failure is a TransportError tagged with a reason and a
 * transient flag; callers decide retry from the flag alone.
 */

import type { FieldOperation, JsonObject, LiveObject, Manifest, ResourceIdentity } from '../reconcile/types.js';

// =============================================================================
// Not Found
// =============================================================================

/**
 * Returned by `get` when the object does not exist
 */
export const NOT_FOUND: unique symbol = Symbol('kubeconverge.not-found');

export type NotFound = typeof NOT_FOUND;

// =============================================================================
// Errors
// =============================================================================

export type TransportErrorReason =
  | 'NotFound'
  | 'AlreadyExists'
  | 'Conflict'
  | 'Invalid'
  | 'BadRequest'
  | 'Unauthorized'
  | 'Forbidden'
  | 'TooManyRequests'
  | 'ServerError'
  | 'Timeout'
  | 'Network'
  | 'Unknown';

export type TransportOperation = 'get' | 'create' | 'patch' | 'delete' | 'list';

const TRANSIENT_REASONS: ReadonlySet<TransportErrorReason> = new Set<TransportErrorReason>([
  'Conflict',
  'TooManyRequests',
  'ServerError',
  'Timeout',
  'Network',
]);

/**
 * Error raised by a transport call
 */
export class TransportError extends Error {
  readonly reason: TransportErrorReason;
  readonly status?: number;
  readonly transient: boolean;
  /** Seconds to wait before retrying, from Retry-After */
  readonly retryAfter?: number;

  constructor(
    message: string,
    reason: TransportErrorReason,
    options: { status?: number; retryAfter?: number; transient?: boolean; cause?: unknown } = {}
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'TransportError';
    this.reason = reason;
    this.status = options.status;
    this.retryAfter = options.retryAfter;
    this.transient = options.transient ?? TRANSIENT_REASONS.has(reason);
  }
}

export function isTransportError(error: unknown, reason?: TransportErrorReason): error is TransportError {
  return error instanceof TransportError && (reason === undefined || error.reason === reason);
}

/**
 * Map an HTTP status to a reason. 409 means AlreadyExists for create and a
 * version conflict otherwise, unless the server said which.
 */
export function reasonFromStatus(
  status: number,
  operation: TransportOperation,
  serverReason?: string
): TransportErrorReason {
  if (serverReason === 'AlreadyExists') return 'AlreadyExists';
  if (serverReason === 'Conflict') return 'Conflict';

  if (status === 400) return 'BadRequest';
  if (status === 401) return 'Unauthorized';
  if (status === 403) return 'Forbidden';
  if (status === 404) return 'NotFound';
  if (status === 409) return operation === 'create' ? 'AlreadyExists' : 'Conflict';
  if (status === 422) return 'Invalid';
  if (status === 429) return 'TooManyRequests';
  if (status === 408 || status === 504) return 'Timeout';
  if (status >= 500) return 'ServerError';
  return 'Unknown';
}

// =============================================================================
// Transport Interface
// =============================================================================

export interface PatchOptions {
  /** Expected resourceVersion; a mismatch fails with a Conflict */
  resourceVersion?: string;
}

export interface ListSelector {
  apiVersion: string;
  kind: string;
  /** Omitted for cluster-scoped kinds, or to list across namespaces */
  namespace?: string;
  labelSelector?: string;
}

export interface Transport {
  get(identity: ResourceIdentity): Promise<LiveObject | NotFound>;
  create(manifest: Manifest): Promise<LiveObject>;
  patch(identity: ResourceIdentity, operations: readonly FieldOperation[], options?: PatchOptions): Promise<LiveObject>;
  delete(identity: ResourceIdentity): Promise<void>;
  list(selector: ListSelector): Promise<LiveObject[]>;
}

// =============================================================================
// Merge Patch
// =============================================================================

/**
 * Build a JSON merge patch (RFC 7386) from field operations.
 * Removal is expressed as null; arrays are replaced whole.
 */
export function buildMergePatch(operations: readonly FieldOperation[]): JsonObject {
  const patch: JsonObject = {};

  for (const operation of operations) {
    if (operation.path.length === 0) continue;

    let target = patch;
    for (const key of operation.path.slice(0, -1)) {
      const next = target[key];
      if (typeof next === 'object' && next !== null && !Array.isArray(next)) {
        target = next;
      } else {
        const created: JsonObject = {};
        target[key] = created;
        target = created;
      }
    }

    const leaf = operation.path[operation.path.length - 1];
    target[leaf] = operation.op === 'set' ? operation.value : null;
  }

  return patch;
}

/**
 * Apply a JSON merge patch (RFC 7386) to a document, returning a new one
 */
export function applyMergePatch(target: JsonObject, patch: JsonObject): JsonObject {
  const result: JsonObject = { ...target };

  for (const [key, value] of Object.entries(patch)) {
    if (value === null) {
      delete result[key];
    } else if (typeof value === 'object' && !Array.isArray(value)) {
      const current = result[key];
      const base = typeof current === 'object' && current !== null && !Array.isArray(current) ? current : {};
      result[key] = applyMergePatch(base, value);
    } else {
      result[key] = value;
    }
  }

  return result;
}
