/**
 * In-process stand-in for a Kubernetes API server
 *
 * Stores objects by identity, assigns server fields on create, applies merge
 * patches with optimistic concurrency and answers label-selected lists.
 */

import { createLogger, type ApiLogger } from '../../src/api/logger.js';
import {
  NOT_FOUND,
  TransportError,
  applyMergePatch,
  buildMergePatch,
  type ListSelector,
  type NotFound,
  type PatchOptions,
  type Transport,
  type TransportOperation,
} from '../../src/api/transport.js';
import { formatIdentity, identityKey, resolveIdentity } from '../../src/reconcile/identity.js';
import { deepClone, getObject, getString, setPath } from '../../src/reconcile/json.js';
import type { FieldOperation, JsonObject, LiveObject, Manifest, ResourceIdentity } from '../../src/reconcile/types.js';

interface InjectedFailure {
  operation: TransportOperation;
  error: TransportError;
  remaining: number;
  match?: (identity: ResourceIdentity) => boolean;
}

export interface FakeCall {
  operation: TransportOperation;
  target: string;
}

export class FakeCluster implements Transport {
  readonly objects = new Map<string, LiveObject>();
  readonly calls: FakeCall[] = [];
  readonly patches: JsonObject[] = [];
  private version = 0;
  private failures: InjectedFailure[] = [];

  /** Store an object as if created earlier, outside the engine */
  seed(object: JsonObject): LiveObject {
    const stored = this.withServerFields(deepClone(object), `uid-${this.objects.size + 1}`);
    this.objects.set(identityKey(resolveIdentity(stored)), stored);
    return stored;
  }

  /** Change a stored object out-of-band; bumps its resourceVersion */
  mutate(identity: ResourceIdentity, change: (object: JsonObject) => JsonObject): LiveObject {
    const key = identityKey(identity);
    const current = this.objects.get(key);
    if (current === undefined) {
      throw new Error(`no such object ${key}`);
    }
    const next = setPath(change(current), ['metadata', 'resourceVersion'], this.nextVersion());
    this.objects.set(key, next);
    return next;
  }

  lookup(identity: ResourceIdentity): LiveObject | undefined {
    return this.objects.get(identityKey(identity));
  }

  /** Fail the next `times` calls of an operation, optionally for matching identities only */
  failNext(
    operation: TransportOperation,
    error: TransportError,
    options: { times?: number; match?: (identity: ResourceIdentity) => boolean } = {}
  ): void {
    this.failures.push({ operation, error, remaining: options.times ?? 1, match: options.match });
  }

  count(operation: TransportOperation): number {
    return this.calls.filter((call) => call.operation === operation).length;
  }

  async get(identity: ResourceIdentity): Promise<LiveObject | NotFound> {
    this.enter('get', identity);
    return this.lookup(identity) ?? NOT_FOUND;
  }

  async create(manifest: Manifest): Promise<LiveObject> {
    const identity = resolveIdentity(manifest);
    this.enter('create', identity);

    const key = identityKey(identity);
    if (this.objects.has(key)) {
      throw new TransportError(`create ${formatIdentity(identity)}: already exists`, 'AlreadyExists', { status: 409 });
    }

    const stored = this.withServerFields(deepClone(manifest), `uid-${this.objects.size + 1}`);
    this.objects.set(key, stored);
    return stored;
  }

  async patch(
    identity: ResourceIdentity,
    operations: readonly FieldOperation[],
    options: PatchOptions = {}
  ): Promise<LiveObject> {
    this.enter('patch', identity);

    const key = identityKey(identity);
    const current = this.objects.get(key);
    if (current === undefined) {
      throw new TransportError(`patch ${formatIdentity(identity)}: not found`, 'NotFound', { status: 404 });
    }

    const currentVersion = getString(current, ['metadata', 'resourceVersion']);
    if (options.resourceVersion !== undefined && options.resourceVersion !== currentVersion) {
      throw new TransportError(
        `patch ${formatIdentity(identity)}: the object has been modified`,
        'Conflict',
        { status: 409 }
      );
    }

    const patch = buildMergePatch(operations);
    this.patches.push(patch);
    const next = setPath(applyMergePatch(current, patch), ['metadata', 'resourceVersion'], this.nextVersion());
    this.objects.set(key, next);
    return next;
  }

  async delete(identity: ResourceIdentity): Promise<void> {
    this.enter('delete', identity);

    const key = identityKey(identity);
    if (!this.objects.delete(key)) {
      throw new TransportError(`delete ${formatIdentity(identity)}: not found`, 'NotFound', { status: 404 });
    }
  }

  async list(selector: ListSelector): Promise<LiveObject[]> {
    this.enter('list', {
      apiVersion: selector.apiVersion,
      kind: selector.kind,
      name: '*',
      ...(selector.namespace !== undefined ? { namespace: selector.namespace } : {}),
    });

    const [labelKey, labelValue] = selector.labelSelector?.split('=') ?? [];

    return [...this.objects.values()].filter((object) => {
      const identity = resolveIdentity(object);
      if (identity.apiVersion !== selector.apiVersion || identity.kind !== selector.kind) return false;
      if (selector.namespace !== undefined && identity.namespace !== selector.namespace) return false;
      if (labelKey === undefined) return true;
      return getString(getObject(object, ['metadata', 'labels']), [labelKey]) === labelValue;
    });
  }

  private enter(operation: TransportOperation, identity: ResourceIdentity): void {
    this.calls.push({ operation, target: formatIdentity(identity) });

    const failure = this.failures.find(
      (entry) => entry.operation === operation && entry.remaining > 0 && (entry.match?.(identity) ?? true)
    );
    if (failure) {
      failure.remaining--;
      throw failure.error;
    }
  }

  private withServerFields(object: JsonObject, uid: string): LiveObject {
    const withVersion = setPath(object, ['metadata', 'resourceVersion'], this.nextVersion());
    const withUid = setPath(withVersion, ['metadata', 'uid'], uid);
    return setPath(withUid, ['metadata', 'creationTimestamp'], '2026-01-01T00:00:00Z');
  }

  private nextVersion(): string {
    this.version++;
    return String(this.version);
  }
}

/**
 * Logger that drops every line
 */
export function createSilentLogger(): ApiLogger {
  return createLogger({ level: 'error' }, () => undefined);
}

/**
 * Retry settings that never sleep
 */
export const NO_DELAY_RETRY = {
  baseDelayMs: 0,
  maxDelayMs: 0,
  sleep: async () => undefined,
};
