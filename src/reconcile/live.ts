/**
 * Live State Fetcher
 *
 * Reads objects fresh from the cluster. Nothing is cached between calls.
 * Bulk reads retry transient failures per object and report what stayed
 * unreadable instead of failing as a whole.
 */

import { NOT_FOUND, type NotFound, type Transport } from '../api/transport.js';
import { logger as defaultLogger, type ApiLogger } from '../api/logger.js';
import { isRetryableError, withRetry } from '../api/retry.js';
import type { RetrySettings } from '../api/types.js';
import { MANAGED_BY_LABEL, MANAGED_BY_VALUE } from './diff.js';
import { formatIdentity, identityKey, isClusterScopedKind } from './identity.js';
import { getString, setPath } from './json.js';
import { runPool } from './pool.js';
import type { LiveObject, ResourceIdentity } from './types.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Where to look for objects eligible for pruning
 */
export interface PruneSelector {
  kinds: ReadonlyArray<{ apiVersion: string; kind: string }>;
  /** Namespaces to search for namespaced kinds */
  namespaces: readonly string[];
  /** Defaults to the managed-by label */
  labelSelector?: string;
}

export interface LiveSnapshot {
  /** Live objects keyed by identity key; absent objects have no entry */
  objects: Map<string, LiveObject>;
  /** Failure message per identity key that could not be read */
  unreadable: Map<string, string>;
}

export interface PruneCandidates {
  objects: LiveObject[];
  /** One message per kind and namespace that could not be listed */
  failures: string[];
}

// =============================================================================
// Fetcher
// =============================================================================

export class LiveStateFetcher {
  private readonly log: ApiLogger;

  constructor(
    private readonly transport: Transport,
    log: ApiLogger = defaultLogger,
    private readonly retry: RetrySettings = {}
  ) {
    this.log = log.child({ component: 'live' });
  }

  /**
   * Fetch one object. A single attempt; transport errors propagate.
   */
  async fetch(identity: ResourceIdentity): Promise<LiveObject | NotFound> {
    const live = await this.transport.get(identity);
    this.log.debug(live === NOT_FOUND ? 'Object not found' : 'Fetched object', {
      object: formatIdentity(identity),
    });
    return live;
  }

  /**
   * Fetch many objects with bounded concurrency
   */
  async fetchAll(identities: readonly ResourceIdentity[], concurrency = 4): Promise<LiveSnapshot> {
    const snapshot: LiveSnapshot = { objects: new Map(), unreadable: new Map() };

    await runPool(identities, concurrency, async (identity) => {
      const target = formatIdentity(identity);
      const result = await withRetry(() => this.fetch(identity), {
        ...this.retry,
        logger: this.log.child({ object: target }),
        isRetryable: isRetryableError,
      });

      if (!result.success) {
        this.log.warn('Could not read live state', { object: target, error: result.error.message });
        snapshot.unreadable.set(identityKey(identity), result.error.message);
      } else if (result.data !== NOT_FOUND) {
        snapshot.objects.set(identityKey(identity), result.data);
      }
    });

    return snapshot;
  }

  /**
   * List live objects carrying the managed-by label.
   * A kind and namespace that cannot be listed is skipped and reported.
   */
  async listPrunable(selector: PruneSelector): Promise<PruneCandidates> {
    const labelSelector = selector.labelSelector ?? `${MANAGED_BY_LABEL}=${MANAGED_BY_VALUE}`;
    const candidates: PruneCandidates = { objects: [], failures: [] };

    for (const { apiVersion, kind } of selector.kinds) {
      const namespaces: Array<string | undefined> = isClusterScopedKind(kind) ? [undefined] : [...selector.namespaces];

      for (const namespace of namespaces) {
        const scope = namespace ? `${kind} in ${namespace}` : kind;
        const result = await withRetry(() => this.transport.list({ apiVersion, kind, namespace, labelSelector }), {
          ...this.retry,
          logger: this.log.child({ scope }),
          isRetryable: isRetryableError,
        });

        if (!result.success) {
          this.log.warn('Could not list prune candidates', { scope, error: result.error.message });
          candidates.failures.push(`${scope}: ${result.error.message}`);
          continue;
        }

        for (const item of result.data) {
          // list items usually omit their own apiVersion and kind
          const withVersion = getString(item, ['apiVersion']) ? item : setPath(item, ['apiVersion'], apiVersion);
          candidates.objects.push(getString(withVersion, ['kind']) ? withVersion : setPath(withVersion, ['kind'], kind));
        }
      }
    }

    this.log.debug('Listed prune candidates', { count: candidates.objects.length });
    return candidates;
  }
}
