/**
 * Wait Monitor
 *
 * Polls live objects until they report ready, fail, or the deadline passes.
 * Waits are independent: one failing never stops another. Once the signal
 * is aborted no further polls are made.
 */

import { logger as defaultLogger, type ApiLogger } from '../api/logger.js';
import { sleep as defaultSleep } from '../api/retry.js';
import { NOT_FOUND, isTransportError } from '../api/transport.js';
import { formatIdentity, identityKey } from './identity.js';
import type { LiveStateFetcher } from './live.js';
import { evaluateReadiness } from './readiness.js';
import type { ReadinessResult, ResourceIdentity } from './types.js';

// =============================================================================
// Types
// =============================================================================

export interface WaitOptions {
  /** Poll interval in milliseconds (default: 2000) */
  intervalMs?: number;
  logger?: ApiLogger;
  /** Replaces the poll sleep (tests) */
  sleep?: (ms: number) => Promise<void>;
  /** Clock in epoch milliseconds (tests) */
  now?: () => number;
  signal?: AbortSignal;
}

export const DEFAULT_POLL_INTERVAL_MS = 2000;

// =============================================================================
// Monitor
// =============================================================================

export class WaitMonitor {
  private readonly intervalMs: number;
  private readonly log: ApiLogger;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => number;
  private readonly signal?: AbortSignal;

  constructor(
    private readonly fetcher: LiveStateFetcher,
    options: WaitOptions = {}
  ) {
    this.intervalMs = options.intervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.log = (options.logger ?? defaultLogger).child({ component: 'wait' });
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? Date.now;
    this.signal = options.signal;
  }

  private cancelled(target: string, lastReason: string): ReadinessResult {
    this.log.debug('Stopped waiting for object', { object: target, lastReason });
    return { status: 'cancelled', lastReason };
  }

  /**
   * Wait for one object to become ready
   *
   * @param deadline - absolute time in epoch milliseconds
   */
  async waitReady(identity: ResourceIdentity, deadline: number): Promise<ReadinessResult> {
    const target = formatIdentity(identity);
    let lastReason = 'not yet observed';

    for (;;) {
      if (this.signal?.aborted) {
        return this.cancelled(target, lastReason);
      }

      try {
        const live = await this.fetcher.fetch(identity);
        if (live === NOT_FOUND) {
          lastReason = 'object not found';
        } else {
          const readiness = evaluateReadiness(identity.kind, live);
          if (readiness.state === 'ready') {
            this.log.debug('Object is ready', { object: target });
            return { status: 'ready' };
          }
          if (readiness.state === 'failed') {
            this.log.warn('Object failed to become ready', { object: target, reason: readiness.reason });
            return { status: 'failed', reason: readiness.reason };
          }
          lastReason = readiness.reason;
        }
      } catch (error) {
        if (!isTransportError(error) || !error.transient) {
          const reason = error instanceof Error ? error.message : String(error);
          return { status: 'failed', reason };
        }
        lastReason = error.message;
      }

      const remaining = deadline - this.now();
      if (remaining <= 0) {
        this.log.warn('Timed out waiting for object', { object: target, lastReason });
        return { status: 'timed-out', lastReason };
      }

      if (this.signal?.aborted) {
        return this.cancelled(target, lastReason);
      }

      this.log.debug('Waiting for object', { object: target, reason: lastReason });
      await this.sleep(Math.min(this.intervalMs, remaining));
    }
  }

  /**
   * Wait for many objects concurrently. Results are keyed by identity key.
   */
  async waitAll(identities: readonly ResourceIdentity[], deadline: number): Promise<Map<string, ReadinessResult>> {
    const results = await Promise.all(
      identities.map(async (identity) => [identityKey(identity), await this.waitReady(identity, deadline)] as const)
    );
    return new Map(results);
  }
}
