/**
 * Apply Executor
 *
 * Runs a plan tier by tier. Inside a tier a bounded pool dispatches steps;
 * each step runs fetch, diff and apply strictly in sequence for its identity.
 * A failed step never aborts its siblings. Steps whose live state could not
 * be read while planning are read and diffed again first.
 */

import { logger as defaultLogger, type ApiLogger } from '../api/logger.js';
import { isRetryableError, withRetry } from '../api/retry.js';
import { NOT_FOUND, isTransportError, type Transport } from '../api/transport.js';
import type { RetrySettings } from '../api/types.js';
import { baselineOperations, diffResource, withBaseline } from './diff.js';
import { formatIdentity, identityKey } from './identity.js';
import { LiveStateFetcher } from './live.js';
import { runPool } from './pool.js';
import { WaitMonitor } from './wait.js';
import type {
  ApplyPlan,
  DiffResult,
  ExecutionEntry,
  ExecutionReport,
  ExecutionSummary,
  OutcomeKind,
  PlanStep,
  ResourceIdentity,
  StepOutcome,
} from './types.js';

// =============================================================================
// Types
// =============================================================================

export interface ExecuteOptions {
  /** Steps in flight per tier (default: 4) */
  concurrency?: number;
  /** When false, create steps fail with "creation disabled" (default: true) */
  allowCreate?: boolean;
  /** Used when a step is re-diffed after a version conflict */
  force?: boolean;
  /** Undispatched steps become cancelled once aborted */
  signal?: AbortSignal;
  /** Wait for created and patched objects to become ready */
  wait?: boolean;
  /** Wait deadline, from the start of the wait phase (default: 300000) */
  timeoutMs?: number;
  /** Wait poll interval (default: 2000) */
  pollIntervalMs?: number;
  retry?: RetrySettings;
  logger?: ApiLogger;
  /** Clock and sleep for the wait phase (tests) */
  now?: () => number;
  waitSleep?: (ms: number) => Promise<void>;
  /** Called as each entry is recorded */
  onEntry?: (entry: ExecutionEntry) => void;
}

export const DEFAULT_CONCURRENCY = 4;
export const DEFAULT_WAIT_TIMEOUT_MS = 300_000;

const SUCCEEDED: ReadonlySet<OutcomeKind> = new Set<OutcomeKind>(['created', 'patched', 'deleted', 'noop']);
const UNSUCCESSFUL: ReadonlySet<OutcomeKind> = new Set<OutcomeKind>(['failed', 'conflict', 'skipped-dependency']);

// =============================================================================
// Report Helpers
// =============================================================================

export function emptySummary(): ExecutionSummary {
  return {
    created: 0,
    patched: 0,
    deleted: 0,
    noop: 0,
    conflict: 0,
    failed: 0,
    'skipped-dependency': 0,
    cancelled: 0,
  };
}

export function summarizeEntries(entries: readonly ExecutionEntry[]): ExecutionSummary {
  const summary = emptySummary();
  for (const entry of entries) {
    summary[entry.outcome]++;
  }
  return summary;
}

/**
 * A report succeeds unless an entry failed, conflicted, was skipped, or
 * failed to become ready. Timed-out waits do not count against it.
 */
export function isReportSuccessful(entries: readonly ExecutionEntry[]): boolean {
  return entries.every(
    (entry) => !UNSUCCESSFUL.has(entry.outcome) && entry.readiness?.status !== 'failed'
  );
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// =============================================================================
// Executor
// =============================================================================

/**
 * Execute a plan against the cluster
 */
export async function executePlan(
  plan: ApplyPlan,
  transport: Transport,
  options: ExecuteOptions = {}
): Promise<ExecutionReport> {
  const startedAt = new Date().toISOString();
  const log = (options.logger ?? defaultLogger).child({ component: 'execute' });
  const fetcher = new LiveStateFetcher(transport, log);
  const concurrency = options.concurrency ?? DEFAULT_CONCURRENCY;
  const allowCreate = options.allowCreate ?? true;

  const recorded = new Map<string, ExecutionEntry>();
  const entries: ExecutionEntry[] = [];

  function record(entry: ExecutionEntry): void {
    recorded.set(identityKey(entry.identity), entry);
    entries.push(entry);
    options.onEntry?.(entry);
  }

  function entryFor(step: PlanStep, outcome: StepOutcome, attempts = 0): ExecutionEntry {
    return { ...outcome, identity: step.identity, tier: step.tier, attempts };
  }

  function failedDependency(step: PlanStep): ResourceIdentity | undefined {
    return step.dependsOn.find((dependency) => {
      const entry = recorded.get(identityKey(dependency));
      return entry !== undefined && !SUCCEEDED.has(entry.outcome);
    });
  }

  async function refresh(current: DiffResult): Promise<DiffResult> {
    if (current.type === 'delete' || current.manifest === undefined) return current;

    const live = await fetcher.fetch(current.identity);
    const next = diffResource(current.identity, current.manifest, live === NOT_FOUND ? undefined : live, {
      force: options.force,
    });
    log.debug('Re-diffed against fresh state', { object: formatIdentity(current.identity), result: next?.type });
    return next ?? current;
  }

  async function apply(diff: DiffResult): Promise<StepOutcome> {
    switch (diff.type) {
      case 'noop':
        return { outcome: 'noop' };
      case 'conflict':
        return { outcome: 'conflict', reason: diff.reason, fields: diff.fields };
      case 'unreadable':
        return { outcome: 'failed', reason: diff.reason };
      case 'create':
        if (!allowCreate) {
          return { outcome: 'failed', reason: 'creation disabled' };
        }
        log.request('POST', formatIdentity(diff.identity));
        await transport.create(withBaseline(diff.manifest));
        return { outcome: 'created' };
      case 'patch':
        log.request(
          'PATCH',
          formatIdentity(diff.identity),
          diff.identity.kind === 'Secret' ? undefined : diff.operations
        );
        await transport.patch(diff.identity, [...diff.operations, ...baselineOperations(diff.manifest)], {
          resourceVersion: diff.resourceVersion,
        });
        return { outcome: 'patched', baseChanged: diff.baseChanged };
      case 'delete':
        log.request('DELETE', formatIdentity(diff.identity));
        try {
          await transport.delete(diff.identity);
        } catch (error) {
          if (!isTransportError(error, 'NotFound')) throw error;
          log.debug('Object already gone', { object: formatIdentity(diff.identity) });
        }
        return { outcome: 'deleted' };
    }
  }

  async function runStep(step: PlanStep): Promise<ExecutionEntry> {
    const diff = step.diff;
    if (diff.type === 'noop' || diff.type === 'conflict') {
      return entryFor(step, await apply(diff));
    }

    if (diff.type !== 'delete') {
      const dependency = failedDependency(step);
      if (dependency) {
        return entryFor(step, { outcome: 'skipped-dependency', dependency: formatIdentity(dependency) });
      }
    }

    const state: { current: DiffResult; stale: boolean } = { current: diff, stale: diff.type === 'unreadable' };

    const result = await withRetry(
      async () => {
        if (state.stale) {
          state.current = await refresh(state.current);
          state.stale = false;
        }
        try {
          return await apply(state.current);
        } catch (error) {
          if (isTransportError(error, 'Conflict') || isTransportError(error, 'AlreadyExists')) {
            state.stale = true;
          }
          throw error;
        }
      },
      {
        ...options.retry,
        logger: log.child({ object: formatIdentity(step.identity) }),
        isRetryable: (error) => isTransportError(error, 'AlreadyExists') || isRetryableError(error),
      }
    );

    if (result.success) {
      return entryFor(step, result.data, result.attempts);
    }

    log.error(`Failed to apply ${formatIdentity(step.identity)}`, result.error);
    return entryFor(step, { outcome: 'failed', reason: errorMessage(result.error) }, result.attempts);
  }

  async function guardedStep(step: PlanStep): Promise<ExecutionEntry> {
    if (options.signal?.aborted) {
      return entryFor(step, { outcome: 'cancelled' });
    }
    try {
      return await runStep(step);
    } catch (error) {
      return entryFor(step, { outcome: 'failed', reason: errorMessage(error) });
    }
  }

  for (const tier of plan.tiers) {
    const tierEntries = await runPool(tier, concurrency, guardedStep);
    tierEntries.forEach(record);
    log.debug('Tier complete', { tier: tier[0]?.tier, steps: tier.length });
  }

  if (options.wait && !options.signal?.aborted) {
    await waitForEntries(entries, fetcher, options, log);
  }

  const summary = summarizeEntries(entries);
  log.info('Execution complete', { ...summary });

  return {
    entries,
    summary,
    success: isReportSuccessful(entries),
    startedAt,
    completedAt: new Date().toISOString(),
  };
}

async function waitForEntries(
  entries: ExecutionEntry[],
  fetcher: LiveStateFetcher,
  options: ExecuteOptions,
  log: ApiLogger
): Promise<void> {
  const waiting = entries.filter((entry) => entry.outcome === 'created' || entry.outcome === 'patched');
  if (waiting.length === 0) return;

  const now = options.now ?? Date.now;
  const monitor = new WaitMonitor(fetcher, {
    intervalMs: options.pollIntervalMs,
    logger: log,
    sleep: options.waitSleep,
    now,
    signal: options.signal,
  });

  const deadline = now() + (options.timeoutMs ?? DEFAULT_WAIT_TIMEOUT_MS);
  const results = await monitor.waitAll(
    waiting.map((entry) => entry.identity),
    deadline
  );

  for (const entry of waiting) {
    entry.readiness = results.get(identityKey(entry.identity));
  }
}
