/**
 * Reconciliation pipeline
 *
 * Normalize → fetch live state → diff → plan → execute.
 */

import { logger as defaultLogger, type ApiLogger } from '../api/logger.js';
import type { Transport } from '../api/transport.js';
import type { RetrySettings } from '../api/types.js';
import { diffResource } from './diff.js';
import { executePlan, type ExecuteOptions } from './execute.js';
import { identityKey, resolveIdentity } from './identity.js';
import { LiveStateFetcher, type PruneSelector } from './live.js';
import { DEFAULT_NAMESPACE, normalizeManifests } from './normalize.js';
import { planApply } from './plan.js';
import type { KindDependencies } from './priority.js';
import type { ApplyPlan, DiffResult, ExecutionReport, LiveObject, Manifest, ResourceIdentity } from './types.js';

// =============================================================================
// Types
// =============================================================================

export interface PlanRequest {
  /** Delete managed live objects of the desired kinds that are no longer desired */
  prune?: boolean;
  force?: boolean;
  kindDependencies?: KindDependencies;
  /** Concurrency of the live state fetch */
  concurrency?: number;
  /** Retries for live state reads */
  retry?: RetrySettings;
  logger?: ApiLogger;
}

export interface ReconcileOptions extends PlanRequest, Omit<ExecuteOptions, 'force' | 'concurrency' | 'logger'> {
  /** Namespace for namespaced manifests without one (default: `default`) */
  defaultNamespace?: string;
  /** Compute the plan without executing it */
  dryRun?: boolean;
}

export interface PlannedReconciliation {
  manifests: Manifest[];
  plan: ApplyPlan;
  /** Live objects the plan was computed against, keyed by identity key */
  snapshot: Map<string, LiveObject>;
  /** Kinds and namespaces the prune search could not list */
  pruneFailures: string[];
}

export interface ReconcileResult extends PlannedReconciliation {
  /** Absent for dry runs */
  report?: ExecutionReport;
}

// =============================================================================
// Planning
// =============================================================================

/**
 * Kinds and namespaces of a desired set, used to scope the prune search
 */
function pruneScope(identities: readonly ResourceIdentity[]): PruneSelector {
  const kinds = new Map<string, { apiVersion: string; kind: string }>();
  const namespaces = new Set<string>();

  for (const identity of identities) {
    kinds.set(`${identity.apiVersion}/${identity.kind}`, { apiVersion: identity.apiVersion, kind: identity.kind });
    if (identity.namespace) {
      namespaces.add(identity.namespace);
    }
    if (identity.kind === 'Namespace') {
      namespaces.add(identity.name);
    }
  }

  return { kinds: [...kinds.values()], namespaces: [...namespaces].sort() };
}

/**
 * Diff a normalized desired set against fresh live state and order the result
 */
export async function planManifests(
  manifests: readonly Manifest[],
  transport: Transport,
  request: PlanRequest = {}
): Promise<PlannedReconciliation> {
  const log = (request.logger ?? defaultLogger).child({ component: 'reconcile' });
  const fetcher = new LiveStateFetcher(transport, log, request.retry);
  const identities = manifests.map((manifest) => resolveIdentity(manifest));

  const { objects: snapshot, unreadable } = await fetcher.fetchAll(identities, request.concurrency);

  const diffs: DiffResult[] = [];
  manifests.forEach((manifest, index) => {
    const identity = identities[index];
    const key = identityKey(identity);
    const failure = unreadable.get(key);
    if (failure !== undefined) {
      diffs.push({ type: 'unreadable', identity, manifest, reason: failure });
      return;
    }
    const diff = diffResource(identity, manifest, snapshot.get(key), { force: request.force });
    if (diff) diffs.push(diff);
  });

  const pruneFailures: string[] = [];
  if (request.prune) {
    const desired = new Set(identities.map(identityKey));
    const candidates = await fetcher.listPrunable(pruneScope(identities));
    pruneFailures.push(...candidates.failures);

    for (const live of candidates.objects) {
      const identity = resolveIdentity(live);
      const key = identityKey(identity);
      if (desired.has(key) || snapshot.has(key)) continue;

      snapshot.set(key, live);
      const diff = diffResource(identity, undefined, live, { prune: true });
      if (diff) diffs.push(diff);
    }
    log.debug('Prune search complete', { candidates: candidates.objects.length });
  }

  const plan = planApply(diffs, { kindDependencies: request.kindDependencies });
  log.info('Plan computed', { ...plan.summary });

  return { manifests: [...manifests], plan, snapshot, pruneFailures };
}

/**
 * Plan the deletion of every desired identity that exists live.
 * Identities that could not be read are deleted too; a delete of an
 * absent object succeeds. Deletes run in reverse priority order.
 */
export async function planDeletion(
  manifests: readonly Manifest[],
  transport: Transport,
  request: Pick<PlanRequest, 'concurrency' | 'retry' | 'logger'> = {}
): Promise<PlannedReconciliation> {
  const log = (request.logger ?? defaultLogger).child({ component: 'reconcile' });
  const fetcher = new LiveStateFetcher(transport, log, request.retry);
  const identities = manifests.map((manifest) => resolveIdentity(manifest));

  const { objects: snapshot, unreadable } = await fetcher.fetchAll(identities, request.concurrency);

  const diffs = identities
    .map((identity): DiffResult | undefined =>
      unreadable.has(identityKey(identity))
        ? { type: 'delete', identity }
        : diffResource(identity, undefined, snapshot.get(identityKey(identity)), { prune: true })
    )
    .filter((diff): diff is DiffResult => diff !== undefined);

  return { manifests: [...manifests], plan: planApply(diffs), snapshot, pruneFailures: [] };
}

// =============================================================================
// Reconciliation
// =============================================================================

function executeOptions(options: ReconcileOptions): ExecuteOptions {
  const { prune: _prune, kindDependencies: _deps, defaultNamespace: _ns, dryRun: _dryRun, ...rest } = options;
  return rest;
}

/**
 * Converge the cluster toward a desired document tree
 *
 * @throws InputError when the tree is malformed or ordering is unresolvable
 */
export async function reconcile(
  tree: unknown,
  transport: Transport,
  options: ReconcileOptions = {}
): Promise<ReconcileResult> {
  const manifests = normalizeManifests(tree, { defaultNamespace: options.defaultNamespace ?? DEFAULT_NAMESPACE });
  const planned = await planManifests(manifests, transport, options);

  if (options.dryRun) {
    return planned;
  }

  const report = await executePlan(planned.plan, transport, executeOptions(options));
  return { ...planned, report };
}

/**
 * Delete every object of a desired document tree
 *
 * @throws InputError when the tree is malformed
 */
export async function deleteManifests(
  tree: unknown,
  transport: Transport,
  options: Omit<ReconcileOptions, 'prune' | 'force' | 'allowCreate' | 'wait' | 'kindDependencies'> = {}
): Promise<ReconcileResult> {
  const manifests = normalizeManifests(tree, { defaultNamespace: options.defaultNamespace ?? DEFAULT_NAMESPACE });
  const planned = await planDeletion(manifests, transport, options);

  if (options.dryRun) {
    return planned;
  }

  const report = await executePlan(planned.plan, transport, executeOptions(options));
  return { ...planned, report };
}
