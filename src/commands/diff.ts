/**
 * diff command - Show what would change on the cluster, without changing it
 */

import { identityKey, formatIdentity } from '../reconcile/identity.js';
import { actionableSteps, hasUnresolvedConflicts } from '../reconcile/plan.js';
import { planManifests } from '../reconcile/reconcile.js';
import { renderDiffResult, type WalkLine } from '../reconcile/render.js';
import type { PlanSummary } from '../reconcile/types.js';
import type { CommandContext, CommandResult, ManifestInputOptions } from '../types.js';
import { header, info, printWalk, verbose, warn } from '../utils/output.js';
import { loadManifests } from './input.js';

export interface DiffOptions extends ManifestInputOptions {
  /** Include managed live objects no longer in the set */
  prune?: boolean;
  /** Show forced overrides instead of conflicts */
  force?: boolean;
}

export interface ObjectDiff {
  object: string;
  type: 'create' | 'patch' | 'delete' | 'conflict' | 'unreadable';
  lines: WalkLine[];
  reason?: string;
}

export interface DiffCommandResult {
  summary: PlanSummary;
  objects: ObjectDiff[];
}

/**
 * Execute the diff command
 */
export async function diffCommand(
  ctx: CommandContext,
  options: DiffOptions = {}
): Promise<CommandResult<DiffCommandResult>> {
  const { config } = ctx.cluster;
  const manifests = await loadManifests(ctx, options, ctx.defaultNamespace());

  verbose(`Comparing ${manifests.length} manifest(s) with live state`, ctx.options.verbose);

  const { plan, snapshot, pruneFailures } = await planManifests(manifests, ctx.transport(), {
    prune: options.prune,
    force: options.force,
    kindDependencies: config.kindDependencies,
    concurrency: config.concurrency,
    logger: ctx.logger,
  });

  const objects: ObjectDiff[] = [];
  for (const step of actionableSteps(plan)) {
    const { diff } = step;
    if (diff.type === 'noop') continue;
    objects.push({
      object: formatIdentity(step.identity),
      type: diff.type,
      lines: renderDiffResult(diff, snapshot.get(identityKey(step.identity))),
      ...(diff.type === 'conflict' || diff.type === 'unreadable' ? { reason: diff.reason } : {}),
    });
  }

  if (ctx.outputFormat === 'human') {
    header('Cluster Diff');
    if (objects.length === 0) {
      info('No changes detected');
    }
    for (const object of objects) {
      if (object.type === 'conflict' || object.type === 'unreadable') {
        warn(`${object.object}: ${object.reason ?? object.type}`);
      } else {
        printWalk(`${object.type} ${object.object}`, object.lines);
      }
    }
    for (const failure of pruneFailures) {
      warn(`Prune search incomplete: ${failure}`);
    }
  }

  const { summary } = plan;
  const changes = summary.create + summary.patch + summary.delete;
  const errors = [
    ...objects
      .filter((object) => object.type === 'unreadable')
      .map((object) => `${object.object}: ${object.reason ?? 'unreadable'}`),
    ...pruneFailures.map((failure) => `Prune search incomplete: ${failure}`),
  ];

  return {
    success: errors.length === 0,
    message:
      changes === 0 && !hasUnresolvedConflicts(plan) && errors.length === 0
        ? 'No differences found'
        : `${changes} change(s): ${summary.create} to create, ${summary.patch} to patch, ${summary.delete} to delete; ${summary.conflict} conflict(s)${
            summary.unreadable > 0 ? `; ${summary.unreadable} unreadable` : ''
          }`,
    data: { summary, objects },
    ...(errors.length > 0 ? { errors } : {}),
  };
}
