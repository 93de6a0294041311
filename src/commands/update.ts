/**
 * update command - Converge the cluster toward the manifest set
 */

import { formatIdentity } from '../reconcile/identity.js';
import { hasUnresolvedConflicts } from '../reconcile/plan.js';
import { reconcile } from '../reconcile/reconcile.js';
import { describeEntry, summarizeReport } from '../reconcile/render.js';
import type { ApplyPlan, ExecutionReport, UnreadableDiff } from '../reconcile/types.js';
import type { CommandContext, CommandResult, ManifestInputOptions } from '../types.js';
import { dryRunNotice, header, printPlan, printReport, verbose, warn } from '../utils/output.js';
import { loadTree } from './input.js';

export interface UpdateOptions extends ManifestInputOptions {
  /** Create objects that do not exist yet */
  create?: boolean;
  /** Delete managed objects no longer in the set */
  prune?: boolean;
  /** Override fields changed outside kubeconverge */
  force?: boolean;
  /** Wait for created and patched objects to become ready */
  wait?: boolean;
  /** Wait deadline in seconds (default from configuration) */
  timeout?: number;
  concurrency?: number;
  /** Plan only */
  dryRun?: boolean;
}

export interface UpdateResult {
  plan: ApplyPlan;
  report?: ExecutionReport;
}

/**
 * Execute the update command
 */
export async function updateCommand(
  ctx: CommandContext,
  options: UpdateOptions = {}
): Promise<CommandResult<UpdateResult>> {
  const { config } = ctx.cluster;
  const tree = await loadTree(ctx, options);
  const dryRun = options.dryRun ?? false;

  verbose(
    `create=${options.create ?? false} prune=${options.prune ?? false} force=${options.force ?? false} wait=${options.wait ?? false}`,
    ctx.options.verbose
  );

  if (ctx.outputFormat === 'human') {
    header(dryRun ? 'Update Plan' : 'Update');
  }

  const result = await reconcile(tree, ctx.transport(), {
    defaultNamespace: ctx.defaultNamespace(),
    kindDependencies: config.kindDependencies,
    prune: options.prune,
    force: options.force,
    allowCreate: options.create ?? false,
    wait: options.wait,
    timeoutMs: options.timeout !== undefined ? options.timeout * 1000 : config.timeoutMs,
    pollIntervalMs: config.pollIntervalMs,
    concurrency: options.concurrency ?? config.concurrency,
    dryRun,
    signal: ctx.signal,
    logger: ctx.logger,
  });

  const pruneErrors = result.pruneFailures.map((failure) => `Prune search incomplete: ${failure}`);

  if (ctx.outputFormat === 'human') {
    printPlan(result.plan);
    pruneErrors.forEach((message) => warn(message));
    if (dryRun) {
      dryRunNotice();
    } else if (result.report) {
      printReport(result.report);
    }
  }

  if (!result.report) {
    const { summary } = result.plan;
    const conflicts = result.plan.conflicts.length;
    const unreadable = result.plan.steps
      .map((step) => step.diff)
      .filter((diff): diff is UnreadableDiff => diff.type === 'unreadable')
      .map((diff) => `${formatIdentity(diff.identity)}: unreadable: ${diff.reason}`);
    const errors = [...unreadable, ...pruneErrors];
    return {
      success: !hasUnresolvedConflicts(result.plan) && errors.length === 0,
      message: `Dry run: ${result.plan.steps.length - summary.noop - summary.unreadable} change(s) planned${
        conflicts > 0 ? `, ${conflicts} conflict(s)` : ''
      }${summary.unreadable > 0 ? `, ${summary.unreadable} unreadable` : ''}`,
      data: { plan: result.plan },
      ...(errors.length > 0 ? { errors } : {}),
    };
  }

  const { report } = result;
  const problems = report.entries.filter(
    (entry) =>
      entry.outcome === 'failed' ||
      entry.outcome === 'conflict' ||
      entry.outcome === 'skipped-dependency' ||
      entry.readiness?.status === 'failed'
  );
  const errors = [...problems.map(describeEntry), ...pruneErrors];

  return {
    success: report.success && pruneErrors.length === 0,
    message: summarizeReport(report),
    data: { plan: result.plan, report },
    errors: errors.length > 0 ? errors : undefined,
  };
}
