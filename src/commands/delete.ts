/**
 * delete command - Delete every object of the manifest set
 */

import { deleteManifests } from '../reconcile/reconcile.js';
import { describeEntry, summarizeReport } from '../reconcile/render.js';
import type { ApplyPlan, ExecutionReport } from '../reconcile/types.js';
import type { CommandContext, CommandResult, ManifestInputOptions } from '../types.js';
import { dryRunNotice, header, printPlan, printReport } from '../utils/output.js';
import { loadTree } from './input.js';

export interface DeleteOptions extends ManifestInputOptions {
  concurrency?: number;
  /** Plan only */
  dryRun?: boolean;
}

export interface DeleteResult {
  plan: ApplyPlan;
  report?: ExecutionReport;
}

/**
 * Execute the delete command. Objects already absent are left out of the plan.
 */
export async function deleteCommand(
  ctx: CommandContext,
  options: DeleteOptions = {}
): Promise<CommandResult<DeleteResult>> {
  const { config } = ctx.cluster;
  const tree = await loadTree(ctx, options);
  const dryRun = options.dryRun ?? false;

  if (ctx.outputFormat === 'human') {
    header(dryRun ? 'Delete Plan' : 'Delete');
  }

  const result = await deleteManifests(tree, ctx.transport(), {
    defaultNamespace: ctx.defaultNamespace(),
    concurrency: options.concurrency ?? config.concurrency,
    dryRun,
    signal: ctx.signal,
    logger: ctx.logger,
  });

  if (ctx.outputFormat === 'human') {
    printPlan(result.plan);
    if (dryRun) {
      dryRunNotice();
    } else if (result.report) {
      printReport(result.report);
    }
  }

  if (!result.report) {
    return {
      success: true,
      message: `Dry run: ${result.plan.summary.delete} object(s) would be deleted`,
      data: { plan: result.plan },
    };
  }

  const failed = result.report.entries.filter((entry) => entry.outcome === 'failed');
  return {
    success: result.report.success,
    message: summarizeReport(result.report),
    data: { plan: result.plan, report: result.report },
    errors: failed.length > 0 ? failed.map(describeEntry) : undefined,
  };
}
