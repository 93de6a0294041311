/**
 * check command - Validate manifests locally, without contacting the cluster
 */

import { getValidationSummary, validateManifests, type ValidationResult } from '../manifests/validator.js';
import type { CommandContext, CommandResult, ManifestInputOptions } from '../types.js';
import { header, printValidation, verbose } from '../utils/output.js';
import { loadManifests } from './input.js';

export type CheckOptions = ManifestInputOptions;

/**
 * Execute the check command
 */
export async function checkCommand(
  ctx: CommandContext,
  options: CheckOptions = {}
): Promise<CommandResult<ValidationResult>> {
  const manifests = await loadManifests(ctx, options);
  const result = validateManifests(manifests);
  verbose(`Checked ${manifests.length} manifest(s)`, ctx.options.verbose);

  if (ctx.outputFormat === 'human') {
    header('Manifest Check');
    printValidation(result);
  }

  return {
    success: result.valid,
    message: `${manifests.length} manifest(s) checked: ${getValidationSummary(result)}`,
    data: result,
    errors: result.errors.length > 0 ? result.errors.map((issue) => `${issue.path}: ${issue.message}`) : undefined,
  };
}
