/**
 * Manifest input shared by the commands
 */

import { InputError } from '../reconcile/errors.js';
import { normalizeManifests } from '../reconcile/normalize.js';
import type { Manifest } from '../reconcile/types.js';
import type { CommandContext, ManifestInputOptions } from '../types.js';
import { verbose } from '../utils/output.js';

/**
 * Load the desired document tree named by --file or --exec
 *
 * @throws InputError when neither or both are given, or the source fails
 */
export async function loadTree(ctx: CommandContext, input: ManifestInputOptions): Promise<unknown> {
  const hasFiles = (input.file?.length ?? 0) > 0;
  const hasExec = input.exec !== undefined;

  if (hasFiles === hasExec) {
    throw new InputError(
      hasFiles ? 'Use either --file or --exec, not both' : 'No manifests given',
      'SOURCE_NOT_FOUND',
      'Pass --file <path> (repeatable) or --exec <document>'
    );
  }

  const source = ctx.source(input);
  verbose(`Loading manifests from ${source.description}`, ctx.options.verbose);
  return source.load();
}

/**
 * Load and normalize the desired manifest set
 *
 * @param defaultNamespace - defaults to the configured namespace only, so
 *   commands that never reach the cluster stay offline
 */
export async function loadManifests(
  ctx: CommandContext,
  input: ManifestInputOptions,
  defaultNamespace = ctx.cluster.config.namespace
): Promise<Manifest[]> {
  const tree = await loadTree(ctx, input);
  const manifests = normalizeManifests(tree, { defaultNamespace });
  verbose(`Normalized ${manifests.length} manifest(s)`, ctx.options.verbose);
  return manifests;
}
