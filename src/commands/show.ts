/**
 * show command - Print the normalized manifest set
 */

import { emitManifests, parseOutputFormat } from '../manifests/emit.js';
import type { Manifest } from '../reconcile/types.js';
import type { CommandContext, CommandResult, ManifestInputOptions } from '../types.js';
import { loadManifests } from './input.js';

export interface ShowOptions extends ManifestInputOptions {
  /** json (default) or yaml */
  format?: string;
  /** Where the rendered manifests go (default: stdout) */
  write?: (text: string) => void;
}

export interface ShowResult {
  manifests: Manifest[];
  rendered: string;
}

/**
 * Execute the show command
 */
export async function showCommand(
  ctx: CommandContext,
  options: ShowOptions = {}
): Promise<CommandResult<ShowResult>> {
  const format = parseOutputFormat(options.format);
  const manifests = await loadManifests(ctx, options);
  const rendered = emitManifests(manifests, format);

  const write = options.write ?? ((text: string) => process.stdout.write(text));
  write(rendered);

  return {
    success: true,
    message: `Rendered ${manifests.length} manifest(s) as ${format}`,
    data: { manifests, rendered },
  };
}
