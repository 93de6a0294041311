/**
 * create command - Converge with creation of missing objects enabled
 */

import type { CommandContext, CommandResult } from '../types.js';
import { updateCommand, type UpdateOptions, type UpdateResult } from './update.js';

export type CreateOptions = Omit<UpdateOptions, 'create'>;

/**
 * Execute the create command
 */
export async function createCommand(
  ctx: CommandContext,
  options: CreateOptions = {}
): Promise<CommandResult<UpdateResult>> {
  return updateCommand(ctx, { ...options, create: true });
}
