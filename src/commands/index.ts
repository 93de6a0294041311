/**
 * Command exports
 */

export { showCommand, type ShowOptions, type ShowResult } from './show.js';
export { checkCommand, type CheckOptions } from './check.js';
export { diffCommand, type DiffOptions, type DiffCommandResult, type ObjectDiff } from './diff.js';
export { updateCommand, type UpdateOptions, type UpdateResult } from './update.js';
export { createCommand, type CreateOptions } from './create.js';
export { deleteCommand, type DeleteOptions, type DeleteResult } from './delete.js';
export { loadTree, loadManifests } from './input.js';
