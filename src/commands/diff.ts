/**
 * diff command - Show what sync would change, without changing anything
 */

import type { CommandContext, CommandResult } from '../types.js';
import type { SyncSummary } from '../reconcilers/apps/types.js';
import { syncCommand } from './sync.js';

export interface DiffOptions {
  /** Print the drifted values for every app that would be updated */
  details?: boolean;
}

/**
 * Execute the diff command
 * Same as `sync --dry-run`
 */
export async function diffCommand(
  ctx: CommandContext,
  options: DiffOptions = {}
): Promise<CommandResult<SyncSummary>> {
  return syncCommand({
    ...ctx,
    options: {
      ...ctx.options,
      dryRun: true,
      verbose: ctx.options.verbose || (options.details ?? false),
    },
  });
}
