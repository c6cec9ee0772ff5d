/**
 * Delete command - stop tracking a branch, re-parenting its children
 */

import * as clack from '@clack/prompts';
import pc from 'picocolors';
import { StackManager } from '../stack/manager.js';
import { exitWithError, openRepository, type GlobalOptions } from './context.js';

export interface DeleteCommandOptions extends GlobalOptions {
  /** Keep the git branch, only forget the metadata */
  keepBranch?: boolean;
  /** Delete the git branch even if it is not merged */
  force?: boolean;
}

export async function deleteCommand(branch: string, options: DeleteCommandOptions = {}): Promise<void> {
  const { config, gitOps, logger } = await openRepository(options);
  const manager = new StackManager(config, { gitOps, logger });

  const result = await manager.delete(branch, {
    deleteBranch: !options.keepBranch,
    force: options.force,
  });
  if (result.isErr()) {
    exitWithError(result.error);
  }

  const { parent, rewired, deletedBranch } = result.value;
  clack.log.success(
    deletedBranch ? `Deleted ${pc.cyan(branch)}` : `Stopped tracking ${pc.cyan(branch)}`
  );

  if (rewired.length > 0) {
    clack.log.info(
      `Moved ${rewired.map((name) => pc.cyan(name)).join(', ')} onto ${pc.cyan(parent)}. ` +
        pc.dim(`Run 'git-stack restack --branch ${parent}' to rebase them.`)
    );
  }
}
