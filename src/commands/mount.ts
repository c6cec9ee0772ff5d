/**
 * Mount command - stack a branch on a new parent (metadata only)
 */

import * as clack from '@clack/prompts';
import pc from 'picocolors';
import { StackManager } from '../stack/manager.js';
import { exitWithError, openRepository, type GlobalOptions } from './context.js';

export interface MountOptions extends GlobalOptions {
  /** Branch to mount. Default: current branch */
  branch?: string;
}

export async function mountCommand(parent: string | undefined, options: MountOptions = {}): Promise<void> {
  const { config, gitOps, logger } = await openRepository(options);
  const manager = new StackManager(config, { gitOps, logger });

  const result = await manager.mount(options.branch, parent);
  if (result.isErr()) {
    exitWithError(result.error);
  }

  const { branch, previousParent } = result.value;
  const from = previousParent ? pc.dim(` (was ${previousParent})`) : '';
  clack.log.success(`${pc.cyan(branch)} is now stacked on ${pc.cyan(result.value.parent)}${from}`);
  clack.log.info(pc.dim(`Run 'git-stack restack' to move its commits onto the new parent`));
}
