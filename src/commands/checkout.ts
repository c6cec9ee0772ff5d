/**
 * Checkout command - switch to a tracked branch or start a new one on top
 * of the current branch
 */

import * as clack from '@clack/prompts';
import pc from 'picocolors';
import { StackManager } from '../stack/manager.js';
import { exitWithError, openRepository, type GlobalOptions } from './context.js';

export async function checkoutCommand(branch: string, options: GlobalOptions = {}): Promise<void> {
  const { config, gitOps, logger } = await openRepository(options);
  const manager = new StackManager(config, { gitOps, logger });

  const result = await manager.checkout(branch);
  if (result.isErr()) {
    exitWithError(result.error);
  }

  const { created, parent } = result.value;
  if (created) {
    clack.log.success(`Created ${pc.cyan(branch)} on top of ${pc.cyan(parent ?? config.trunk)}`);
  } else {
    clack.log.success(`Switched to ${pc.cyan(branch)}`);
  }
}
