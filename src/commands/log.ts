/**
 * Log command - show the commits a branch adds on top of its parent
 */

import { logArgs } from '../stack/status.js';
import {
  exitWithError,
  exitWithGitError,
  openRepository,
  resolveTrackedNode,
  type GlobalOptions,
} from './context.js';

export async function logCommand(branch: string | undefined, options: GlobalOptions = {}): Promise<void> {
  const context = await openRepository(options);
  const node = await resolveTrackedNode(context, branch);
  if (node.isErr()) {
    exitWithError(node.error);
  }

  const result = await context.gitOps.passthrough(logArgs(node.value), context.config.repoRoot);
  if (result.isErr()) {
    exitWithGitError(result.error);
  }
}
