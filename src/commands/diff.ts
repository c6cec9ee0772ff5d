/**
 * Diff command - show a branch's own changes against its parent
 */

import { diffArgs } from '../stack/status.js';
import {
  exitWithError,
  exitWithGitError,
  openRepository,
  resolveTrackedNode,
  type GlobalOptions,
} from './context.js';

export async function diffCommand(branch: string | undefined, options: GlobalOptions = {}): Promise<void> {
  const context = await openRepository(options);
  const node = await resolveTrackedNode(context, branch);
  if (node.isErr()) {
    exitWithError(node.error);
  }

  const result = await context.gitOps.passthrough(diffArgs(node.value), context.config.repoRoot);
  if (result.isErr()) {
    exitWithGitError(result.error);
  }
}
