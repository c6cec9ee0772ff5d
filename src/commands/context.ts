/**
 * Shared setup for commands: locate the repository, resolve configuration
 * and build the logger.
 */

import * as clack from '@clack/prompts';
import { err } from 'neverthrow';
import { ConfigManager } from '../config/manager.js';
import type { StackConfig } from '../config/schema.js';
import { GitOperations } from '../git/operations.js';
import type { GitError } from '../git/types.js';
import { type IGitOperations, defaultGitOps } from '../git/interface.js';
import { createCliLogger, type Logger } from '../logger.js';
import {
  StackErrors,
  stackErr,
  stackOk,
  type StackError,
  type StackResult,
} from '../stack/errors.js';
import { StateStore } from '../stack/store.js';
import type { BranchNode } from '../stack/types.js';

export interface GlobalOptions {
  verbose?: boolean;
}

export interface CommandContext {
  config: StackConfig;
  gitOps: IGitOperations;
  logger: Logger;
}

/**
 * Print a stack error with its suggestion and exit
 */
export function exitWithError(error: StackError): never {
  clack.cancel(error.format());
  process.exit(1);
}

/**
 * Unwrap a result, exiting on failure
 */
export function unwrapOrExit<T>(result: StackResult<T>): T {
  if (result.isErr()) {
    exitWithError(result.error);
  }
  return result.value;
}

export async function openRepository(options: GlobalOptions = {}): Promise<CommandContext> {
  const logger = createCliLogger(options.verbose ?? false);

  const isRepo = await GitOperations.isGitRepository();
  if (!isRepo) {
    clack.cancel('Not a git repository');
    process.exit(1);
  }

  const rootResult = await defaultGitOps.getRepoRoot();
  if (rootResult.isErr()) {
    clack.cancel(rootResult.error.message);
    process.exit(1);
  }

  const configResult = await new ConfigManager(rootResult.value, { logger }).load();
  if (configResult.isErr()) {
    clack.cancel(`Configuration error: ${configResult.error.message}`);
    process.exit(1);
  }

  logger.debug('Resolved configuration', { ...configResult.value });

  return {
    config: configResult.value,
    gitOps: defaultGitOps,
    logger,
  };
}

/**
 * Look up a tracked branch, defaulting to the current one
 */
export async function resolveTrackedNode(
  context: CommandContext,
  branch?: string
): Promise<StackResult<BranchNode>> {
  const { config, gitOps, logger } = context;

  const graphResult = await new StateStore(config, logger).load();
  if (graphResult.isErr()) return err(graphResult.error);

  const name = branch || (await gitOps.getCurrentBranch(config.repoRoot));
  if (!name) {
    return stackErr('NOT_FOUND', 'HEAD is detached', undefined, 'Check out a branch or name one');
  }

  const node = graphResult.value.get(name);
  if (!node) {
    return StackErrors.notTracked(name);
  }
  return stackOk(node);
}

/**
 * Exit with git's own status after a passthrough command fails
 */
export function exitWithGitError(error: GitError): never {
  clack.cancel(error.message);
  process.exit(error.exitCode || 1);
}
