/**
 * Stack error types using neverthrow Result values
 */

import { err, ok, type Result } from 'neverthrow';

/**
 * All possible error codes for stack operations
 */
export type StackErrorCode =
  | 'NOT_IN_REPO'
  | 'DUPLICATE_BRANCH'
  | 'UNKNOWN_PARENT'
  | 'WOULD_CREATE_CYCLE'
  | 'NOT_FOUND'
  | 'TRUNK_PROTECTED'
  | 'DIRTY_WORKING_TREE'
  | 'UNSUPPORTED_STATE_VERSION'
  | 'STATE_CORRUPT'
  | 'STATE_WRITE_FAILED'
  | 'REBASE_CONFLICT'
  | 'REBASE_IN_PROGRESS'
  | 'VCS_COMMAND_FAILED'
  | 'CONFIG_ERROR'
  | 'GITHUB_ERROR';

/**
 * Structured error for stack operations
 */
export class StackError extends Error {
  constructor(
    public readonly code: StackErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>,
    public readonly suggestion?: string
  ) {
    super(message);
    this.name = 'StackError';
  }

  /**
   * Format error for CLI display
   */
  format(): string {
    let output = this.message;
    if (this.suggestion) {
      output += `\n\nSuggestion: ${this.suggestion}`;
    }
    return output;
  }
}

/**
 * Result type alias for stack operations
 */
export type StackResult<T> = Result<T, StackError>;

/**
 * Helper to create a successful result
 */
export const stackOk = <T>(value: T): StackResult<T> => ok(value);

/**
 * Helper to create an error result
 */
export const stackErr = <T = never>(
  code: StackErrorCode,
  message: string,
  details?: Record<string, unknown>,
  suggestion?: string
): StackResult<T> => err(new StackError(code, message, details, suggestion));

/**
 * Common error constructors for consistent error messages
 */
export const StackErrors = {
  notInRepo: () =>
    stackErr(
      'NOT_IN_REPO',
      'Not in a git repository',
      undefined,
      'Run this command from within a git repository'
    ),

  duplicateBranch: (branch: string) =>
    stackErr(
      'DUPLICATE_BRANCH',
      `Branch '${branch}' already exists`,
      { branch },
      `To track the existing branch, check it out and run 'git-stack mount <parent>'`
    ),

  unknownParent: (branch: string, parent: string) =>
    stackErr(
      'UNKNOWN_PARENT',
      `Cannot stack '${branch}' on '${parent}': '${parent}' is not tracked`,
      { branch, parent },
      `Mount '${parent}' first with 'git-stack mount', or choose a different parent`
    ),

  wouldCreateCycle: (branch: string, parent: string) =>
    stackErr(
      'WOULD_CREATE_CYCLE',
      `Cannot stack '${branch}' on '${parent}': '${parent}' is stacked on '${branch}'`,
      { branch, parent },
      'Choose a parent that is not one of its descendants'
    ),

  notFound: (branch: string, reason: string) =>
    stackErr(
      'NOT_FOUND',
      `Branch '${branch}' ${reason}`,
      { branch },
      `Remove the stale entry with 'git-stack delete ${branch}' or recreate the branch`
    ),

  notTracked: (branch: string) =>
    stackErr(
      'NOT_FOUND',
      `Branch '${branch}' is not tracked by git-stack`,
      { branch },
      `Add it to a stack with 'git-stack mount <parent>'`
    ),

  trunkProtected: (trunk: string, operation: string) =>
    stackErr(
      'TRUNK_PROTECTED',
      `Cannot ${operation} the trunk branch '${trunk}'`,
      { trunk, operation },
      'Pick a stacked branch instead'
    ),

  dirtyWorkingTree: (branch: string | null) =>
    stackErr(
      'DIRTY_WORKING_TREE',
      branch
        ? `Branch '${branch}' has uncommitted changes`
        : 'The working tree has uncommitted changes',
      { branch },
      'Commit or stash your changes, then run the command again'
    ),

  unsupportedStateVersion: (path: string, version: unknown) =>
    stackErr(
      'UNSUPPORTED_STATE_VERSION',
      `State file ${path} has unsupported version ${String(version)}`,
      { path, version },
      'Upgrade git-stack to a release that understands this state file'
    ),

  stateCorrupt: (path: string, reason: string) =>
    stackErr(
      'STATE_CORRUPT',
      `State file ${path} is corrupt: ${reason}`,
      { path },
      'Fix or move the file aside; git-stack will not reset it on its own'
    ),

  stateWriteFailed: (path: string, message: string, afterSideEffect = false) =>
    stackErr(
      'STATE_WRITE_FAILED',
      `Failed to write state file ${path}: ${message}`,
      { path, afterSideEffect },
      afterSideEffect
        ? 'Git was already changed; run `git-stack status` and re-mount branches whose parents look wrong'
        : 'Check permissions on the state directory'
    ),

  rebaseConflict: (branch: string, files: string[], remaining: number) =>
    new StackError(
      'REBASE_CONFLICT',
      `Restack paused: '${branch}' has conflicts` +
        (remaining > 0 ? ` (${remaining} branch${remaining !== 1 ? 'es' : ''} left)` : ''),
      { branch, files, remaining },
      "Resolve the conflicts, 'git add' the files, then run 'git-stack restack' to continue"
    ),

  rebaseInProgress: (branch: string) =>
    stackErr(
      'REBASE_IN_PROGRESS',
      `A rebase of '${branch}' is in progress`,
      { branch },
      "Resolve it and run 'git-stack restack', or run 'git-stack restack --abort'"
    ),

  vcsFailed: (operation: string, message: string, branch?: string) =>
    stackErr(
      'VCS_COMMAND_FAILED',
      branch
        ? `Git ${operation} failed for '${branch}': ${message}`
        : `Git ${operation} failed: ${message}`,
      { operation, branch },
      'Check the git output above, fix the cause and run the command again'
    ),

  configError: <T = never>(message: string): StackResult<T> =>
    stackErr('CONFIG_ERROR', `Configuration error: ${message}`),
};
