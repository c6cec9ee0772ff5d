/**
 * Core type definitions for git operations
 */

export interface Repository {
  root: string;
  name: string;
}

export interface GitStatus {
  dirty: boolean;
  staged: number;
  unstaged: number;
  untracked: number;
  conflicted: string[];
}

/**
 * Outcome of a rebase attempt. A conflict is not a failure: git keeps its own
 * rebase-in-progress state and the caller decides whether to pause.
 */
export type RebaseOutcome =
  | { kind: 'success' }
  | { kind: 'conflict'; branch: string; files: string[] };

export class GitError extends Error {
  constructor(
    message: string,
    public readonly command: string,
    public readonly exitCode: number
  ) {
    super(message);
    this.name = 'GitError';
  }
}
