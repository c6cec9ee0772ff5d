/**
 * Git operations interface for dependency injection
 *
 * The stack engine only talks to git through this interface, so tests can
 * swap in an in-process fake.
 */

import { GitOperations, type GitResult } from './operations.js';
import type { RebaseOutcome } from './types.js';

export type { GitResult } from './operations.js';

export interface IGitOperations {
  getRepoRoot(cwd?: string): Promise<GitResult<string>>;
  getCurrentBranch(cwd?: string): Promise<string | null>;
  branchExists(branch: string, cwd?: string): Promise<boolean>;
  remoteBranchExists(branch: string, remote: string, cwd?: string): Promise<boolean>;
  getCommit(ref: string, cwd?: string): Promise<GitResult<string>>;
  getConfig(key: string, cwd?: string): Promise<string | null>;
  isClean(cwd?: string): Promise<GitResult<boolean>>;
  createBranch(branch: string, from: string, cwd?: string): Promise<GitResult<void>>;
  checkout(branch: string, cwd?: string): Promise<GitResult<void>>;
  deleteBranch(branch: string, force: boolean, cwd?: string): Promise<GitResult<void>>;
  rebase(branch: string, onto: string, upstream?: string, cwd?: string): Promise<GitResult<RebaseOutcome>>;
  rebaseInProgress(cwd?: string): Promise<GitResult<string | null>>;
  continueRebase(cwd?: string): Promise<GitResult<RebaseOutcome>>;
  abortRebase(cwd?: string): Promise<GitResult<void>>;
  fastForward(branch: string, to: string, cwd?: string): Promise<GitResult<void>>;
  fetch(remote: string, cwd?: string): Promise<GitResult<void>>;
  pushForce(branch: string, remote: string, cwd?: string): Promise<GitResult<void>>;
  isAncestor(ancestor: string, descendant: string, cwd?: string): Promise<GitResult<boolean>>;
  isMergedInto(branch: string, trunkRef: string, cwd?: string): Promise<GitResult<boolean>>;
  countCommits(from: string, to: string, cwd?: string): Promise<GitResult<number>>;
  upstreamGone(branch: string, cwd?: string): Promise<GitResult<boolean>>;
  getRemoteDefaultBranch(remote: string, cwd?: string): Promise<string | null>;
  getCommitSubject(ref: string, cwd?: string): Promise<GitResult<string>>;
  getRemoteUrl(remote: string, cwd?: string): Promise<GitResult<string>>;
  passthrough(args: string[], cwd?: string): Promise<GitResult<void>>;
}

/**
 * Default implementation using the real GitOperations
 */
export const defaultGitOps: IGitOperations = {
  getRepoRoot: async (cwd) => (await GitOperations.getRepository(cwd)).map((repo) => repo.root),
  getCurrentBranch: (cwd) => GitOperations.getCurrentBranch(cwd),
  branchExists: (branch, cwd) => GitOperations.branchExists(branch, cwd),
  remoteBranchExists: (branch, remote, cwd) => GitOperations.remoteBranchExists(branch, remote, cwd),
  getCommit: (ref, cwd) => GitOperations.getCommit(ref, cwd),
  getConfig: (key, cwd) => GitOperations.getConfig(key, cwd),
  isClean: (cwd) => GitOperations.isClean(cwd),
  createBranch: (branch, from, cwd) => GitOperations.createBranch(branch, from, cwd),
  checkout: (branch, cwd) => GitOperations.checkout(branch, cwd),
  deleteBranch: (branch, force, cwd) => GitOperations.deleteBranch(branch, force, cwd),
  rebase: (branch, onto, upstream, cwd) => GitOperations.rebase(branch, onto, upstream, cwd),
  rebaseInProgress: (cwd) => GitOperations.rebaseInProgress(cwd),
  continueRebase: (cwd) => GitOperations.continueRebase(cwd),
  abortRebase: (cwd) => GitOperations.abortRebase(cwd),
  fastForward: (branch, to, cwd) => GitOperations.fastForward(branch, to, cwd),
  fetch: (remote, cwd) => GitOperations.fetch(remote, cwd),
  pushForce: (branch, remote, cwd) => GitOperations.pushForce(branch, remote, cwd),
  isAncestor: (ancestor, descendant, cwd) => GitOperations.isAncestor(ancestor, descendant, cwd),
  isMergedInto: (branch, trunkRef, cwd) => GitOperations.isMergedInto(branch, trunkRef, cwd),
  countCommits: (from, to, cwd) => GitOperations.countCommits(from, to, cwd),
  upstreamGone: (branch, cwd) => GitOperations.upstreamGone(branch, cwd),
  getRemoteDefaultBranch: (remote, cwd) => GitOperations.getRemoteDefaultBranch(remote, cwd),
  getCommitSubject: (ref, cwd) => GitOperations.getCommitSubject(ref, cwd),
  getRemoteUrl: (remote, cwd) => GitOperations.getRemoteUrl(remote, cwd),
  passthrough: (args, cwd) => GitOperations.passthrough(args, cwd),
};
