/**
 * Low-level git command wrappers using neverthrow Result types
 */

import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { isAbsolute, join } from 'node:path';
import { execa } from 'execa';
import { Result, ok, err } from 'neverthrow';
import { GitParser } from './parser.js';
import { GitError, type GitStatus, type RebaseOutcome, type Repository } from './types.js';

export type GitResult<T> = Result<T, GitError>;

export interface GitExecResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

export class GitOperations {
  /**
   * Execute a git command and return stdout
   */
  static async exec(
    args: string[],
    cwd?: string,
    env?: Record<string, string>
  ): Promise<GitExecResult> {
    const result = await execa('git', args, {
      cwd: cwd || process.cwd(),
      env,
      reject: false,
    });

    return {
      stdout: result.stdout,
      stderr: result.stderr,
      exitCode: result.exitCode ?? 1,
    };
  }

  /**
   * Execute a git command and return Result
   */
  static async execResult(args: string[], cwd?: string): Promise<GitResult<string>> {
    const result = await this.exec(args, cwd);
    if (result.exitCode !== 0) {
      return err(
        new GitError(
          result.stderr.trim() || 'Git command failed',
          `git ${args.join(' ')}`,
          result.exitCode
        )
      );
    }
    return ok(result.stdout.trim());
  }

  /**
   * Run git with the terminal attached (diff, log)
   */
  static async passthrough(args: string[], cwd?: string): Promise<GitResult<void>> {
    const result = await execa('git', args, {
      cwd: cwd || process.cwd(),
      stdio: 'inherit',
      reject: false,
    });
    if (result.exitCode !== 0) {
      return err(new GitError('Git command failed', `git ${args.join(' ')}`, result.exitCode ?? 1));
    }
    return ok(undefined);
  }

  /**
   * Check if we're in a git repository
   */
  static async isGitRepository(cwd?: string): Promise<boolean> {
    const result = await this.execResult(['rev-parse', '--git-dir'], cwd);
    return result.isOk();
  }

  /**
   * Get repository root and name
   */
  static async getRepository(cwd?: string): Promise<GitResult<Repository>> {
    const result = await this.execResult(['rev-parse', '--show-toplevel'], cwd);
    return result.map((root) => ({
      root,
      name: root.split('/').pop() || 'unknown',
    }));
  }

  /**
   * Check if a branch exists locally
   */
  static async branchExists(branch: string, cwd?: string): Promise<boolean> {
    const result = await this.execResult(
      ['show-ref', '--verify', '--quiet', `refs/heads/${branch}`],
      cwd
    );
    return result.isOk();
  }

  /**
   * Check if a branch exists on remote
   */
  static async remoteBranchExists(
    branch: string,
    remote = 'origin',
    cwd?: string
  ): Promise<boolean> {
    const result = await this.execResult(
      ['show-ref', '--verify', '--quiet', `refs/remotes/${remote}/${branch}`],
      cwd
    );
    return result.isOk();
  }

  /**
   * Get current branch name, null on a detached HEAD
   */
  static async getCurrentBranch(cwd?: string): Promise<string | null> {
    const result = await this.execResult(['symbolic-ref', '--quiet', '--short', 'HEAD'], cwd);
    return result.isOk() && result.value ? result.value : null;
  }

  /**
   * Get full commit hash
   */
  static async getCommit(ref = 'HEAD', cwd?: string): Promise<GitResult<string>> {
    return this.execResult(['rev-parse', '--verify', '--quiet', `${ref}^{commit}`], cwd);
  }

  /**
   * Read a single git config value
   */
  static async getConfig(key: string, cwd?: string): Promise<string | null> {
    const result = await this.execResult(['config', '--get', key], cwd);
    return result.isOk() && result.value ? result.value : null;
  }

  /**
   * Get status of the working tree
   */
  static async getStatus(cwd?: string): Promise<GitResult<GitStatus>> {
    const result = await this.execResult(['status', '--porcelain=v1'], cwd);
    return result.map((output) => GitParser.parseStatus(output));
  }

  /**
   * Working tree has no staged, unstaged or conflicted changes
   */
  static async isClean(cwd?: string): Promise<GitResult<boolean>> {
    const status = await this.getStatus(cwd);
    return status.map((s) => !s.dirty);
  }

  /**
   * Create a branch at the given start point without switching to it
   */
  static async createBranch(branch: string, from: string, cwd?: string): Promise<GitResult<void>> {
    const result = await this.execResult(['branch', branch, from], cwd);
    return result.map(() => undefined);
  }

  /**
   * Checkout a branch
   */
  static async checkout(branch: string, cwd?: string): Promise<GitResult<void>> {
    const result = await this.execResult(['checkout', '--quiet', branch], cwd);
    return result.map(() => undefined);
  }

  /**
   * Delete a branch
   */
  static async deleteBranch(
    branch: string,
    force = false,
    cwd?: string
  ): Promise<GitResult<void>> {
    const flag = force ? '-D' : '-d';
    const result = await this.execResult(['branch', flag, branch], cwd);
    return result.map(() => undefined);
  }

  /**
   * Rebase a branch onto a new base. With an upstream, only the commits in
   * upstream..branch are replayed (`git rebase --onto`).
   */
  static async rebase(
    branch: string,
    onto: string,
    upstream?: string,
    cwd?: string
  ): Promise<GitResult<RebaseOutcome>> {
    const args = upstream
      ? ['rebase', '--onto', onto, upstream, branch]
      : ['rebase', onto, branch];
    const result = await this.exec(args, cwd);
    return this.rebaseOutcome(result, args, cwd);
  }

  /**
   * Continue a paused rebase without opening an editor
   */
  static async continueRebase(cwd?: string): Promise<GitResult<RebaseOutcome>> {
    const args = ['rebase', '--continue'];
    const result = await this.exec(args, cwd, { GIT_EDITOR: 'true' });
    return this.rebaseOutcome(result, args, cwd);
  }

  /**
   * Abort a paused rebase
   */
  static async abortRebase(cwd?: string): Promise<GitResult<void>> {
    const result = await this.execResult(['rebase', '--abort'], cwd);
    return result.map(() => undefined);
  }

  /**
   * Name of the branch a rebase is paused on, or null when none is in progress
   */
  static async rebaseInProgress(cwd?: string): Promise<GitResult<string | null>> {
    const root = cwd || process.cwd();

    for (const dir of ['rebase-merge', 'rebase-apply']) {
      const pathResult = await this.execResult(['rev-parse', '--git-path', dir], root);
      if (pathResult.isErr()) {
        return err(pathResult.error);
      }

      const rebaseDir = isAbsolute(pathResult.value)
        ? pathResult.value
        : join(root, pathResult.value);
      if (!existsSync(rebaseDir)) {
        continue;
      }

      const headNamePath = join(rebaseDir, 'head-name');
      if (!existsSync(headNamePath)) {
        // rebase-apply without head-name is a `git am` session
        continue;
      }

      const headName = await readFile(headNamePath, 'utf8');
      return ok(GitParser.parseRebaseHeadName(headName) ?? 'HEAD');
    }

    return ok(null);
  }

  /**
   * Move a branch forward to a descendant commit
   */
  static async fastForward(branch: string, to: string, cwd?: string): Promise<GitResult<void>> {
    const current = await this.getCurrentBranch(cwd);
    const args = current === branch
      ? ['merge', '--ff-only', '--quiet', to]
      : ['branch', '--force', branch, to];
    const result = await this.execResult(args, cwd);
    return result.map(() => undefined);
  }

  /**
   * Fetch from remote, pruning deleted remote branches
   */
  static async fetch(remote = 'origin', cwd?: string): Promise<GitResult<void>> {
    const result = await this.execResult(['fetch', '--prune', remote], cwd);
    return result.map(() => undefined);
  }

  /**
   * Push to remote with force-with-lease and set upstream
   */
  static async pushForce(branch: string, remote = 'origin', cwd?: string): Promise<GitResult<void>> {
    const result = await this.execResult(
      ['push', '--force-with-lease', '--set-upstream', remote, `${branch}:${branch}`],
      cwd
    );
    return result.map(() => undefined);
  }

  /**
   * Check if commit A is an ancestor of commit B
   */
  static async isAncestor(commitA: string, commitB: string, cwd?: string): Promise<GitResult<boolean>> {
    const args = ['merge-base', '--is-ancestor', commitA, commitB];
    const result = await this.exec(args, cwd);
    if (result.exitCode === 0) return ok(true);
    if (result.exitCode === 1) return ok(false);
    return err(new GitError(result.stderr.trim() || 'Git command failed', `git ${args.join(' ')}`, result.exitCode));
  }

  /**
   * A branch is merged when it is an ancestor of the trunk ref, or when every
   * one of its commits has a patch-equivalent commit there (rebase merges).
   */
  static async isMergedInto(branch: string, trunkRef: string, cwd?: string): Promise<GitResult<boolean>> {
    const ancestor = await this.isAncestor(branch, trunkRef, cwd);
    if (ancestor.isErr() || ancestor.value) {
      return ancestor;
    }

    const cherry = await this.execResult(['cherry', trunkRef, branch], cwd);
    return cherry.map((output) => GitParser.countUnmergedCherries(output) === 0);
  }

  /**
   * Count commits between two refs
   */
  static async countCommits(from: string, to: string, cwd?: string): Promise<GitResult<number>> {
    const result = await this.execResult(['rev-list', '--count', `${from}..${to}`], cwd);
    return result.map((value) => parseInt(value, 10));
  }

  /**
   * The branch had an upstream that no longer exists on the remote
   */
  static async upstreamGone(branch: string, cwd?: string): Promise<GitResult<boolean>> {
    const result = await this.execResult(
      ['for-each-ref', '--format=%(upstream:track)', `refs/heads/${branch}`],
      cwd
    );
    return result.map((output) => GitParser.isUpstreamGone(output));
  }

  /**
   * Default branch of a remote, from refs/remotes/<remote>/HEAD
   */
  static async getRemoteDefaultBranch(remote = 'origin', cwd?: string): Promise<string | null> {
    const result = await this.execResult(['symbolic-ref', `refs/remotes/${remote}/HEAD`], cwd);
    return result.isOk() ? GitParser.parseRemoteHead(result.value, remote) : null;
  }

  /**
   * Subject line of the latest commit on a ref
   */
  static async getCommitSubject(ref: string, cwd?: string): Promise<GitResult<string>> {
    return this.execResult(['log', '--no-show-signature', '--format=%s', '-1', ref], cwd);
  }

  /**
   * URL of a remote
   */
  static async getRemoteUrl(remote = 'origin', cwd?: string): Promise<GitResult<string>> {
    return this.execResult(['config', '--get', `remote.${remote}.url`], cwd);
  }

  private static async rebaseOutcome(
    result: GitExecResult,
    args: string[],
    cwd?: string
  ): Promise<GitResult<RebaseOutcome>> {
    if (result.exitCode === 0) {
      return ok({ kind: 'success' });
    }

    // A conflict leaves git's rebase state behind; anything else is a failure
    const inProgress = await this.rebaseInProgress(cwd);
    if (inProgress.isOk() && inProgress.value) {
      const status = await this.getStatus(cwd);
      return ok({
        kind: 'conflict',
        branch: inProgress.value,
        files: status.isOk() ? status.value.conflicted : [],
      });
    }

    return err(
      new GitError(
        result.stderr.trim() || 'Git command failed',
        `git ${args.join(' ')}`,
        result.exitCode
      )
    );
  }
}
