/**
 * In-process stand-in for git: a commit DAG, local and remote branches,
 * rebase with injectable conflicts, and a log of mutating calls.
 */

import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ok, err } from 'neverthrow';
import type { StackConfig } from '../../config/schema.js';
import type { GitResult, IGitOperations } from '../../git/interface.js';
import { GitError, type RebaseOutcome } from '../../git/types.js';

export interface FakeCommit {
  id: string;
  parents: string[];
  subject: string;
  /** Content identity; rebased copies keep it, like a patch id */
  patch: string;
}

export interface RebaseCall {
  branch: string;
  onto: string;
  upstream: string | undefined;
}

interface RebaseState {
  branch: string;
  onto: string;
  replay: FakeCommit[];
}

const REMOTE = 'origin';

function failure(message: string, command: string): GitError {
  return new GitError(message, command, 1);
}

export class FakeGit implements IGitOperations {
  readonly commits = new Map<string, FakeCommit>();
  readonly branches = new Map<string, string>();
  readonly remoteBranches = new Map<string, string>();
  /** Branches whose upstream was deleted on the remote */
  readonly gone = new Set<string>();
  /** Branches whose next rebase stops on a conflict */
  readonly conflicts = new Set<string>();
  /** Branches whose `rebase --continue` conflicts again */
  readonly conflictsAgain = new Set<string>();
  /** Branches the remote refuses to accept */
  readonly rejectedPushes = new Set<string>();
  readonly configs = new Map<string, string>();

  readonly rebaseCalls: RebaseCall[] = [];
  readonly pushes: string[] = [];
  readonly deleted: string[] = [];
  readonly passthroughCalls: string[][] = [];
  fetches = 0;

  current: string | null = null;
  dirty = false;
  remoteHead: string | null = null;
  rebaseState: RebaseState | null = null;

  private seq = 0;

  constructor(readonly root = '/repo/widgets') {}

  // ============ Test setup helpers ============

  /**
   * Create the trunk with `count` commits and check it out
   */
  init(trunk = 'main', count = 1): string {
    let tip: string | null = null;
    for (let i = 1; i <= count; i++) {
      tip = this.makeCommit(tip ? [tip] : [], `${trunk} ${i}`);
    }
    if (!tip) throw new Error('init needs at least one commit');
    this.branches.set(trunk, tip);
    this.current = trunk;
    return tip;
  }

  /**
   * Add a commit on top of a branch. The patch defaults to a unique value.
   */
  commit(branch: string, subject: string, patch?: string): string {
    const tip = this.tip(branch);
    const id = this.makeCommit([tip], subject, patch);
    this.branches.set(branch, id);
    return id;
  }

  branch(name: string, from: string): string {
    const tip = this.tip(from);
    this.branches.set(name, tip);
    return tip;
  }

  tip(ref: string): string {
    const id = this.resolve(ref);
    if (!id) throw new Error(`Unknown ref ${ref}`);
    return id;
  }

  /** Subjects from the root up to `ref` along first parents */
  history(ref: string): string[] {
    const subjects: string[] = [];
    let commit = this.commits.get(this.tip(ref));
    while (commit) {
      subjects.unshift(commit.subject);
      commit = commit.parents[0] ? this.commits.get(commit.parents[0]) : undefined;
    }
    return subjects;
  }

  pushRemote(branch: string): void {
    this.remoteBranches.set(branch, this.tip(branch));
  }

  // ============ IGitOperations ============

  async getRepoRoot(): Promise<GitResult<string>> {
    return ok(this.root);
  }

  async getCurrentBranch(): Promise<string | null> {
    return this.current;
  }

  async branchExists(branch: string): Promise<boolean> {
    return this.branches.has(branch);
  }

  async remoteBranchExists(branch: string, remote: string): Promise<boolean> {
    return remote === REMOTE && this.remoteBranches.has(branch);
  }

  async getCommit(ref: string): Promise<GitResult<string>> {
    const id = this.resolve(ref);
    return id ? ok(id) : err(failure(`unknown revision ${ref}`, `git rev-parse ${ref}`));
  }

  async getConfig(key: string): Promise<string | null> {
    return this.configs.get(key) ?? null;
  }

  async isClean(): Promise<GitResult<boolean>> {
    return ok(!this.dirty);
  }

  async createBranch(branch: string, from: string): Promise<GitResult<void>> {
    if (this.branches.has(branch)) {
      return err(failure(`a branch named '${branch}' already exists`, 'git branch'));
    }
    const id = this.resolve(from);
    if (!id) {
      return err(failure(`not a valid object name: '${from}'`, 'git branch'));
    }
    this.branches.set(branch, id);
    return ok(undefined);
  }

  async checkout(branch: string): Promise<GitResult<void>> {
    if (!this.branches.has(branch)) {
      return err(failure(`pathspec '${branch}' did not match`, 'git checkout'));
    }
    this.current = branch;
    return ok(undefined);
  }

  async deleteBranch(branch: string, force: boolean): Promise<GitResult<void>> {
    if (this.current === branch) {
      return err(failure(`cannot delete branch '${branch}' checked out`, 'git branch -d'));
    }
    if (!this.branches.has(branch)) {
      return err(failure(`branch '${branch}' not found`, 'git branch -d'));
    }
    if (!force) {
      const tip = this.tip(branch);
      const head = this.current ? this.tip(this.current) : null;
      if (!head || !this.reachable(head).has(tip)) {
        return err(failure(`the branch '${branch}' is not fully merged`, 'git branch -d'));
      }
    }
    this.branches.delete(branch);
    this.deleted.push(branch);
    return ok(undefined);
  }

  async rebase(branch: string, onto: string, upstream?: string): Promise<GitResult<RebaseOutcome>> {
    this.rebaseCalls.push({ branch, onto, upstream });

    const tip = this.resolve(branch);
    const ontoId = this.resolve(onto);
    const upstreamId = upstream ? this.resolve(upstream) : ontoId;
    if (!tip || !ontoId || !upstreamId) {
      return err(failure('invalid upstream', 'git rebase'));
    }

    // Commits in the branch but not upstream, oldest first, minus those
    // whose patch is already in the new base
    const excluded = this.reachable(upstreamId);
    const landedPatches = new Set([...this.reachable(ontoId)].map((id) => this.patchOf(id)));
    const replay: FakeCommit[] = [];
    let cursor = this.commits.get(tip);
    while (cursor && !excluded.has(cursor.id)) {
      if (!landedPatches.has(cursor.patch)) {
        replay.unshift(cursor);
      }
      cursor = cursor.parents[0] ? this.commits.get(cursor.parents[0]) : undefined;
    }

    if (this.conflicts.has(branch)) {
      this.conflicts.delete(branch);
      this.rebaseState = { branch, onto: ontoId, replay };
      this.current = null;
      return ok({ kind: 'conflict', branch, files: ['src/shared.ts'] });
    }

    this.applyReplay(branch, ontoId, replay);
    return ok({ kind: 'success' });
  }

  async rebaseInProgress(): Promise<GitResult<string | null>> {
    return ok(this.rebaseState?.branch ?? null);
  }

  async continueRebase(): Promise<GitResult<RebaseOutcome>> {
    const state = this.rebaseState;
    if (!state) {
      return err(failure('No rebase in progress?', 'git rebase --continue'));
    }
    if (this.conflictsAgain.has(state.branch)) {
      this.conflictsAgain.delete(state.branch);
      return ok({ kind: 'conflict', branch: state.branch, files: ['src/other.ts'] });
    }

    this.rebaseState = null;
    this.applyReplay(state.branch, state.onto, state.replay);
    return ok({ kind: 'success' });
  }

  async abortRebase(): Promise<GitResult<void>> {
    const state = this.rebaseState;
    if (!state) {
      return err(failure('No rebase in progress?', 'git rebase --abort'));
    }
    this.rebaseState = null;
    this.current = state.branch;
    return ok(undefined);
  }

  async fastForward(branch: string, to: string): Promise<GitResult<void>> {
    const id = this.resolve(to);
    if (!id || !this.branches.has(branch)) {
      return err(failure('not something we can merge', 'git merge --ff-only'));
    }
    this.branches.set(branch, id);
    return ok(undefined);
  }

  async fetch(): Promise<GitResult<void>> {
    this.fetches++;
    return ok(undefined);
  }

  async pushForce(branch: string, remote: string): Promise<GitResult<void>> {
    if (remote !== REMOTE) {
      return err(failure(`'${remote}' does not appear to be a git repository`, 'git push'));
    }
    if (this.rejectedPushes.has(branch)) {
      return err(failure(`failed to push some refs to '${remote}'`, 'git push'));
    }
    this.remoteBranches.set(branch, this.tip(branch));
    this.gone.delete(branch);
    this.pushes.push(branch);
    return ok(undefined);
  }

  async isAncestor(ancestor: string, descendant: string): Promise<GitResult<boolean>> {
    const a = this.resolve(ancestor);
    const d = this.resolve(descendant);
    if (!a || !d) {
      return err(failure('not a valid commit name', 'git merge-base --is-ancestor'));
    }
    return ok(this.reachable(d).has(a));
  }

  async isMergedInto(branch: string, trunkRef: string): Promise<GitResult<boolean>> {
    const b = this.resolve(branch);
    const t = this.resolve(trunkRef);
    if (!b || !t) {
      return err(failure('unknown revision', 'git cherry'));
    }

    const inTrunk = this.reachable(t);
    if (inTrunk.has(b)) {
      return ok(true);
    }

    const trunkPatches = new Set([...inTrunk].map((id) => this.patchOf(id)));
    for (const id of this.reachable(b)) {
      if (!inTrunk.has(id) && !trunkPatches.has(this.patchOf(id))) {
        return ok(false);
      }
    }
    return ok(true);
  }

  async countCommits(from: string, to: string): Promise<GitResult<number>> {
    const f = this.resolve(from);
    const t = this.resolve(to);
    if (!f || !t) {
      return err(failure('unknown revision', 'git rev-list --count'));
    }
    const excluded = this.reachable(f);
    return ok([...this.reachable(t)].filter((id) => !excluded.has(id)).length);
  }

  async upstreamGone(branch: string): Promise<GitResult<boolean>> {
    return ok(this.gone.has(branch));
  }

  async getRemoteDefaultBranch(): Promise<string | null> {
    return this.remoteHead;
  }

  async getCommitSubject(ref: string): Promise<GitResult<string>> {
    const id = this.resolve(ref);
    const commit = id ? this.commits.get(id) : undefined;
    return commit ? ok(commit.subject) : err(failure('unknown revision', 'git log'));
  }

  async getRemoteUrl(remote: string): Promise<GitResult<string>> {
    return remote === REMOTE
      ? ok('git@github.com:acme/widgets.git')
      : err(failure(`No such remote '${remote}'`, 'git remote get-url'));
  }

  async passthrough(args: string[]): Promise<GitResult<void>> {
    this.passthroughCalls.push(args);
    return ok(undefined);
  }

  // ============ Internals ============

  private makeCommit(parents: string[], subject: string, patch?: string): string {
    this.seq++;
    const id = `c${String(this.seq).padStart(4, '0')}${'0'.repeat(35)}`;
    this.commits.set(id, { id, parents, subject, patch: patch ?? `patch-${this.seq}` });
    return id;
  }

  private applyReplay(branch: string, onto: string, replay: FakeCommit[]): void {
    let tip = onto;
    for (const commit of replay) {
      tip = this.makeCommit([tip], commit.subject, commit.patch);
    }
    this.branches.set(branch, tip);
    this.current = branch;
  }

  private patchOf(id: string): string {
    return this.commits.get(id)?.patch ?? id;
  }

  private resolve(ref: string): string | null {
    if (ref === 'HEAD') {
      return this.current ? this.branches.get(this.current) ?? null : null;
    }
    const local = this.branches.get(ref);
    if (local) return local;
    if (ref.startsWith(`${REMOTE}/`)) {
      return this.remoteBranches.get(ref.slice(REMOTE.length + 1)) ?? null;
    }
    return this.commits.has(ref) ? ref : null;
  }

  private reachable(id: string): Set<string> {
    const seen = new Set<string>();
    const stack = [id];
    while (stack.length > 0) {
      const next = stack.pop();
      if (next === undefined || seen.has(next)) continue;
      seen.add(next);
      stack.push(...(this.commits.get(next)?.parents ?? []));
    }
    return seen;
  }
}

/**
 * A throwaway state directory and a config pointing at it
 */
export async function createTestConfig(
  git: FakeGit,
  trunk = 'main'
): Promise<{ config: StackConfig; cleanup: () => Promise<void> }> {
  const stateDir = await mkdtemp(join(tmpdir(), 'git-stack-test-'));
  return {
    config: { repoRoot: git.root, trunk, remote: REMOTE, stateDir },
    cleanup: () => rm(stateDir, { recursive: true, force: true }),
  };
}
