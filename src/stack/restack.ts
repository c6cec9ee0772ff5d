/**
 * Restack orchestration - rebases every branch in a stack onto its parent,
 * parents first, and records progress so a conflict can be resumed.
 */

import { err } from 'neverthrow';
import type { StackConfig } from '../config/schema.js';
import { type IGitOperations, defaultGitOps } from '../git/interface.js';
import { silentLogger, type Logger } from '../logger.js';
import {
  StackError,
  StackErrors,
  stackErr,
  stackOk,
  type StackResult,
} from './errors.js';
import type { StackGraph } from './graph.js';
import { StateStore } from './store.js';
import type { RestackOperation } from './types.js';

export type RestackStepState = 'pending' | 'rebasing' | 'succeeded' | 'skipped' | 'conflict-paused';

/**
 * How a branch ended up on its parent
 */
export type RestackAction = 'rebased' | 'fast-forwarded' | 'continued' | 'up-to-date';

export interface RestackStep {
  branch: string;
  parent: string;
  state: RestackStepState;
  action?: RestackAction;
  pushed: boolean;
}

export interface RestackReport {
  outcome: 'completed' | 'paused';
  target: string;
  resumed: boolean;
  steps: RestackStep[];
  /** Branch waiting on conflict resolution */
  blocked: string | null;
  remaining: string[];
  conflict: StackError | null;
}

export interface RestackOptions {
  /** Branch to restack along with its descendants. Default: current branch */
  target?: string;
  /** Also restack the target's ancestors, root first */
  ancestors?: boolean;
  /** Force-push each restacked branch whose remote tip differs */
  push?: boolean;
  /** Fetch and fast-forward trunk before restacking */
  fetch?: boolean;
}

export interface AbortReport {
  blocked: string | null;
  originalBranch: string | null;
}

export interface RestackOrchestratorOptions {
  gitOps?: IGitOperations;
  store?: StateStore;
  logger?: Logger;
  /** Called as each branch starts, for progress output */
  onStep?: (branch: string) => void;
}

interface RunContext {
  target: string;
  push: boolean;
  originalBranch: string | null;
  startedAt: string;
  resumed: boolean;
  steps: RestackStep[];
}

type BranchOutcome =
  | { kind: 'done'; step: RestackStep; changed: boolean }
  | { kind: 'conflict'; onto: string; files: string[] };

export class RestackOrchestrator {
  readonly store: StateStore;
  private readonly git: IGitOperations;
  private readonly logger: Logger;
  private readonly onStep: (branch: string) => void;

  constructor(
    private readonly config: StackConfig,
    options: RestackOrchestratorOptions = {}
  ) {
    this.git = options.gitOps || defaultGitOps;
    this.logger = options.logger || silentLogger;
    this.store = options.store || new StateStore(config, this.logger);
    this.onStep = options.onStep || (() => {});
  }

  /**
   * Restack a branch and everything above it, or resume a paused restack
   */
  async restack(options: RestackOptions = {}): Promise<StackResult<RestackReport>> {
    const graphResult = await this.store.load();
    if (graphResult.isErr()) return err(graphResult.error);
    const graph = graphResult.value;

    const inProgress = await this.git.rebaseInProgress(this.config.repoRoot);
    if (inProgress.isErr()) {
      return StackErrors.vcsFailed('rebase status', inProgress.error.message);
    }

    if (graph.operation) {
      return this.resume(graph, graph.operation, inProgress.value);
    }
    if (inProgress.value) {
      return StackErrors.rebaseInProgress(inProgress.value);
    }

    const current = await this.git.getCurrentBranch(this.config.repoRoot);
    const target = options.target || current;
    if (!target) {
      return stackErr('NOT_FOUND', 'HEAD is detached', undefined, 'Check out a branch or pass --branch');
    }
    if (!graph.isKnown(target)) {
      return StackErrors.notTracked(target);
    }

    const clean = await this.requireClean(current);
    if (clean.isErr()) return err(clean.error);

    const work = [
      ...(options.ancestors ? graph.ancestors(target).reverse() : []),
      ...graph.topologicalOrder(target),
    ];
    const present = await this.requireBranches(graph, work);
    if (present.isErr()) return err(present.error);

    if (options.fetch) {
      const fetched = await this.git.fetch(this.config.remote, this.config.repoRoot);
      if (fetched.isErr()) {
        return StackErrors.vcsFailed('fetch', fetched.error.message);
      }
      const updated = await this.updateTrunk(graph.trunk);
      if (updated.isErr()) return err(updated.error);
    }

    this.logger.debug('Restacking', { target, branches: work });

    return this.runQueue(graph, work, {
      target,
      push: options.push ?? false,
      originalBranch: current,
      startedAt: new Date().toISOString(),
      resumed: false,
      steps: [],
    });
  }

  /**
   * Abandon a paused restack: abort git's rebase, forget the stored
   * operation and return to the branch the restack started from
   */
  async abort(): Promise<StackResult<AbortReport>> {
    const graphResult = await this.store.load();
    if (graphResult.isErr()) return err(graphResult.error);
    const graph = graphResult.value;

    const inProgress = await this.git.rebaseInProgress(this.config.repoRoot);
    if (inProgress.isErr()) {
      return StackErrors.vcsFailed('rebase status', inProgress.error.message);
    }

    const operation = graph.operation;
    if (!operation && !inProgress.value) {
      return stackErr('NOT_FOUND', 'No restack in progress', undefined, "Start one with 'git-stack restack'");
    }

    if (inProgress.value) {
      const aborted = await this.git.abortRebase(this.config.repoRoot);
      if (aborted.isErr()) {
        return StackErrors.vcsFailed('rebase --abort', aborted.error.message, inProgress.value);
      }
    }

    if (operation) {
      graph.operation = null;
      const saved = await this.store.save(graph, true);
      if (saved.isErr()) return err(saved.error);
    }

    const originalBranch = operation?.originalBranch ?? null;
    if (originalBranch) {
      const restored = await this.returnTo(originalBranch);
      if (restored.isErr()) return err(restored.error);
    }

    return stackOk({
      blocked: operation?.blocked ?? inProgress.value,
      originalBranch,
    });
  }

  /**
   * Fast-forward local trunk to the remote trunk when it is strictly behind
   */
  async updateTrunk(trunk: string): Promise<StackResult<boolean>> {
    const remoteRef = `${this.config.remote}/${trunk}`;

    const remoteTip = await this.git.getCommit(remoteRef, this.config.repoRoot);
    if (remoteTip.isErr()) {
      this.logger.warn(`No ${remoteRef} to update '${trunk}' from`);
      return stackOk(false);
    }

    const localTip = await this.git.getCommit(trunk, this.config.repoRoot);
    if (localTip.isErr()) {
      return StackErrors.notFound(trunk, 'does not exist in git');
    }
    if (localTip.value === remoteTip.value) {
      return stackOk(false);
    }

    const behind = await this.git.isAncestor(localTip.value, remoteTip.value, this.config.repoRoot);
    if (behind.isErr()) {
      return StackErrors.vcsFailed('merge-base', behind.error.message, trunk);
    }
    if (!behind.value) {
      const ahead = await this.git.isAncestor(remoteTip.value, localTip.value, this.config.repoRoot);
      if (ahead.isOk() && !ahead.value) {
        this.logger.warn(`'${trunk}' has diverged from ${remoteRef}; leaving it alone`);
      }
      return stackOk(false);
    }

    const forwarded = await this.git.fastForward(trunk, remoteRef, this.config.repoRoot);
    if (forwarded.isErr()) {
      return StackErrors.vcsFailed('fast-forward', forwarded.error.message, trunk);
    }

    this.logger.info(`Fast-forwarded '${trunk}' to ${remoteRef}`);
    return stackOk(true);
  }

  private async resume(
    graph: StackGraph,
    operation: RestackOperation,
    inProgress: string | null
  ): Promise<StackResult<RestackReport>> {
    const context: RunContext = {
      target: operation.target,
      push: operation.push,
      originalBranch: operation.originalBranch,
      startedAt: operation.startedAt,
      resumed: true,
      steps: [],
    };

    this.logger.debug('Resuming restack', { blocked: operation.blocked, remaining: operation.remaining });

    if (!inProgress) {
      // Aborted or finished by hand: run the blocked branch again
      const clean = await this.requireClean(operation.blocked);
      if (clean.isErr()) return err(clean.error);
      const present = await this.requireBranches(graph, [operation.blocked, ...operation.remaining]);
      if (present.isErr()) return err(present.error);
      return this.runQueue(graph, [operation.blocked, ...operation.remaining], context);
    }

    if (inProgress !== operation.blocked) {
      return StackErrors.rebaseInProgress(inProgress);
    }

    const present = await this.requireBranches(graph, operation.remaining);
    if (present.isErr()) return err(present.error);

    this.onStep(operation.blocked);
    const continued = await this.git.continueRebase(this.config.repoRoot);
    if (continued.isErr()) {
      return StackErrors.vcsFailed('rebase --continue', continued.error.message, operation.blocked);
    }

    if (continued.value.kind === 'conflict') {
      return stackOk(this.pausedReport(graph, context, operation.blocked, continued.value.files, operation.remaining));
    }

    graph.setAnchor(operation.blocked, operation.onto);
    const saved = await this.store.save(graph, true);
    if (saved.isErr()) return err(saved.error);

    const pushed = await this.pushIfChanged(operation.blocked, context.push);
    if (pushed.isErr()) return err(pushed.error);

    context.steps.push({
      branch: operation.blocked,
      parent: graph.get(operation.blocked)?.parent ?? graph.trunk,
      state: 'succeeded',
      action: 'continued',
      pushed: pushed.value,
    });

    return this.runQueue(graph, operation.remaining, context);
  }

  private async runQueue(
    graph: StackGraph,
    queue: string[],
    context: RunContext
  ): Promise<StackResult<RestackReport>> {
    for (const [index, branch] of queue.entries()) {
      const rest = queue.slice(index + 1);

      this.onStep(branch);
      const outcome = await this.restackBranch(graph, branch);
      if (outcome.isErr()) return err(outcome.error);

      if (outcome.value.kind === 'conflict') {
        graph.operation = {
          kind: 'restack',
          target: context.target,
          blocked: branch,
          onto: outcome.value.onto,
          remaining: rest,
          push: context.push,
          originalBranch: context.originalBranch,
          startedAt: context.startedAt,
        };
        const saved = await this.store.save(graph, true);
        if (saved.isErr()) return err(saved.error);

        this.logger.debug('Restack paused', { blocked: branch, remaining: rest });
        return stackOk(this.pausedReport(graph, context, branch, outcome.value.files, rest));
      }

      if (graph.operation) {
        graph.operation.remaining = rest;
      }
      if (outcome.value.changed || graph.operation) {
        const saved = await this.store.save(graph, true);
        if (saved.isErr()) return err(saved.error);
      }

      const pushed = await this.pushIfChanged(branch, context.push);
      if (pushed.isErr()) return err(pushed.error);

      context.steps.push({ ...outcome.value.step, pushed: pushed.value });
    }

    graph.operation = null;
    const saved = await this.store.save(graph, true);
    if (saved.isErr()) return err(saved.error);

    if (context.originalBranch) {
      const restored = await this.returnTo(context.originalBranch);
      if (restored.isErr()) return err(restored.error);
    }

    return stackOk({
      outcome: 'completed',
      target: context.target,
      resumed: context.resumed,
      steps: context.steps,
      blocked: null,
      remaining: [],
      conflict: null,
    });
  }

  /**
   * Put one branch on top of its parent's current tip. The anchor moves to
   * that tip on success; a conflict leaves git mid-rebase.
   */
  private async restackBranch(graph: StackGraph, branch: string): Promise<StackResult<BranchOutcome>> {
    const node = graph.get(branch);
    if (!node) {
      return StackErrors.notTracked(branch);
    }
    if (!(await this.git.branchExists(branch, this.config.repoRoot))) {
      return StackErrors.notFound(branch, 'is tracked but no longer exists in git');
    }

    const base = await this.git.getCommit(node.parent, this.config.repoRoot);
    if (base.isErr()) {
      return StackErrors.notFound(node.parent, 'is tracked but no longer exists in git');
    }
    const tip = await this.git.getCommit(branch, this.config.repoRoot);
    if (tip.isErr()) {
      return StackErrors.vcsFailed('rev-parse', tip.error.message, branch);
    }

    const step: RestackStep = { branch, parent: node.parent, state: 'rebasing', pushed: false };

    const stacked = await this.git.isAncestor(base.value, tip.value, this.config.repoRoot);
    if (stacked.isErr()) {
      return StackErrors.vcsFailed('merge-base', stacked.error.message, branch);
    }
    if (stacked.value) {
      const changed = node.anchor !== base.value;
      graph.setAnchor(branch, base.value);
      return stackOk({ kind: 'done', step: { ...step, state: 'skipped', action: 'up-to-date' }, changed });
    }

    // No commits of its own: move the ref, nothing to replay
    const empty = await this.git.isAncestor(tip.value, base.value, this.config.repoRoot);
    if (empty.isErr()) {
      return StackErrors.vcsFailed('merge-base', empty.error.message, branch);
    }
    if (empty.value) {
      const forwarded = await this.git.fastForward(branch, base.value, this.config.repoRoot);
      if (forwarded.isErr()) {
        return StackErrors.vcsFailed('fast-forward', forwarded.error.message, branch);
      }
      graph.setAnchor(branch, base.value);
      return stackOk({ kind: 'done', step: { ...step, state: 'succeeded', action: 'fast-forwarded' }, changed: true });
    }

    const upstream = await this.chooseUpstream(branch, node.parent, node.anchor, tip.value, base.value);
    if (upstream.isErr()) return err(upstream.error);

    this.logger.debug('Rebasing', { branch, onto: base.value, upstream: upstream.value ?? null });

    const rebased = await this.git.rebase(branch, base.value, upstream.value, this.config.repoRoot);
    if (rebased.isErr()) {
      return StackErrors.vcsFailed('rebase', rebased.error.message, branch);
    }
    if (rebased.value.kind === 'conflict') {
      return stackOk({ kind: 'conflict', onto: base.value, files: rebased.value.files });
    }

    graph.setAnchor(branch, base.value);
    return stackOk({ kind: 'done', step: { ...step, state: 'succeeded', action: 'rebased' }, changed: true });
  }

  /**
   * The anchor bounds the commits that belong to the branch, so only
   * `anchor..branch` is replayed even when the parent itself was rewritten.
   * It is usable only while it is still in the branch's history.
   */
  private async chooseUpstream(
    branch: string,
    parent: string,
    anchor: string | null,
    tip: string,
    base: string
  ): Promise<StackResult<string | undefined>> {
    if (!anchor) {
      return stackOk(undefined);
    }

    const inBranch = await this.git.isAncestor(anchor, tip, this.config.repoRoot);
    if (inBranch.isErr()) {
      return StackErrors.vcsFailed('merge-base', inBranch.error.message, branch);
    }
    if (!inBranch.value) {
      // A fresh mount points the anchor at the new parent's tip
      if (anchor === base) {
        this.logger.debug('Branch not yet on its mounted parent', { branch, parent });
        return stackOk(undefined);
      }
      this.logger.warn(
        `'${branch}' no longer contains its last known base on '${parent}'; rebasing all of '${branch}' onto it`
      );
      return stackOk(undefined);
    }

    return stackOk(anchor);
  }

  private async pushIfChanged(branch: string, push: boolean): Promise<StackResult<boolean>> {
    if (!push) {
      return stackOk(false);
    }

    const remote = this.config.remote;
    if (await this.git.remoteBranchExists(branch, remote, this.config.repoRoot)) {
      const remoteTip = await this.git.getCommit(`${remote}/${branch}`, this.config.repoRoot);
      const localTip = await this.git.getCommit(branch, this.config.repoRoot);
      if (remoteTip.isOk() && localTip.isOk() && remoteTip.value === localTip.value) {
        return stackOk(false);
      }
    }

    const pushed = await this.git.pushForce(branch, remote, this.config.repoRoot);
    if (pushed.isErr()) {
      return StackErrors.vcsFailed('push', pushed.error.message, branch);
    }

    this.logger.debug('Pushed', { branch, remote });
    return stackOk(true);
  }

  /**
   * Every queued branch and its parent must exist before anything is rebased
   */
  private async requireBranches(graph: StackGraph, branches: string[]): Promise<StackResult<void>> {
    for (const branch of branches) {
      const node = graph.get(branch);
      if (!node) {
        return StackErrors.notTracked(branch);
      }
      if (!(await this.git.branchExists(branch, this.config.repoRoot))) {
        return StackErrors.notFound(branch, 'is tracked but no longer exists in git');
      }
      const parent = await this.git.getCommit(node.parent, this.config.repoRoot);
      if (parent.isErr()) {
        return StackErrors.notFound(node.parent, 'is tracked but no longer exists in git');
      }
    }
    return stackOk(undefined);
  }

  private async requireClean(branch: string | null): Promise<StackResult<void>> {
    const clean = await this.git.isClean(this.config.repoRoot);
    if (clean.isErr()) {
      return StackErrors.vcsFailed('status', clean.error.message);
    }
    if (!clean.value) {
      return StackErrors.dirtyWorkingTree(branch);
    }
    return stackOk(undefined);
  }

  private async returnTo(branch: string): Promise<StackResult<void>> {
    if (!(await this.git.branchExists(branch, this.config.repoRoot))) {
      return stackOk(undefined);
    }
    if ((await this.git.getCurrentBranch(this.config.repoRoot)) === branch) {
      return stackOk(undefined);
    }

    const checkedOut = await this.git.checkout(branch, this.config.repoRoot);
    if (checkedOut.isErr()) {
      return StackErrors.vcsFailed('checkout', checkedOut.error.message, branch);
    }
    return stackOk(undefined);
  }

  private pausedReport(
    graph: StackGraph,
    context: RunContext,
    blocked: string,
    files: string[],
    remaining: string[]
  ): RestackReport {
    const parentOf = (branch: string) => graph.get(branch)?.parent ?? graph.trunk;
    return {
      outcome: 'paused',
      target: context.target,
      resumed: context.resumed,
      steps: [
        ...context.steps,
        { branch: blocked, parent: parentOf(blocked), state: 'conflict-paused', pushed: false },
        ...remaining.map((branch): RestackStep => ({ branch, parent: parentOf(branch), state: 'pending', pushed: false })),
      ],
      blocked,
      remaining,
      conflict: StackErrors.rebaseConflict(blocked, files, remaining.length),
    };
  }
}
