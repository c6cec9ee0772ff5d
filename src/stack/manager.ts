/**
 * Stack management - checkout, mount and delete. Each is one edit to the
 * stack graph plus whatever git side effect it needs.
 */

import { err } from 'neverthrow';
import type { StackConfig } from '../config/schema.js';
import { type IGitOperations, defaultGitOps } from '../git/interface.js';
import { silentLogger, type Logger } from '../logger.js';
import {
  StackErrors,
  stackErr,
  stackOk,
  type StackResult,
} from './errors.js';
import type { StackGraph } from './graph.js';
import { StateStore } from './store.js';

export interface StackManagerOptions {
  gitOps?: IGitOperations;
  store?: StateStore;
  logger?: Logger;
}

export interface CheckoutResult {
  branch: string;
  created: boolean;
  parent: string | null;
  anchor: string | null;
}

export interface MountResult {
  branch: string;
  parent: string;
  previousParent: string | null;
  anchor: string;
}

export interface DeleteOptions {
  /** Also delete the git branch. Default: true */
  deleteBranch?: boolean;
  /** Delete the git branch even if it is not merged */
  force?: boolean;
}

export interface DeleteResult {
  branch: string;
  parent: string;
  rewired: string[];
  deletedBranch: boolean;
}

export class StackManager {
  readonly store: StateStore;
  private readonly git: IGitOperations;
  private readonly logger: Logger;

  constructor(
    private readonly config: StackConfig,
    options: StackManagerOptions = {}
  ) {
    this.git = options.gitOps || defaultGitOps;
    this.logger = options.logger || silentLogger;
    this.store = options.store || new StateStore(config, this.logger);
  }

  /**
   * Load the stack graph for this repository
   */
  async loadGraph(): Promise<StackResult<StackGraph>> {
    return this.store.load();
  }

  /**
   * Switch to a tracked branch, or create a new one stacked on the current
   * branch and switch to it
   */
  async checkout(name: string): Promise<StackResult<CheckoutResult>> {
    const graphResult = await this.store.load();
    if (graphResult.isErr()) return err(graphResult.error);
    const graph = graphResult.value;

    if (graph.isKnown(name)) {
      const exists = await this.git.branchExists(name, this.config.repoRoot);
      if (!exists) {
        return StackErrors.notFound(name, 'is tracked but no longer exists in git');
      }

      const checkoutResult = await this.git.checkout(name, this.config.repoRoot);
      if (checkoutResult.isErr()) {
        return StackErrors.vcsFailed('checkout', checkoutResult.error.message, name);
      }

      return stackOk({
        branch: name,
        created: false,
        parent: graph.get(name)?.parent ?? null,
        anchor: graph.get(name)?.anchor ?? null,
      });
    }

    const current = await this.requireCurrentBranch();
    if (current.isErr()) return err(current.error);
    const parent = current.value;

    if (!graph.isKnown(parent)) {
      return StackErrors.unknownParent(name, parent);
    }

    if (await this.git.branchExists(name, this.config.repoRoot)) {
      return StackErrors.duplicateBranch(name);
    }

    const tip = await this.git.getCommit(parent, this.config.repoRoot);
    if (tip.isErr()) {
      return StackErrors.vcsFailed('rev-parse', tip.error.message, parent);
    }

    const createResult = await this.git.createBranch(name, parent, this.config.repoRoot);
    if (createResult.isErr()) {
      return StackErrors.vcsFailed('branch', createResult.error.message, name);
    }

    const added = graph.add(name, parent, tip.value);
    if (added.isErr()) return err(added.error);

    const saved = await this.store.save(graph, true);
    if (saved.isErr()) {
      // Nothing tracks the new branch, so take it back out of git
      const cleanup = await this.git.deleteBranch(name, true, this.config.repoRoot);
      if (cleanup.isErr()) {
        this.logger.warn(`Could not remove branch '${name}' after a failed save`, {
          error: cleanup.error.message,
        });
      }
      return err(saved.error);
    }

    const checkoutResult = await this.git.checkout(name, this.config.repoRoot);
    if (checkoutResult.isErr()) {
      return StackErrors.vcsFailed('checkout', checkoutResult.error.message, name);
    }

    this.logger.debug('Created stacked branch', { branch: name, parent, anchor: tip.value });

    return stackOk({
      branch: name,
      created: true,
      parent,
      anchor: tip.value,
    });
  }

  /**
   * Declare a new parent for a branch. Only metadata changes; commits are
   * rewritten by the next restack.
   */
  async mount(branch?: string, newParent?: string): Promise<StackResult<MountResult>> {
    const graphResult = await this.store.load();
    if (graphResult.isErr()) return err(graphResult.error);
    const graph = graphResult.value;

    let target = branch;
    if (!target) {
      const current = await this.requireCurrentBranch();
      if (current.isErr()) return err(current.error);
      target = current.value;
    }

    const parent = newParent || graph.trunk;

    if (graph.isTrunk(target)) {
      return StackErrors.trunkProtected(target, 'mount');
    }
    if (!graph.isKnown(parent)) {
      return StackErrors.unknownParent(target, parent);
    }
    if (parent === target || graph.isDescendant(parent, target)) {
      return StackErrors.wouldCreateCycle(target, parent);
    }

    const tracked = graph.get(target);
    if (!tracked && !(await this.git.branchExists(target, this.config.repoRoot))) {
      return StackErrors.notFound(target, 'does not exist in git');
    }

    const tip = await this.git.getCommit(parent, this.config.repoRoot);
    if (tip.isErr()) {
      return StackErrors.notFound(parent, 'is tracked but no longer exists in git');
    }

    const previousParent = tracked ? tracked.parent : null;
    const result = tracked
      ? graph.reparent(target, parent, tip.value)
      : graph.add(target, parent, tip.value);
    if (result.isErr()) return err(result.error);

    const saved = await this.store.save(graph);
    if (saved.isErr()) return err(saved.error);

    this.logger.debug('Mounted branch', { branch: target, parent, previousParent });

    return stackOk({
      branch: target,
      parent,
      previousParent,
      anchor: tip.value,
    });
  }

  /**
   * Load the graph, delete a branch from it and persist
   */
  async delete(branch: string, options: DeleteOptions = {}): Promise<StackResult<DeleteResult>> {
    const graphResult = await this.store.load();
    if (graphResult.isErr()) return err(graphResult.error);
    return this.removeBranch(graphResult.value, branch, options);
  }

  /**
   * Remove a branch from an already loaded graph. Its children move onto its
   * parent and lose their anchors. The graph is saved before the git branch
   * is deleted.
   */
  async removeBranch(
    graph: StackGraph,
    branch: string,
    options: DeleteOptions = {}
  ): Promise<StackResult<DeleteResult>> {
    const deleteBranch = options.deleteBranch ?? true;

    if (graph.isTrunk(branch)) {
      return StackErrors.trunkProtected(branch, 'delete');
    }
    const node = graph.get(branch);
    if (!node) {
      return StackErrors.notTracked(branch);
    }
    if (graph.operation?.blocked === branch) {
      return StackErrors.rebaseInProgress(branch);
    }

    const existsInGit = deleteBranch && (await this.git.branchExists(branch, this.config.repoRoot));
    let switched = false;

    if (existsInGit) {
      const current = await this.git.getCurrentBranch(this.config.repoRoot);
      if (current === branch) {
        const clean = await this.git.isClean(this.config.repoRoot);
        if (clean.isErr()) {
          return StackErrors.vcsFailed('status', clean.error.message);
        }
        if (!clean.value) {
          return StackErrors.dirtyWorkingTree(branch);
        }

        const checkoutResult = await this.git.checkout(node.parent, this.config.repoRoot);
        if (checkoutResult.isErr()) {
          return StackErrors.vcsFailed('checkout', checkoutResult.error.message, node.parent);
        }
        switched = true;
      }
    }

    const parent = node.parent;
    const removed = graph.remove(branch);
    if (removed.isErr()) return err(removed.error);

    if (graph.operation) {
      graph.operation.remaining = graph.operation.remaining.filter((name) => name !== branch);
    }

    const saved = await this.store.save(graph, switched);
    if (saved.isErr()) return err(saved.error);

    if (existsInGit) {
      const deleted = await this.git.deleteBranch(branch, options.force ?? false, this.config.repoRoot);
      if (deleted.isErr()) {
        return stackErr(
          'VCS_COMMAND_FAILED',
          `Stopped tracking '${branch}' but git refused to delete it: ${deleted.error.message}`,
          { branch },
          `Delete it yourself with 'git branch -D ${branch}'`
        );
      }
    }

    this.logger.debug('Deleted branch', { branch, parent, rewired: removed.value });

    return stackOk({
      branch,
      parent,
      rewired: removed.value,
      deletedBranch: existsInGit,
    });
  }

  private async requireCurrentBranch(): Promise<StackResult<string>> {
    const current = await this.git.getCurrentBranch(this.config.repoRoot);
    if (!current) {
      return stackErr('NOT_FOUND', 'HEAD is detached', undefined, 'Check out a branch first');
    }
    return stackOk(current);
  }
}
