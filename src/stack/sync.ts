/**
 * Stack sync - fetches, prunes branches whose work has landed on the remote
 * trunk, and optionally restacks what is left onto the updated trunk.
 */

import { err } from 'neverthrow';
import type { StackConfig } from '../config/schema.js';
import { type IGitOperations, defaultGitOps } from '../git/interface.js';
import { silentLogger, type Logger } from '../logger.js';
import { StackErrors, stackOk, type StackResult } from './errors.js';
import type { StackGraph } from './graph.js';
import { StackManager } from './manager.js';
import { RestackOrchestrator, type RestackReport } from './restack.js';
import { StateStore } from './store.js';

/**
 * Why a branch is considered landed
 */
export type PruneReason = 'merged' | 'upstream-gone';

export interface PruneCandidate {
  branch: string;
  parent: string;
  reason: PruneReason;
}

export interface PrunedBranch extends PruneCandidate {
  /** Children moved onto the pruned branch's parent */
  rewired: string[];
}

export interface SyncOptions {
  /** Report what would be pruned without changing anything */
  dryRun?: boolean;
  /** Fast-forward trunk and restack every branch afterwards */
  restack?: boolean;
  /** Forwarded to the restack */
  push?: boolean;
}

export interface SyncReport {
  dryRun: boolean;
  candidates: PruneCandidate[];
  pruned: PrunedBranch[];
  trunkUpdated: boolean;
  restack: RestackReport | null;
}

export interface SyncEngineOptions {
  gitOps?: IGitOperations;
  store?: StateStore;
  logger?: Logger;
  manager?: StackManager;
  orchestrator?: RestackOrchestrator;
}

export class SyncEngine {
  private readonly git: IGitOperations;
  private readonly logger: Logger;
  private readonly store: StateStore;
  private readonly manager: StackManager;
  private readonly orchestrator: RestackOrchestrator;

  constructor(
    private readonly config: StackConfig,
    options: SyncEngineOptions = {}
  ) {
    this.git = options.gitOps || defaultGitOps;
    this.logger = options.logger || silentLogger;
    this.store = options.store || new StateStore(config, this.logger);

    const shared = { gitOps: this.git, logger: this.logger, store: this.store };
    this.manager = options.manager || new StackManager(config, shared);
    this.orchestrator = options.orchestrator || new RestackOrchestrator(config, shared);
  }

  async sync(options: SyncOptions = {}): Promise<StackResult<SyncReport>> {
    const dryRun = options.dryRun ?? false;

    const graphResult = await this.store.load();
    if (graphResult.isErr()) return err(graphResult.error);
    const graph = graphResult.value;

    if (graph.operation) {
      return StackErrors.rebaseInProgress(graph.operation.blocked);
    }

    if (!dryRun) {
      const clean = await this.git.isClean(this.config.repoRoot);
      if (clean.isErr()) {
        return StackErrors.vcsFailed('status', clean.error.message);
      }
      if (!clean.value) {
        return StackErrors.dirtyWorkingTree(await this.git.getCurrentBranch(this.config.repoRoot));
      }
    }

    const fetched = await this.git.fetch(this.config.remote, this.config.repoRoot);
    if (fetched.isErr()) {
      return StackErrors.vcsFailed('fetch', fetched.error.message);
    }

    const candidatesResult = await this.findLanded(graph);
    if (candidatesResult.isErr()) return err(candidatesResult.error);
    const candidates = candidatesResult.value;

    const report: SyncReport = {
      dryRun,
      candidates,
      pruned: [],
      trunkUpdated: false,
      restack: null,
    };

    if (dryRun) {
      return stackOk(report);
    }

    for (const candidate of candidates) {
      const removed = await this.manager.removeBranch(graph, candidate.branch, {
        deleteBranch: true,
        force: true,
      });
      if (removed.isErr()) return err(removed.error);

      this.logger.info(`Pruned '${candidate.branch}'`, { reason: candidate.reason });
      report.pruned.push({ ...candidate, parent: removed.value.parent, rewired: removed.value.rewired });
    }

    if (options.restack) {
      const updated = await this.orchestrator.updateTrunk(graph.trunk);
      if (updated.isErr()) return err(updated.error);
      report.trunkUpdated = updated.value;

      const restacked = await this.orchestrator.restack({
        target: graph.trunk,
        push: options.push ?? false,
      });
      if (restacked.isErr()) return err(restacked.error);
      report.restack = restacked.value;
    }

    return stackOk(report);
  }

  /**
   * Branches whose commits have reached `<remote>/<trunk>`, parents first
   */
  async findLanded(graph: StackGraph): Promise<StackResult<PruneCandidate[]>> {
    const remote = this.config.remote;
    const trunkRef = `${remote}/${graph.trunk}`;

    if ((await this.git.getCommit(trunkRef, this.config.repoRoot)).isErr()) {
      this.logger.warn(`No ${trunkRef} to compare against; nothing pruned`);
      return stackOk([]);
    }

    const candidates: PruneCandidate[] = [];

    for (const branch of graph.topologicalOrder(graph.trunk)) {
      const node = graph.get(branch);
      if (!node) continue;

      const tip = await this.git.getCommit(branch, this.config.repoRoot);
      if (tip.isErr()) {
        this.logger.debug('Skipping branch missing from git', { branch });
        continue;
      }

      // Nothing committed yet, so nothing can have landed
      const parentTip = await this.git.getCommit(node.parent, this.config.repoRoot);
      if (parentTip.isOk() && parentTip.value === tip.value) {
        continue;
      }

      const reason = await this.landedReason(branch, tip.value, trunkRef);
      if (reason.isErr()) return err(reason.error);
      if (reason.value) {
        candidates.push({ branch, parent: node.parent, reason: reason.value });
      }
    }

    return stackOk(candidates);
  }

  private async landedReason(
    branch: string,
    tip: string,
    trunkRef: string
  ): Promise<StackResult<PruneReason | null>> {
    const remote = this.config.remote;

    if (await this.git.remoteBranchExists(branch, remote, this.config.repoRoot)) {
      const remoteTip = await this.git.getCommit(`${remote}/${branch}`, this.config.repoRoot);
      if (remoteTip.isErr()) {
        return StackErrors.vcsFailed('rev-parse', remoteTip.error.message, branch);
      }

      // Local work that never reached the remote keeps the branch alive
      if (tip !== remoteTip.value) {
        const behind = await this.git.isAncestor(tip, remoteTip.value, this.config.repoRoot);
        if (behind.isErr()) {
          return StackErrors.vcsFailed('merge-base', behind.error.message, branch);
        }
        if (!behind.value) return stackOk(null);
      }

      const merged = await this.git.isMergedInto(remoteTip.value, trunkRef, this.config.repoRoot);
      if (merged.isErr()) {
        return StackErrors.vcsFailed('cherry', merged.error.message, branch);
      }
      return stackOk(merged.value ? 'merged' : null);
    }

    const gone = await this.git.upstreamGone(branch, this.config.repoRoot);
    if (gone.isErr()) {
      return StackErrors.vcsFailed('for-each-ref', gone.error.message, branch);
    }
    if (!gone.value) {
      return stackOk(null);
    }

    const merged = await this.git.isMergedInto(tip, trunkRef, this.config.repoRoot);
    if (merged.isErr()) {
      return StackErrors.vcsFailed('cherry', merged.error.message, branch);
    }
    return stackOk(merged.value ? 'upstream-gone' : null);
  }
}
