/**
 * Read-only views of the stack: per-branch status, and the git ranges
 * `diff` and `log` show for a branch.
 */

import { err } from 'neverthrow';
import type { StackConfig } from '../config/schema.js';
import { type IGitOperations, defaultGitOps } from '../git/interface.js';
import { silentLogger, type Logger } from '../logger.js';
import { StackErrors, stackOk, type StackResult } from './errors.js';
import type { StackGraph } from './graph.js';
import { StateStore } from './store.js';
import type { BranchNode, RestackOperation } from './types.js';

/**
 * How a branch sits relative to its parent's tip
 */
export type ParentRelation = 'stacked' | 'diverged' | 'missing';

export type UpstreamState = 'synced' | 'not-synced' | 'none';

export interface BranchStatus {
  branch: string;
  parent: string;
  depth: number;
  commit: string | null;
  anchor: string | null;
  relation: ParentRelation;
  /** Parent commits not yet in the branch */
  commitsBehind: number;
  /** Branch commits not in the parent */
  commitsAhead: number;
  upstream: UpstreamState;
  prNumber?: number;
}

export interface StatusReport {
  trunk: string;
  trunkCommit: string | null;
  currentBranch: string | null;
  currentTracked: boolean;
  /** Parents before children */
  branches: BranchStatus[];
  operation: RestackOperation | null;
}

export interface StatusReporterOptions {
  gitOps?: IGitOperations;
  store?: StateStore;
  logger?: Logger;
}

export const SHORT_SHA_LENGTH = 7;

export function shortSha(commit: string): string {
  return commit.slice(0, SHORT_SHA_LENGTH);
}

/**
 * `git diff` arguments for a branch's own changes. Uses the anchor when known
 * so parent commits the branch has not picked up yet stay out of the diff.
 */
export function diffArgs(node: BranchNode): string[] {
  return ['diff', `${node.anchor ?? node.parent}..${node.name}`];
}

export function logArgs(node: BranchNode): string[] {
  return ['log', '--graph', '--oneline', '-p', '--decorate', `${node.parent}..${node.name}`];
}

export class StatusReporter {
  readonly store: StateStore;
  private readonly git: IGitOperations;
  private readonly logger: Logger;

  constructor(
    private readonly config: StackConfig,
    options: StatusReporterOptions = {}
  ) {
    this.git = options.gitOps || defaultGitOps;
    this.logger = options.logger || silentLogger;
    this.store = options.store || new StateStore(config, this.logger);
  }

  async collect(): Promise<StackResult<StatusReport>> {
    const graphResult = await this.store.load();
    if (graphResult.isErr()) return err(graphResult.error);
    const graph = graphResult.value;

    const currentBranch = await this.git.getCurrentBranch(this.config.repoRoot);
    const trunkCommit = await this.git.getCommit(graph.trunk, this.config.repoRoot);

    const branches: BranchStatus[] = [];
    for (const branch of graph.topologicalOrder(graph.trunk)) {
      const status = await this.branchStatus(graph, branch);
      if (status.isErr()) return err(status.error);
      branches.push(status.value);
    }

    return stackOk({
      trunk: graph.trunk,
      trunkCommit: trunkCommit.isOk() ? trunkCommit.value : null,
      currentBranch,
      currentTracked: currentBranch !== null && graph.isKnown(currentBranch),
      branches,
      operation: graph.operation,
    });
  }

  private async branchStatus(graph: StackGraph, branch: string): Promise<StackResult<BranchStatus>> {
    const node = graph.get(branch);
    if (!node) {
      return StackErrors.notTracked(branch);
    }

    const status: BranchStatus = {
      branch,
      parent: node.parent,
      depth: graph.ancestors(branch).length,
      commit: null,
      anchor: node.anchor,
      relation: 'missing',
      commitsBehind: 0,
      commitsAhead: 0,
      upstream: 'none',
      prNumber: node.prNumber,
    };

    const tip = await this.git.getCommit(branch, this.config.repoRoot);
    if (tip.isErr()) {
      return stackOk(status);
    }
    status.commit = tip.value;

    const parentTip = await this.git.getCommit(node.parent, this.config.repoRoot);
    if (parentTip.isErr()) {
      this.logger.debug('Parent missing from git', { branch, parent: node.parent });
      return stackOk(status);
    }

    const stacked = await this.git.isAncestor(parentTip.value, tip.value, this.config.repoRoot);
    if (stacked.isErr()) {
      return StackErrors.vcsFailed('merge-base', stacked.error.message, branch);
    }
    status.relation = stacked.value ? 'stacked' : 'diverged';

    const behind = await this.git.countCommits(tip.value, parentTip.value, this.config.repoRoot);
    const ahead = await this.git.countCommits(parentTip.value, tip.value, this.config.repoRoot);
    status.commitsBehind = behind.unwrapOr(0);
    status.commitsAhead = ahead.unwrapOr(0);

    const remote = this.config.remote;
    if (await this.git.remoteBranchExists(branch, remote, this.config.repoRoot)) {
      const remoteTip = await this.git.getCommit(`${remote}/${branch}`, this.config.repoRoot);
      status.upstream = remoteTip.isOk() && remoteTip.value === tip.value ? 'synced' : 'not-synced';
    }

    return stackOk(status);
  }
}
