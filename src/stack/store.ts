/**
 * State store - persists the stack graph to one JSON file per repository.
 *
 * Writes go to a temp file in the same directory, are flushed, then renamed
 * over the target, so readers see either the old or the new graph.
 */

import { createHash } from 'node:crypto';
import { mkdir, open, readFile, rename, rm } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { Result } from 'neverthrow';
import type { StackConfig } from '../config/schema.js';
import { GitParser } from '../git/parser.js';
import { silentLogger, type Logger } from '../logger.js';
import { StackErrors, stackOk, type StackResult } from './errors.js';
import { StackGraph } from './graph.js';
import type { BranchNode, RestackOperation } from './types.js';

export const STATE_VERSION = 1;

export interface PersistedState {
  version: number;
  repo: string;
  trunk: string;
  branches: BranchNode[];
  operation: RestackOperation | null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

function isBranchNode(value: unknown): value is BranchNode {
  if (!isRecord(value)) return false;
  return (
    typeof value.name === 'string' &&
    value.name.length > 0 &&
    typeof value.parent === 'string' &&
    (value.anchor === null || typeof value.anchor === 'string') &&
    typeof value.createdAt === 'string' &&
    (value.prNumber === undefined || typeof value.prNumber === 'number')
  );
}

function isRestackOperation(value: unknown): value is RestackOperation {
  if (!isRecord(value)) return false;
  return (
    value.kind === 'restack' &&
    typeof value.target === 'string' &&
    typeof value.blocked === 'string' &&
    typeof value.onto === 'string' &&
    isStringArray(value.remaining) &&
    typeof value.push === 'boolean' &&
    (value.originalBranch === null || typeof value.originalBranch === 'string') &&
    typeof value.startedAt === 'string'
  );
}

/**
 * Validate a version-1 state document
 */
export function validateState(value: unknown): value is PersistedState {
  if (!isRecord(value)) return false;
  return (
    value.version === STATE_VERSION &&
    typeof value.repo === 'string' &&
    typeof value.trunk === 'string' &&
    value.trunk.length > 0 &&
    Array.isArray(value.branches) &&
    value.branches.every(isBranchNode) &&
    (value.operation === null || value.operation === undefined || isRestackOperation(value.operation))
  );
}

/**
 * File name for a repository's state. The hash keeps paths that sanitize
 * to the same name apart.
 */
export function stateFileName(repoRoot: string): string {
  const digest = createHash('sha256').update(repoRoot).digest('hex').slice(0, 12);
  return `${GitParser.sanitizePath(repoRoot)}-${digest}.json`;
}

export class StateStore {
  readonly path: string;
  private readonly logger: Logger;

  constructor(
    private readonly config: StackConfig,
    logger?: Logger
  ) {
    this.path = join(config.stateDir, stateFileName(config.repoRoot));
    this.logger = logger || silentLogger;
  }

  /**
   * Load the graph. A missing file is an empty graph on the configured trunk.
   */
  async load(): Promise<StackResult<StackGraph>> {
    let raw: string;
    try {
      raw = await readFile(this.path, 'utf8');
    } catch (e) {
      if (isRecord(e) && e.code === 'ENOENT') {
        this.logger.debug('No state file yet, starting empty', { path: this.path });
        return stackOk(new StackGraph(this.config.trunk));
      }
      return StackErrors.stateCorrupt(this.path, e instanceof Error ? e.message : String(e));
    }

    const parsed = Result.fromThrowable(
      (): unknown => JSON.parse(raw),
      (e) => (e instanceof Error ? e.message : String(e))
    )();
    if (parsed.isErr()) {
      return StackErrors.stateCorrupt(this.path, `invalid JSON (${parsed.error})`);
    }

    const content = parsed.value;
    if (!isRecord(content)) {
      return StackErrors.stateCorrupt(this.path, 'expected an object');
    }
    if (content.version !== STATE_VERSION) {
      return StackErrors.unsupportedStateVersion(this.path, content.version);
    }
    if (!validateState(content)) {
      return StackErrors.stateCorrupt(this.path, 'unexpected shape');
    }
    if (content.repo !== this.config.repoRoot) {
      return StackErrors.stateCorrupt(this.path, `belongs to repository '${content.repo}'`);
    }

    if (content.trunk !== this.config.trunk) {
      this.logger.warn(
        `Stack metadata uses trunk '${content.trunk}' but '${this.config.trunk}' is configured; keeping '${content.trunk}'`
      );
    }

    const graph = new StackGraph(content.trunk, content.branches);
    if (graph.size !== content.branches.length) {
      return StackErrors.stateCorrupt(this.path, 'duplicate branch names');
    }

    const problem = graph.validate();
    if (problem) {
      return StackErrors.stateCorrupt(this.path, problem);
    }

    graph.operation = content.operation ?? null;
    return stackOk(graph);
  }

  /**
   * Persist the graph atomically (write temp, fsync, rename)
   */
  async save(graph: StackGraph, afterSideEffect = false): Promise<StackResult<void>> {
    const state: PersistedState = {
      version: STATE_VERSION,
      repo: this.config.repoRoot,
      trunk: graph.trunk,
      branches: graph.nodes(),
      operation: graph.operation,
    };

    const tempPath = `${this.path}.${process.pid}.${Date.now()}.tmp`;

    try {
      await mkdir(dirname(this.path), { recursive: true });

      const handle = await open(tempPath, 'w');
      try {
        await handle.writeFile(JSON.stringify(state, null, 2) + '\n', 'utf8');
        await handle.sync();
      } finally {
        await handle.close();
      }

      await rename(tempPath, this.path);
    } catch (e) {
      const message = e instanceof Error ? e.message : String(e);
      await rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
        this.logger.debug('Could not remove temp state file', {
          path: tempPath,
          error: cleanupError instanceof Error ? cleanupError.message : String(cleanupError),
        });
      });
      if (afterSideEffect) {
        this.logger.error('Git was changed but stack metadata could not be saved', { path: this.path });
      }
      return StackErrors.stateWriteFailed(this.path, message, afterSideEffect);
    }

    this.logger.debug('Saved stack state', { path: this.path, branches: state.branches.length });
    return stackOk(undefined);
  }
}
