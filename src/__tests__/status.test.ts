/**
 * Tests for StatusReporter and the tree it renders to
 */

import { afterEach, beforeEach, describe, expect, test } from 'vitest';
import { StackManager } from '../stack/manager.js';
import { diffArgs, logArgs, shortSha, StatusReporter, type StatusReport } from '../stack/status.js';
import { StackVisualizer } from '../stack/visualizer.js';
import { createTestConfig, FakeGit } from './helpers/fake-git.js';

const ANSI = /\x1b\[[0-9;]*m/g;

const plain = (lines: string[]) => lines.map((line) => line.replace(ANSI, ''));

describe('StatusReporter', () => {
  let git: FakeGit;
  let manager: StackManager;
  let reporter: StatusReporter;
  let cleanup: () => Promise<void>;

  beforeEach(async () => {
    git = new FakeGit();
    git.init('main', 1);
    const setup = await createTestConfig(git);
    cleanup = setup.cleanup;
    manager = new StackManager(setup.config, { gitOps: git });
    reporter = new StatusReporter(setup.config, { gitOps: git });

    // main ← a (pushed, PR #12) ← b, then trunk moves on
    await manager.checkout('a');
    git.commit('a', 'a 1');
    git.pushRemote('a');
    await manager.checkout('b');
    git.commit('b', 'b 1');
    git.commit('main', 'main 2');

    const graph = await manager.loadGraph();
    if (graph.isOk()) {
      graph.value.setPrNumber('a', 12);
      await manager.store.save(graph.value);
    }
  });

  afterEach(async () => {
    await cleanup();
  });

  test('describes each branch against its parent and remote', async () => {
    const result = await reporter.collect();

    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      const report = result.value;
      expect(report.trunk).toBe('main');
      expect(report.trunkCommit).toBe(git.tip('main'));
      expect(report.currentBranch).toBe('b');
      expect(report.currentTracked).toBe(true);
      expect(report.operation).toBeNull();

      expect(report.branches).toMatchObject([
        {
          branch: 'a',
          parent: 'main',
          depth: 0,
          commit: git.tip('a'),
          relation: 'diverged',
          commitsBehind: 1,
          commitsAhead: 1,
          upstream: 'synced',
          prNumber: 12,
        },
        {
          branch: 'b',
          parent: 'a',
          depth: 1,
          commit: git.tip('b'),
          relation: 'stacked',
          commitsBehind: 0,
          commitsAhead: 1,
          upstream: 'none',
        },
      ]);
    }
  });

  test('marks a pushed branch with newer local commits as not synced', async () => {
    git.commit('a', 'a 2');

    const result = await reporter.collect();

    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      expect(result.value.branches[0]?.upstream).toBe('not-synced');
    }
  });

  test('reports a tracked branch that git no longer has', async () => {
    git.current = 'main';
    git.branches.delete('b');

    const result = await reporter.collect();

    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      expect(result.value.branches[1]).toMatchObject({ branch: 'b', relation: 'missing', commit: null });
    }
  });

  test('renders the stack as a tree', async () => {
    const result = await reporter.collect();
    expect(result.isOk()).toBe(true);
    if (!result.isOk()) return;

    const lines = plain(new StackVisualizer().visualizeStatus(result.value));

    expect(lines).toEqual([
      '  main c000400',
      '  └── a c000200 · diverges from main (1 behind) · synced · #12',
      '●     └── b c000300 · is stacked on a · no upstream',
    ]);
  });

  test('renders anchors on request', async () => {
    const result = await reporter.collect();
    expect(result.isOk()).toBe(true);
    if (!result.isOk()) return;

    const lines = plain(new StackVisualizer().visualizeStatus(result.value, { showAnchors: true }));

    expect(lines[1]).toBe('  └── a c000200 · diverges from main (1 behind) · synced · #12 · anchor c000100');
  });
});

describe('StackVisualizer notes', () => {
  const report: StatusReport = {
    trunk: 'main',
    trunkCommit: null,
    currentBranch: 'scratch',
    currentTracked: false,
    branches: [
      {
        branch: 'gone',
        parent: 'main',
        depth: 0,
        commit: null,
        anchor: null,
        relation: 'missing',
        commitsBehind: 0,
        commitsAhead: 0,
        upstream: 'none',
      },
    ],
    operation: {
      kind: 'restack',
      target: 'gone',
      blocked: 'gone',
      onto: 'c1',
      remaining: ['x', 'y'],
      push: false,
      originalBranch: 'scratch',
      startedAt: '2024-01-01T00:00:00.000Z',
    },
  };

  test('flags missing branches, an untracked checkout and a paused restack', () => {
    const lines = plain(new StackVisualizer().visualizeStatus(report));

    expect(lines).toEqual([
      '  main',
      '  └── gone does not exist!',
      '',
      "'scratch' is not tracked. Run 'git-stack mount <parent>' to add it.",
      '',
      "Restack paused on 'gone' (2 branches left). Run 'git-stack restack' to continue or 'git-stack restack --abort'.",
    ]);
  });
});

describe('diff and log ranges', () => {
  const node = { name: 'feat', parent: 'main', anchor: 'abc1234', createdAt: '2024-01-01T00:00:00.000Z' };

  test('diff starts at the anchor when known', () => {
    expect(diffArgs(node)).toEqual(['diff', 'abc1234..feat']);
    expect(diffArgs({ ...node, anchor: null })).toEqual(['diff', 'main..feat']);
  });

  test('log covers the commits above the parent', () => {
    expect(logArgs(node)).toEqual(['log', '--graph', '--oneline', '-p', '--decorate', 'main..feat']);
  });

  test('short sha keeps seven characters', () => {
    expect(shortSha('0123456789abcdef')).toBe('0123456');
  });
});
