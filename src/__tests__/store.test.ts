/**
 * Tests for StateStore against a temporary directory
 */

import { mkdtemp, readFile, readdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, test } from 'vitest';
import type { StackConfig } from '../config/schema.js';
import { StackGraph } from '../stack/graph.js';
import { STATE_VERSION, StateStore, stateFileName } from '../stack/store.js';

const CREATED_AT = '2024-01-01T00:00:00.000Z';

describe('StateStore', () => {
  let stateDir: string;
  let config: StackConfig;
  let store: StateStore;

  beforeEach(async () => {
    stateDir = await mkdtemp(join(tmpdir(), 'git-stack-store-'));
    config = { repoRoot: '/home/dev/widgets', trunk: 'main', remote: 'origin', stateDir };
    store = new StateStore(config);
  });

  afterEach(async () => {
    await rm(stateDir, { recursive: true, force: true });
  });

  test('keys the file by repository path', () => {
    expect(store.path).toBe(join(stateDir, 'home-dev-widgets-7bfd95b47093.json'));
  });

  test('paths that sanitize alike get different files', () => {
    expect(stateFileName('/work/a-b/c')).toBe('work-a-b-c-6b919627cae4.json');
    expect(stateFileName('/work/a/b-c')).toBe('work-a-b-c-0fce0ba0764d.json');
  });

  test('repositories with similar paths keep separate stacks', async () => {
    const first = new StateStore({ ...config, repoRoot: '/work/a-b/c' });
    const second = new StateStore({ ...config, repoRoot: '/work/a/b-c' });
    const graph = new StackGraph('main');
    graph.add('feature-one', 'main', 'c1', CREATED_AT);

    expect((await first.save(graph)).isOk()).toBe(true);

    const loaded = await second.load();
    expect(loaded.isOk()).toBe(true);
    if (loaded.isOk()) {
      expect(loaded.value.size).toBe(0);
    }
  });

  test('refuses a state file written for another repository', async () => {
    const raw = JSON.stringify({ version: 1, repo: '/home/dev/gadgets', trunk: 'main', branches: [], operation: null });
    await writeFile(store.path, raw);

    const result = await store.load();

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.code).toBe('STATE_CORRUPT');
      expect(result.error.message).toBe(
        `State file ${store.path} is corrupt: belongs to repository '/home/dev/gadgets'`
      );
    }
    expect(await readFile(store.path, 'utf8')).toBe(raw);
  });

  test('missing file loads as an empty graph on the configured trunk', async () => {
    const result = await store.load();

    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      expect(result.value.trunk).toBe('main');
      expect(result.value.size).toBe(0);
      expect(result.value.operation).toBeNull();
    }
  });

  test('saves and loads branches and the restack operation', async () => {
    const graph = new StackGraph('main');
    graph.add('a', 'main', 'c1', CREATED_AT);
    graph.add('a1', 'a', null, CREATED_AT);
    graph.setPrNumber('a', 12);
    graph.operation = {
      kind: 'restack',
      target: 'a',
      blocked: 'a1',
      onto: 'c2',
      remaining: [],
      push: true,
      originalBranch: 'a',
      startedAt: CREATED_AT,
    };

    expect((await store.save(graph)).isOk()).toBe(true);

    const loaded = await store.load();
    expect(loaded.isOk()).toBe(true);
    if (loaded.isOk()) {
      expect(loaded.value.nodes()).toEqual([
        { name: 'a', parent: 'main', anchor: 'c1', createdAt: CREATED_AT, prNumber: 12 },
        { name: 'a1', parent: 'a', anchor: null, createdAt: CREATED_AT },
      ]);
      expect(loaded.value.operation).toEqual(graph.operation);
    }
  });

  test('writes a versioned document and leaves no temp files', async () => {
    const graph = new StackGraph('main');
    graph.add('b', 'main', 'c1', CREATED_AT);

    await store.save(graph);

    const content: unknown = JSON.parse(await readFile(store.path, 'utf8'));
    expect(content).toEqual({
      version: STATE_VERSION,
      repo: '/home/dev/widgets',
      trunk: 'main',
      branches: [{ name: 'b', parent: 'main', anchor: 'c1', createdAt: CREATED_AT }],
      operation: null,
    });
    expect(await readdir(stateDir)).toEqual(['home-dev-widgets-7bfd95b47093.json']);
  });

  test('refuses an unknown version without touching the file', async () => {
    const raw = JSON.stringify({ version: 2, repo: '/home/dev/widgets', trunk: 'main', branches: [] });
    await writeFile(store.path, raw);

    const result = await store.load();

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.code).toBe('UNSUPPORTED_STATE_VERSION');
      expect(result.error.details?.version).toBe(2);
    }
    expect(await readFile(store.path, 'utf8')).toBe(raw);
  });

  test('reports invalid JSON as corrupt', async () => {
    await writeFile(store.path, '{"version": 1,');

    const result = await store.load();

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.code).toBe('STATE_CORRUPT');
      expect(result.error.message).toContain('invalid JSON');
    }
  });

  test('reports a malformed document as corrupt', async () => {
    await writeFile(store.path, JSON.stringify({ version: 1, repo: 'x', trunk: 'main', branches: 'a' }));

    const result = await store.load();

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.code).toBe('STATE_CORRUPT');
      expect(result.error.message).toContain('unexpected shape');
    }
  });

  test('reports a parent cycle as corrupt', async () => {
    await writeFile(
      store.path,
      JSON.stringify({
        version: 1,
        repo: '/home/dev/widgets',
        trunk: 'main',
        branches: [
          { name: 'x', parent: 'y', anchor: null, createdAt: CREATED_AT },
          { name: 'y', parent: 'x', anchor: null, createdAt: CREATED_AT },
        ],
        operation: null,
      })
    );

    const result = await store.load();

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.code).toBe('STATE_CORRUPT');
      expect(result.error.message).toContain("branch 'x' is part of a parent cycle");
    }
  });

  test('reports duplicate branch names as corrupt', async () => {
    await writeFile(
      store.path,
      JSON.stringify({
        version: 1,
        repo: '/home/dev/widgets',
        trunk: 'main',
        branches: [
          { name: 'x', parent: 'main', anchor: null, createdAt: CREATED_AT },
          { name: 'x', parent: 'main', anchor: 'c1', createdAt: CREATED_AT },
        ],
        operation: null,
      })
    );

    const result = await store.load();

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.message).toContain('duplicate branch names');
    }
  });

  test('keeps the persisted trunk over the configured one', async () => {
    await store.save(new StackGraph('develop'));

    const result = await store.load();

    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      expect(result.value.trunk).toBe('develop');
    }
  });

  test('reports a write failure with the side-effect flag', async () => {
    const blocker = join(stateDir, 'blocker');
    await writeFile(blocker, '');
    const blocked = new StateStore({ ...config, stateDir: join(blocker, 'state') });

    const result = await blocked.save(new StackGraph('main'), true);

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.code).toBe('STATE_WRITE_FAILED');
      expect(result.error.details?.afterSideEffect).toBe(true);
    }
  });
});
