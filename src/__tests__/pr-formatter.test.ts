/**
 * Tests for PR description formatter
 *
 * These are pure functions that don't require any mocking.
 */

import { describe, expect, test } from 'vitest';
import {
  buildNavigationInfo,
  formatStackNavigation,
  updatePRDescription,
  type StackNavigationInfo,
} from '../github/pr-formatter.js';
import { StackGraph } from '../stack/graph.js';

const prLink = (n: number) => `https://github.com/acme/widgets/pull/${n}`;

describe('formatStackNavigation', () => {
  test('formats navigation with parent and children', () => {
    const info: StackNavigationInfo = {
      stackRoot: 'feature/auth',
      trunk: 'main',
      currentBranch: 'feature/auth',
      parent: { branch: 'main' },
      children: [{ branch: 'feature/login', pr: { number: 102, url: prLink(102) } }],
    };

    const lines = formatStackNavigation(info).split('\n');

    expect(lines[0]).toBe('<!-- git-stack-start -->');
    expect(lines[lines.length - 1]).toBe('<!-- git-stack-end -->');
    expect(lines).toContain('| ⬆️ | `main` | (trunk) |');
    expect(lines).toContain('| → | **`feature/auth`** | **this PR** |');
    expect(lines).toContain(`| ⬇️ | \`feature/login\` | [#102](${prLink(102)}) |`);
    expect(lines).toContain('<sub>Part of stack `feature/auth` · Managed by git-stack</sub>');
  });

  test('links the parent PR when the parent is not trunk', () => {
    const info: StackNavigationInfo = {
      stackRoot: 'feature/auth',
      trunk: 'main',
      currentBranch: 'feature/login',
      parent: { branch: 'feature/auth', pr: { number: 101, url: prLink(101) } },
      children: [],
    };

    const lines = formatStackNavigation(info).split('\n');

    expect(lines).toContain(`| ⬆️ | \`feature/auth\` | [#101](${prLink(101)}) |`);
  });

  test('marks branches without a PR', () => {
    const info: StackNavigationInfo = {
      stackRoot: 'feature/auth',
      trunk: 'main',
      currentBranch: 'feature/auth',
      parent: { branch: 'main' },
      children: [{ branch: 'feature/2fa' }],
    };

    const lines = formatStackNavigation(info).split('\n');

    expect(lines).toContain('| ⬇️ | `feature/2fa` | — |');
  });
});

describe('updatePRDescription', () => {
  const sampleNavInfo: StackNavigationInfo = {
    stackRoot: 'feature/test',
    trunk: 'main',
    currentBranch: 'feature/test',
    parent: { branch: 'main' },
    children: [],
  };
  const navigation = formatStackNavigation(sampleNavInfo);

  test('uses the navigation alone for an empty body', () => {
    expect(updatePRDescription('', sampleNavInfo)).toBe(navigation);
    expect(updatePRDescription(null, sampleNavInfo)).toBe(navigation);
    expect(updatePRDescription(undefined, sampleNavInfo)).toBe(navigation);
  });

  test('appends navigation to an existing body', () => {
    const result = updatePRDescription('This is my PR description.\n', sampleNavInfo);

    expect(result).toBe('This is my PR description.\n\n' + navigation);
  });

  test('replaces an existing navigation section in place', () => {
    const existingBody = `Some description

<!-- git-stack-start -->
old navigation content
<!-- git-stack-end -->

More content after`;

    const result = updatePRDescription(existingBody, sampleNavInfo);

    expect(result).toBe(`Some description\n\n${navigation}\n\nMore content after`);
  });
});

describe('buildNavigationInfo', () => {
  const graph = new StackGraph('main', [
    { name: 'feature/root', parent: 'main', anchor: null, createdAt: '2024-01-01', prNumber: 101 },
    { name: 'feature/zebra', parent: 'feature/root', anchor: null, createdAt: '2024-01-01' },
    { name: 'feature/alpha', parent: 'feature/root', anchor: null, createdAt: '2024-01-01', prNumber: 103 },
    { name: 'feature/alpha-tests', parent: 'feature/alpha', anchor: null, createdAt: '2024-01-01' },
  ]);

  test('builds navigation for a stack root', () => {
    const result = buildNavigationInfo(graph, 'feature/root', prLink);

    expect(result).toEqual({
      stackRoot: 'feature/root',
      trunk: 'main',
      currentBranch: 'feature/root',
      parent: { branch: 'main', pr: undefined },
      children: [
        { branch: 'feature/alpha', pr: { number: 103, url: prLink(103) } },
        { branch: 'feature/zebra', pr: undefined },
      ],
    });
  });

  test('links the parent PR and finds the stack root higher up', () => {
    const result = buildNavigationInfo(graph, 'feature/alpha-tests', prLink);

    expect(result.stackRoot).toBe('feature/root');
    expect(result.parent).toEqual({ branch: 'feature/alpha', pr: { number: 103, url: prLink(103) } });
    expect(result.children).toEqual([]);
  });
});
