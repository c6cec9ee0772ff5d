/**
 * Tests for GitHub remote parsing and response checks
 */

import { describe, expect, test } from 'vitest';
import { GitHubAPI, parseGitHubUrl, pullRequestUrl } from '../github/api.js';
import { describeGitHubError, isGitHubPR, isGitHubPRList } from '../github/types.js';
import { FakeGit } from './helpers/fake-git.js';

describe('parseGitHubUrl', () => {
  test('parses HTTPS remotes', () => {
    expect(parseGitHubUrl('https://github.com/acme/widgets.git')).toEqual({
      host: 'github.com',
      owner: 'acme',
      repo: 'widgets',
    });
    expect(parseGitHubUrl('https://github.com/acme/widgets')).toEqual({
      host: 'github.com',
      owner: 'acme',
      repo: 'widgets',
    });
  });

  test('parses HTTPS remotes with credentials', () => {
    expect(parseGitHubUrl('https://bot@github.example.com/acme/widgets.git')).toEqual({
      host: 'github.example.com',
      owner: 'acme',
      repo: 'widgets',
    });
  });

  test('parses SSH remotes', () => {
    expect(parseGitHubUrl('git@github.com:acme/widgets.git\n')).toEqual({
      host: 'github.com',
      owner: 'acme',
      repo: 'widgets',
    });
  });

  test('rejects anything else', () => {
    expect(parseGitHubUrl('/srv/git/widgets.git')).toBeNull();
  });

  test('builds pull request links', () => {
    expect(pullRequestUrl({ host: 'github.com', owner: 'acme', repo: 'widgets' }, 7)).toBe(
      'https://github.com/acme/widgets/pull/7'
    );
  });
});

describe('GitHubAPI.getRepoInfo', () => {
  test('reads the configured remote', async () => {
    const api = new GitHubAPI({ repoRoot: '/repo/widgets', remote: 'origin', gitOps: new FakeGit() });

    const result = await api.getRepoInfo();

    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      expect(result.value).toEqual({ host: 'github.com', owner: 'acme', repo: 'widgets' });
    }
  });

  test('fails for an unknown remote', async () => {
    const api = new GitHubAPI({ repoRoot: '/repo/widgets', remote: 'upstream', gitOps: new FakeGit() });

    const result = await api.getRepoInfo();

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.message).toBe("Could not get remote URL: No such remote 'upstream'");
    }
  });
});

describe('response checks', () => {
  const pr = {
    number: 12,
    title: 'Add widgets',
    body: null,
    html_url: 'https://github.com/acme/widgets/pull/12',
    head: { ref: 'feature/widgets' },
    base: { ref: 'main' },
    state: 'open',
    draft: false,
  };

  test('accepts a pull request', () => {
    expect(isGitHubPR(pr)).toBe(true);
    expect(isGitHubPRList([pr, { ...pr, number: 13 }])).toBe(true);
    expect(isGitHubPRList([])).toBe(true);
  });

  test('rejects a malformed pull request', () => {
    expect(isGitHubPR({ ...pr, number: '12' })).toBe(false);
    expect(isGitHubPR({ ...pr, head: 'feature/widgets' })).toBe(false);
    expect(isGitHubPRList([pr, null])).toBe(false);
  });

  test('describes validation errors', () => {
    expect(
      describeGitHubError({
        message: 'Validation Failed',
        errors: [{ resource: 'PullRequest', field: 'base', code: 'invalid' }, { message: 'No commits between main and x' }],
      })
    ).toBe('Validation Failed (PullRequest.base: invalid; No commits between main and x)');
    expect(describeGitHubError({ message: 'Bad credentials' })).toBe('Bad credentials');
    expect(describeGitHubError('oops')).toBeNull();
  });
});
