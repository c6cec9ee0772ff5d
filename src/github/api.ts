/**
 * GitHub API client for PR operations using neverthrow Result types
 */

import { execa } from 'execa';
import { Result, ok, err } from 'neverthrow';
import * as clack from '@clack/prompts';
import { type IGitOperations, defaultGitOps } from '../git/interface.js';
import type {
  GitHubRepo,
  GitHubPR,
  CreatePRRequest,
  GitHubAuth,
} from './types.js';
import {
  GitHubError,
  describeGitHubError,
  isGitHubPR,
  isGitHubPRList,
} from './types.js';

export type GitHubResult<T> = Result<T, GitHubError>;

export interface GitHubAPIOptions {
  repoRoot: string;
  remote: string;
  gitOps?: IGitOperations;
  env?: NodeJS.ProcessEnv;
}

/**
 * Parse a GitHub remote URL (HTTPS or SSH) into host, owner and repo
 */
export function parseGitHubUrl(remoteUrl: string): GitHubRepo | null {
  const url = remoteUrl.trim().replace(/\.git$/, '');

  // HTTPS format: https://github.com/owner/repo
  const httpsMatch = url.match(/^https?:\/\/(?:[^@/]+@)?([^/]+)\/([^/]+)\/([^/]+)$/);
  if (httpsMatch) {
    return { host: httpsMatch[1], owner: httpsMatch[2], repo: httpsMatch[3] };
  }

  // SSH format: git@github.com:owner/repo
  const sshMatch = url.match(/^[^@]+@([^:]+):([^/]+)\/(.+)$/);
  if (sshMatch) {
    return { host: sshMatch[1], owner: sshMatch[2], repo: sshMatch[3] };
  }

  return null;
}

export function pullRequestUrl(repo: GitHubRepo, prNumber: number): string {
  return `https://${repo.host}/${repo.owner}/${repo.repo}/pull/${prNumber}`;
}

export class GitHubAPI {
  private auth: GitHubAuth | null = null;
  private repo: GitHubRepo | null = null;
  private readonly git: IGitOperations;
  private readonly env: NodeJS.ProcessEnv;

  constructor(private readonly options: GitHubAPIOptions) {
    this.git = options.gitOps || defaultGitOps;
    this.env = options.env || process.env;
  }

  /**
   * Authenticate with GitHub
   * Try gh CLI first, then env var, then prompt
   */
  async authenticate(): Promise<GitHubResult<GitHubAuth>> {
    if (this.auth) {
      return ok(this.auth);
    }

    const ghToken = await this.getGHToken();
    if (ghToken) {
      this.auth = { token: ghToken, source: 'gh-cli' };
      return ok(this.auth);
    }

    const envToken = this.env.GITHUB_TOKEN || this.env.GH_TOKEN;
    if (envToken) {
      this.auth = { token: envToken, source: 'env' };
      return ok(this.auth);
    }

    const token = await clack.text({
      message: 'GitHub Personal Access Token:',
      placeholder: 'ghp_...',
      validate: (value) => {
        if (!value) return 'Token is required';
        if (!value.startsWith('ghp_') && !value.startsWith('github_pat_')) {
          return 'Invalid token format';
        }
      },
    });

    if (clack.isCancel(token)) {
      return err(new GitHubError('Authentication cancelled'));
    }

    this.auth = { token, source: 'prompt' };
    return ok(this.auth);
  }

  /**
   * Try to get token from gh CLI
   */
  private async getGHToken(): Promise<string | null> {
    const result = await execa('gh', ['auth', 'token'], { reject: false });

    if (result.exitCode === 0 && result.stdout.trim()) {
      return result.stdout.trim();
    }
    return null;
  }

  /**
   * Get repository info from the configured remote
   */
  async getRepoInfo(): Promise<GitHubResult<GitHubRepo>> {
    if (this.repo) {
      return ok(this.repo);
    }

    const remoteResult = await this.git.getRemoteUrl(this.options.remote, this.options.repoRoot);
    if (remoteResult.isErr()) {
      return err(new GitHubError('Could not get remote URL: ' + remoteResult.error.message));
    }

    const repo = parseGitHubUrl(remoteResult.value);
    if (!repo) {
      return err(
        new GitHubError('Could not parse GitHub repository from remote URL: ' + remoteResult.value)
      );
    }

    this.repo = repo;
    return ok(repo);
  }

  private getAPIBaseUrl(host: string): string {
    if (host === 'github.com') {
      return 'https://api.github.com';
    }
    // GitHub Enterprise
    return `https://${host}/api/v3`;
  }

  /**
   * Make an authenticated API request and check the response shape
   */
  private async apiRequest<T>(
    endpoint: string,
    guard: (value: unknown) => value is T,
    init: { method?: string; body?: string } = {}
  ): Promise<GitHubResult<T>> {
    const authResult = await this.authenticate();
    if (authResult.isErr()) {
      return err(authResult.error);
    }

    const repoResult = await this.getRepoInfo();
    if (repoResult.isErr()) {
      return err(repoResult.error);
    }

    const url = `${this.getAPIBaseUrl(repoResult.value.host)}${endpoint}`;

    let response: Response;
    try {
      response = await fetch(url, {
        ...init,
        headers: {
          Authorization: `Bearer ${authResult.value.token}`,
          Accept: 'application/vnd.github+json',
          'X-GitHub-Api-Version': '2022-11-28',
          'Content-Type': 'application/json',
        },
      });
    } catch (e) {
      return err(new GitHubError(`GitHub request failed: ${e instanceof Error ? e.message : String(e)}`));
    }

    const text = await response.text();
    const parsed = Result.fromThrowable(
      (): unknown => JSON.parse(text),
      () => null
    )();

    if (!response.ok) {
      const message = parsed.isOk() ? describeGitHubError(parsed.value) : null;
      return err(
        new GitHubError(
          message ?? `GitHub API error: ${response.status} ${response.statusText}`,
          response.status,
          text
        )
      );
    }

    if (parsed.isErr() || !guard(parsed.value)) {
      return err(new GitHubError('Unexpected response from GitHub', response.status, text));
    }

    return ok(parsed.value);
  }

  async createPR(request: CreatePRRequest): Promise<GitHubResult<GitHubPR>> {
    const repoResult = await this.getRepoInfo();
    if (repoResult.isErr()) {
      return err(repoResult.error);
    }

    const repo = repoResult.value;

    return this.apiRequest(`/repos/${repo.owner}/${repo.repo}/pulls`, isGitHubPR, {
      method: 'POST',
      body: JSON.stringify({
        title: request.title,
        head: request.head,
        base: request.base,
        body: request.body || '',
        draft: request.draft || false,
      }),
    });
  }

  /**
   * Get the open PR for a branch, if any
   */
  async getPRForBranch(branch: string): Promise<GitHubResult<GitHubPR | null>> {
    const repoResult = await this.getRepoInfo();
    if (repoResult.isErr()) {
      return err(repoResult.error);
    }

    const repo = repoResult.value;
    const head = encodeURIComponent(`${repo.owner}:${branch}`);
    const prsResult = await this.apiRequest(
      `/repos/${repo.owner}/${repo.repo}/pulls?head=${head}&state=open`,
      isGitHubPRList
    );

    return prsResult.map((prs) => prs[0] ?? null);
  }

  /**
   * Update a PR (title, body, etc.)
   */
  async updatePR(
    prNumber: number,
    updates: { title?: string; body?: string }
  ): Promise<GitHubResult<GitHubPR>> {
    const repoResult = await this.getRepoInfo();
    if (repoResult.isErr()) {
      return err(repoResult.error);
    }

    const repo = repoResult.value;

    return this.apiRequest(`/repos/${repo.owner}/${repo.repo}/pulls/${prNumber}`, isGitHubPR, {
      method: 'PATCH',
      body: JSON.stringify(updates),
    });
  }
}
