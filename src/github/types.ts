/**
 * GitHub API types
 */

export interface GitHubRepo {
  owner: string;
  repo: string;
  host: string; // e.g., "github.com" or GitHub Enterprise host
}

export interface GitHubPR {
  number: number;
  title: string;
  body: string | null;
  html_url: string;
  head: {
    ref: string;
  };
  base: {
    ref: string;
  };
  state: 'open' | 'closed';
  draft: boolean;
}

export interface CreatePRRequest {
  title: string;
  head: string;
  base: string;
  body?: string;
  draft?: boolean;
}

export interface GitHubAuth {
  token: string;
  source: 'gh-cli' | 'env' | 'prompt';
}

export class GitHubError extends Error {
  constructor(
    message: string,
    public statusCode?: number,
    public response?: string
  ) {
    super(message);
    this.name = 'GitHubError';
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isRefObject(value: unknown): value is { ref: string } {
  return isRecord(value) && typeof value.ref === 'string';
}

export function isGitHubPR(value: unknown): value is GitHubPR {
  return (
    isRecord(value) &&
    typeof value.number === 'number' &&
    typeof value.title === 'string' &&
    (value.body === null || typeof value.body === 'string') &&
    typeof value.html_url === 'string' &&
    isRefObject(value.head) &&
    isRefObject(value.base) &&
    (value.state === 'open' || value.state === 'closed') &&
    typeof value.draft === 'boolean'
  );
}

export function isGitHubPRList(value: unknown): value is GitHubPR[] {
  return Array.isArray(value) && value.every(isGitHubPR);
}

/**
 * Pull a readable message out of a GitHub error body
 */
export function describeGitHubError(body: unknown): string | null {
  if (!isRecord(body) || typeof body.message !== 'string') {
    return null;
  }

  let message = body.message;
  if (Array.isArray(body.errors)) {
    const details = body.errors
      .map((e: unknown) => {
        if (typeof e === 'string') return e;
        if (!isRecord(e)) return JSON.stringify(e);
        if (typeof e.message === 'string') return e.message;
        if (typeof e.resource === 'string' && typeof e.field === 'string') {
          return `${e.resource}.${e.field}: ${typeof e.code === 'string' ? e.code : 'invalid'}`;
        }
        return JSON.stringify(e);
      })
      .join('; ');
    message += ` (${details})`;
  }
  return message;
}
