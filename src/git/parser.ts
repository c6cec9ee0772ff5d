/**
 * Parse git porcelain output into structured data
 */

import type { GitStatus } from './types.js';

const CONFLICT_CODES = new Set(['DD', 'AU', 'UD', 'UA', 'DU', 'AA', 'UU']);

export class GitParser {
  /**
   * Parse git status --porcelain=v1 output
   */
  static parseStatus(statusOutput: string): GitStatus {
    const lines = statusOutput.split('\n').filter((l) => l.trim());

    let staged = 0;
    let unstaged = 0;
    let untracked = 0;
    const conflicted: string[] = [];

    for (const line of lines) {
      const code = line.slice(0, 2);
      const x = line[0]; // Index status
      const y = line[1]; // Working tree status

      if (CONFLICT_CODES.has(code)) {
        conflicted.push(line.slice(3));
      } else if (x === '?' && y === '?') {
        untracked++;
      } else {
        if (x !== ' ' && x !== '?') staged++;
        if (y !== ' ' && y !== '?') unstaged++;
      }
    }

    return {
      dirty: staged > 0 || unstaged > 0 || conflicted.length > 0,
      staged,
      unstaged,
      untracked,
      conflicted,
    };
  }

  /**
   * Parse `git for-each-ref --format=%(upstream:track)` output.
   * Git prints "[gone]" once the upstream ref was deleted on the remote.
   */
  static isUpstreamGone(trackOutput: string): boolean {
    return trackOutput.trim() === '[gone]';
  }

  /**
   * Parse `git cherry <upstream> <head>` output. Lines starting with "+" are
   * commits with no patch-equivalent upstream.
   */
  static countUnmergedCherries(cherryOutput: string): number {
    return cherryOutput
      .split('\n')
      .filter((line) => line.startsWith('+')).length;
  }

  /**
   * Extract the branch name a rebase is operating on from the contents of
   * .git/rebase-merge/head-name (or rebase-apply/head-name)
   */
  static parseRebaseHeadName(headName: string): string | null {
    const trimmed = headName.trim();
    if (!trimmed || trimmed === 'detached HEAD') {
      return null;
    }
    return GitParser.normalizeBranchName(trimmed);
  }

  /**
   * Strip "refs/remotes/<remote>/" from a symbolic ref
   */
  static parseRemoteHead(symbolicRef: string, remote: string): string | null {
    const prefix = `refs/remotes/${remote}/`;
    const trimmed = symbolicRef.trim();
    if (!trimmed.startsWith(prefix)) {
      return null;
    }
    return trimmed.slice(prefix.length) || null;
  }

  /**
   * Extract branch name from refs/heads/ format
   */
  static normalizeBranchName(ref: string): string {
    return ref.replace(/^refs\/heads\//, '');
  }

  /**
   * Sanitize a path-like value for use as a single file name
   */
  static sanitizePath(value: string): string {
    return value
      .replace(/^[/\\]+/, '')
      .replace(/[/\\:]+/g, '-')
      .replace(/[^A-Za-z0-9._-]/g, '_');
  }
}
