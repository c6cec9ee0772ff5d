/**
 * PR command - open a GitHub pull request for the current branch against
 * its parent, with stack navigation in the description
 */

import * as clack from '@clack/prompts';
import pc from 'picocolors';
import { GitHubAPI, pullRequestUrl } from '../github/api.js';
import { buildNavigationInfo, updatePRDescription } from '../github/pr-formatter.js';
import type { GitHubError } from '../github/types.js';
import { StackError, StackErrors } from '../stack/errors.js';
import { StateStore } from '../stack/store.js';
import { exitWithError, openRepository, unwrapOrExit, type GlobalOptions } from './context.js';

export interface PRCommandOptions extends GlobalOptions {
  draft?: boolean;
  /** Push the branch before opening the PR */
  push?: boolean;
}

function exitWithGitHubError(error: GitHubError): never {
  exitWithError(
    new StackError(
      'GITHUB_ERROR',
      error.message,
      { statusCode: error.statusCode },
      'Check that your token can access this repository'
    )
  );
}

export async function prCommand(options: PRCommandOptions = {}): Promise<void> {
  const { config, gitOps, logger } = await openRepository(options);
  const store = new StateStore(config, logger);
  const spinner = clack.spinner();

  const graph = unwrapOrExit(await store.load());

  const branch = await gitOps.getCurrentBranch(config.repoRoot);
  if (!branch) {
    clack.cancel('Could not determine current branch');
    process.exit(1);
  }

  const node = graph.get(branch) ?? unwrapOrExit(StackErrors.notTracked(branch));

  if (options.push) {
    spinner.start(`Pushing ${branch}...`);
    const pushed = await gitOps.pushForce(branch, config.remote, config.repoRoot);
    if (pushed.isErr()) {
      spinner.stop('Failed');
      unwrapOrExit(StackErrors.vcsFailed('push', pushed.error.message, branch));
    }
    spinner.stop(`Pushed ${branch}`);
  } else if (!(await gitOps.remoteBranchExists(branch, config.remote, config.repoRoot))) {
    clack.cancel(
      `Branch '${branch}' has not been pushed to ${config.remote}.\n\n` +
        `Push it first, or run: ${pc.cyan('git-stack pr --push')}`
    );
    process.exit(1);
  }

  const github = new GitHubAPI({ repoRoot: config.repoRoot, remote: config.remote, gitOps });

  spinner.start('Authenticating with GitHub...');
  const auth = await github.authenticate();
  if (auth.isErr()) {
    spinner.stop('Failed');
    exitWithGitHubError(auth.error);
  }
  spinner.stop(`Authenticated via ${auth.value.source}`);

  const repoResult = await github.getRepoInfo();
  if (repoResult.isErr()) {
    exitWithGitHubError(repoResult.error);
  }
  const repo = repoResult.value;
  clack.log.info(`Repository: ${repo.owner}/${repo.repo} (${repo.host})`);

  const navigation = buildNavigationInfo(graph, branch, (prNumber) => pullRequestUrl(repo, prNumber));

  spinner.start('Checking for an existing PR...');
  const existing = await github.getPRForBranch(branch);
  if (existing.isErr()) {
    spinner.stop('Failed');
    exitWithGitHubError(existing.error);
  }

  let prNumber: number;
  let prUrl: string;

  if (existing.value) {
    const pr = existing.value;
    spinner.message(`Updating stack navigation on #${pr.number}...`);
    const updated = await github.updatePR(pr.number, {
      body: updatePRDescription(pr.body, navigation),
    });
    if (updated.isErr()) {
      spinner.stop('Failed');
      exitWithGitHubError(updated.error);
    }
    spinner.stop(`PR #${pr.number} already open`);
    prNumber = pr.number;
    prUrl = pr.html_url;
  } else {
    const subject = await gitOps.getCommitSubject(branch, config.repoRoot);
    const title = subject.isOk() && subject.value ? subject.value : branch;

    spinner.message(`Creating PR for ${branch}...`);
    const created = await github.createPR({
      title,
      head: branch,
      base: node.parent,
      body: updatePRDescription(null, navigation),
      draft: options.draft,
    });
    if (created.isErr()) {
      spinner.stop('Failed');
      exitWithGitHubError(created.error);
    }
    spinner.stop(`Created PR #${created.value.number}`);
    prNumber = created.value.number;
    prUrl = created.value.html_url;
  }

  graph.setPrNumber(branch, prNumber);
  const saved = await store.save(graph);
  if (saved.isErr()) {
    logger.warn(`Could not cache PR number for '${branch}'`, { error: saved.error.message });
  }

  console.log('');
  console.log(`  ${pc.green('✓')} ${pc.cyan(branch)} → ${pc.cyan(node.parent)}  ${pc.dim(prUrl)}`);
  console.log('');
}
