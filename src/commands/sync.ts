/**
 * Sync command - prune branches that have landed on the remote trunk
 */

import * as clack from '@clack/prompts';
import pc from 'picocolors';
import { SyncEngine } from '../stack/sync.js';
import { exitWithError, openRepository, type GlobalOptions } from './context.js';
import { printRestackReport } from './restack.js';

export interface SyncCommandOptions extends GlobalOptions {
  dryRun?: boolean;
  restack?: boolean;
  push?: boolean;
}

export async function syncCommand(options: SyncCommandOptions = {}): Promise<void> {
  const { config, gitOps, logger } = await openRepository(options);
  const spinner = clack.spinner();

  spinner.start(`Fetching ${config.remote}...`);
  const engine = new SyncEngine(config, { gitOps, logger });
  const result = await engine.sync({
    dryRun: options.dryRun,
    restack: options.restack,
    push: options.push,
  });

  if (result.isErr()) {
    spinner.stop('Failed');
    exitWithError(result.error);
  }

  const report = result.value;
  spinner.stop(report.dryRun ? 'Sync plan' : 'Synced');
  console.log('');

  if (report.candidates.length === 0) {
    console.log(pc.dim('  No merged branches to prune'));
  } else if (report.dryRun) {
    for (const candidate of report.candidates) {
      const why = candidate.reason === 'merged' ? 'merged' : 'merged, remote branch deleted';
      console.log(`  ${pc.yellow('−')} ${pc.cyan(candidate.branch)} ${pc.dim(`(${why})`)}`);
    }
    console.log('');
    console.log(pc.dim('Run without --dry-run to prune these branches.'));
  } else {
    for (const pruned of report.pruned) {
      let line = `  ${pc.red('−')} ${pc.cyan(pruned.branch)}`;
      if (pruned.rewired.length > 0) {
        line += pc.dim(` (${pruned.rewired.join(', ')} moved onto ${pruned.parent})`);
      }
      console.log(line);
    }
  }
  console.log('');

  if (report.trunkUpdated) {
    clack.log.info(`Fast-forwarded ${pc.cyan(config.trunk)}`);
  }
  if (report.restack) {
    printRestackReport(report.restack);
  }
}
