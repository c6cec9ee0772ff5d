/**
 * Status command - show every stack as a tree from trunk
 */

import * as clack from '@clack/prompts';
import pc from 'picocolors';
import { StatusReporter } from '../stack/status.js';
import { StackVisualizer } from '../stack/visualizer.js';
import { exitWithError, openRepository, type GlobalOptions } from './context.js';

export interface StatusOptions extends GlobalOptions {
  /** Show each branch's anchor commit */
  anchors?: boolean;
}

export async function statusCommand(options: StatusOptions = {}): Promise<void> {
  const { config, gitOps, logger } = await openRepository(options);
  const spinner = clack.spinner();

  spinner.start('Checking stack status...');
  const reporter = new StatusReporter(config, { gitOps, logger });
  const result = await reporter.collect();

  if (result.isErr()) {
    spinner.stop('Failed');
    exitWithError(result.error);
  }
  spinner.stop('Stack status');

  const report = result.value;
  const visualizer = new StackVisualizer();

  console.log('');
  for (const line of visualizer.visualizeStatus(report, { showAnchors: options.anchors || options.verbose })) {
    console.log(line);
  }
  console.log('');

  if (report.branches.length === 0) {
    console.log(
      pc.dim('No stacked branches yet. Create one with ') +
        pc.cyan('git-stack checkout <branch>')
    );
    console.log('');
  }
}
