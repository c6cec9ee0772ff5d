/**
 * Restack command - rebase a branch and everything above it onto their
 * parents, resuming where a conflict left off
 */

import * as clack from '@clack/prompts';
import pc from 'picocolors';
import { RestackOrchestrator, type RestackReport, type RestackStep } from '../stack/restack.js';
import { exitWithError, openRepository, type GlobalOptions } from './context.js';

export interface RestackCommandOptions extends GlobalOptions {
  branch?: string;
  fetch?: boolean;
  ancestors?: boolean;
  push?: boolean;
  abort?: boolean;
}

function describeStep(step: RestackStep): string {
  const name = pc.cyan(step.branch);
  const pushed = step.pushed ? pc.dim(' (pushed)') : '';

  switch (step.state) {
    case 'succeeded':
      if (step.action === 'fast-forwarded') {
        return `${pc.green('✓')} ${name} fast-forwarded to ${step.parent}${pushed}`;
      }
      if (step.action === 'continued') {
        return `${pc.green('✓')} ${name} finished rebasing onto ${step.parent}${pushed}`;
      }
      return `${pc.green('✓')} ${name} rebased onto ${step.parent}${pushed}`;
    case 'skipped':
      return `${pc.dim('•')} ${name} ${pc.dim(`already on ${step.parent}`)}${pushed}`;
    case 'conflict-paused':
      return `${pc.red('✗')} ${name} has conflicts with ${step.parent}`;
    case 'pending':
      return `${pc.dim('○')} ${pc.dim(step.branch)}`;
    case 'rebasing':
      return `${pc.yellow('…')} ${name}`;
  }
}

export function printRestackReport(report: RestackReport): void {
  for (const step of report.steps) {
    console.log('  ' + describeStep(step));
  }
  console.log('');

  if (report.outcome === 'paused' && report.conflict) {
    const files = report.conflict.details?.files;
    if (Array.isArray(files) && files.length > 0) {
      clack.log.warn(`Conflicting files:\n${files.map((file) => `  ${String(file)}`).join('\n')}`);
    }
    clack.log.warn(report.conflict.format());
    return;
  }

  const changed = report.steps.filter((step) => step.state === 'succeeded').length;
  clack.log.success(
    changed === 0
      ? 'Everything is already stacked'
      : `Restacked ${changed} branch${changed !== 1 ? 'es' : ''}`
  );
}

export async function restackCommand(options: RestackCommandOptions = {}): Promise<void> {
  const { config, gitOps, logger } = await openRepository(options);
  const spinner = clack.spinner();

  const orchestrator = new RestackOrchestrator(config, {
    gitOps,
    logger,
    onStep: (branch) => spinner.message(`Restacking ${branch}...`),
  });

  if (options.abort) {
    const aborted = await orchestrator.abort();
    if (aborted.isErr()) {
      exitWithError(aborted.error);
    }
    const { blocked, originalBranch } = aborted.value;
    clack.log.success(
      `Aborted restack${blocked ? ` of ${pc.cyan(blocked)}` : ''}` +
        (originalBranch ? `, back on ${pc.cyan(originalBranch)}` : '')
    );
    return;
  }

  spinner.start('Restacking...');
  const result = await orchestrator.restack({
    target: options.branch,
    fetch: options.fetch,
    ancestors: options.ancestors,
    push: options.push,
  });

  if (result.isErr()) {
    spinner.stop('Failed');
    exitWithError(result.error);
  }

  const report = result.value;
  spinner.stop(report.outcome === 'paused' ? 'Restack paused' : 'Restack complete');
  console.log('');
  printRestackReport(report);
}
