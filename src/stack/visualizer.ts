/**
 * Generate tree structures for stack visualization
 */

import pc from 'picocolors';
import { ColorManager } from './colors.js';
import { shortSha, type BranchStatus, type StatusReport } from './status.js';

export interface VisualizationOptions {
  /** Append the anchor commit to each branch line */
  showAnchors?: boolean;
}

export class StackVisualizer {
  private colorManager: ColorManager;

  constructor(colorManager?: ColorManager) {
    this.colorManager = colorManager || new ColorManager();
  }

  /**
   * Render the whole stack forest from trunk down
   */
  visualizeStatus(report: StatusReport, options: VisualizationOptions = {}): string[] {
    const lines: string[] = [];

    const byParent = new Map<string, BranchStatus[]>();
    for (const status of report.branches) {
      const siblings = byParent.get(status.parent) ?? [];
      siblings.push(status);
      byParent.set(status.parent, siblings);
    }

    let trunkLine = this.marker(report.trunk === report.currentBranch) + pc.bold(report.trunk);
    if (report.trunkCommit) {
      trunkLine += ' ' + pc.dim(shortSha(report.trunkCommit));
    }
    lines.push(trunkLine);

    const roots = byParent.get(report.trunk) ?? [];
    roots.forEach((root, i) => {
      const colorFn = this.colorManager.getColorForStack(root.branch);
      this.buildTreeLines(root, byParent, '', i === roots.length - 1, report, colorFn, options, lines);
    });

    if (!report.currentTracked && report.currentBranch) {
      lines.push('');
      lines.push(
        pc.yellow(`'${report.currentBranch}' is not tracked.`) +
          pc.dim(` Run 'git-stack mount <parent>' to add it.`)
      );
    }

    if (report.operation) {
      const remaining = report.operation.remaining.length;
      lines.push('');
      lines.push(
        pc.yellow(`Restack paused on '${report.operation.blocked}'`) +
          pc.dim(` (${remaining} branch${remaining !== 1 ? 'es' : ''} left).`) +
          pc.dim(` Run 'git-stack restack' to continue or 'git-stack restack --abort'.`)
      );
    }

    return lines;
  }

  /**
   * Recursively build tree lines for a branch and its children
   */
  private buildTreeLines(
    status: BranchStatus,
    byParent: Map<string, BranchStatus[]>,
    prefix: string,
    isLast: boolean,
    report: StatusReport,
    colorFn: (text: string) => string,
    options: VisualizationOptions,
    lines: string[]
  ): void {
    const isCurrent = status.branch === report.currentBranch;
    const connector = isLast ? '└──' : '├──';

    let line = this.marker(isCurrent) + prefix + colorFn(connector) + ' ';
    line += isCurrent ? pc.bold(colorFn(status.branch)) : colorFn(status.branch);
    line += ' ' + this.describe(status, options);
    lines.push(line);

    const children = byParent.get(status.branch) ?? [];
    const childPrefix = prefix + (isLast ? '    ' : colorFn('│') + '   ');
    children.forEach((child, i) => {
      this.buildTreeLines(child, byParent, childPrefix, i === children.length - 1, report, colorFn, options, lines);
    });
  }

  private describe(status: BranchStatus, options: VisualizationOptions): string {
    if (status.commit === null) {
      return pc.red('does not exist!');
    }

    const parts: string[] = [pc.dim(shortSha(status.commit))];

    if (status.relation === 'stacked') {
      parts.push(pc.green(`is stacked on ${status.parent}`));
    } else if (status.relation === 'diverged') {
      parts.push(pc.yellow(`diverges from ${status.parent}`) + pc.dim(` (${status.commitsBehind} behind)`));
    } else {
      parts.push(pc.red(`parent ${status.parent} does not exist!`));
    }

    if (status.upstream === 'synced') {
      parts.push(pc.green('synced'));
    } else if (status.upstream === 'not-synced') {
      parts.push(pc.yellow('not synced'));
    } else {
      parts.push(pc.dim('no upstream'));
    }

    if (status.prNumber !== undefined) {
      parts.push(pc.cyan(`#${status.prNumber}`));
    }

    if (options.showAnchors) {
      parts.push(pc.dim(`anchor ${status.anchor ? shortSha(status.anchor) : 'unknown'}`));
    }

    return parts.join(pc.dim(' · '));
  }

  private marker(isCurrent: boolean): string {
    return isCurrent ? pc.bold(pc.green('● ')) : '  ';
  }
}
