/**
 * PR description formatter for stack navigation
 */

import type { StackGraph } from '../stack/graph.js';

export interface PRLink {
  number: number;
  url: string;
}

/**
 * Stack navigation info for PR description
 */
export interface StackNavigationInfo {
  /** Branch stacked directly on trunk that this stack grows from */
  stackRoot: string;
  trunk: string;
  currentBranch: string;
  parent: {
    branch: string;
    pr?: PRLink;
  };
  children: Array<{
    branch: string;
    pr?: PRLink;
  }>;
}

/**
 * Markers for identifying managed sections in PR description
 */
const STACK_SECTION_START = '<!-- git-stack-start -->';
const STACK_SECTION_END = '<!-- git-stack-end -->';

function prCell(pr: PRLink | undefined): string {
  return pr ? `[#${pr.number}](${pr.url})` : '—';
}

/**
 * Format stack navigation as markdown for PR description
 */
export function formatStackNavigation(info: StackNavigationInfo): string {
  const lines: string[] = [];

  lines.push(STACK_SECTION_START);
  lines.push('');
  lines.push('---');
  lines.push('');
  lines.push('## 📚 Stack');
  lines.push('');
  lines.push('| | Branch | PR |');
  lines.push('|---|--------|-----|');

  const parentLabel = info.parent.branch === info.trunk ? '(trunk)' : prCell(info.parent.pr);
  lines.push(`| ⬆️ | \`${info.parent.branch}\` | ${parentLabel} |`);

  lines.push(`| → | **\`${info.currentBranch}\`** | **this PR** |`);

  for (const child of info.children) {
    lines.push(`| ⬇️ | \`${child.branch}\` | ${prCell(child.pr)} |`);
  }

  lines.push('');
  lines.push(`<sub>Part of stack \`${info.stackRoot}\` · Managed by git-stack</sub>`);
  lines.push('');
  lines.push(STACK_SECTION_END);

  return lines.join('\n');
}

/**
 * Add or update stack navigation in a PR description
 */
export function updatePRDescription(
  existingBody: string | undefined | null,
  navigation: StackNavigationInfo
): string {
  const body = existingBody || '';
  const navSection = formatStackNavigation(navigation);

  const startIndex = body.indexOf(STACK_SECTION_START);
  const endIndex = body.indexOf(STACK_SECTION_END);

  if (startIndex !== -1 && endIndex !== -1) {
    return (
      body.slice(0, startIndex) +
      navSection +
      body.slice(endIndex + STACK_SECTION_END.length)
    );
  }

  if (body.trim()) {
    return body.trim() + '\n\n' + navSection;
  }

  return navSection;
}

/**
 * Build navigation info for a tracked branch. `prLink` turns a cached PR
 * number into a link.
 */
export function buildNavigationInfo(
  graph: StackGraph,
  currentBranch: string,
  prLink: (prNumber: number) => string
): StackNavigationInfo {
  const link = (branch: string): PRLink | undefined => {
    const prNumber = graph.get(branch)?.prNumber;
    return prNumber === undefined ? undefined : { number: prNumber, url: prLink(prNumber) };
  };

  const parent = graph.get(currentBranch)?.parent ?? graph.trunk;
  const ancestors = graph.ancestors(currentBranch);

  return {
    stackRoot: ancestors[ancestors.length - 1] ?? currentBranch,
    trunk: graph.trunk,
    currentBranch,
    parent: {
      branch: parent,
      pr: link(parent),
    },
    children: graph.childrenOf(currentBranch).map((branch) => ({
      branch,
      pr: link(branch),
    })),
  };
}
