/**
 * CLI argument parsing and command routing
 */

import * as clack from '@clack/prompts';
import pc from 'picocolors';
import { checkoutCommand } from './commands/checkout.js';
import type { GlobalOptions } from './commands/context.js';
import { deleteCommand } from './commands/delete.js';
import { diffCommand } from './commands/diff.js';
import { logCommand } from './commands/log.js';
import { mountCommand, type MountOptions } from './commands/mount.js';
import { prCommand } from './commands/pr.js';
import { restackCommand, type RestackCommandOptions } from './commands/restack.js';
import { statusCommand } from './commands/status.js';
import { syncCommand } from './commands/sync.js';

export const VERSION = '0.1.0';

/**
 * Pull global flags out of the argument list
 */
export function parseGlobalOptions(args: string[]): { globals: GlobalOptions; rest: string[] } {
  const globals: GlobalOptions = {};
  const rest: string[] = [];

  for (const arg of args) {
    if (arg === '--verbose') {
      globals.verbose = true;
    } else {
      rest.push(arg);
    }
  }

  return { globals, rest };
}

export async function runCLI(argv: string[]): Promise<void> {
  const { globals, rest: args } = parseGlobalOptions(argv);
  const command: string | undefined = args[0];
  const rest = args.slice(1);

  if (command === 'help' || command === '--help' || command === '-h') {
    showHelp();
    return;
  }

  if (command === '--version' || command === '-v') {
    showVersion();
    return;
  }

  try {
    switch (command) {
      case undefined:
      case 'status':
      case 'st':
        await handleStatusCommand(rest, globals);
        break;

      case 'checkout':
      case 'co':
        await handleCheckoutCommand(rest, globals);
        break;

      case 'restack':
        await handleRestackCommand(rest, globals);
        break;

      case 'mount':
        await handleMountCommand(rest, globals);
        break;

      case 'diff':
        await handleBranchArgCommand(rest, globals, diffCommand, showDiffHelp);
        break;

      case 'log':
        await handleBranchArgCommand(rest, globals, logCommand, showLogHelp);
        break;

      case 'delete':
        await handleDeleteCommand(rest, globals);
        break;

      case 'sync':
        await handleSyncCommand(rest, globals);
        break;

      case 'pr':
        await handlePRCommand(rest, globals);
        break;

      default:
        clack.log.error(`Unknown command: ${command}`);
        console.log('');
        showHelp();
        process.exit(1);
    }
  } catch (error) {
    clack.log.error(error instanceof Error ? error.message : String(error));
    process.exit(1);
  }
}

function unexpected(arg: string): never {
  clack.log.error(`Unexpected argument: ${arg}`);
  process.exit(1);
}

/**
 * Value of an option that takes one, e.g. `--branch feat`
 */
function optionValue(args: string[], index: number, flag: string): string {
  const value = args[index + 1];
  if (value === undefined || value.startsWith('-')) {
    clack.log.error(`${flag} needs a value`);
    process.exit(1);
  }
  return value;
}

async function handleStatusCommand(args: string[], globals: GlobalOptions): Promise<void> {
  const options = { ...globals, anchors: false };

  for (const arg of args) {
    switch (arg) {
      case '-a':
      case '--anchors':
        options.anchors = true;
        break;
      case '-h':
      case '--help':
        showStatusHelp();
        return;
      default:
        unexpected(arg);
    }
  }

  await statusCommand(options);
}

async function handleCheckoutCommand(args: string[], globals: GlobalOptions): Promise<void> {
  let branch = '';

  for (const arg of args) {
    switch (arg) {
      case '-h':
      case '--help':
        showCheckoutHelp();
        return;
      default:
        if (!branch) {
          branch = arg;
        } else {
          unexpected(arg);
        }
    }
  }

  if (!branch) {
    clack.log.error('Branch name required');
    showCheckoutHelp();
    process.exit(1);
  }

  await checkoutCommand(branch, globals);
}

async function handleRestackCommand(args: string[], globals: GlobalOptions): Promise<void> {
  const options: RestackCommandOptions = { ...globals };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    switch (arg) {
      case '-b':
      case '--branch':
        options.branch = optionValue(args, i, arg);
        i++;
        break;
      case '-f':
      case '--fetch':
        options.fetch = true;
        break;
      case '-a':
      case '--ancestors':
        options.ancestors = true;
        break;
      case '-p':
      case '--push':
        options.push = true;
        break;
      case '--abort':
        options.abort = true;
        break;
      case '-h':
      case '--help':
        showRestackHelp();
        return;
      default:
        unexpected(arg);
    }
  }

  await restackCommand(options);
}

async function handleMountCommand(args: string[], globals: GlobalOptions): Promise<void> {
  const options: MountOptions = { ...globals };
  let parent: string | undefined;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    switch (arg) {
      case '-b':
      case '--branch':
        options.branch = optionValue(args, i, arg);
        i++;
        break;
      case '-h':
      case '--help':
        showMountHelp();
        return;
      default:
        if (parent === undefined) {
          parent = arg;
        } else {
          unexpected(arg);
        }
    }
  }

  await mountCommand(parent, options);
}

async function handleBranchArgCommand(
  args: string[],
  globals: GlobalOptions,
  command: (branch: string | undefined, options: GlobalOptions) => Promise<void>,
  showCommandHelp: () => void
): Promise<void> {
  let branch: string | undefined;

  for (const arg of args) {
    switch (arg) {
      case '-h':
      case '--help':
        showCommandHelp();
        return;
      default:
        if (branch === undefined) {
          branch = arg;
        } else {
          unexpected(arg);
        }
    }
  }

  await command(branch, globals);
}

async function handleDeleteCommand(args: string[], globals: GlobalOptions): Promise<void> {
  const options = { ...globals, keepBranch: false, force: false };
  let branch = '';

  for (const arg of args) {
    switch (arg) {
      case '-k':
      case '--keep-branch':
        options.keepBranch = true;
        break;
      case '-f':
      case '--force':
        options.force = true;
        break;
      case '-h':
      case '--help':
        showDeleteHelp();
        return;
      default:
        if (!branch) {
          branch = arg;
        } else {
          unexpected(arg);
        }
    }
  }

  if (!branch) {
    clack.log.error('Branch name required');
    showDeleteHelp();
    process.exit(1);
  }

  await deleteCommand(branch, options);
}

async function handleSyncCommand(args: string[], globals: GlobalOptions): Promise<void> {
  const options = { ...globals, dryRun: false, restack: false, push: false };

  for (const arg of args) {
    switch (arg) {
      case '-n':
      case '--dry-run':
        options.dryRun = true;
        break;
      case '-r':
      case '--restack':
        options.restack = true;
        break;
      case '-p':
      case '--push':
        options.push = true;
        break;
      case '-h':
      case '--help':
        showSyncHelp();
        return;
      default:
        unexpected(arg);
    }
  }

  await syncCommand(options);
}

async function handlePRCommand(args: string[], globals: GlobalOptions): Promise<void> {
  const options = { ...globals, draft: false, push: false };

  for (const arg of args) {
    switch (arg) {
      case '-d':
      case '--draft':
        options.draft = true;
        break;
      case '-p':
      case '--push':
        options.push = true;
        break;
      case '-h':
      case '--help':
        showPRHelp();
        return;
      default:
        unexpected(arg);
    }
  }

  await prCommand(options);
}

function showVersion(): void {
  console.log(`git-stack v${VERSION}`);
}

function showHelp(): void {
  console.log(`
${pc.bold('git-stack')} - Stacked branches on plain git

${pc.bold('Usage:')}
  git-stack <command> [options]

${pc.bold('Commands:')}
  ${pc.cyan('status, st')}         Show all stacks as a tree (default)
  ${pc.cyan('checkout, co')}       Switch to a branch, creating it on top of the current one
  ${pc.cyan('restack')}            Rebase a branch and its descendants onto their parents
  ${pc.cyan('mount')}              Stack a branch on a different parent
  ${pc.cyan('diff')}               Show a branch's own changes
  ${pc.cyan('log')}                Show the commits a branch adds to its parent
  ${pc.cyan('delete')}             Stop tracking a branch and delete it
  ${pc.cyan('sync')}               Prune merged branches after fetching
  ${pc.cyan('pr')}                 Open a GitHub PR for the current branch

${pc.bold('Options:')}
  --verbose            Print debug logging
  -h, --help           Show help
  -v, --version        Show version

${pc.bold('Environment:')}
  GIT_STACK_STATE_DIR  Where stack metadata is kept
  GIT_STACK_LOG        Log level (debug, info, warn, error)

${pc.bold('Examples:')}
  git-stack checkout feat/api       # Start feat/api on top of the current branch
  git-stack restack --fetch         # Update trunk, then restack the current branch
  git-stack mount feat/api          # Stack the current branch on feat/api
  git-stack sync --restack          # Prune merged branches and restack the rest
`);
}

function showStatusHelp(): void {
  console.log(`
${pc.bold('git-stack status')} - Show all stacks as a tree

${pc.bold('Usage:')}
  git-stack status [options]

${pc.bold('Options:')}
  -a, --anchors        Show the commit each branch was last restacked onto
  -h, --help           Show help
`);
}

function showCheckoutHelp(): void {
  console.log(`
${pc.bold('git-stack checkout')} - Switch to a branch, creating it if needed

${pc.bold('Usage:')}
  git-stack checkout <branch>

A branch git-stack does not know yet is created from the current branch and
stacked on it. The current branch must be the trunk or a tracked branch.

${pc.bold('Examples:')}
  git-stack checkout feat/api       # Create feat/api on top of HEAD's branch
  git-stack checkout main           # Switch back to trunk
`);
}

function showRestackHelp(): void {
  console.log(`
${pc.bold('git-stack restack')} - Rebase a branch and its descendants onto their parents

${pc.bold('Usage:')}
  git-stack restack [options]

${pc.bold('Options:')}
  -b, --branch <name>  Branch to restack (default: current branch)
  -f, --fetch          Fetch and fast-forward trunk first
  -a, --ancestors      Restack the branch's ancestors too
  -p, --push           Force-push restacked branches
  --abort              Abandon a paused restack
  -h, --help           Show help

When a rebase stops on conflicts, resolve them, 'git add' the files and run
'git-stack restack' again to continue where it left off.
`);
}

function showMountHelp(): void {
  console.log(`
${pc.bold('git-stack mount')} - Stack a branch on a different parent

${pc.bold('Usage:')}
  git-stack mount [parent] [options]

${pc.bold('Arguments:')}
  parent               New parent (default: trunk)

${pc.bold('Options:')}
  -b, --branch <name>  Branch to mount (default: current branch)
  -h, --help           Show help

Only metadata changes. Run 'git-stack restack' to move the commits.
`);
}

function showDiffHelp(): void {
  console.log(`
${pc.bold('git-stack diff')} - Show a branch's own changes

${pc.bold('Usage:')}
  git-stack diff [branch]
`);
}

function showLogHelp(): void {
  console.log(`
${pc.bold('git-stack log')} - Show the commits a branch adds to its parent

${pc.bold('Usage:')}
  git-stack log [branch]
`);
}

function showDeleteHelp(): void {
  console.log(`
${pc.bold('git-stack delete')} - Stop tracking a branch and delete it

${pc.bold('Usage:')}
  git-stack delete <branch> [options]

${pc.bold('Options:')}
  -k, --keep-branch    Keep the git branch, only forget it
  -f, --force          Delete the git branch even if it is not merged
  -h, --help           Show help

Children of the deleted branch move onto its parent.
`);
}

function showSyncHelp(): void {
  console.log(`
${pc.bold('git-stack sync')} - Prune branches that have been merged

${pc.bold('Usage:')}
  git-stack sync [options]

${pc.bold('Options:')}
  -n, --dry-run        Show what would be pruned
  -r, --restack        Fast-forward trunk and restack everything afterwards
  -p, --push           Force-push restacked branches (with --restack)
  -h, --help           Show help
`);
}

function showPRHelp(): void {
  console.log(`
${pc.bold('git-stack pr')} - Open a GitHub PR for the current branch

${pc.bold('Usage:')}
  git-stack pr [options]

${pc.bold('Options:')}
  -d, --draft          Open the PR as a draft
  -p, --push           Push the branch first
  -h, --help           Show help

The PR targets the branch's parent and carries a stack navigation table.
`);
}
