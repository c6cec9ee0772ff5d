#!/usr/bin/env node

/**
 * git-stack CLI - Entry point
 */

import { runCLI } from './cli.js';

// Skip node and the script path
const args = process.argv.slice(2);

runCLI(args).catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
