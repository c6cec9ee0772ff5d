/**
 * Leveled logger that writes through @clack/prompts
 */

import * as clack from '@clack/prompts';
import pc from 'picocolors';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface Logger {
  debug(message: string, metadata?: Record<string, unknown>): void;
  info(message: string, metadata?: Record<string, unknown>): void;
  warn(message: string, metadata?: Record<string, unknown>): void;
  error(message: string, metadata?: Record<string, unknown>): void;
}

interface LoggerOptions {
  /** Minimum level to print. Default: "info" */
  level?: LogLevel;
  /** Suppress all output (for tests) */
  silent?: boolean;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && value in LEVEL_ORDER;
}

function withMetadata(message: string, metadata?: Record<string, unknown>): string {
  if (!metadata || Object.keys(metadata).length === 0) {
    return message;
  }
  return `${message} ${pc.dim(JSON.stringify(metadata))}`;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const minLevel = options.level ?? 'info';
  const silent = options.silent ?? false;

  const enabled = (level: LogLevel) =>
    !silent && LEVEL_ORDER[level] >= LEVEL_ORDER[minLevel];

  return {
    debug(message, metadata) {
      if (enabled('debug')) clack.log.message(pc.dim(withMetadata(message, metadata)));
    },
    info(message, metadata) {
      if (enabled('info')) clack.log.info(withMetadata(message, metadata));
    },
    warn(message, metadata) {
      if (enabled('warn')) clack.log.warn(withMetadata(message, metadata));
    },
    error(message, metadata) {
      if (enabled('error')) clack.log.error(withMetadata(message, metadata));
    },
  };
}

/**
 * Logger for a CLI run: --verbose wins, then GIT_STACK_LOG, then "info"
 */
export function createCliLogger(verbose: boolean, env: NodeJS.ProcessEnv = process.env): Logger {
  if (verbose) {
    return createLogger({ level: 'debug' });
  }
  const fromEnv = env.GIT_STACK_LOG;
  return createLogger({ level: isLogLevel(fromEnv) ? fromEnv : 'info' });
}

/** Discards everything. Useful for tests. */
export const silentLogger: Logger = createLogger({ silent: true });
