/**
 * Configuration management - reads from git config, .git-stack.json and the
 * environment. Uses neverthrow Result types for error handling.
 */

import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { homedir } from 'node:os';
import { isAbsolute, join, resolve } from 'node:path';
import { Result, ok } from 'neverthrow';
import { type IGitOperations, defaultGitOps } from '../git/interface.js';
import { silentLogger, type Logger } from '../logger.js';
import {
  type FileConfig,
  type StackConfig,
  CONFIG_FILE_NAME,
  DEFAULT_REMOTE,
  DEFAULT_TRUNK,
  validateConfig,
  mergeConfigs,
} from './schema.js';

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export type ConfigResult<T> = Result<T, ConfigError>;

export interface ConfigManagerOptions {
  gitOps?: IGitOperations;
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
}

export class ConfigManager {
  private readonly configPath: string;
  private readonly git: IGitOperations;
  private readonly env: NodeJS.ProcessEnv;
  private readonly logger: Logger;

  constructor(
    private readonly repoRoot: string,
    options: ConfigManagerOptions = {}
  ) {
    this.configPath = join(repoRoot, CONFIG_FILE_NAME);
    this.git = options.gitOps || defaultGitOps;
    this.env = options.env || process.env;
    this.logger = options.logger || silentLogger;
  }

  /**
   * Resolve configuration: git config, then the JSON file, then environment.
   * Without an explicit trunk, the remote's default branch is used.
   */
  async load(): Promise<ConfigResult<StackConfig>> {
    const gitConfig = await this.loadFromGitConfig();
    const fileConfig = await this.loadFromFile();
    const merged = mergeConfigs(gitConfig, fileConfig);
    const remote = merged.remote ?? DEFAULT_REMOTE;

    let trunk = merged.trunk;
    if (!trunk) {
      trunk = (await this.git.getRemoteDefaultBranch(remote, this.repoRoot)) ?? DEFAULT_TRUNK;
      this.logger.debug('Trunk not configured, using detected default', { trunk });
    }

    const stateDir = this.env.GIT_STACK_STATE_DIR || merged.stateDir || this.defaultStateDir();

    return ok({
      repoRoot: this.repoRoot,
      trunk,
      remote,
      stateDir: isAbsolute(stateDir) ? stateDir : resolve(this.repoRoot, stateDir),
    });
  }

  /**
   * Load configuration from git config (stack.trunk, stack.remote)
   */
  private async loadFromGitConfig(): Promise<FileConfig> {
    const trunk = await this.git.getConfig('stack.trunk', this.repoRoot);
    const remote = await this.git.getConfig('stack.remote', this.repoRoot);

    return {
      trunk: trunk ?? undefined,
      remote: remote ?? undefined,
    };
  }

  /**
   * Load configuration from .git-stack.json
   */
  private async loadFromFile(): Promise<FileConfig> {
    if (!existsSync(this.configPath)) {
      return {};
    }

    let raw: string;
    try {
      raw = await readFile(this.configPath, 'utf8');
    } catch (e) {
      this.logger.warn(`Failed to read ${CONFIG_FILE_NAME}, using defaults`, {
        error: e instanceof Error ? e.message : String(e),
      });
      return {};
    }

    const parseResult = Result.fromThrowable(
      (): unknown => JSON.parse(raw),
      (e) => new ConfigError(`Failed to parse config: ${e instanceof Error ? e.message : String(e)}`)
    )();

    if (parseResult.isErr()) {
      this.logger.warn(`${parseResult.error.message}, using defaults`);
      return {};
    }

    const content = parseResult.value;
    if (validateConfig(content)) {
      return content;
    }

    this.logger.warn(`Invalid ${CONFIG_FILE_NAME} format, using defaults`);
    return {};
  }

  private defaultStateDir(): string {
    const base = this.env.XDG_STATE_HOME || join(homedir(), '.local', 'state');
    return join(base, 'git-stack');
  }
}
