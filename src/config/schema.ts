/**
 * Configuration schema and validation
 */

/**
 * Settings read from .git-stack.json in the repository root
 */
export interface FileConfig {
  trunk?: string;
  remote?: string;
  stateDir?: string;
}

/**
 * Resolved configuration threaded through the store, mutators and engines
 */
export interface StackConfig {
  repoRoot: string;
  trunk: string;
  remote: string;
  stateDir: string;
}

export const CONFIG_FILE_NAME = '.git-stack.json';

export const DEFAULT_TRUNK = 'main';
export const DEFAULT_REMOTE = 'origin';

/**
 * Validate configuration object
 */
export function validateConfig(config: unknown): config is FileConfig {
  if (!config || typeof config !== 'object' || Array.isArray(config)) {
    return false;
  }

  for (const key of ['trunk', 'remote', 'stateDir'] as const) {
    const value: unknown = Reflect.get(config, key);
    if (value !== undefined && (typeof value !== 'string' || value.trim() === '')) {
      return false;
    }
  }

  return true;
}

/**
 * Merge two configurations (right takes precedence)
 */
export function mergeConfigs(base: FileConfig, override: FileConfig): FileConfig {
  return {
    trunk: override.trunk ?? base.trunk,
    remote: override.remote ?? base.remote,
    stateDir: override.stateDir ?? base.stateDir,
  };
}
