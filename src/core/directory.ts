import * as path from 'path';
import { DIR_PATTERNS, ENV_VARS } from '../constants/index.js';
import { expandTilde, getHomeDirectory } from '../utils/home-directory.js';

/**
 * Cross-platform directory resolution following XDG conventions
 */

export interface TendrilDirectories {
  /** Holds config.jsonc and the default tendril.yml */
  config: string;
  /** Base directory for the default install root */
  data: string;
}

function fromEnv(name: string, env: NodeJS.ProcessEnv): string | undefined {
  const value = env[name]?.trim();
  return value ? path.resolve(expandTilde(value)) : undefined;
}

/**
 * Resolve tendril's directories.
 *
 * Config: `$TENDRIL_CONFIG_DIR`, else `$XDG_CONFIG_HOME/tendril`, else `~/.config/tendril`.
 * Data: `$XDG_DATA_HOME`, else `~/.local/share`.
 */
export function getTendrilDirectories(env: NodeJS.ProcessEnv = process.env): TendrilDirectories {
  const homeDir = getHomeDirectory();
  const configHome = fromEnv(ENV_VARS.XDG_CONFIG_HOME, env) ?? path.join(homeDir, '.config');

  return {
    config: fromEnv(ENV_VARS.CONFIG_DIR, env) ?? path.join(configHome, DIR_PATTERNS.CONFIG),
    data: fromEnv(ENV_VARS.XDG_DATA_HOME, env) ?? path.join(homeDir, '.local', 'share')
  };
}

/**
 * Where packages go when nothing overrides it.
 */
export function getDefaultInstallRoot(env: NodeJS.ProcessEnv = process.env): string {
  return path.join(getTendrilDirectories(env).data, DIR_PATTERNS.INSTALL_ROOT);
}
