/**
 * Shared constants for tendril
 * Single source of truth for directory names, file names and defaults.
 */

export const DIR_PATTERNS = {
  CONFIG: 'tendril',
  /** Relative to the XDG data home */
  INSTALL_ROOT: 'nvim/site/pack/tendril/start'
} as const;

export const FILE_PATTERNS = {
  MANIFEST_YML: 'tendril.yml',
  CONFIG_JSONC: 'config.jsonc',
  CONFIG_JSON: 'config.json'
} as const;

export const ENV_VARS = {
  CONFIG_DIR: 'TENDRIL_CONFIG_DIR',
  XDG_CONFIG_HOME: 'XDG_CONFIG_HOME',
  XDG_DATA_HOME: 'XDG_DATA_HOME'
} as const;

export const DEFAULT_GIT_HOST = 'https://github.com';

export const DEFAULT_REINDEX_COMMAND = ['nvim', '--headless', '+helptags ALL', '+qa'] as const;

export const COMMAND_NAMES = ['install', 'upgrade', 'clean', 'list', 'status'] as const;

export const COMMAND_ALIASES: ReadonlyMap<string, CommandName> = new Map<string, CommandName>([
  ['update', 'upgrade']
]);

export type CommandName = typeof COMMAND_NAMES[number];
