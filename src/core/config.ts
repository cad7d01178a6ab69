import { join, resolve } from 'path';
import type { ReconcilerConfig, ReconcilerConfigInput, TendrilUserConfig } from '../types/index.js';
import { DEFAULT_GIT_HOST, DEFAULT_REINDEX_COMMAND, FILE_PATTERNS } from '../constants/index.js';
import { exists, readJsonOrJsoncFile } from '../utils/fs.js';
import { expandTilde } from '../utils/home-directory.js';
import { logger } from '../utils/logger.js';
import { ConfigError, describeError } from '../utils/errors.js';
import type { LoadedManifest } from '../utils/manifest-yml.js';
import { getDefaultInstallRoot, getTendrilDirectories } from './directory.js';

/**
 * Configuration management for tendril
 * Supports both JSON and JSONC formats
 */

const CONFIG_FILE_NAMES = [FILE_PATTERNS.CONFIG_JSONC, FILE_PATTERNS.CONFIG_JSON];

export function getDefaultConfig(env: NodeJS.ProcessEnv = process.env): ReconcilerConfig {
  return {
    installRoot: getDefaultInstallRoot(env),
    gitHost: DEFAULT_GIT_HOST,
    reindexCommand: [...DEFAULT_REINDEX_COMMAND]
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Absolute install root: `~` expanded, relative paths taken from `baseDir`.
 */
export function normalizeInstallRoot(installRoot: string, baseDir: string): string {
  return resolve(baseDir, expandTilde(installRoot.trim()));
}

/**
 * Pick the recognised settings out of a parsed document. Unknown keys are
 * ignored so the same parser serves config files and manifests.
 *
 * @param origin names the document in error messages
 * @param baseDir what a relative `installRoot` is taken from
 * @throws ConfigError when a recognised key has the wrong type
 */
export function parseConfigFields(raw: Record<string, unknown>, origin: string, baseDir: string): ReconcilerConfigInput {
  const input: ReconcilerConfigInput = {};
  const { installRoot, gitHost, reindexCommand } = raw;

  if (installRoot !== undefined && installRoot !== null) {
    if (typeof installRoot !== 'string' || installRoot.trim() === '') {
      throw new ConfigError(`${origin}: installRoot must be a non-empty string`);
    }
    input.installRoot = normalizeInstallRoot(installRoot, baseDir);
  }

  if (gitHost !== undefined && gitHost !== null) {
    if (typeof gitHost !== 'string' || gitHost.trim() === '') {
      throw new ConfigError(`${origin}: gitHost must be a non-empty string`);
    }
    input.gitHost = gitHost.trim();
  }

  if (reindexCommand !== undefined && reindexCommand !== null) {
    if (!Array.isArray(reindexCommand) || !reindexCommand.every((arg): arg is string => typeof arg === 'string')) {
      throw new ConfigError(`${origin}: reindexCommand must be a list of strings`);
    }
    input.reindexCommand = [...reindexCommand];
  }

  return input;
}

/**
 * Overlay each layer on `base`. Only fields a layer defines replace the
 * field below it.
 */
export function mergeConfig(base: ReconcilerConfig, ...layers: ReconcilerConfigInput[]): ReconcilerConfig {
  const merged: ReconcilerConfig = { ...base };
  for (const layer of layers) {
    if (layer.installRoot !== undefined) merged.installRoot = layer.installRoot;
    if (layer.gitHost !== undefined) merged.gitHost = layer.gitHost;
    if (layer.reindexCommand !== undefined) merged.reindexCommand = layer.reindexCommand;
  }
  return merged;
}

class ConfigManager {
  constructor(private readonly configDir: string) {}

  /**
   * Find the existing config file (supports both .json and .jsonc)
   * Returns the path to the existing config file, or null if none exists
   */
  async findConfigFile(): Promise<string | null> {
    for (const fileName of CONFIG_FILE_NAMES) {
      const path = join(this.configDir, fileName);
      if (await exists(path)) {
        return path;
      }
    }
    return null;
  }

  /**
   * Read the user config file. A missing file is an empty config.
   */
  async load(): Promise<TendrilUserConfig> {
    const configPath = await this.findConfigFile();
    if (!configPath) {
      logger.debug('Config file not found, using defaults', { configDir: this.configDir });
      return {};
    }

    logger.debug(`Loading config from: ${configPath}`);
    let raw: unknown;
    try {
      raw = await readJsonOrJsoncFile(configPath);
    } catch (error) {
      throw new ConfigError(`Failed to load configuration: ${describeError(error)}`, { configPath, error });
    }

    if (!isRecord(raw)) {
      throw new ConfigError(`${configPath}: configuration must be an object`);
    }

    const fields = parseConfigFields(raw, configPath, this.configDir);
    return {
      installRoot: fields.installRoot,
      gitHost: fields.gitHost,
      reindexCommand: fields.reindexCommand ? [...fields.reindexCommand] : undefined
    };
  }
}

export interface LoadReconcilerConfigOptions {
  /** Defaults to the resolved tendril config directory */
  configDir?: string;
  manifest?: Pick<LoadedManifest, 'settings'>;
  /** Highest-precedence layer, e.g. CLI flags */
  overrides?: ReconcilerConfigInput;
  /** What a relative `installRoot` override is taken from */
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Build the active configuration: defaults, then the user config file,
 * then manifest settings, then overrides.
 */
export async function loadReconcilerConfig(options: LoadReconcilerConfigOptions = {}): Promise<ReconcilerConfig> {
  const env = options.env ?? process.env;
  const configDir = options.configDir ?? getTendrilDirectories(env).config;
  const userConfig = await new ConfigManager(configDir).load();

  const overrides: ReconcilerConfigInput = { ...options.overrides };
  if (overrides.installRoot !== undefined) {
    overrides.installRoot = normalizeInstallRoot(overrides.installRoot, options.cwd ?? process.cwd());
  }

  const config = mergeConfig(getDefaultConfig(env), userConfig, options.manifest?.settings ?? {}, overrides);
  logger.debug('Resolved configuration', { config });
  return config;
}

export { ConfigManager };
