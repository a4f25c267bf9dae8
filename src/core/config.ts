import { join } from 'path';
import { homedir } from 'os';
import { ModpinConfig, ModpinDirectories, FetchSettings, RegistryToolConfig } from '../types/index.js';
import { readJsonOrJsoncFile, exists } from '../utils/fs.js';
import { logger } from '../utils/logger.js';
import { ConfigError, errorMessage } from '../utils/errors.js';
import { getModpinDirectories } from './directory.js';
import {
  FILE_PATTERNS,
  ENV_VARS,
  DEFAULTS,
  DEFAULT_VCS_HOSTS,
  PROXY_DISABLED_VALUES
} from '../constants/index.js';

/**
 * Configuration management for modpin
 * Reads config.jsonc (or config.json) from the modpin directory; environment
 * variables take precedence over the file.
 */

type Env = Record<string, string | undefined>;

class ConfigManager {
  private config: ModpinConfig | null = null;
  private configPath: string | null = null;
  private readonly dirs: ModpinDirectories;
  private readonly env: Env;

  constructor(dirs: ModpinDirectories = getModpinDirectories(), env: Env = process.env) {
    this.dirs = dirs;
    this.env = env;
  }

  /**
   * Find the existing config file (supports both .json and .jsonc)
   */
  private async findConfigFile(): Promise<string | null> {
    for (const fileName of FILE_PATTERNS.CONFIG_FILES) {
      const path = join(this.dirs.config, fileName);
      if (await exists(path)) {
        return path;
      }
    }
    return null;
  }

  /**
   * Load configuration from file. A missing file means an empty configuration.
   */
  async load(): Promise<ModpinConfig> {
    if (this.config) {
      return this.config;
    }

    const configPath = await this.findConfigFile();
    if (!configPath) {
      logger.debug('Config file not found, using defaults');
      this.config = {};
      return this.config;
    }

    logger.debug(`Loading config from: ${configPath}`);
    let raw: unknown;
    try {
      raw = await readJsonOrJsoncFile(configPath);
    } catch (error) {
      logger.error('Failed to load configuration', { error });
      throw new ConfigError(`Failed to load configuration: ${errorMessage(error)}`, { configPath });
    }

    this.config = validateConfig(raw, configPath);
    this.configPath = configPath;
    return this.config;
  }

  /**
   * Get a configuration value
   */
  async get<K extends keyof ModpinConfig>(key: K): Promise<ModpinConfig[K]> {
    const config = await this.load();
    return config[key];
  }

  /**
   * Path of the config file that was loaded, or the default location
   */
  getConfigFilePath(): string {
    return this.configPath ?? join(this.dirs.config, FILE_PATTERNS.CONFIG_FILES[0]);
  }

  getDirectories(): ModpinDirectories {
    return this.dirs;
  }

  /**
   * Merge file config, environment and explicit overrides into fetch settings.
   */
  async resolveFetchSettings(overrides: Partial<FetchSettings> = {}): Promise<FetchSettings> {
    const config = await this.load();
    const env = this.env;

    const proxySource = nonEmpty(env[ENV_VARS.PROXY]) ?? config.proxy;
    const privatePatterns = nonEmpty(env[ENV_VARS.PRIVATE])
      ?? nonEmpty(env[ENV_VARS.NOPROXY])
      ?? config.private
      ?? '';
    const registryTool = parseRegistryToolCommand(env[ENV_VARS.REGISTRY_TOOL]) ?? config.registryTool ?? null;

    const settings: FetchSettings = {
      proxy: normalizeProxy(proxySource),
      privatePatterns,
      cacheDir: nonEmpty(env[ENV_VARS.CACHE_DIR]) ?? config.cacheDir ?? this.dirs.cache,
      netrcPath: nonEmpty(env[ENV_VARS.NETRC]) ?? config.netrcPath ?? join(homedir(), FILE_PATTERNS.NETRC),
      requestTimeoutMs: config.requestTimeoutMs ?? DEFAULTS.REQUEST_TIMEOUT_MS,
      concurrency: config.concurrency ?? DEFAULTS.CONCURRENCY,
      vcsHosts: config.vcsHosts ?? [...DEFAULT_VCS_HOSTS],
      registryTool,
      ...overrides
    };

    logger.debug('Resolved fetch settings', { ...settings });
    return Object.freeze(settings);
  }
}

function nonEmpty(value: string | undefined): string | undefined {
  return value !== undefined && value.trim() !== '' ? value.trim() : undefined;
}

/**
 * Take the first entry of a comma-separated proxy list. `direct` and `off`
 * disable the proxy.
 */
export function normalizeProxy(value: string | undefined): string | null {
  if (value === undefined) {
    return null;
  }
  const disabled: readonly string[] = PROXY_DISABLED_VALUES;
  const first = value.split(',')[0].trim();
  if (first === '' || disabled.includes(first)) {
    return null;
  }
  return first.replace(/\/+$/, '');
}

export function parseRegistryToolCommand(value: string | undefined): RegistryToolConfig | undefined {
  const parts = value?.trim().split(/\s+/).filter(Boolean) ?? [];
  if (parts.length === 0) {
    return undefined;
  }
  return { command: parts[0], args: parts.slice(1) };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(item => typeof item === 'string');
}

function validateConfig(source: unknown, configPath: string): ModpinConfig {
  if (!isRecord(source)) {
    throw new ConfigError('Invalid configuration structure', { configPath });
  }

  const config: ModpinConfig = {};

  const stringKeys = ['proxy', 'private', 'cacheDir', 'netrcPath'] as const;
  for (const key of stringKeys) {
    const value = source[key];
    if (value === undefined) continue;
    if (typeof value !== 'string') {
      throw new ConfigError(`Config key '${key}' must be a string`, { configPath });
    }
    config[key] = value;
  }

  const numberKeys = ['requestTimeoutMs', 'concurrency'] as const;
  for (const key of numberKeys) {
    const value = source[key];
    if (value === undefined) continue;
    if (typeof value !== 'number' || !Number.isInteger(value) || value <= 0) {
      throw new ConfigError(`Config key '${key}' must be a positive integer`, { configPath });
    }
    config[key] = value;
  }

  if (source.vcsHosts !== undefined) {
    const hosts = source.vcsHosts;
    if (!isStringArray(hosts)) {
      throw new ConfigError(`Config key 'vcsHosts' must be an array of strings`, { configPath });
    }
    config.vcsHosts = hosts;
  }

  if (source.registryTool !== undefined) {
    const tool = source.registryTool;
    const command = isRecord(tool) ? tool.command : undefined;
    if (!isRecord(tool) || typeof command !== 'string') {
      throw new ConfigError(`Config key 'registryTool' needs a 'command' string`, { configPath });
    }
    const args = tool.args;
    if (args !== undefined && !isStringArray(args)) {
      throw new ConfigError(`Config key 'registryTool.args' must be an array of strings`, { configPath });
    }
    config.registryTool = { command, ...(args ? { args } : {}) };
  }

  return config;
}

// Create and export a singleton instance
export const configManager = new ConfigManager();

// Export the class for testing purposes
export { ConfigManager };
