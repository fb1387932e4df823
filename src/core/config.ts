import { dirname, join } from 'path';
import { FeedConfig, RefAsmConfig, RefAsmDirectories } from '../types/index.js';
import { ENV_VARS, FILE_PATTERNS } from '../constants/index.js';
import { readJsonOrJsoncFile, exists } from '../utils/fs.js';
import { logger } from '../utils/logger.js';
import { ConfigError } from '../utils/errors.js';
import { getRefAsmDirectories, resolveUserPath } from './directory.js';

/**
 * Configuration management for the resolver
 * Supports both JSON and JSONC formats
 */

export interface ResolvedFeed {
  name?: string;
  path: string;
}

/**
 * Configuration with defaults applied and every path absolute
 */
export interface ResolvedConfig {
  feeds: ResolvedFeed[];
  globalPackagesFolder: string;
  cacheRoot: string;
}

function isOptionalString(value: unknown): boolean {
  return value === undefined || typeof value === 'string';
}

function isFeedConfig(value: unknown): value is FeedConfig {
  return typeof value === 'object' && value !== null &&
    'path' in value && typeof value.path === 'string' &&
    (!('name' in value) || isOptionalString(value.name));
}

function isRefAsmConfig(value: unknown): value is RefAsmConfig {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }
  if ('feeds' in value && value.feeds !== undefined && !(Array.isArray(value.feeds) && value.feeds.every(isFeedConfig))) {
    return false;
  }
  if ('globalPackagesFolder' in value && !isOptionalString(value.globalPackagesFolder)) {
    return false;
  }
  if ('cacheRoot' in value && !isOptionalString(value.cacheRoot)) {
    return false;
  }
  return true;
}

export function applyConfigDefaults(
  config: RefAsmConfig,
  baseDir: string,
  directories: RefAsmDirectories = getRefAsmDirectories()
): ResolvedConfig {
  return {
    feeds: (config.feeds ?? []).map(feed => ({
      name: feed.name,
      path: resolveUserPath(feed.path, baseDir)
    })),
    globalPackagesFolder: config.globalPackagesFolder
      ? resolveUserPath(config.globalPackagesFolder, baseDir)
      : directories.globalPackages,
    cacheRoot: config.cacheRoot
      ? resolveUserPath(config.cacheRoot, baseDir)
      : directories.cacheRoot
  };
}

export class ConfigManager {
  private config: ResolvedConfig | null = null;
  private readonly directories: RefAsmDirectories;
  private readonly explicitPath: string | undefined;

  constructor(explicitPath?: string, directories: RefAsmDirectories = getRefAsmDirectories()) {
    this.explicitPath = explicitPath ?? process.env[ENV_VARS.CONFIG];
    this.directories = directories;
  }

  /**
   * Find the config file: an explicit path must exist, otherwise the first of
   * config.jsonc / config.json in the config directory
   */
  async findConfigFile(): Promise<string | null> {
    if (this.explicitPath) {
      if (!(await exists(this.explicitPath))) {
        throw new ConfigError(`Config file not found: ${this.explicitPath}`, { path: this.explicitPath });
      }
      return this.explicitPath;
    }

    for (const fileName of FILE_PATTERNS.CONFIG_FILES) {
      const path = join(this.directories.config, fileName);
      if (await exists(path)) {
        return path;
      }
    }
    return null;
  }

  /**
   * Load configuration from file, falling back to defaults when there is none
   */
  async load(): Promise<ResolvedConfig> {
    if (this.config) {
      return this.config;
    }

    const configPath = await this.findConfigFile();
    if (!configPath) {
      logger.debug('Config file not found, using defaults');
      this.config = applyConfigDefaults({}, process.cwd(), this.directories);
      return this.config;
    }

    logger.debug(`Loading config from: ${configPath}`);
    try {
      const fileConfig = await readJsonOrJsoncFile(configPath, isRefAsmConfig);
      this.config = applyConfigDefaults(fileConfig, dirname(configPath), this.directories);
      return this.config;
    } catch (error) {
      logger.error('Failed to load configuration', { error });
      throw new ConfigError(`Failed to load configuration from ${configPath}`, { path: configPath, error });
    }
  }
}

export async function loadResolverConfig(configPath?: string): Promise<ResolvedConfig> {
  return new ConfigManager(configPath).load();
}
