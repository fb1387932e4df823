import { Command } from 'commander';

import { CommandResult, LogLevel } from '../types/index.js';
import { withErrorHandling } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { loadResolverConfig, type ResolvedConfig } from '../core/config.js';
import { resolveUserPath } from '../core/directory.js';
import { createResolutionEnvironment } from '../core/environment.js';
import { parsePackageIdentity } from '../core/packaging/package-identity.js';
import { getPreset } from '../core/presets.js';

export interface ResolveCommandOptions {
  language?: string;
  package?: string[];
  feed?: string[];
  cache?: string;
  config?: string;
  verbose?: boolean;
}

/**
 * Feeds given on the command line are queried before configured ones
 */
export function applyCommandLineOverrides(config: ResolvedConfig, options: ResolveCommandOptions, cwd: string = process.cwd()): ResolvedConfig {
  return {
    ...config,
    feeds: [
      ...(options.feed ?? []).map(feed => ({ path: resolveUserPath(feed, cwd) })),
      ...config.feeds
    ],
    cacheRoot: options.cache ? resolveUserPath(options.cache, cwd) : config.cacheRoot
  };
}

export async function resolveCommand(
  presetName: string,
  options: ResolveCommandOptions,
  signal?: AbortSignal
): Promise<CommandResult<string[]>> {
  const config = applyCommandLineOverrides(await loadResolverConfig(options.config), options);
  const environment = createResolutionEnvironment(config);

  const preset = getPreset(presetName);
  const descriptor = options.package && options.package.length > 0
    ? preset.addPackages(options.package.map(parsePackageIdentity))
    : preset;

  const references = await descriptor.resolve(options.language ?? null, { signal, environment });
  const paths = references.map(reference => reference.filePath).sort();
  return { success: true, data: paths };
}

export function setupResolveCommand(program: Command): void {
  program
    .command('resolve')
    .description('Resolve the reference assemblies of a preset and print their paths')
    .argument('<preset>', 'preset name, e.g. netFramework.net472.default (see `refasm presets`)')
    .option('-l, --language <name>', 'language whose specific assemblies to include, e.g. "C#"')
    .option('-p, --package <id@version...>', 'additional packages to reference')
    .option('-f, --feed <dir...>', 'package feed directories, queried before configured feeds')
    .option('--cache <dir>', 'directory packages are extracted into')
    .option('--config <file>', 'config file to use instead of ~/.refasm/config.jsonc')
    .option('--verbose', 'enable debug logging')
    .action(withErrorHandling(async (presetName: string, options: ResolveCommandOptions) => {
      if (options.verbose) {
        logger.setLevel(LogLevel.DEBUG);
      }

      const controller = new AbortController();
      const onInterrupt = (): void => controller.abort();
      process.once('SIGINT', onInterrupt);
      try {
        const result = await resolveCommand(presetName, options, controller.signal);
        for (const path of result.data ?? []) {
          console.log(path);
        }
      } finally {
        process.off('SIGINT', onInterrupt);
      }
    }));
}
