import * as os from 'os';
import * as path from 'path';
import { RefAsmDirectories } from '../types/index.js';
import { DIR_PATTERNS, ENV_VARS, FILE_PATTERNS } from '../constants/index.js';

/**
 * Well-known directories used by the resolver
 */

/**
 * Config lives under ~/.refasm; extracted packages under <tmp>/test-packages so
 * that every process on the machine shares them.
 */
export function getRefAsmDirectories(): RefAsmDirectories {
  const homeDir = os.homedir();
  const nugetPackages = process.env[ENV_VARS.NUGET_PACKAGES];

  return {
    config: path.join(homeDir, DIR_PATTERNS.REFASM),
    cacheRoot: path.join(os.tmpdir(), DIR_PATTERNS.TEST_PACKAGES),
    globalPackages: nugetPackages
      ? path.resolve(nugetPackages)
      : path.join(homeDir, ...DIR_PATTERNS.NUGET_PACKAGES)
  };
}

/**
 * The lock file guarding a cache root
 */
export function getLockFilePath(cacheRoot: string): string {
  return path.join(cacheRoot, FILE_PATTERNS.LOCK_FILE);
}

/**
 * Expand a leading ~ and resolve relative paths against `baseDir`
 */
export function resolveUserPath(input: string, baseDir: string): string {
  if (input === '~') {
    return os.homedir();
  }
  if (input.startsWith('~/') || input.startsWith('~\\')) {
    return path.join(os.homedir(), input.slice(2));
  }
  return path.resolve(baseDir, input);
}
