import { logger } from '../utils/logger.js';
import { loadResolverConfig, type ResolvedConfig } from './config.js';
import { getLockFilePath } from './directory.js';
import { FileSystemSemaphore } from './locking/file-system-semaphore.js';
import { PackageFolderStore, type PackageStore } from './packaging/package-folder-store.js';
import { FolderFeedRegistry } from './registry/folder-feed-registry.js';
import type { PackageRegistry } from './registry/types.js';

/**
 * Everything a resolution needs from the outside world
 */
export interface ResolutionEnvironment {
  /** Queried in order; the first registry that knows a package serves it */
  registries: readonly PackageRegistry[];
  /** Where packages are extracted; shared by every process on the machine */
  localStore: PackageStore;
  /** Read-only fallback probed after the local store */
  globalStore: PackageStore | null;
  /** Guards the local store across processes */
  semaphore: FileSystemSemaphore;
}

export function createResolutionEnvironment(config: ResolvedConfig): ResolutionEnvironment {
  logger.debug('Creating resolution environment', {
    feeds: config.feeds.map(feed => feed.path),
    cacheRoot: config.cacheRoot,
    globalPackagesFolder: config.globalPackagesFolder
  });

  return {
    registries: config.feeds.map(feed => new FolderFeedRegistry(feed.path, feed.name)),
    localStore: new PackageFolderStore(config.cacheRoot),
    globalStore: new PackageFolderStore(config.globalPackagesFolder),
    semaphore: FileSystemSemaphore.forPath(getLockFilePath(config.cacheRoot))
  };
}

let defaultEnvironment: Promise<ResolutionEnvironment> | null = null;

/**
 * Environment built from the user's config file, created on first use
 */
export function getDefaultEnvironment(): Promise<ResolutionEnvironment> {
  if (!defaultEnvironment) {
    defaultEnvironment = loadResolverConfig().then(createResolutionEnvironment);
    defaultEnvironment.catch(() => {
      defaultEnvironment = null;
    });
  }
  return defaultEnvironment;
}
