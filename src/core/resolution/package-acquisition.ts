import { RefAsmError } from '../../types/index.js';
import {
  OperationCancelledError,
  PackageDownloadError,
  PackageNotFoundError,
  isAbortError,
  throwIfCancelled
} from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import type { PackageStore } from '../packaging/package-folder-store.js';
import { formatIdentity, identityEquals, identityKey, type PackageIdentity } from '../packaging/package-identity.js';
import { PackageFolderReader, hasCompileTimeAssets, type PackageReader } from '../packaging/package-reader.js';
import type { RegistryCacheContext } from '../registry/registry-cache-context.js';
import type { PackageDownload } from '../registry/types.js';
import type { DependencyGraph } from './dependency-graph.js';

export interface AcquiredPackage {
  identity: PackageIdentity;
  installedPath: string;
  reader: PackageReader;
}

export interface AcquisitionOptions {
  localStore: PackageStore;
  globalStore: PackageStore | null;
  graph: DependencyGraph;
  context: RegistryCacheContext;
  rootPackage: PackageIdentity | null;
  signal?: AbortSignal;
}

/**
 * Look for an extracted copy in the local store first, then the global one
 */
export async function findInstalledPath(
  identity: PackageIdentity,
  localStore: PackageStore,
  globalStore: PackageStore | null
): Promise<string | null> {
  return (await localStore.getInstalledPath(identity))
    ?? (globalStore ? await globalStore.getInstalledPath(identity) : null);
}

async function downloadPackage(identity: PackageIdentity, options: AcquisitionOptions): Promise<PackageDownload> {
  const info = options.graph.get(identityKey(identity));
  if (!info) {
    throw new PackageNotFoundError(identity.id, identity.version.toString());
  }

  let download: PackageDownload | null;
  try {
    download = await info.source.download(identity, options.context, options.signal);
  } catch (error) {
    if (isAbortError(error)) {
      throw new OperationCancelledError();
    }
    if (error instanceof RefAsmError) {
      throw error;
    }
    throw new PackageDownloadError(identity.id, identity.version.toString(), { registry: info.source.name, error });
  }

  if (!download) {
    throw new PackageNotFoundError(identity.id, identity.version.toString());
  }
  return download;
}

/**
 * Make `identity` available on disk. Returns null for a non-root package that
 * has no lib/ or ref/ content: it only mattered for the dependency walk.
 */
export async function acquirePackage(
  identity: PackageIdentity,
  options: AcquisitionOptions
): Promise<AcquiredPackage | null> {
  throwIfCancelled(options.signal);

  const installedPath = await findInstalledPath(identity, options.localStore, options.globalStore);
  if (installedPath) {
    logger.debug(`Using installed copy of ${formatIdentity(identity)}`, { installedPath });
    return { identity, installedPath, reader: new PackageFolderReader(installedPath) };
  }

  const download = await downloadPackage(identity, options);
  const isRoot = identityEquals(identity, options.rootPackage ?? undefined);
  if (!isRoot && !(await hasCompileTimeAssets(download.reader, options.signal))) {
    logger.debug(`Skipping ${formatIdentity(identity)}: no compile-time assets`);
    return null;
  }

  const extractedPath = await options.localStore.extract(download, options.signal);
  return { identity, installedPath: extractedPath, reader: new PackageFolderReader(extractedPath) };
}
