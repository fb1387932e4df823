import { createReadStream } from 'fs';
import { basename, join, resolve } from 'path';
import type { Readable } from 'stream';
import { FILE_PATTERNS } from '../../constants/index.js';
import { InvalidPackageError, throwIfCancelled } from '../../utils/errors.js';
import { isFile } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';
import { FrameworkReducer } from '../frameworks/framework-reducer.js';
import type { TargetFramework } from '../frameworks/target-framework.js';
import { formatIdentity, identityEquals, identityKey, type PackageIdentity } from '../packaging/package-identity.js';
import { readPackageManifest, type PackageManifest } from '../packaging/package-manifest.js';
import { PackageFolderReader } from '../packaging/package-reader.js';
import type { RegistryCacheContext } from './registry-cache-context.js';
import type { DependencyInfo, PackageDownload, PackageRegistry } from './types.js';

const frameworkReducer = new FrameworkReducer();

/**
 * A registry backed by a local directory laid out as
 * `<feed>/<id-lowercase>/<version>/package.yml` next to the package content.
 */
export class FolderFeedRegistry implements PackageRegistry {
  readonly feedPath: string;
  readonly name: string;

  constructor(feedPath: string, name?: string) {
    this.feedPath = resolve(feedPath);
    this.name = name ?? basename(this.feedPath);
  }

  getPackageDirectory(identity: PackageIdentity): string {
    return join(this.feedPath, identity.id.toLowerCase(), identity.version.toString().toLowerCase());
  }

  async getDependencyInfo(
    identity: PackageIdentity,
    framework: TargetFramework,
    context: RegistryCacheContext,
    signal?: AbortSignal
  ): Promise<DependencyInfo | null> {
    const manifest = await this.loadManifest(identity, context, signal);
    if (!manifest) {
      return null;
    }

    const nearest = frameworkReducer.getNearest(framework, manifest.dependencyGroups.map(group => group.targetFramework));
    const group = nearest
      ? manifest.dependencyGroups.find(candidate => candidate.targetFramework.shortName === nearest.shortName)
      : undefined;

    return {
      identity,
      dependencies: group?.packages ?? [],
      source: this
    };
  }

  async download(
    identity: PackageIdentity,
    context: RegistryCacheContext,
    signal?: AbortSignal
  ): Promise<PackageDownload | null> {
    const manifest = await this.loadManifest(identity, context, signal);
    if (!manifest) {
      return null;
    }

    const packageDir = this.getPackageDirectory(identity);
    logger.debug(`Downloading ${formatIdentity(identity)} from feed '${this.name}'`, { packageDir });

    return {
      identity,
      reader: new PackageFolderReader(packageDir),
      openEntry: (entryPath: string, entrySignal?: AbortSignal): Readable =>
        createReadStream(join(packageDir, ...entryPath.split('/')), { signal: entrySignal })
    };
  }

  private loadManifest(
    identity: PackageIdentity,
    context: RegistryCacheContext,
    signal?: AbortSignal
  ): Promise<PackageManifest | null> {
    throwIfCancelled(signal);
    return context.getManifest(`${this.feedPath}|${identityKey(identity)}`, async () => {
      const manifestPath = join(this.getPackageDirectory(identity), FILE_PATTERNS.PACKAGE_YML);
      if (!(await isFile(manifestPath))) {
        return null;
      }

      const manifest = await readPackageManifest(manifestPath);
      if (!identityEquals(manifest.identity, identity)) {
        throw new InvalidPackageError(
          `${manifestPath} declares ${formatIdentity(manifest.identity)}, expected ${formatIdentity(identity)}`,
          { manifestPath }
        );
      }
      return manifest;
    });
  }
}
