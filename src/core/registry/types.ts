import type { Readable } from 'stream';
import type { TargetFramework } from '../frameworks/target-framework.js';
import type { PackageIdentity } from '../packaging/package-identity.js';
import type { PackageDependency } from '../packaging/package-manifest.js';
import type { PackageReader } from '../packaging/package-reader.js';
import type { RegistryCacheContext } from './registry-cache-context.js';

/**
 * Dependencies of one package identity for one target framework, together with
 * the registry that answered for it. That registry is the one packages are
 * later downloaded from.
 */
export interface DependencyInfo {
  identity: PackageIdentity;
  dependencies: PackageDependency[];
  source: PackageRegistry;
}

/**
 * Package content obtained from a registry, not yet extracted
 */
export interface PackageDownload {
  identity: PackageIdentity;
  reader: PackageReader;
  openEntry(path: string, signal?: AbortSignal): Readable;
}

export interface PackageRegistry {
  readonly name: string;

  /**
   * Dependencies of `identity` for `framework`, or null when this registry does
   * not have the package.
   */
  getDependencyInfo(
    identity: PackageIdentity,
    framework: TargetFramework,
    context: RegistryCacheContext,
    signal?: AbortSignal
  ): Promise<DependencyInfo | null>;

  download(
    identity: PackageIdentity,
    context: RegistryCacheContext,
    signal?: AbortSignal
  ): Promise<PackageDownload | null>;
}
