import { join } from 'path';
import { FILE_PATTERNS, PACKAGE_FOLDERS, type PackageFolder } from '../../constants/index.js';
import { throwIfCancelled } from '../../utils/errors.js';
import { walkRelativeFiles } from '../../utils/fs.js';
import { parseTargetFramework, type TargetFramework } from '../frameworks/target-framework.js';
import { readPackageManifest, type PackageManifest } from './package-manifest.js';

/**
 * Items of one package folder kind (`lib`, `ref` or framework assemblies)
 * that target the same framework.
 */
export interface FrameworkSpecificGroup {
  targetFramework: TargetFramework;
  /** Package-relative paths with '/' separators, or assembly names for framework items */
  items: string[];
}

export interface PackageReader {
  getManifest(signal?: AbortSignal): Promise<PackageManifest>;
  getFiles(signal?: AbortSignal): Promise<string[]>;
  getItems(folder: PackageFolder, signal?: AbortSignal): Promise<FrameworkSpecificGroup[]>;
  getFrameworkItems(signal?: AbortSignal): Promise<FrameworkSpecificGroup[]>;
}

/**
 * Group files under `<folder>/<tfm>/...` by framework. Files placed directly in
 * `<folder>/` belong to the framework-agnostic group.
 */
export function groupFolderItems(files: Iterable<string>, folder: PackageFolder): FrameworkSpecificGroup[] {
  const groups = new Map<string, FrameworkSpecificGroup>();

  for (const file of files) {
    const segments = file.split('/');
    if (segments.length < 2 || segments[0].toLowerCase() !== folder) {
      continue;
    }

    const framework = segments.length === 2
      ? parseTargetFramework('')
      : parseTargetFramework(segments[1]);

    let group = groups.get(framework.shortName);
    if (!group) {
      group = { targetFramework: framework, items: [] };
      groups.set(framework.shortName, group);
    }
    group.items.push(file);
  }

  return Array.from(groups.values());
}

export function groupFrameworkAssemblies(manifest: PackageManifest): FrameworkSpecificGroup[] {
  const groups = new Map<string, FrameworkSpecificGroup>();
  for (const reference of manifest.frameworkAssemblies) {
    const key = reference.targetFramework.shortName;
    let group = groups.get(key);
    if (!group) {
      group = { targetFramework: reference.targetFramework, items: [] };
      groups.set(key, group);
    }
    group.items.push(reference.assemblyName);
  }
  return Array.from(groups.values());
}

/**
 * True when the package carries anything under lib/ or ref/
 */
export async function hasCompileTimeAssets(reader: PackageReader, signal?: AbortSignal): Promise<boolean> {
  const [libItems, refItems] = await Promise.all([
    reader.getItems(PACKAGE_FOLDERS.LIB, signal),
    reader.getItems(PACKAGE_FOLDERS.REF, signal)
  ]);
  return libItems.length > 0 || refItems.length > 0;
}

/**
 * Reads a package laid out as a plain directory (a feed entry or an extracted copy)
 */
export class PackageFolderReader implements PackageReader {
  private manifest: Promise<PackageManifest> | null = null;
  private files: Promise<string[]> | null = null;

  constructor(readonly rootPath: string) {}

  getManifest(signal?: AbortSignal): Promise<PackageManifest> {
    throwIfCancelled(signal);
    this.manifest ??= readPackageManifest(join(this.rootPath, FILE_PATTERNS.PACKAGE_YML));
    return this.manifest;
  }

  async getFiles(signal?: AbortSignal): Promise<string[]> {
    throwIfCancelled(signal);
    this.files ??= this.collectFiles();
    return this.files;
  }

  async getItems(folder: PackageFolder, signal?: AbortSignal): Promise<FrameworkSpecificGroup[]> {
    return groupFolderItems(await this.getFiles(signal), folder);
  }

  async getFrameworkItems(signal?: AbortSignal): Promise<FrameworkSpecificGroup[]> {
    return groupFrameworkAssemblies(await this.getManifest(signal));
  }

  private async collectFiles(): Promise<string[]> {
    const files: string[] = [];
    for await (const file of walkRelativeFiles(this.rootPath)) {
      if (file !== FILE_PATTERNS.COMPLETION_MARKER) {
        files.push(file);
      }
    }
    return files.sort();
  }
}
