import { extname, join, resolve } from 'path';
import { FACADES_FOLDER, FILE_PATTERNS, PACKAGE_FOLDERS } from '../../constants/index.js';
import { throwIfCancelled } from '../../utils/errors.js';
import { isDirectory, isFile, listFiles } from '../../utils/fs.js';
import { FrameworkReducer } from '../frameworks/framework-reducer.js';
import type { TargetFramework } from '../frameworks/target-framework.js';
import type { FrameworkSpecificGroup } from '../packaging/package-reader.js';
import type { AcquiredPackage } from './package-acquisition.js';

const frameworkReducer = new FrameworkReducer();

export interface NearestAssets {
  /** Package-relative paths of the chosen ref/ group, or the lib/ group when there is no ref/ match */
  compileItems: string[];
  /** Assembly names from the nearest framework assembly group */
  frameworkItems: string[];
}

export interface AssemblySetRequest {
  packages: readonly AcquiredPackage[];
  framework: TargetFramework;
  /** Installed folder of the reference assembly package, when there is one */
  rootInstallPath: string | null;
  referenceAssemblyPath: string | null;
  assemblies: readonly string[];
  languageAssemblies: readonly string[];
  signal?: AbortSignal;
}

function nearestGroup(target: TargetFramework, groups: FrameworkSpecificGroup[]): FrameworkSpecificGroup | null {
  const nearest = frameworkReducer.getNearest(target, groups.map(group => group.targetFramework));
  if (!nearest) {
    return null;
  }
  return groups.find(group => group.targetFramework.shortName === nearest.shortName) ?? null;
}

function isAssemblyFile(path: string): boolean {
  return extname(path).toLowerCase() === FILE_PATTERNS.ASSEMBLY_EXTENSION;
}

/**
 * Nearest ref/ group wins outright; lib/ is only consulted without one.
 * Framework assemblies are selected independently.
 */
export async function selectNearestAssets(
  pkg: AcquiredPackage,
  framework: TargetFramework,
  signal?: AbortSignal
): Promise<NearestAssets> {
  const [refGroups, libGroups, frameworkGroups] = await Promise.all([
    pkg.reader.getItems(PACKAGE_FOLDERS.REF, signal),
    pkg.reader.getItems(PACKAGE_FOLDERS.LIB, signal),
    pkg.reader.getFrameworkItems(signal)
  ]);

  const compileGroup = nearestGroup(framework, refGroups) ?? nearestGroup(framework, libGroups);
  return {
    compileItems: compileGroup?.items ?? [],
    frameworkItems: nearestGroup(framework, frameworkGroups)?.items ?? []
  };
}

/**
 * `build\.NETFramework\v4.7.2` and `build/.NETFramework/v4.7.2` name the same folder
 */
export function toReferenceDirectory(rootInstallPath: string, referenceAssemblyPath: string | null): string {
  const segments = (referenceAssemblyPath ?? '').split(/[\\/]+/).filter(Boolean);
  return join(rootInstallPath, ...segments);
}

/**
 * Collect the absolute paths of every assembly the request contributes, deduplicated
 */
export async function buildAssemblySet(request: AssemblySetRequest): Promise<string[]> {
  const resolved = new Set<string>();
  const referenceDir = request.rootInstallPath
    ? toReferenceDirectory(request.rootInstallPath, request.referenceAssemblyPath)
    : null;

  const addNamedAssembly = async (name: string): Promise<void> => {
    if (!referenceDir) {
      return;
    }
    const candidate = join(referenceDir, `${name}${FILE_PATTERNS.ASSEMBLY_EXTENSION}`);
    if (await isFile(candidate)) {
      resolved.add(resolve(candidate));
    }
  };

  for (const pkg of request.packages) {
    throwIfCancelled(request.signal);
    const assets = await selectNearestAssets(pkg, request.framework, request.signal);

    for (const item of assets.compileItems) {
      if (isAssemblyFile(item)) {
        resolved.add(resolve(pkg.installedPath, ...item.split('/')));
      }
    }

    for (const name of assets.frameworkItems) {
      await addNamedAssembly(name);
    }
  }

  for (const name of [...request.assemblies, ...request.languageAssemblies]) {
    throwIfCancelled(request.signal);
    await addNamedAssembly(name);
  }

  if (referenceDir) {
    const facadesDir = join(referenceDir, FACADES_FOLDER);
    if (await isDirectory(facadesDir)) {
      for (const file of await listFiles(facadesDir)) {
        if (isAssemblyFile(file)) {
          resolved.add(resolve(facadesDir, file));
        }
      }
    }
  }

  return Array.from(resolved);
}
