export { ReferenceAssemblies, type ReferenceAssembliesOptions, type ResolveOptions } from './reference-assemblies.js';
export { ReferenceAssembliesPresets, getPreset, listPresetNames, type NetFrameworkPresets, type Net4xPresets } from './presets.js';
export {
  LanguageNames,
  AssemblyIdentityComparers,
  createReferenceFromFile,
  type LanguageName,
  type AssemblyIdentityComparer,
  type MetadataReference
} from './compiler-types.js';
export { createResolutionEnvironment, getDefaultEnvironment, type ResolutionEnvironment } from './environment.js';
export { ConfigManager, loadResolverConfig, applyConfigDefaults, type ResolvedConfig, type ResolvedFeed } from './config.js';
export { SemanticVersion } from './versioning/semantic-version.js';
export { VersionRange } from './versioning/version-range.js';
export { parseTargetFramework, type TargetFramework } from './frameworks/target-framework.js';
export { FrameworkReducer } from './frameworks/framework-reducer.js';
export { createPackageIdentity, parsePackageIdentity, type PackageIdentity } from './packaging/package-identity.js';
export { PackageFolderStore, type PackageStore } from './packaging/package-folder-store.js';
export { PackageFolderReader, type PackageReader, type FrameworkSpecificGroup } from './packaging/package-reader.js';
export { FolderFeedRegistry } from './registry/folder-feed-registry.js';
export { RegistryCacheContext } from './registry/registry-cache-context.js';
export type { DependencyInfo, PackageDownload, PackageRegistry } from './registry/types.js';
export { FileSystemSemaphore, type LockReleaser } from './locking/file-system-semaphore.js';
export * from '../utils/errors.js';
export { RefAsmError, ErrorCodes } from '../types/index.js';
