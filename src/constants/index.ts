/**
 * Shared constants for the refasm resolver
 * Single source of truth for directory names, file names and package folder conventions.
 */

export const DIR_PATTERNS = {
  REFASM: '.refasm',
  TEST_PACKAGES: 'test-packages',
  NUGET_PACKAGES: ['.nuget', 'packages']
} as const;

export const FILE_PATTERNS = {
  PACKAGE_YML: 'package.yml',
  CONFIG_FILES: ['config.jsonc', 'config.json'],
  LOCK_FILE: '.lock',
  STALE_GUARD_SUFFIX: '.stale',
  COMPLETION_MARKER: '.refasm.completed',
  ASSEMBLY_EXTENSION: '.dll'
} as const;

/**
 * Top-level folders inside a package that carry compile-time assets.
 */
export const PACKAGE_FOLDERS = {
  LIB: 'lib',
  REF: 'ref'
} as const;

export const FACADES_FOLDER = 'Facades' as const;

export const ENV_VARS = {
  CONFIG: 'REFASM_CONFIG',
  VERBOSE: 'REFASM_VERBOSE',
  LOG_LEVEL: 'REFASM_LOG_LEVEL',
  NUGET_PACKAGES: 'NUGET_PACKAGES'
} as const;

/**
 * Version of the Microsoft.NETFramework.ReferenceAssemblies.* packages the
 * .NET Framework presets are built on.
 */
export const REFERENCE_ASSEMBLIES_PACKAGE_VERSION = '1.0.0-preview.2' as const;

export const LOCK_POLL = {
  INITIAL_DELAY_MS: 25,
  MAX_DELAY_MS: 500,
  /** Age after which a lock file without a readable owner, or a leftover stale guard, is abandoned */
  ABANDONED_AFTER_MS: 10_000
} as const;

export type PackageFolder = typeof PACKAGE_FOLDERS[keyof typeof PACKAGE_FOLDERS];
