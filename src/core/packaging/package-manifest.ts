import * as yaml from 'js-yaml';
import { InvalidPackageError } from '../../utils/errors.js';
import { readTextFile } from '../../utils/fs.js';
import { SemanticVersion } from '../versioning/semantic-version.js';
import { VersionRange } from '../versioning/version-range.js';
import { parseTargetFramework, type TargetFramework } from '../frameworks/target-framework.js';
import { createPackageIdentity, type PackageIdentity } from './package-identity.js';

export interface PackageDependency {
  id: string;
  range: VersionRange;
}

export interface PackageDependencyGroup {
  targetFramework: TargetFramework;
  packages: PackageDependency[];
}

export interface FrameworkAssemblyReference {
  assemblyName: string;
  targetFramework: TargetFramework;
}

/**
 * Parsed and validated package.yml
 */
export interface PackageManifest {
  identity: PackageIdentity;
  dependencyGroups: PackageDependencyGroup[];
  frameworkAssemblies: FrameworkAssemblyReference[];
}

type YamlRecord = Record<string, unknown>;

function isRecord(value: unknown): value is YamlRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// YAML turns unquoted 1.0 into a number
function readScalar(value: unknown): string | undefined {
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number') {
    return String(value);
  }
  return undefined;
}

function readList(record: YamlRecord, key: string, source: string): unknown[] {
  const value = record[key];
  if (value === undefined || value === null) {
    return [];
  }
  if (!Array.isArray(value)) {
    throw new InvalidPackageError(`'${key}' must be a list in ${source}`, { source });
  }
  return value;
}

function parseDependency(value: unknown, source: string): PackageDependency {
  if (!isRecord(value)) {
    throw new InvalidPackageError(`dependency entries must be mappings in ${source}`, { source });
  }
  const id = readScalar(value.id);
  if (!id) {
    throw new InvalidPackageError(`dependency without an id in ${source}`, { source });
  }
  return { id, range: VersionRange.parse(readScalar(value.version) ?? '') };
}

function parseDependencyGroup(value: unknown, source: string): PackageDependencyGroup {
  if (!isRecord(value)) {
    throw new InvalidPackageError(`dependency groups must be mappings in ${source}`, { source });
  }
  return {
    targetFramework: parseTargetFramework(readScalar(value.targetFramework) ?? ''),
    packages: readList(value, 'packages', source).map(dep => parseDependency(dep, source))
  };
}

function parseFrameworkAssembly(value: unknown, source: string): FrameworkAssemblyReference {
  if (!isRecord(value)) {
    throw new InvalidPackageError(`frameworkAssemblies entries must be mappings in ${source}`, { source });
  }
  const assemblyName = readScalar(value.assemblyName);
  if (!assemblyName) {
    throw new InvalidPackageError(`framework assembly without an assemblyName in ${source}`, { source });
  }
  return {
    assemblyName,
    targetFramework: parseTargetFramework(readScalar(value.targetFramework) ?? '')
  };
}

/**
 * Parse package.yml content with validation
 */
export function parsePackageManifest(content: string, source: string): PackageManifest {
  let parsed: unknown;
  try {
    parsed = yaml.load(content);
  } catch (error) {
    throw new InvalidPackageError(`unable to parse ${source}`, { source, error });
  }

  if (!isRecord(parsed)) {
    throw new InvalidPackageError(`${source} must contain a mapping`, { source });
  }

  const id = readScalar(parsed.id);
  const versionText = readScalar(parsed.version);
  if (!id || !versionText) {
    throw new InvalidPackageError(`${source} must contain id and version fields`, { source });
  }

  const version = SemanticVersion.tryParse(versionText);
  if (!version) {
    throw new InvalidPackageError(`${source} has an invalid version '${versionText}'`, { source });
  }

  return {
    identity: createPackageIdentity(id, version),
    dependencyGroups: readList(parsed, 'dependencies', source).map(group => parseDependencyGroup(group, source)),
    frameworkAssemblies: readList(parsed, 'frameworkAssemblies', source).map(item => parseFrameworkAssembly(item, source))
  };
}

export async function readPackageManifest(manifestPath: string): Promise<PackageManifest> {
  const content = await readTextFile(manifestPath);
  return parsePackageManifest(content, manifestPath);
}
