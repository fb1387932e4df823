import { SemanticVersion } from '../versioning/semantic-version.js';
import { ValidationError } from '../../utils/errors.js';

/**
 * A package id paired with an exact version. Ids compare case-insensitively.
 */
export interface PackageIdentity {
  readonly id: string;
  readonly version: SemanticVersion;
}

export function createPackageIdentity(id: string, version: SemanticVersion | string): PackageIdentity {
  const trimmed = id.trim();
  if (!trimmed) {
    throw new ValidationError('Package id must not be empty');
  }
  return Object.freeze({
    id: trimmed,
    version: typeof version === 'string' ? SemanticVersion.parse(version) : version
  });
}

/**
 * Parse `Id@1.2.3` (the form the CLI accepts)
 */
export function parsePackageIdentity(input: string): PackageIdentity {
  const at = input.lastIndexOf('@');
  if (at <= 0 || at === input.length - 1) {
    throw new ValidationError(`Expected <id>@<version>, received '${input}'`, { input });
  }
  return createPackageIdentity(input.slice(0, at), input.slice(at + 1));
}

/**
 * Key used for every map and set keyed by identity
 */
export function identityKey(identity: PackageIdentity): string {
  return `${identity.id.toLowerCase()}@${identity.version.toString()}`;
}

export function identityEquals(a: PackageIdentity | undefined, b: PackageIdentity | undefined): boolean {
  if (!a || !b) {
    return a === b;
  }
  return a.id.toLowerCase() === b.id.toLowerCase() && a.version.equals(b.version);
}

export function formatIdentity(identity: PackageIdentity): string {
  return `${identity.id}@${identity.version.toString()}`;
}
