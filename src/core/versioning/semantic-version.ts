import * as semver from 'semver';
import { ValidationError } from '../../utils/errors.js';

const VERSION_PATTERN = /^v?(\d+)(?:\.(\d+))?(?:\.(\d+))?(?:\.(\d+))?(?:-([0-9A-Za-z.-]+))?(?:\+([0-9A-Za-z.-]+))?$/;

/**
 * A package version: up to four numeric parts plus an optional SemVer 2.0
 * prerelease label and build metadata.
 *
 * Ordering compares the numeric parts first and then the prerelease label with
 * SemVer precedence rules; build metadata never participates.
 */
export class SemanticVersion {
  readonly major: number;
  readonly minor: number;
  readonly patch: number;
  readonly revision: number;
  readonly release: string;
  readonly metadata: string;

  private constructor(major: number, minor: number, patch: number, revision: number, release: string, metadata: string) {
    this.major = major;
    this.minor = minor;
    this.patch = patch;
    this.revision = revision;
    this.release = release;
    this.metadata = metadata;
    Object.freeze(this);
  }

  static parse(value: string): SemanticVersion {
    const parsed = SemanticVersion.tryParse(value);
    if (!parsed) {
      throw new ValidationError(`'${value}' is not a valid version`, { version: value });
    }
    return parsed;
  }

  static tryParse(value: string): SemanticVersion | null {
    const match = VERSION_PATTERN.exec(value.trim());
    if (!match) {
      return null;
    }

    const [, major, minor, patch, revision, release = '', metadata = ''] = match;
    // Let semver validate the label; it rejects empty identifiers and leading zeros
    if (release && !semver.valid(`0.0.0-${release}`)) {
      return null;
    }

    return new SemanticVersion(
      Number(major),
      Number(minor ?? 0),
      Number(patch ?? 0),
      Number(revision ?? 0),
      release,
      metadata
    );
  }

  get isPrerelease(): boolean {
    return this.release.length > 0;
  }

  compareTo(other: SemanticVersion): number {
    const numeric = [
      this.major - other.major,
      this.minor - other.minor,
      this.patch - other.patch,
      this.revision - other.revision
    ].find(diff => diff !== 0);
    if (numeric !== undefined) {
      return Math.sign(numeric);
    }

    if (this.release === other.release) {
      return 0;
    }

    return semver.compare(toSemverLabel(this.release), toSemverLabel(other.release));
  }

  equals(other: SemanticVersion): boolean {
    return this.compareTo(other) === 0;
  }

  /**
   * Normalized form: three numeric parts, the revision only when non-zero
   */
  toString(): string {
    const numbers = `${this.major}.${this.minor}.${this.patch}${this.revision !== 0 ? `.${this.revision}` : ''}`;
    return this.release ? `${numbers}-${this.release}` : numbers;
  }
}

function toSemverLabel(release: string): string {
  return release ? `0.0.0-${release}` : '0.0.0';
}
