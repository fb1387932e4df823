import { InvalidVersionRangeError } from '../../utils/errors.js';
import { SemanticVersion } from './semantic-version.js';

/**
 * Version range in interval notation:
 *
 *   1.0          >= 1.0
 *   [1.0]        == 1.0
 *   (1.0,)       >  1.0
 *   (,1.0]       <= 1.0
 *   [1.0,2.0)    >= 1.0 and < 2.0
 *
 * An empty string or `*` matches every version.
 */
export class VersionRange {
  readonly minVersion: SemanticVersion | null;
  readonly isMinInclusive: boolean;
  readonly maxVersion: SemanticVersion | null;
  readonly isMaxInclusive: boolean;

  constructor(
    minVersion: SemanticVersion | null,
    isMinInclusive: boolean,
    maxVersion: SemanticVersion | null,
    isMaxInclusive: boolean
  ) {
    this.minVersion = minVersion;
    this.isMinInclusive = minVersion !== null && isMinInclusive;
    this.maxVersion = maxVersion;
    this.isMaxInclusive = maxVersion !== null && isMaxInclusive;
    Object.freeze(this);
  }

  static readonly all = new VersionRange(null, false, null, false);

  static exact(version: SemanticVersion): VersionRange {
    return new VersionRange(version, true, version, true);
  }

  static atLeast(version: SemanticVersion): VersionRange {
    return new VersionRange(version, true, null, false);
  }

  static parse(value: string): VersionRange {
    const text = value.trim();
    if (text === '' || text === '*') {
      return VersionRange.all;
    }

    const first = text[0];
    const last = text[text.length - 1];
    if (first !== '[' && first !== '(') {
      const version = SemanticVersion.tryParse(text);
      if (!version) {
        throw new InvalidVersionRangeError(value);
      }
      return VersionRange.atLeast(version);
    }

    if (last !== ']' && last !== ')') {
      throw new InvalidVersionRangeError(value);
    }

    const isMinInclusive = first === '[';
    const isMaxInclusive = last === ']';
    const parts = text.slice(1, -1).split(',').map(part => part.trim());

    if (parts.length === 1) {
      // [1.0] is the only legal single-part interval
      const version = SemanticVersion.tryParse(parts[0]);
      if (!version || !isMinInclusive || !isMaxInclusive) {
        throw new InvalidVersionRangeError(value);
      }
      return VersionRange.exact(version);
    }

    if (parts.length !== 2) {
      throw new InvalidVersionRangeError(value);
    }

    const [minText, maxText] = parts;
    const minVersion = minText ? SemanticVersion.tryParse(minText) : null;
    const maxVersion = maxText ? SemanticVersion.tryParse(maxText) : null;
    if ((minText && !minVersion) || (maxText && !maxVersion) || (!minVersion && !maxVersion)) {
      throw new InvalidVersionRangeError(value);
    }

    if (minVersion && maxVersion) {
      const order = minVersion.compareTo(maxVersion);
      if (order > 0 || (order === 0 && !(isMinInclusive && isMaxInclusive))) {
        throw new InvalidVersionRangeError(value);
      }
    }

    return new VersionRange(minVersion, isMinInclusive, maxVersion, isMaxInclusive);
  }

  satisfies(version: SemanticVersion): boolean {
    if (this.minVersion) {
      const order = version.compareTo(this.minVersion);
      if (order < 0 || (order === 0 && !this.isMinInclusive)) {
        return false;
      }
    }

    if (this.maxVersion) {
      const order = version.compareTo(this.maxVersion);
      if (order > 0 || (order === 0 && !this.isMaxInclusive)) {
        return false;
      }
    }

    return true;
  }

  toString(): string {
    if (!this.minVersion && !this.maxVersion) {
      return '*';
    }

    if (this.minVersion && this.maxVersion && this.isMinInclusive && this.isMaxInclusive && this.minVersion.equals(this.maxVersion)) {
      return `[${this.minVersion.toString()}]`;
    }

    if (this.minVersion && this.isMinInclusive && !this.maxVersion) {
      return this.minVersion.toString();
    }

    const open = this.isMinInclusive ? '[' : '(';
    const close = this.isMaxInclusive ? ']' : ')';
    return `${open}${this.minVersion?.toString() ?? ''},${this.maxVersion?.toString() ?? ''}${close}`;
  }
}
