import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { SemanticVersion } from '../../../src/core/versioning/semantic-version.js';
import { VersionRange } from '../../../src/core/versioning/version-range.js';
import { InvalidVersionRangeError } from '../../../src/utils/errors.js';

const v = (text: string) => SemanticVersion.parse(text);

describe('VersionRange', () => {
  it('treats a bare version as a minimum', () => {
    const range = VersionRange.parse('1.0');
    assert.equal(range.minVersion?.toString(), '1.0.0');
    assert.equal(range.isMinInclusive, true);
    assert.equal(range.maxVersion, null);
    assert.equal(range.satisfies(v('1.0.0')), true);
    assert.equal(range.satisfies(v('5.0.0')), true);
    assert.equal(range.satisfies(v('0.9.0')), false);
    assert.equal(range.toString(), '1.0.0');
  });

  it('parses half-open intervals', () => {
    const range = VersionRange.parse('[1.0.0,2.0.0)');
    assert.equal(range.satisfies(v('1.0.0')), true);
    assert.equal(range.satisfies(v('1.9.9')), true);
    assert.equal(range.satisfies(v('2.0.0')), false);
    assert.equal(range.toString(), '[1.0.0,2.0.0)');
  });

  it('parses exclusive and open-ended bounds', () => {
    const above = VersionRange.parse('(1.0,)');
    assert.equal(above.satisfies(v('1.0.0')), false);
    assert.equal(above.satisfies(v('1.0.1')), true);
    assert.equal(above.toString(), '(1.0.0,)');

    const upTo = VersionRange.parse('(,2.0]');
    assert.equal(upTo.minVersion, null);
    assert.equal(upTo.satisfies(v('0.1.0')), true);
    assert.equal(upTo.satisfies(v('2.0.0')), true);
    assert.equal(upTo.satisfies(v('2.0.1')), false);
    assert.equal(upTo.toString(), '(,2.0.0]');
  });

  it('parses exact versions', () => {
    const range = VersionRange.parse('[1.5]');
    assert.equal(range.satisfies(v('1.5.0')), true);
    assert.equal(range.satisfies(v('1.5.1')), false);
    assert.equal(range.toString(), '[1.5.0]');
  });

  it('matches everything for * and empty input', () => {
    assert.equal(VersionRange.parse('*'), VersionRange.all);
    assert.equal(VersionRange.parse(''), VersionRange.all);
    assert.equal(VersionRange.all.satisfies(v('0.0.1')), true);
    assert.equal(VersionRange.all.toString(), '*');
  });

  it('rejects malformed ranges', () => {
    for (const text of ['[1.0', '(1.0)', '[2.0,1.0]', 'abc', '[,]', '(1.0,1.0)', '[1.0,2.0,3.0]']) {
      assert.throws(() => VersionRange.parse(text), InvalidVersionRangeError, text);
    }
  });
});
