import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { SemanticVersion } from '../../../src/core/versioning/semantic-version.js';
import { ValidationError } from '../../../src/utils/errors.js';

function v(text: string): SemanticVersion {
  return SemanticVersion.parse(text);
}

describe('SemanticVersion', () => {
  describe('parse', () => {
    it('fills missing numeric parts with zero', () => {
      const version = v('1.2');
      assert.equal(version.major, 1);
      assert.equal(version.minor, 2);
      assert.equal(version.patch, 0);
      assert.equal(version.toString(), '1.2.0');
    });

    it('keeps a non-zero fourth part', () => {
      assert.equal(v('1.2.3.4').toString(), '1.2.3.4');
      assert.equal(v('1.2.3.0').toString(), '1.2.3');
    });

    it('reads prerelease labels and build metadata', () => {
      const version = v('1.0.0-preview.2+build.5');
      assert.equal(version.release, 'preview.2');
      assert.equal(version.metadata, 'build.5');
      assert.equal(version.isPrerelease, true);
      assert.equal(version.toString(), '1.0.0-preview.2');
    });

    it('accepts a leading v', () => {
      assert.equal(v('v2.1').toString(), '2.1.0');
    });

    it('rejects malformed versions', () => {
      assert.equal(SemanticVersion.tryParse('abc'), null);
      assert.equal(SemanticVersion.tryParse('1.0.0-'), null);
      assert.equal(SemanticVersion.tryParse('1.0.0-01'), null);
      assert.equal(SemanticVersion.tryParse('1.2.3.4.5'), null);
      assert.throws(() => v('not-a-version'), ValidationError);
    });
  });

  describe('compareTo', () => {
    it('orders by numeric parts first', () => {
      assert.equal(v('1.0.0').compareTo(v('1.0.1')), -1);
      assert.equal(v('2.0').compareTo(v('1.9.9')), 1);
      assert.equal(v('1.0.0.1').compareTo(v('1.0.0')), 1);
    });

    it('places prereleases before the release', () => {
      assert.equal(v('1.0.0-preview.2').compareTo(v('1.0.0')), -1);
      assert.equal(v('1.0.0-alpha').compareTo(v('1.0.0-beta')), -1);
      assert.equal(v('1.0.0-alpha.2').compareTo(v('1.0.0-alpha.10')), -1);
    });

    it('ignores build metadata', () => {
      assert.equal(v('1.0.0+abc').compareTo(v('1.0.0')), 0);
      assert.ok(v('1.0.0+abc').equals(v('1.0.0+def')));
    });
  });
});
