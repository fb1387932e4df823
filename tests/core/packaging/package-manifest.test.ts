import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { parsePackageManifest } from '../../../src/core/packaging/package-manifest.js';
import { InvalidPackageError, InvalidVersionRangeError } from '../../../src/utils/errors.js';

const SOURCE = 'test/package.yml';

describe('parsePackageManifest', () => {
  it('reads identity, dependency groups and framework assemblies', () => {
    const manifest = parsePackageManifest([
      'id: Contoso.Widgets',
      'version: 2.1.0',
      'dependencies:',
      '  - targetFramework: net472',
      '    packages:',
      '      - id: Contoso.Core',
      '        version: "[1.0.0,2.0.0)"',
      '      - id: Contoso.Logging',
      '  - targetFramework: netstandard2.0',
      '    packages: []',
      'frameworkAssemblies:',
      '  - assemblyName: System.Xml',
      '    targetFramework: net45',
      ''
    ].join('\n'), SOURCE);

    assert.equal(manifest.identity.id, 'Contoso.Widgets');
    assert.equal(manifest.identity.version.toString(), '2.1.0');

    assert.equal(manifest.dependencyGroups.length, 2);
    const [net472, netstandard] = manifest.dependencyGroups;
    assert.equal(net472.targetFramework.shortName, 'net472');
    assert.deepEqual(
      net472.packages.map(dep => [dep.id, dep.range.toString()]),
      [['Contoso.Core', '[1.0.0,2.0.0)'], ['Contoso.Logging', '*']]
    );
    assert.equal(netstandard.targetFramework.shortName, 'netstandard2.0');
    assert.deepEqual(netstandard.packages, []);

    assert.equal(manifest.frameworkAssemblies.length, 1);
    assert.equal(manifest.frameworkAssemblies[0].assemblyName, 'System.Xml');
    assert.equal(manifest.frameworkAssemblies[0].targetFramework.shortName, 'net45');
  });

  it('accepts versions YAML reads as numbers', () => {
    const manifest = parsePackageManifest('id: Numeric\nversion: 1.5\n', SOURCE);
    assert.equal(manifest.identity.version.toString(), '1.5.0');
    assert.deepEqual(manifest.dependencyGroups, []);
    assert.deepEqual(manifest.frameworkAssemblies, []);
  });

  it('rejects manifests without an id or version', () => {
    assert.throws(() => parsePackageManifest('version: 1.0.0\n', SOURCE), InvalidPackageError);
    assert.throws(() => parsePackageManifest('id: NoVersion\n', SOURCE), InvalidPackageError);
  });

  it('rejects content that is not a mapping', () => {
    assert.throws(() => parsePackageManifest('- just\n- a list\n', SOURCE), InvalidPackageError);
    assert.throws(() => parsePackageManifest('id: [unterminated\n', SOURCE), InvalidPackageError);
  });

  it('rejects an invalid version', () => {
    assert.throws(() => parsePackageManifest('id: Bad\nversion: one\n', SOURCE), InvalidPackageError);
  });

  it('rejects malformed dependency entries', () => {
    assert.throws(
      () => parsePackageManifest('id: A\nversion: 1.0.0\ndependencies: nope\n', SOURCE),
      InvalidPackageError
    );
    assert.throws(
      () => parsePackageManifest('id: A\nversion: 1.0.0\ndependencies:\n  - packages:\n      - version: 1.0.0\n', SOURCE),
      InvalidPackageError
    );
    assert.throws(
      () => parsePackageManifest('id: A\nversion: 1.0.0\ndependencies:\n  - packages:\n      - id: B\n        version: "[2.0"\n', SOURCE),
      InvalidVersionRangeError
    );
  });
});
