import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import path from 'node:path';

import {
  PackageFolderReader,
  groupFolderItems,
  groupFrameworkAssemblies,
  hasCompileTimeAssets
} from '../../../src/core/packaging/package-reader.js';
import { parsePackageManifest } from '../../../src/core/packaging/package-manifest.js';
import { createTempDir, removeDir, writeFeedPackage, writeFile } from '../../test-helpers.js';

describe('groupFolderItems', () => {
  it('groups files by the framework folder under lib/', () => {
    const groups = groupFolderItems([
      'lib/net45/A.dll',
      'lib/net472/B.dll',
      'lib/net472/B.xml',
      'lib/C.dll',
      'LIB/net45/D.dll',
      'ref/netstandard2.0/R.dll',
      'libx/net45/Z.dll',
      'package.yml'
    ], 'lib');

    assert.deepEqual(
      groups.map(group => [group.targetFramework.shortName, group.items]),
      [
        ['net45', ['lib/net45/A.dll', 'LIB/net45/D.dll']],
        ['net472', ['lib/net472/B.dll', 'lib/net472/B.xml']],
        ['', ['lib/C.dll']]
      ]
    );
  });

  it('returns no groups when the folder is absent', () => {
    assert.deepEqual(groupFolderItems(['lib/net45/A.dll'], 'ref'), []);
  });
});

describe('groupFrameworkAssemblies', () => {
  it('groups assembly names by target framework', () => {
    const manifest = parsePackageManifest([
      'id: Framework.Refs',
      'version: 1.0.0',
      'frameworkAssemblies:',
      '  - assemblyName: System.Xml',
      '    targetFramework: net45',
      '  - assemblyName: System.Data',
      '    targetFramework: net45',
      '  - assemblyName: System.Net.Http',
      '    targetFramework: net472',
      ''
    ].join('\n'), 'inline');

    assert.deepEqual(
      groupFrameworkAssemblies(manifest).map(group => [group.targetFramework.shortName, group.items]),
      [
        ['net45', ['System.Xml', 'System.Data']],
        ['net472', ['System.Net.Http']]
      ]
    );
  });
});

describe('PackageFolderReader', () => {
  let testDir: string;

  beforeEach(() => {
    testDir = createTempDir('reader');
  });

  afterEach(() => {
    removeDir(testDir);
  });

  it('lists package files without junk or the completion marker', async () => {
    const packageDir = writeFeedPackage(testDir, { id: 'Reader.Test', version: '1.0.0', files: ['lib/net472/A.dll'] });
    writeFile(path.join(packageDir, '.refasm.completed'), 'done');
    writeFile(path.join(packageDir, '.DS_Store'), 'junk');

    const reader = new PackageFolderReader(packageDir);
    assert.deepEqual(await reader.getFiles(), ['lib/net472/A.dll', 'package.yml']);
    assert.equal((await reader.getManifest()).identity.id, 'Reader.Test');
  });

  it('reports whether a package has compile-time assets', async () => {
    const withLib = writeFeedPackage(testDir, { id: 'With.Lib', version: '1.0.0', files: ['lib/net45/A.dll'] });
    const withRef = writeFeedPackage(testDir, { id: 'With.Ref', version: '1.0.0', files: ['ref/netstandard2.0/A.dll'] });
    const withoutAssets = writeFeedPackage(testDir, { id: 'Meta.Only', version: '1.0.0', files: ['build/Meta.targets'] });

    assert.equal(await hasCompileTimeAssets(new PackageFolderReader(withLib)), true);
    assert.equal(await hasCompileTimeAssets(new PackageFolderReader(withRef)), true);
    assert.equal(await hasCompileTimeAssets(new PackageFolderReader(withoutAssets)), false);
  });
});
