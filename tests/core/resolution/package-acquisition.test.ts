import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import path from 'node:path';

import { parseTargetFramework } from '../../../src/core/frameworks/target-framework.js';
import { PackageFolderStore } from '../../../src/core/packaging/package-folder-store.js';
import type { PackageIdentity } from '../../../src/core/packaging/package-identity.js';
import { FolderFeedRegistry } from '../../../src/core/registry/folder-feed-registry.js';
import { RegistryCacheContext } from '../../../src/core/registry/registry-cache-context.js';
import { buildDependencyGraph, type DependencyGraph } from '../../../src/core/resolution/dependency-graph.js';
import { acquirePackage, findInstalledPath } from '../../../src/core/resolution/package-acquisition.js';
import { PackageNotFoundError } from '../../../src/utils/errors.js';
import { CountingRegistry, createTempDir, identity, removeDir, writeFeedPackage } from '../../test-helpers.js';

describe('acquirePackage', () => {
  let testDir: string;
  let feedDir: string;
  let localStore: PackageFolderStore;
  let globalStore: PackageFolderStore;
  let registry: CountingRegistry;
  let context: RegistryCacheContext;

  beforeEach(() => {
    testDir = createTempDir('acquire');
    feedDir = path.join(testDir, 'feed');
    localStore = new PackageFolderStore(path.join(testDir, 'local'));
    globalStore = new PackageFolderStore(path.join(testDir, 'global'));
    registry = new CountingRegistry(new FolderFeedRegistry(feedDir));
    context = new RegistryCacheContext();

    writeFeedPackage(feedDir, { id: 'Has.Lib', version: '1.0.0', files: ['lib/net472/Has.Lib.dll'] });
    writeFeedPackage(feedDir, { id: 'Meta.Only', version: '1.0.0', files: ['build/Meta.Only.targets'] });
  });

  afterEach(() => {
    removeDir(testDir);
  });

  async function graphFor(...roots: PackageIdentity[]): Promise<DependencyGraph> {
    return buildDependencyGraph(roots, {
      framework: parseTargetFramework('net472'),
      registries: [registry],
      context
    });
  }

  function options(graph: DependencyGraph, rootPackage: PackageIdentity | null = null) {
    return { localStore, globalStore, graph, context, rootPackage };
  }

  it('downloads from the registry and extracts into the local store', async () => {
    const pkg = identity('Has.Lib', '1.0.0');
    const acquired = await acquirePackage(pkg, options(await graphFor(pkg)));

    assert.ok(acquired);
    assert.equal(acquired.installedPath, localStore.getPackageDirectory(pkg));
    assert.equal(registry.downloads, 1);
    assert.deepEqual(await acquired.reader.getFiles(), ['lib/net472/Has.Lib.dll', 'package.yml']);
  });

  it('reuses an extracted copy without downloading again', async () => {
    const pkg = identity('Has.Lib', '1.0.0');
    await acquirePackage(pkg, options(await graphFor(pkg)));

    const again = await acquirePackage(pkg, options(new Map()));

    assert.equal(again?.installedPath, localStore.getPackageDirectory(pkg));
    assert.equal(registry.downloads, 1);
  });

  it('falls back to the global store', async () => {
    const pkg = identity('Has.Lib', '1.0.0');
    const download = await registry.download(pkg, context);
    assert.ok(download);
    const globalPath = await globalStore.extract(download);

    assert.equal(await findInstalledPath(pkg, localStore, globalStore), globalPath);

    const acquired = await acquirePackage(pkg, options(new Map()));
    assert.equal(acquired?.installedPath, globalPath);
    assert.equal(await localStore.getInstalledPath(pkg), null);
  });

  it('skips dependency-only packages that carry no compile-time assets', async () => {
    const pkg = identity('Meta.Only', '1.0.0');
    const acquired = await acquirePackage(pkg, options(await graphFor(pkg)));

    assert.equal(acquired, null);
    assert.equal(await localStore.getInstalledPath(pkg), null);
  });

  it('always extracts the reference assembly package', async () => {
    const pkg = identity('Meta.Only', '1.0.0');
    const acquired = await acquirePackage(pkg, options(await graphFor(pkg), pkg));

    assert.equal(acquired?.installedPath, localStore.getPackageDirectory(pkg));
  });

  it('fails for packages no registry provided', async () => {
    await assert.rejects(
      acquirePackage(identity('Absent', '1.0.0'), options(new Map())),
      PackageNotFoundError
    );
  });
});
