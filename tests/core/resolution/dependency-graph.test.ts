import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { parseTargetFramework } from '../../../src/core/frameworks/target-framework.js';
import { RegistryCacheContext } from '../../../src/core/registry/registry-cache-context.js';
import type { PackageRegistry } from '../../../src/core/registry/types.js';
import { buildDependencyGraph } from '../../../src/core/resolution/dependency-graph.js';
import { OperationCancelledError } from '../../../src/utils/errors.js';
import { InMemoryRegistry, identity } from '../../test-helpers.js';

function build(registries: PackageRegistry[], roots = [identity('A', '1.0.0')], signal?: AbortSignal) {
  return buildDependencyGraph(roots, {
    framework: parseTargetFramework('net472'),
    registries,
    context: new RegistryCacheContext(),
    signal
  });
}

describe('buildDependencyGraph', () => {
  it('terminates on cycles and records each identity once', async () => {
    const registry = new InMemoryRegistry('feed')
      .add('A', '1.0.0', { B: '[1.0.0,)' })
      .add('B', '1.0.0', { A: '[1.0.0,)' });

    const graph = await build([registry]);

    assert.deepEqual(Array.from(graph.keys()), ['a@1.0.0', 'b@1.0.0']);
    assert.deepEqual(registry.lookups, ['a@1.0.0', 'b@1.0.0']);
  });

  it('walks depth-first and expands shared dependencies once', async () => {
    const registry = new InMemoryRegistry('feed')
      .add('A', '1.0.0', { B: '1.0.0', C: '1.0.0' })
      .add('B', '1.0.0', { D: '1.0.0' })
      .add('C', '1.0.0', { D: '1.0.0' })
      .add('D', '1.0.0');

    const graph = await build([registry]);

    assert.deepEqual(Array.from(graph.keys()), ['a@1.0.0', 'b@1.0.0', 'd@1.0.0', 'c@1.0.0']);
    assert.deepEqual(registry.lookups, ['a@1.0.0', 'b@1.0.0', 'd@1.0.0', 'c@1.0.0']);
  });

  it('expands each dependency at the lowest version its range allows', async () => {
    const registry = new InMemoryRegistry('feed')
      .add('A', '1.0.0', { B: '[1.5.0,2.0.0)', Unbounded: '(,3.0.0]' })
      .add('B', '1.5.0');

    const graph = await build([registry]);

    assert.deepEqual(Array.from(graph.keys()), ['a@1.0.0', 'b@1.5.0']);
    assert.deepEqual(registry.lookups, ['a@1.0.0', 'b@1.5.0']);
  });

  it('takes each identity from the first registry that has it', async () => {
    const primary = new InMemoryRegistry('primary').add('A', '1.0.0', { B: '1.0.0' });
    const secondary = new InMemoryRegistry('secondary')
      .add('A', '1.0.0')
      .add('B', '1.0.0');

    const graph = await build([primary, secondary]);

    assert.equal(graph.get('a@1.0.0')?.source, primary);
    assert.equal(graph.get('b@1.0.0')?.source, secondary);
    assert.deepEqual(primary.lookups, ['a@1.0.0', 'b@1.0.0']);
    assert.deepEqual(secondary.lookups, ['b@1.0.0']);
  });

  it('drops identities no registry provides', async () => {
    const registry = new InMemoryRegistry('feed').add('A', '1.0.0', { Missing: '1.0.0', B: '1.0.0' }).add('B', '1.0.0', { Missing: '1.0.0' });

    const graph = await build([registry]);

    assert.deepEqual(Array.from(graph.keys()), ['a@1.0.0', 'b@1.0.0']);
    assert.equal(registry.lookups.filter(key => key === 'missing@1.0.0').length, 1);
  });

  it('walks the roots in order', async () => {
    const registry = new InMemoryRegistry('feed')
      .add('Root', '1.0.0')
      .add('Extra', '2.0.0', { Root: '1.0.0' });

    const graph = await build([registry], [identity('Root', '1.0.0'), identity('Extra', '2.0.0')]);

    assert.deepEqual(Array.from(graph.keys()), ['root@1.0.0', 'extra@2.0.0']);
  });

  it('stops when cancelled', async () => {
    const controller = new AbortController();
    controller.abort();
    const registry = new InMemoryRegistry('feed').add('A', '1.0.0');

    await assert.rejects(build([registry], undefined, controller.signal), OperationCancelledError);
    assert.deepEqual(registry.lookups, []);
  });
});
