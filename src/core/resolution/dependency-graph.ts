import { throwIfCancelled } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import type { TargetFramework } from '../frameworks/target-framework.js';
import { createPackageIdentity, formatIdentity, identityKey, type PackageIdentity } from '../packaging/package-identity.js';
import type { RegistryCacheContext } from '../registry/registry-cache-context.js';
import type { DependencyInfo, PackageRegistry } from '../registry/types.js';

/**
 * Dependency info per identity, keyed by `identityKey`
 */
export type DependencyGraph = Map<string, DependencyInfo>;

export interface DependencyGraphOptions {
  framework: TargetFramework;
  registries: readonly PackageRegistry[];
  context: RegistryCacheContext;
  signal?: AbortSignal;
}

/**
 * Ask registries in priority order; the first one that knows the package wins.
 */
async function fetchDependencyInfo(
  identity: PackageIdentity,
  options: DependencyGraphOptions
): Promise<DependencyInfo | null> {
  for (const registry of options.registries) {
    throwIfCancelled(options.signal);
    const info = await registry.getDependencyInfo(identity, options.framework, options.context, options.signal);
    if (info) {
      logger.debug(`Resolved dependencies of ${formatIdentity(identity)} from '${registry.name}'`, {
        dependencies: info.dependencies.map(dep => `${dep.id} ${dep.range.toString()}`)
      });
      return info;
    }
  }
  return null;
}

/**
 * Depth-first walk from `roots`, expanding each dependency at the lowest version
 * its range allows. An identity already in the graph is never expanded again,
 * which bounds the walk on diamonds and cycles. Identities no registry knows
 * are left out of the graph.
 *
 * Uses an explicit stack; the visiting order is the same as the recursive walk.
 */
export async function buildDependencyGraph(
  roots: readonly PackageIdentity[],
  options: DependencyGraphOptions
): Promise<DependencyGraph> {
  const graph: DependencyGraph = new Map();
  const missing = new Set<string>();
  const stack: PackageIdentity[] = [...roots].reverse();

  while (stack.length > 0) {
    throwIfCancelled(options.signal);
    const identity = stack.pop();
    if (!identity) {
      break;
    }

    const key = identityKey(identity);
    if (graph.has(key) || missing.has(key)) {
      continue;
    }

    const info = await fetchDependencyInfo(identity, options);
    if (!info) {
      // Preserved behavior: the package is dropped and resolution continues without it
      logger.warn(`No registry provides ${formatIdentity(identity)}; continuing without it`);
      missing.add(key);
      continue;
    }

    graph.set(key, info);

    const next: PackageIdentity[] = [];
    for (const dependency of info.dependencies) {
      const minVersion = dependency.range.minVersion;
      if (!minVersion) {
        logger.debug(`Skipping ${dependency.id} ${dependency.range.toString()}: range has no lower bound`);
        continue;
      }
      next.push(createPackageIdentity(dependency.id, minVersion));
    }
    stack.push(...next.reverse());
  }

  return graph;
}
