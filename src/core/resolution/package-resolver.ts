/**
 * Picks one version per package id from a dependency graph such that every
 * dependency range of every picked package is satisfied, preferring the lowest
 * acceptable version of each id.
 */

import { VersionConflictError, throwIfCancelled } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { formatIdentity, type PackageIdentity } from '../packaging/package-identity.js';
import type { DependencyInfo } from '../registry/types.js';
import type { DependencyGraph } from './dependency-graph.js';

interface ConflictDetails {
  packageId: string;
  ranges: string[];
  requestedBy: string[];
  availableVersions: string[];
}

interface SolverState {
  available: Map<string, DependencyInfo[]>;
  chosen: Map<string, DependencyInfo>;
  conflict: ConflictDetails | null;
  signal?: AbortSignal;
}

function groupById(graph: DependencyGraph): Map<string, DependencyInfo[]> {
  const available = new Map<string, DependencyInfo[]>();
  for (const info of graph.values()) {
    const id = info.identity.id.toLowerCase();
    let versions = available.get(id);
    if (!versions) {
      versions = [];
      available.set(id, versions);
    }
    versions.push(info);
  }

  for (const versions of available.values()) {
    versions.sort((a, b) => a.identity.version.compareTo(b.identity.version));
  }
  return available;
}

/**
 * Constraints that already chosen packages place on `id`
 */
function collectConstraints(id: string, chosen: Map<string, DependencyInfo>): { ranges: string[]; requestedBy: string[]; accepts: (info: DependencyInfo) => boolean } {
  const edges = Array.from(chosen.values()).flatMap(parent =>
    parent.dependencies
      .filter(dep => dep.id.toLowerCase() === id)
      .map(dep => ({ parent, range: dep.range }))
  );

  return {
    ranges: edges.map(edge => edge.range.toString()),
    requestedBy: edges.map(edge => formatIdentity(edge.parent.identity)),
    accepts: info => edges.every(edge => edge.range.satisfies(info.identity.version))
  };
}

/**
 * A candidate must also accept whatever is already chosen for its own dependencies
 */
function isConsistentWithChosen(candidate: DependencyInfo, chosen: Map<string, DependencyInfo>): boolean {
  return candidate.dependencies.every(dep => {
    const picked = chosen.get(dep.id.toLowerCase());
    return !picked || dep.range.satisfies(picked.identity.version);
  });
}

function assign(queue: readonly string[], state: SolverState): boolean {
  throwIfCancelled(state.signal);
  if (queue.length === 0) {
    return true;
  }

  const [id, ...rest] = queue;
  if (state.chosen.has(id)) {
    return assign(rest, state);
  }

  const versions = state.available.get(id);
  if (!versions) {
    // Not in the graph: no registry had it, so there is nothing to pick
    logger.debug(`No candidates for '${id}' in the dependency graph; skipping`);
    return assign(rest, state);
  }

  const constraints = collectConstraints(id, state.chosen);
  const candidates = versions.filter(info => constraints.accepts(info) && isConsistentWithChosen(info, state.chosen));

  for (const candidate of candidates) {
    state.chosen.set(id, candidate);
    const dependencyIds = candidate.dependencies
      .map(dep => dep.id.toLowerCase())
      .filter(depId => !state.chosen.has(depId));

    if (assign([...rest, ...dependencyIds], state)) {
      return true;
    }
    state.chosen.delete(id);
  }

  // Unwinding overwrites deeper failures; an unconstrained id keeps what is below it
  if (constraints.ranges.length > 0 || !state.conflict) {
    state.conflict = {
      packageId: versions[0].identity.id,
      ranges: constraints.ranges,
      requestedBy: constraints.requestedBy,
      availableVersions: versions.map(info => info.identity.version.toString())
    };
  }
  return false;
}

/**
 * Resolve `requestedIds` and everything they depend on to concrete identities.
 * Throws VersionConflictError when no combination satisfies all ranges.
 */
export function resolvePackages(
  requestedIds: readonly string[],
  graph: DependencyGraph,
  signal?: AbortSignal
): PackageIdentity[] {
  const state: SolverState = {
    available: groupById(graph),
    chosen: new Map(),
    conflict: null,
    signal
  };

  const queue = Array.from(new Set(requestedIds.map(id => id.toLowerCase())));
  if (!assign(queue, state)) {
    const conflict = state.conflict ?? {
      packageId: requestedIds[0] ?? '',
      ranges: [],
      requestedBy: [],
      availableVersions: []
    };
    throw new VersionConflictError(conflict.packageId, conflict);
  }

  const resolved = Array.from(state.chosen.values(), info => info.identity);
  logger.debug('Resolved package versions', { packages: resolved.map(formatIdentity) });
  return resolved;
}
