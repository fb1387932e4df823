import {
  FRAMEWORK_FAMILIES,
  compareFrameworkVersions,
  type FrameworkVersion,
  type TargetFramework
} from './target-framework.js';

/**
 * Highest .NETStandard version each runtime version implements.
 * Entries are ordered by runtime version.
 */
const NET_STANDARD_SUPPORT: Record<string, ReadonlyArray<readonly [FrameworkVersion, FrameworkVersion]>> = {
  [FRAMEWORK_FAMILIES.NET_FRAMEWORK]: [
    [[4, 5, 0], [1, 1, 0]],
    [[4, 5, 1], [1, 2, 0]],
    [[4, 6, 0], [1, 3, 0]],
    [[4, 6, 1], [2, 0, 0]]
  ],
  [FRAMEWORK_FAMILIES.NET_CORE_APP]: [
    [[1, 0, 0], [1, 6, 0]],
    [[2, 0, 0], [2, 0, 0]],
    [[3, 0, 0], [2, 1, 0]]
  ]
};

/**
 * Closeness of a compatible candidate: lower tier wins, then higher version.
 */
interface FrameworkDistance {
  tier: number;
  version: FrameworkVersion;
}

const TIER_SAME_FAMILY = 0;
const TIER_NET_STANDARD = 1;
const TIER_ANY = 2;

function maxNetStandardVersion(target: TargetFramework): FrameworkVersion | null {
  if (target.family === FRAMEWORK_FAMILIES.NET_STANDARD) {
    return target.version;
  }

  const table = NET_STANDARD_SUPPORT[target.family];
  if (!table) {
    return null;
  }

  let supported: FrameworkVersion | null = null;
  for (const [runtimeVersion, standardVersion] of table) {
    if (compareFrameworkVersions(runtimeVersion, target.version) <= 0) {
      supported = standardVersion;
    }
  }
  return supported;
}

/**
 * Distance from target to candidate, or null when the candidate cannot be
 * consumed by a project targeting `target`.
 */
export function getFrameworkDistance(target: TargetFramework, candidate: TargetFramework): FrameworkDistance | null {
  if (candidate.family === FRAMEWORK_FAMILIES.ANY) {
    return { tier: TIER_ANY, version: candidate.version };
  }

  // An unparseable name only matches itself
  if (candidate.family === FRAMEWORK_FAMILIES.UNSUPPORTED || target.family === FRAMEWORK_FAMILIES.UNSUPPORTED) {
    return candidate.shortName === target.shortName
      ? { tier: TIER_SAME_FAMILY, version: candidate.version }
      : null;
  }

  if (candidate.identifier === target.identifier) {
    return compareFrameworkVersions(candidate.version, target.version) <= 0
      ? { tier: TIER_SAME_FAMILY, version: candidate.version }
      : null;
  }

  if (candidate.family === FRAMEWORK_FAMILIES.NET_STANDARD) {
    const supported = maxNetStandardVersion(target);
    if (supported && compareFrameworkVersions(candidate.version, supported) <= 0) {
      return { tier: TIER_NET_STANDARD, version: candidate.version };
    }
  }

  return null;
}

export function isCompatible(target: TargetFramework, candidate: TargetFramework): boolean {
  return getFrameworkDistance(target, candidate) !== null;
}

/**
 * Picks the nearest compatible framework from a set of candidates
 */
export class FrameworkReducer {
  getNearest(target: TargetFramework, candidates: Iterable<TargetFramework>): TargetFramework | null {
    let best: { framework: TargetFramework; distance: FrameworkDistance } | null = null;

    for (const framework of candidates) {
      const distance = getFrameworkDistance(target, framework);
      if (!distance) {
        continue;
      }

      if (!best || isNearer(distance, best.distance)) {
        best = { framework, distance };
      }
    }

    return best?.framework ?? null;
  }
}

function isNearer(a: FrameworkDistance, b: FrameworkDistance): boolean {
  if (a.tier !== b.tier) {
    return a.tier < b.tier;
  }
  return compareFrameworkVersions(a.version, b.version) > 0;
}
