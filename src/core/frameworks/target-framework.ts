/**
 * Target framework monikers as they appear in package folder names
 * (`lib/net472`, `ref/netstandard2.0`, `lib/netcoreapp2.1`, `lib/net6.0`).
 * Any other `<identifier><version>` name (`lib/p1`, `lib/uap10.0`) forms a
 * generic family of its own.
 */

export const FRAMEWORK_FAMILIES = {
  NET_FRAMEWORK: '.NETFramework',
  NET_STANDARD: '.NETStandard',
  NET_CORE_APP: '.NETCoreApp',
  ANY: 'Any',
  GENERIC: 'Generic',
  UNSUPPORTED: 'Unsupported'
} as const;

export type FrameworkFamily = typeof FRAMEWORK_FAMILIES[keyof typeof FRAMEWORK_FAMILIES];

export type FrameworkVersion = readonly [number, number, number];

export interface TargetFramework {
  readonly family: FrameworkFamily;
  /** Frameworks with the same identifier are versions of one another */
  readonly identifier: string;
  readonly version: FrameworkVersion;
  /** Normalized folder name, used as the group key */
  readonly shortName: string;
}

const NET_FRAMEWORK_PATTERN = /^net(\d)(\d)?(\d)?$/;
const DOTTED_PATTERN = /^(netstandard|netcoreapp|net)(\d+)\.(\d+)(?:\.(\d+))?(?:-[a-z0-9.]+)?$/;
const GENERIC_PATTERN = /^([a-z]+)(\d+(?:\.\d+){0,2})?$/;
const RESERVED_IDENTIFIERS: ReadonlySet<string> = new Set(['net', 'netstandard', 'netcoreapp']);

export const ANY_FRAMEWORK: TargetFramework = Object.freeze({
  family: FRAMEWORK_FAMILIES.ANY,
  identifier: FRAMEWORK_FAMILIES.ANY,
  version: [0, 0, 0] as const,
  shortName: ''
});

export function parseTargetFramework(folderName: string): TargetFramework {
  const name = folderName.trim().toLowerCase();
  if (name === '' || name === 'any') {
    return ANY_FRAMEWORK;
  }

  const legacy = NET_FRAMEWORK_PATTERN.exec(name);
  if (legacy) {
    return createFramework(FRAMEWORK_FAMILIES.NET_FRAMEWORK, [
      Number(legacy[1]),
      Number(legacy[2] ?? 0),
      Number(legacy[3] ?? 0)
    ]);
  }

  const dotted = DOTTED_PATTERN.exec(name);
  if (dotted) {
    const version: FrameworkVersion = [Number(dotted[2]), Number(dotted[3]), Number(dotted[4] ?? 0)];
    switch (dotted[1]) {
      case 'netstandard':
        return createFramework(FRAMEWORK_FAMILIES.NET_STANDARD, version);
      case 'netcoreapp':
        return createFramework(FRAMEWORK_FAMILIES.NET_CORE_APP, version);
      default:
        // net5.0 and later continue .NETCoreApp; net4.x dotted names are not valid folders
        if (version[0] >= 5) {
          return createFramework(FRAMEWORK_FAMILIES.NET_CORE_APP, version);
        }
    }
  }

  const generic = GENERIC_PATTERN.exec(name);
  if (generic && generic[1] && !RESERVED_IDENTIFIERS.has(generic[1])) {
    return Object.freeze({
      family: FRAMEWORK_FAMILIES.GENERIC,
      identifier: generic[1],
      version: parseGenericVersion(generic[2] ?? ''),
      shortName: name
    });
  }

  return Object.freeze({
    family: FRAMEWORK_FAMILIES.UNSUPPORTED,
    identifier: name,
    version: [0, 0, 0] as const,
    shortName: name
  });
}

// `p1` is 1.0, `p12` is 1.2 (one digit per part), `p1.10` is 1.10
function parseGenericVersion(text: string): FrameworkVersion {
  const parts = text.includes('.') ? text.split('.') : text.split('');
  const [major = 0, minor = 0, patch = 0] = parts.slice(0, 3).map(Number);
  return [major, minor, patch];
}

export function compareFrameworkVersions(a: FrameworkVersion, b: FrameworkVersion): number {
  for (let i = 0; i < 3; i++) {
    if (a[i] !== b[i]) {
      return a[i] < b[i] ? -1 : 1;
    }
  }
  return 0;
}

function createFramework(family: FrameworkFamily, version: FrameworkVersion): TargetFramework {
  return Object.freeze({ family, identifier: family, version, shortName: formatShortName(family, version) });
}

function formatShortName(family: FrameworkFamily, [major, minor, patch]: FrameworkVersion): string {
  const dotted = `${major}.${minor}${patch ? `.${patch}` : ''}`;
  switch (family) {
    case FRAMEWORK_FAMILIES.NET_FRAMEWORK:
      return `net${major}${minor}${patch ? patch : ''}`;
    case FRAMEWORK_FAMILIES.NET_STANDARD:
      return `netstandard${dotted}`;
    case FRAMEWORK_FAMILIES.NET_CORE_APP:
      return major >= 5 ? `net${dotted}` : `netcoreapp${dotted}`;
    default:
      return '';
  }
}
