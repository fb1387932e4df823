import { REFERENCE_ASSEMBLIES_PACKAGE_VERSION } from '../constants/index.js';
import { ValidationError } from '../utils/errors.js';
import { AssemblyIdentityComparers, LanguageNames } from './compiler-types.js';
import { createPackageIdentity } from './packaging/package-identity.js';
import { ReferenceAssemblies } from './reference-assemblies.js';

/**
 * Catalog of ready-made descriptors, one per supported target framework.
 * Each preset is created on first access and shared by the whole process.
 */

type PresetFactory = () => ReferenceAssemblies;

function once(factory: PresetFactory): PresetFactory {
  let instance: ReferenceAssemblies | null = null;
  return () => {
    instance ??= factory();
    return instance;
  };
}

const NET20_ASSEMBLIES = ['mscorlib', 'System', 'System.Data', 'System.Xml'];
const NET4X_ASSEMBLIES = ['mscorlib', 'System', 'System.Core', 'System.Data', 'System.Data.DataSetExtensions', 'System.Xml', 'System.Xml.Linq'];
const NET45_ASSEMBLIES = [...NET4X_ASSEMBLIES.slice(0, 5), 'System.Net.Http', ...NET4X_ASSEMBLIES.slice(5)];
const NET20_WINDOWS_FORMS = ['System.Drawing', 'System.Windows.Forms'];
const WINDOWS_FORMS = ['System.Deployment', 'System.Drawing', 'System.Windows.Forms'];
const WPF = ['PresentationCore', 'PresentationFramework', 'System.Xaml', 'WindowsBase'];

function netFrameworkReferenceAssemblies(
  tfm: string,
  version: string,
  assemblies: readonly string[],
  withCSharp: boolean
): ReferenceAssemblies {
  const base = new ReferenceAssemblies(
    tfm,
    createPackageIdentity(`Microsoft.NETFramework.ReferenceAssemblies.${tfm}`, REFERENCE_ASSEMBLIES_PACKAGE_VERSION),
    `build\\.NETFramework\\v${version}`
  )
    .withAssemblyIdentityComparer(AssemblyIdentityComparers.desktop)
    .addAssemblies(assemblies);

  const withLanguages = withCSharp
    ? base.addLanguageSpecificAssemblies(LanguageNames.CSharp, ['Microsoft.CSharp'])
    : base;
  return withLanguages.addLanguageSpecificAssemblies(LanguageNames.VisualBasic, ['Microsoft.VisualBasic']);
}

export interface NetFrameworkPresets {
  readonly default: ReferenceAssemblies;
  readonly windowsForms: ReferenceAssemblies;
  readonly wpf?: ReferenceAssemblies;
}

export interface Net4xPresets extends NetFrameworkPresets {
  readonly wpf: ReferenceAssemblies;
}

const factories = new Map<string, PresetFactory>();

function register(name: string, factory: PresetFactory): PresetFactory {
  const shared = once(factory);
  factories.set(name, shared);
  return shared;
}

function net20Presets(): NetFrameworkPresets {
  const byDefault = register('netFramework.net20.default', () =>
    netFrameworkReferenceAssemblies('net20', '2.0', NET20_ASSEMBLIES, false));
  const windowsForms = register('netFramework.net20.windowsForms', () => byDefault().addAssemblies(NET20_WINDOWS_FORMS));

  return Object.freeze({
    get default() { return byDefault(); },
    get windowsForms() { return windowsForms(); }
  });
}

function net4xPresets(tfm: string, version: string, assemblies: readonly string[]): Net4xPresets {
  const byDefault = register(`netFramework.${tfm}.default`, () =>
    netFrameworkReferenceAssemblies(tfm, version, assemblies, true));
  const windowsForms = register(`netFramework.${tfm}.windowsForms`, () => byDefault().addAssemblies(WINDOWS_FORMS));
  const wpf = register(`netFramework.${tfm}.wpf`, () => byDefault().addAssemblies(WPF));

  return Object.freeze({
    get default() { return byDefault(); },
    get windowsForms() { return windowsForms(); },
    get wpf() { return wpf(); }
  });
}

function packagePreset(name: string, tfm: string, packageId: string, version: string): PresetFactory {
  return register(name, () =>
    new ReferenceAssemblies(tfm).addPackages([createPackageIdentity(packageId, version)]));
}

const netCoreApp10 = packagePreset('netCore.netCoreApp10', 'netcoreapp1.0', 'Microsoft.NETCore.App', '1.0.16');
const netCoreApp11 = packagePreset('netCore.netCoreApp11', 'netcoreapp1.1', 'Microsoft.NETCore.App', '1.1.13');
const netCoreApp20 = packagePreset('netCore.netCoreApp20', 'netcoreapp2.0', 'Microsoft.NETCore.App', '2.0.9');
const netCoreApp21 = packagePreset('netCore.netCoreApp21', 'netcoreapp2.1', 'Microsoft.NETCore.App', '2.1.13');

const netStandard1x = [0, 1, 2, 3, 4, 5, 6].map(minor =>
  packagePreset(`netStandard.netStandard1${minor}`, `netstandard1.${minor}`, 'NETStandard.Library', '1.6.1'));

const netStandard20 = register('netStandard.netStandard20', () =>
  new ReferenceAssemblies(
    'netstandard2.0',
    createPackageIdentity('NETStandard.Library', '2.0.3'),
    'build\\netstandard2.0\\ref'
  ).addAssemblies(['netstandard']));

const netFramework = Object.freeze({
  net20: net20Presets(),
  net40: net4xPresets('net40', '4.0', NET4X_ASSEMBLIES),
  net45: net4xPresets('net45', '4.5', NET45_ASSEMBLIES),
  net451: net4xPresets('net451', '4.5.1', NET45_ASSEMBLIES),
  net452: net4xPresets('net452', '4.5.2', NET45_ASSEMBLIES),
  net46: net4xPresets('net46', '4.6', NET45_ASSEMBLIES),
  net461: net4xPresets('net461', '4.6.1', NET45_ASSEMBLIES),
  net462: net4xPresets('net462', '4.6.2', NET45_ASSEMBLIES),
  net47: net4xPresets('net47', '4.7', NET45_ASSEMBLIES),
  net471: net4xPresets('net471', '4.7.1', NET45_ASSEMBLIES),
  net472: net4xPresets('net472', '4.7.2', NET45_ASSEMBLIES),
  net48: net4xPresets('net48', '4.8', NET45_ASSEMBLIES)
});

function netStandardAt(minor: number): ReferenceAssemblies {
  const factory = netStandard1x[minor];
  if (!factory) {
    throw new ValidationError(`No netstandard1.${minor} preset`);
  }
  return factory();
}

export const ReferenceAssembliesPresets = Object.freeze({
  get default() { return netStandard20(); },
  netFramework,
  netCore: Object.freeze({
    get netCoreApp10() { return netCoreApp10(); },
    get netCoreApp11() { return netCoreApp11(); },
    get netCoreApp20() { return netCoreApp20(); },
    get netCoreApp21() { return netCoreApp21(); }
  }),
  netStandard: Object.freeze({
    get netStandard10() { return netStandardAt(0); },
    get netStandard11() { return netStandardAt(1); },
    get netStandard12() { return netStandardAt(2); },
    get netStandard13() { return netStandardAt(3); },
    get netStandard14() { return netStandardAt(4); },
    get netStandard15() { return netStandardAt(5); },
    get netStandard16() { return netStandardAt(6); },
    get netStandard20() { return netStandard20(); }
  })
});

/**
 * Preset names in catalog order, e.g. `netFramework.net472.wpf`
 */
export function listPresetNames(): string[] {
  return Array.from(factories.keys());
}

/**
 * Look up a preset by its dotted name; `default` is accepted as well
 */
export function getPreset(name: string): ReferenceAssemblies {
  if (name === 'default') {
    return ReferenceAssembliesPresets.default;
  }

  const factory = factories.get(name);
  if (!factory) {
    throw new ValidationError(`Unknown preset '${name}'`, { available: listPresetNames() });
  }
  return factory();
}
