import { throwIfCancelled, ValidationError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import {
  AssemblyIdentityComparers,
  createReferenceFromFile,
  type AssemblyIdentityComparer,
  type MetadataReference
} from './compiler-types.js';
import { getDefaultEnvironment, type ResolutionEnvironment } from './environment.js';
import { parseTargetFramework, FRAMEWORK_FAMILIES } from './frameworks/target-framework.js';
import { formatIdentity, identityEquals, identityKey, type PackageIdentity } from './packaging/package-identity.js';
import { RegistryCacheContext } from './registry/registry-cache-context.js';
import { buildAssemblySet } from './resolution/assembly-set-builder.js';
import { buildDependencyGraph, type DependencyGraph } from './resolution/dependency-graph.js';
import { acquirePackage, type AcquiredPackage } from './resolution/package-acquisition.js';
import { resolvePackages } from './resolution/package-resolver.js';

export interface ReferenceAssembliesOptions {
  targetFramework: string;
  assemblyIdentityComparer?: AssemblyIdentityComparer;
  referenceAssemblyPackage?: PackageIdentity | null;
  /** Folder inside the reference assembly package holding the assemblies, e.g. `build\.NETFramework\v4.7.2` */
  referenceAssemblyPath?: string | null;
  assemblies?: readonly string[];
  languageSpecificAssemblies?: ReadonlyMap<string, readonly string[]>;
  packages?: readonly PackageIdentity[];
}

export interface ResolveOptions {
  signal?: AbortSignal;
  /** Registries, stores and lock to resolve with; defaults to the user's configuration */
  environment?: ResolutionEnvironment;
}

const DEFAULT_LANGUAGE = '';

/**
 * Immutable description of the assemblies to compile against for one target
 * framework. Every `with`/`add` method returns a new instance; `resolve`
 * memoizes its answer per language on the instance it is called on.
 */
export class ReferenceAssemblies {
  readonly targetFramework: string;
  readonly assemblyIdentityComparer: AssemblyIdentityComparer;
  readonly referenceAssemblyPackage: PackageIdentity | null;
  readonly referenceAssemblyPath: string | null;
  readonly assemblies: readonly string[];
  readonly languageSpecificAssemblies: ReadonlyMap<string, readonly string[]>;
  readonly packages: readonly PackageIdentity[];

  private readonly references = new Map<string, readonly MetadataReference[]>();

  constructor(options: ReferenceAssembliesOptions);
  constructor(targetFramework: string);
  constructor(targetFramework: string, referenceAssemblyPackage: PackageIdentity, referenceAssemblyPath: string);
  constructor(
    targetFrameworkOrOptions: string | ReferenceAssembliesOptions,
    referenceAssemblyPackage?: PackageIdentity,
    referenceAssemblyPath?: string
  ) {
    const options: ReferenceAssembliesOptions = typeof targetFrameworkOrOptions === 'string'
      ? { targetFramework: targetFrameworkOrOptions, referenceAssemblyPackage, referenceAssemblyPath }
      : targetFrameworkOrOptions;

    if (!options.targetFramework || !options.targetFramework.trim()) {
      throw new ValidationError('Target framework is required');
    }

    this.targetFramework = options.targetFramework;
    this.assemblyIdentityComparer = options.assemblyIdentityComparer ?? AssemblyIdentityComparers.default;
    this.referenceAssemblyPackage = options.referenceAssemblyPackage ?? null;
    this.referenceAssemblyPath = options.referenceAssemblyPath ?? null;
    this.assemblies = Object.freeze([...(options.assemblies ?? [])]);
    this.languageSpecificAssemblies = new Map(
      Array.from(options.languageSpecificAssemblies ?? [], ([language, names]) => [language, Object.freeze([...names])])
    );
    this.packages = Object.freeze([...(options.packages ?? [])]);

    Object.freeze(this);
  }

  private toOptions(): ReferenceAssembliesOptions {
    return {
      targetFramework: this.targetFramework,
      assemblyIdentityComparer: this.assemblyIdentityComparer,
      referenceAssemblyPackage: this.referenceAssemblyPackage,
      referenceAssemblyPath: this.referenceAssemblyPath,
      assemblies: this.assemblies,
      languageSpecificAssemblies: this.languageSpecificAssemblies,
      packages: this.packages
    };
  }

  withAssemblyIdentityComparer(assemblyIdentityComparer: AssemblyIdentityComparer): ReferenceAssemblies {
    return new ReferenceAssemblies({ ...this.toOptions(), assemblyIdentityComparer });
  }

  withAssemblies(assemblies: readonly string[]): ReferenceAssemblies {
    return new ReferenceAssemblies({ ...this.toOptions(), assemblies });
  }

  addAssemblies(assemblies: readonly string[]): ReferenceAssemblies {
    return this.withAssemblies(this.assemblies.concat(assemblies));
  }

  withLanguageSpecificAssemblies(languageSpecificAssemblies: ReadonlyMap<string, readonly string[]>): ReferenceAssemblies;
  withLanguageSpecificAssemblies(language: string, assemblies: readonly string[]): ReferenceAssemblies;
  withLanguageSpecificAssemblies(
    languageOrMap: string | ReadonlyMap<string, readonly string[]>,
    assemblies: readonly string[] = []
  ): ReferenceAssemblies {
    if (typeof languageOrMap !== 'string') {
      return new ReferenceAssemblies({ ...this.toOptions(), languageSpecificAssemblies: languageOrMap });
    }

    const languageSpecificAssemblies = new Map(this.languageSpecificAssemblies);
    languageSpecificAssemblies.set(languageOrMap, assemblies);
    return new ReferenceAssemblies({ ...this.toOptions(), languageSpecificAssemblies });
  }

  addLanguageSpecificAssemblies(language: string, assemblies: readonly string[]): ReferenceAssemblies {
    const existing = this.languageSpecificAssemblies.get(language) ?? [];
    return this.withLanguageSpecificAssemblies(language, existing.concat(assemblies));
  }

  withPackages(packages: readonly PackageIdentity[]): ReferenceAssemblies {
    return new ReferenceAssemblies({ ...this.toOptions(), packages });
  }

  addPackages(packages: readonly PackageIdentity[]): ReferenceAssemblies {
    return this.withPackages(this.packages.concat(packages));
  }

  /**
   * Resolve the references for `language`. A language without specific
   * assemblies shares the language-agnostic result.
   */
  async resolve(language?: string | null, options: ResolveOptions = {}): Promise<readonly MetadataReference[]> {
    if (language) {
      const specific = this.languageSpecificAssemblies.get(language);
      if (!specific || specific.length === 0) {
        return this.resolve(null, options);
      }
    }

    const key = language ?? DEFAULT_LANGUAGE;
    const cached = this.references.get(key);
    if (cached) {
      return cached;
    }

    throwIfCancelled(options.signal);
    const environment = options.environment ?? await getDefaultEnvironment();

    return environment.semaphore.use(async () => {
      const existing = this.references.get(key);
      if (existing) {
        return existing;
      }

      const computed = await this.resolveCore(key, environment, options.signal);
      this.references.set(key, computed);
      return computed;
    }, options.signal);
  }

  private async resolveCore(
    language: string,
    environment: ResolutionEnvironment,
    signal?: AbortSignal
  ): Promise<readonly MetadataReference[]> {
    const framework = parseTargetFramework(this.targetFramework);
    if (framework.family === FRAMEWORK_FAMILIES.UNSUPPORTED) {
      logger.warn(`Unrecognized target framework '${this.targetFramework}'; only framework-neutral assets and folders of the same name will match`);
    }

    logger.debug(`Resolving reference assemblies for ${this.targetFramework}`, {
      language: language || '(default)',
      referenceAssemblyPackage: this.referenceAssemblyPackage ? formatIdentity(this.referenceAssemblyPackage) : null,
      packages: this.packages.map(formatIdentity)
    });

    const context = new RegistryCacheContext();
    try {
      const roots = this.referenceAssemblyPackage
        ? [this.referenceAssemblyPackage, ...this.packages]
        : [...this.packages];
      const graph = await buildDependencyGraph(roots, {
        framework,
        registries: environment.registries,
        context,
        signal
      });

      const acquired: AcquiredPackage[] = [];
      let rootInstallPath: string | null = null;
      for (const identity of this.createInstallSet(graph, signal)) {
        const pkg = await acquirePackage(identity, {
          localStore: environment.localStore,
          globalStore: environment.globalStore,
          graph,
          context,
          rootPackage: this.referenceAssemblyPackage,
          signal
        });
        if (!pkg) {
          continue;
        }
        if (identityEquals(identity, this.referenceAssemblyPackage ?? undefined)) {
          rootInstallPath = pkg.installedPath;
        }
        acquired.push(pkg);
      }

      const paths = await buildAssemblySet({
        packages: acquired,
        framework,
        rootInstallPath,
        referenceAssemblyPath: this.referenceAssemblyPath,
        assemblies: this.assemblies,
        languageAssemblies: language ? this.languageSpecificAssemblies.get(language) ?? [] : [],
        signal
      });

      logger.debug(`Resolved ${paths.length} reference assemblies for ${this.targetFramework}`);
      return Object.freeze(paths.map(createReferenceFromFile));
    } finally {
      context.dispose();
    }
  }

  /**
   * The reference assembly package first, then the versions the resolver picked
   * for everything else
   */
  private createInstallSet(graph: DependencyGraph, signal?: AbortSignal): PackageIdentity[] {
    const installSet: PackageIdentity[] = [];
    const seen = new Set<string>();
    const push = (identity: PackageIdentity): void => {
      const key = identityKey(identity);
      if (!seen.has(key)) {
        seen.add(key);
        installSet.push(identity);
      }
    };

    if (this.referenceAssemblyPackage) {
      push(this.referenceAssemblyPackage);
    }

    if (this.packages.length > 0) {
      const resolved = resolvePackages(this.packages.map(pkg => pkg.id), graph, signal);
      resolved.forEach(push);
    }

    return installSet;
  }
}
