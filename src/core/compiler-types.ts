import { basename, resolve } from 'path';

/**
 * Language names as compilers spell them; used as keys of language-specific assemblies
 */
export const LanguageNames = {
  CSharp: 'C#',
  VisualBasic: 'Visual Basic'
} as const;

export type LanguageName = typeof LanguageNames[keyof typeof LanguageNames];

/**
 * How the compiler should unify assembly identities. `desktop` applies the
 * .NET Framework unification and retargeting rules.
 */
export interface AssemblyIdentityComparer {
  readonly name: 'default' | 'desktop';
}

export const AssemblyIdentityComparers: Readonly<Record<AssemblyIdentityComparer['name'], AssemblyIdentityComparer>> = Object.freeze({
  default: Object.freeze({ name: 'default' }),
  desktop: Object.freeze({ name: 'desktop' })
});

/**
 * Handle a compiler can load a reference from
 */
export interface MetadataReference {
  readonly filePath: string;
  readonly display: string;
}

export function createReferenceFromFile(filePath: string): MetadataReference {
  const absolute = resolve(filePath);
  return Object.freeze({ filePath: absolute, display: basename(absolute) });
}
