/**
 * Package assembler: groups extracted files by directory into packages.
 */
import { BuildError, ErrorCodes } from '../../utils/errors.js';
import type { StandardLibraryOracle } from '../stdlib/standard-library.js';
import type { Application } from './application.js';
import type { SourceFile } from './types.js';

/** Import path reserved for program entry points. */
export const RESERVED_ENTRY_PACKAGE = 'main';

/** Prefix of the synthetic import path given to top-level files. */
export const TOP_LEVEL_PACKAGE_PREFIX = 'main';

const TOP_LEVEL_SUFFIX_RANGE = 100000;

/** Returns an integer in [0, bound). */
export type RandomSource = (bound: number) => number;

/**
 * Default source. The suffix is not meant to be reproducible; tests
 * inject their own.
 */
export const defaultRandom: RandomSource = (bound: number): number =>
  Math.floor(Math.random() * bound);

export function topLevelImportPath(random: RandomSource): string {
  const suffix = random(TOP_LEVEL_SUFFIX_RANGE);
  return `${TOP_LEVEL_PACKAGE_PREFIX}${String(suffix).padStart(5, '0')}`;
}

export interface AssemblyOptions {
  standardLibrary: StandardLibraryOracle;
  /** Import paths allowed to coincide with standard-library names */
  allowedShadowNames: ReadonlySet<string>;
  random: RandomSource;
}

/**
 * Derive the import path of a directory relative to the base directory.
 */
export function importPathForDir(dir: string, random: RandomSource): string {
  if (dir === '.') {
    return topLevelImportPath(random);
  }
  return dir.split('\\').join('/');
}

/**
 * Create one package per directory, in sorted directory order, and
 * register it with the application.
 */
export async function assemblePackages(
  app: Application,
  filesByDir: ReadonlyMap<string, SourceFile[]>,
  options: AssemblyOptions
): Promise<void> {
  const dirs = [...filesByDir.keys()].sort();

  for (const dir of dirs) {
    const files = filesByDir.get(dir) ?? [];
    const importPath = importPathForDir(dir, options.random);

    if (importPath === RESERVED_ENTRY_PACKAGE) {
      throw new BuildError(
        ErrorCodes.RESERVED_IDENTIFIER,
        `top-level ${RESERVED_ENTRY_PACKAGE} package is forbidden`,
        { dir }
      );
    }

    let isShadow = false;
    if (await options.standardLibrary.isStandard(importPath)) {
      if (!options.allowedShadowNames.has(importPath)) {
        throw new BuildError(
          ErrorCodes.SHADOWS_STANDARD_PACKAGE,
          `package "${importPath}" has the same name as a standard package`,
          { importPath }
        );
      }
      isShadow = true;
    }

    app.addPackage({
      importPath,
      files,
      hasInit: files.some(f => f.hasInit),
      isShadow,
    });
  }
}
