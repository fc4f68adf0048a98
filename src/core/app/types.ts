/**
 * Types for the application package graph.
 */

/** Stable index of a package in its application's arena. */
export type PackageId = number;

/**
 * A source file of the build.
 */
export interface SourceFile {
  /** File name, relative to the owning package's base directory (or the app's) */
  readonly name: string;
  /** The package name the file declares */
  readonly packageName: string;
  /** Import paths, in source order */
  readonly importPaths: readonly string[];
  /** Whether the file has a true init function */
  readonly hasInit: boolean;
}

/**
 * A package of the build, keyed by its import path.
 */
export interface Package {
  readonly id: PackageId;
  readonly importPath: string;
  readonly files: readonly SourceFile[];
  /** Directory the file names are relative to; set only for workspace packages */
  readonly baseDir?: string;
  /** Direct dependencies, sorted by import path once the graph is built */
  dependencies: PackageId[];
  readonly hasInit: boolean;
  /** Import path coincides with an allow-listed standard-library name */
  readonly isShadow: boolean;
}

export interface NewPackage {
  importPath: string;
  files: SourceFile[];
  baseDir?: string;
  hasInit?: boolean;
  isShadow?: boolean;
}

/**
 * Serializable view of a planned application.
 */
export interface BuildPlan {
  packages: Array<{
    importPath: string;
    baseDir?: string;
    files: string[];
    dependencies: string[];
    hasInit: boolean;
    isShadow: boolean;
  }>;
  rootPackages: string[];
}
