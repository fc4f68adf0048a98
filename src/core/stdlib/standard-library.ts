/**
 * Standard-library oracle: is an import path part of the standard library?
 */
import * as path from 'node:path';
import { isDirectory } from '../../utils/file-system.js';

export interface StandardLibraryOracle {
  isStandard(importPath: string): Promise<boolean>;
}

export type StandardLibraryLookup = (importPath: string) => Promise<boolean>;

/**
 * Memo table in front of a lookup.
 *
 * One promise is stored per import path; the first insertion wins and
 * entries are never invalidated, so one cache can serve several builds.
 */
export class StandardLibraryCache implements StandardLibraryOracle {
  private readonly entries = new Map<string, Promise<boolean>>();

  constructor(private readonly lookup: StandardLibraryLookup) {}

  isStandard(importPath: string): Promise<boolean> {
    const cached = this.entries.get(importPath);
    if (cached) {
      return cached;
    }
    const pending = this.lookup(importPath);
    this.entries.set(importPath, pending);
    return pending;
  }

  get size(): number {
    return this.entries.size;
  }
}

/**
 * Lookup against a GOROOT: a path is standard when `<root>/src/<path>`
 * is a directory. Paths with a dot in them (domain-style) never are.
 */
export function goRootLookup(goRoot: string): StandardLibraryLookup {
  return async (importPath: string): Promise<boolean> => {
    if (importPath === '' || importPath.includes('.')) {
      return false;
    }
    return isDirectory(path.join(goRoot, 'src', ...importPath.split('/')));
  };
}

/**
 * A cached oracle for the standard library rooted at `goRoot`.
 */
export function createGoRootStandardLibrary(goRoot: string): StandardLibraryCache {
  return new StandardLibraryCache(goRootLookup(goRoot));
}
