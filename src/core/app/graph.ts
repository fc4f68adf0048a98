/**
 * Populates each package's dependency list from its files' imports.
 */
import type { Application } from './application.js';
import type { Package } from './types.js';

/**
 * Resolve imports against the application's index. Paths without a package
 * are dropped: they belong to the standard library or were never found.
 * Each target appears once; lists are sorted by import path.
 */
export function populateDependencies(app: Application): void {
  for (const pkg of app.packages) {
    const imports = new Set<string>();
    for (const file of pkg.files) {
      for (const importPath of file.importPaths) {
        imports.add(importPath);
      }
    }

    const deps: Package[] = [];
    for (const importPath of imports) {
      const dep = app.lookup(importPath);
      if (dep) {
        deps.push(dep);
      }
    }
    deps.sort((a, b) => compareImportPaths(a.importPath, b.importPath));
    pkg.dependencies = deps.map(dep => dep.id);
  }
}

/**
 * Byte-wise ordering of import paths (not locale-aware).
 */
export function compareImportPaths(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
