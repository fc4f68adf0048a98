/**
 * Literal tagging validator.
 *
 * Composite literals of standard-library types must name their fields:
 * a positional literal silently changes meaning when the library adds or
 * reorders fields in a later release.
 */
import * as path from 'node:path';
import type { LiteralViolation } from '../../utils/errors.js';
import type { ParsedSourceFile } from '../../frontend/interface.types.js';
import type { StandardLibraryOracle } from '../stdlib/standard-library.js';
import { literalKey, type LiteralExemptions } from './exemptions.js';

/**
 * Local name => import path, for standard-library imports only.
 * Dot imports are not tracked.
 */
export async function trackStandardImports(
  file: ParsedSourceFile,
  standardLibrary: StandardLibraryOracle
): Promise<Map<string, string>> {
  const imports = new Map<string, string>();

  for (const spec of file.imports) {
    if (!(await standardLibrary.isStandard(spec.path))) {
      continue;
    }
    if (spec.alias === '.') {
      continue;
    }
    // Standard packages are named after their last path component.
    imports.set(spec.alias ?? path.posix.basename(spec.path), spec.path);
  }

  return imports;
}

/**
 * Returns every untagged standard-library composite literal in the file.
 * An empty array means the file passes.
 */
export async function findUntaggedLiterals(
  file: ParsedSourceFile,
  displayName: string,
  standardLibrary: StandardLibraryOracle,
  exemptions: LiteralExemptions
): Promise<LiteralViolation[]> {
  const imports = await trackStandardImports(file, standardLibrary);
  const violations: LiteralViolation[] = [];

  for (const lit of file.compositeLiterals) {
    if (lit.qualifier === undefined) continue;

    const importPath = imports.get(lit.qualifier);
    if (importPath === undefined) {
      // pkg.T for a package of the application
      continue;
    }
    if (exemptions.has(literalKey(importPath, lit.typeName))) continue;

    if (lit.elements.some(kind => kind === 'positional')) {
      violations.push({
        position: { file: displayName, ...lit.location },
        message: `composite struct literal ${importPath}.${lit.typeName} with untagged fields`,
      });
    }
  }

  return violations;
}
