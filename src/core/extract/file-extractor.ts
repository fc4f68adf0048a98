/**
 * Turns one application source file into a SourceFile record.
 * A file is accepted whole or rejected whole.
 */
import * as path from 'node:path';
import { BuildError, ErrorCodes, UntaggedLiteralError } from '../../utils/errors.js';
import type { LanguageFrontend } from '../../frontend/interface.types.js';
import type { SourceFile } from '../app/types.js';
import { describeImportPathProblem } from '../imports/import-path.js';
import { findUntaggedLiterals } from '../literals/validator.js';
import type { LiteralExemptions } from '../literals/exemptions.js';
import type { StandardLibraryOracle } from '../stdlib/standard-library.js';

export interface ExtractionContext {
  frontend: LanguageFrontend;
  standardLibrary: StandardLibraryOracle;
  exemptions: LiteralExemptions;
}

/**
 * Parse `filename` (relative to `baseDir`), validate its imports and its
 * composite literals, and return the file record.
 *
 * @param content Pre-loaded file content, when discovery already read it
 */
export async function extractFile(
  baseDir: string,
  filename: string,
  ctx: ExtractionContext,
  content?: string
): Promise<SourceFile> {
  const parsed = await ctx.frontend.parseFile(path.join(baseDir, filename), content);

  const importPaths: string[] = [];
  for (const spec of parsed.imports) {
    const problem = describeImportPathProblem(spec.path);
    if (problem !== null) {
      throw new BuildError(
        ErrorCodes.INVALID_IMPORT_PATH,
        `${filename}:${spec.location.line}:${spec.location.column}: bad import ${JSON.stringify(spec.path)}: ${problem}`,
        { file: filename, importPath: spec.path }
      );
    }
    importPaths.push(spec.path);
  }

  const violations = await findUntaggedLiterals(parsed, filename, ctx.standardLibrary, ctx.exemptions);
  if (violations.length > 0) {
    throw new UntaggedLiteralError(violations);
  }

  return {
    name: filename,
    packageName: parsed.packageName,
    importPaths,
    hasInit: parsed.hasInit,
  };
}
