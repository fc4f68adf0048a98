/**
 * Per-directory package discovery: picks the Go files of one directory
 * that take part in the build and checks they agree on a package name.
 */
import * as path from 'node:path';
import { BuildError, ErrorCodes, FrontendSyntaxError } from '../../utils/errors.js';
import { readFile } from '../../utils/file-system.js';
import type { DirectoryOverlay } from '../overlay/directory-overlay.js';
import {
  ConstraintSyntaxError,
  matchFileContent,
  matchFileName,
  type BuildContext,
} from './build-constraints.js';

export interface CandidateFile {
  /** Base name */
  name: string;
  /** Name relative to the build's base directory */
  relativePath: string;
  absolutePath: string;
}

export interface SelectedFile extends CandidateFile {
  content: string;
}

export interface DirectorySelection {
  goFiles: SelectedFile[];
  /** Go files left out by name rules or build constraints */
  ignoredFiles: string[];
}

/**
 * Whether a name can be a buildable Go source at all.
 */
export function isGoSourceName(name: string): boolean {
  return name.endsWith('.go') &&
    !name.startsWith('_') &&
    !name.startsWith('.') &&
    !name.endsWith('_test.go');
}

/**
 * Apply name rules and build constraints to the candidates of one directory.
 */
export async function selectGoFiles(
  candidates: readonly CandidateFile[],
  ctx: BuildContext
): Promise<DirectorySelection> {
  const goFiles: SelectedFile[] = [];
  const ignoredFiles: string[] = [];

  for (const file of candidates) {
    if (!file.name.endsWith('.go')) continue;

    if (!isGoSourceName(file.name) || !matchFileName(ctx, file.name)) {
      ignoredFiles.push(file.relativePath);
      continue;
    }

    const content = await readFile(file.absolutePath);
    let matched: boolean;
    try {
      matched = matchFileContent(ctx, content);
    } catch (error) {
      if (error instanceof ConstraintSyntaxError) {
        throw new FrontendSyntaxError(`${file.relativePath}: invalid build constraint: ${error.message}`);
      }
      throw error;
    }

    if (matched) {
      goFiles.push({ ...file, content });
    } else {
      ignoredFiles.push(file.relativePath);
    }
  }

  return { goFiles, ignoredFiles };
}

/**
 * Discover the buildable files of `dir` (relative to the overlay's base)
 * through the overlay, so only the listed files are considered.
 */
export async function discoverPackageDir(
  overlay: DirectoryOverlay,
  dir: string,
  ctx: BuildContext
): Promise<DirectorySelection> {
  const entries = await overlay.readDir(dir);
  const candidates: CandidateFile[] = entries
    .filter(entry => !entry.isDirectory)
    .map(entry => ({
      name: entry.name,
      relativePath: entry.relativePath,
      absolutePath: path.join(overlay.baseDir, entry.relativePath),
    }));
  return selectGoFiles(candidates, ctx);
}

/**
 * Fails when files of one directory declare different package names.
 */
export function checkSinglePackage(
  dir: string,
  files: ReadonlyArray<{ name: string; packageName: string }>
): void {
  const first = files[0];
  if (!first) return;
  const other = files.find(f => f.packageName !== first.packageName);
  if (other) {
    throw new BuildError(
      ErrorCodes.MIXED_PACKAGE_NAMES,
      `found packages ${first.packageName} (${first.name}) and ${other.packageName} (${other.name}) in ${dir}`,
      { dir, packages: [first.packageName, other.packageName] }
    );
  }
}
