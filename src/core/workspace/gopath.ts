/**
 * Workspace oracle over a GOPATH-style tree: package `a/b` lives in
 * `<root>/src/a/b`.
 */
import * as path from 'node:path';
import { PackageNotFoundError } from '../../utils/errors.js';
import { isDirectory, listDirectory, statFile } from '../../utils/file-system.js';
import type { ImportSpecInfo, LanguageFrontend } from '../../frontend/interface.types.js';
import type { BuildContext } from '../discovery/build-constraints.js';
import { checkSinglePackage, selectGoFiles, type CandidateFile } from '../discovery/package-dir.js';
import { compareImportPaths } from '../app/graph.js';

/**
 * A package found in the workspace.
 */
export interface WorkspacePackage {
  importPath: string;
  /** Declared package name */
  name: string;
  /** Absolute directory of the package */
  dir: string;
  /** Buildable file names, relative to `dir` */
  files: string[];
  /** Union of the files' imports, sorted and de-duplicated */
  imports: string[];
}

export interface WorkspaceOracle {
  /**
   * Locate a package. Rejects with PackageNotFoundError when the workspace
   * has no buildable package under the path, and with the underlying error
   * when the package's files cannot be read or parsed.
   */
  locate(importPath: string): Promise<WorkspacePackage>;
}

export class GoPathWorkspace implements WorkspaceOracle {
  constructor(
    private readonly root: string,
    private readonly frontend: LanguageFrontend,
    private readonly buildContext: BuildContext
  ) {}

  async locate(importPath: string): Promise<WorkspacePackage> {
    const dir = path.join(this.root, 'src', ...importPath.split('/'));
    if (!(await isDirectory(dir))) {
      throw new PackageNotFoundError(importPath, `no directory ${dir}`);
    }

    const candidates: CandidateFile[] = [];
    for (const name of await listDirectory(dir)) {
      const absolutePath = path.join(dir, name);
      if ((await statFile(absolutePath)).isDirectory()) continue;
      candidates.push({ name, relativePath: name, absolutePath });
    }

    const { goFiles } = await selectGoFiles(candidates, this.buildContext);

    const parsed: Array<{ name: string; packageName: string; imports: ImportSpecInfo[] }> = [];
    for (const file of goFiles) {
      const source = await this.frontend.parseFile(file.absolutePath, file.content);
      parsed.push({ name: file.name, packageName: source.packageName, imports: source.imports });
    }
    checkSinglePackage(dir, parsed);

    const imports = new Set<string>();
    for (const file of parsed) {
      for (const spec of file.imports) {
        imports.add(spec.path);
      }
    }

    const [first] = parsed;
    if (!first) {
      throw new PackageNotFoundError(importPath, `no buildable Go source files in ${dir}`);
    }
    return {
      importPath,
      name: first.packageName,
      dir,
      files: goFiles.map(f => f.name),
      imports: [...imports].sort(compareImportPaths),
    };
  }
}
