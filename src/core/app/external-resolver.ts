/**
 * External resolver: pulls in, transitively, the workspace packages the
 * application imports.
 */
import { BuildError, ErrorCodes } from '../../utils/errors.js';
import type { Logger } from '../../utils/logger.js';
import type { StandardLibraryOracle } from '../stdlib/standard-library.js';
import type { WorkspaceOracle, WorkspacePackage } from '../workspace/gopath.js';
import type { Application } from './application.js';
import type { PackageId, SourceFile } from './types.js';

export interface ExternalResolutionOptions {
  workspace: WorkspaceOracle;
  standardLibrary: StandardLibraryOracle;
  /** Drops workspace files whose "importPath/fileName" matches */
  excludeFiles?: RegExp;
  logger: Logger;
}

export interface ExternalResolutionResult {
  /** Import paths registered from the workspace, in resolution order */
  resolved: string[];
  /** Import paths the workspace could not provide */
  unresolved: string[];
}

/**
 * Resolve every import of the application that is neither standard nor
 * already a package, until no new package turns up.
 *
 * Packages are processed through a FIFO queue seeded with the current
 * packages; each package registered from the workspace is queued in turn.
 * A path the workspace cannot provide, for whatever reason, is warned about
 * once and skipped; any edge to it is dropped later by the graph builder.
 */
export async function resolveExternalPackages(
  app: Application,
  options: ExternalResolutionOptions
): Promise<ExternalResolutionResult> {
  const { workspace, standardLibrary, excludeFiles, logger } = options;
  const queue: PackageId[] = [...app.getOrder()];
  const warned = new Set<string>();
  const resolved: string[] = [];

  for (let id = queue.shift(); id !== undefined; id = queue.shift()) {
    const pkg = app.get(id);
    for (const file of pkg.files) {
      for (const importPath of file.importPaths) {
        if (app.has(importPath) || warned.has(importPath)) {
          continue;
        }
        if (await standardLibrary.isStandard(importPath)) {
          continue;
        }

        let found: WorkspacePackage;
        try {
          found = await workspace.locate(importPath);
        } catch (error) {
          const reason = error instanceof Error ? error.message : String(error);
          logger.warn(`Can't find package "${importPath}" in the workspace: ${reason}`);
          warned.add(importPath);
          continue;
        }

        const files: SourceFile[] = [];
        for (const name of found.files) {
          // search() ignores lastIndex, so g and y flags stay harmless.
          if (excludeFiles && `${importPath}/${name}`.search(excludeFiles) !== -1) {
            continue;
          }
          // Every file records the package's full import list.
          files.push({
            name,
            packageName: found.name,
            importPaths: found.imports,
            hasInit: false,
          });
        }
        if (files.length === 0) {
          throw new BuildError(
            ErrorCodes.PACKAGE_FULLY_EXCLUDED,
            `package ${importPath} required, but all its files were excluded by the exclusion pattern`,
            { importPath }
          );
        }

        const added = app.addPackage({ importPath, files, baseDir: found.dir });
        logger.debug(`resolved ${importPath} from ${found.dir}`, { files: files.map(f => f.name) });
        resolved.push(importPath);
        queue.push(added.id);
      }
    }
  }

  return { resolved, unresolved: [...warned] };
}
