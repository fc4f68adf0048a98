/**
 * The planning pipeline: files → packages → workspace closure → graph →
 * build order.
 */
import * as path from 'node:path';
import { BuildError, ErrorCodes } from '../../utils/errors.js';
import { logger as defaultLogger, type Logger } from '../../utils/logger.js';
import type { LanguageFrontend } from '../../frontend/interface.types.js';
import { GoFrontend } from '../../frontend/go.js';
import type { Config } from '../config/schema.js';
import { compileExcludePattern, toBuildContext } from '../config/loader.js';
import { DEFAULT_BUILD_CONTEXT, type BuildContext } from '../discovery/build-constraints.js';
import { checkSinglePackage, discoverPackageDir } from '../discovery/package-dir.js';
import { extractFile, type ExtractionContext } from '../extract/file-extractor.js';
import { createLiteralExemptions, DEFAULT_LITERAL_EXEMPTIONS, type LiteralExemptions } from '../literals/exemptions.js';
import { DirectoryOverlay } from '../overlay/directory-overlay.js';
import { createGoRootStandardLibrary, type StandardLibraryOracle } from '../stdlib/standard-library.js';
import { GoPathWorkspace, type WorkspaceOracle } from '../workspace/gopath.js';
import { Application } from './application.js';
import { assemblePackages, defaultRandom, type RandomSource } from './assembler.js';
import { resolveExternalPackages } from './external-resolver.js';
import { populateDependencies } from './graph.js';
import { sortApplication } from './topo-sort.js';
import type { SourceFile } from './types.js';

export interface ApplicationBuilderOptions {
  standardLibrary: StandardLibraryOracle;
  frontend?: LanguageFrontend;
  /** Enables external resolution */
  workspace?: WorkspaceOracle;
  allowedShadowNames?: Iterable<string>;
  /** Applied to "importPath/fileName" of workspace files only */
  excludeFiles?: RegExp;
  exemptions?: LiteralExemptions;
  buildContext?: BuildContext;
  /** Source of the top-level package's numeric suffix */
  random?: RandomSource;
  logger?: Logger;
}

export interface FromConfigOverrides {
  frontend?: LanguageFrontend;
  standardLibrary?: StandardLibraryOracle;
  workspace?: WorkspaceOracle;
  random?: RandomSource;
  logger?: Logger;
}

/**
 * Rejects file names that have no usable directory component.
 */
export function checkFilenames(filenames: readonly string[]): void {
  for (const name of filenames) {
    const dir = path.dirname(name);
    if (name === '' || dir === '' || dir === path.sep) {
      throw new BuildError(
        ErrorCodes.MALFORMED_INPUT,
        `bad filename ${JSON.stringify(name)}`,
        { filename: name }
      );
    }
  }
}

export class ApplicationBuilder {
  private readonly frontend: LanguageFrontend;
  private readonly standardLibrary: StandardLibraryOracle;
  private readonly workspace: WorkspaceOracle | undefined;
  private readonly allowedShadowNames: ReadonlySet<string>;
  private readonly excludeFiles: RegExp | undefined;
  private readonly exemptions: LiteralExemptions;
  private readonly buildContext: BuildContext;
  private readonly random: RandomSource;
  private readonly log: Logger;

  constructor(options: ApplicationBuilderOptions) {
    this.frontend = options.frontend ?? new GoFrontend();
    this.standardLibrary = options.standardLibrary;
    this.workspace = options.workspace;
    this.allowedShadowNames = new Set(options.allowedShadowNames ?? []);
    this.excludeFiles = options.excludeFiles;
    this.exemptions = options.exemptions ?? DEFAULT_LITERAL_EXEMPTIONS;
    this.buildContext = options.buildContext ?? DEFAULT_BUILD_CONTEXT;
    this.random = options.random ?? defaultRandom;
    this.log = (options.logger ?? defaultLogger).child('build');
  }

  /**
   * Wire a builder from configuration: GOROOT oracle, GOPATH workspace when
   * `workspace_root` is set, exemptions and build context.
   */
  static fromConfig(config: Config, overrides: FromConfigOverrides = {}): ApplicationBuilder {
    const frontend = overrides.frontend ?? new GoFrontend();
    const buildContext = toBuildContext(config);
    const workspace = overrides.workspace ?? (config.workspace_root
      ? new GoPathWorkspace(config.workspace_root, frontend, buildContext)
      : undefined);

    return new ApplicationBuilder({
      frontend,
      standardLibrary: overrides.standardLibrary ?? createGoRootStandardLibrary(config.standard_library_root),
      allowedShadowNames: config.allowed_shadow_names,
      excludeFiles: compileExcludePattern(config.exclude_files),
      exemptions: createLiteralExemptions(config.literal_exemptions),
      buildContext,
      ...(workspace ? { workspace } : {}),
      ...(overrides.random ? { random: overrides.random } : {}),
      ...(overrides.logger ? { logger: overrides.logger } : {}),
    });
  }

  /**
   * Plan the application made of `filenames` (relative to `baseDir`).
   * Resolves with the packages in build order or rejects with one error;
   * no partial application is ever returned.
   */
  async build(baseDir: string, filenames: readonly string[]): Promise<Application> {
    checkFilenames(filenames);

    const app = new Application();
    const filesByDir = await this.extractDirectories(app, baseDir, filenames);

    await assemblePackages(app, filesByDir, {
      standardLibrary: this.standardLibrary,
      allowedShadowNames: this.allowedShadowNames,
      random: this.random,
    });
    this.log.debug(`assembled ${app.size} application package(s)`);

    if (this.workspace) {
      const { resolved } = await resolveExternalPackages(app, {
        workspace: this.workspace,
        standardLibrary: this.standardLibrary,
        logger: this.log,
        ...(this.excludeFiles ? { excludeFiles: this.excludeFiles } : {}),
      });
      this.log.debug(`resolved ${resolved.length} workspace package(s)`);
    }

    populateDependencies(app);
    sortApplication(app);

    this.log.info(`planned ${app.size} package(s) from ${app.files.length} file(s)`);
    return app;
  }

  private async extractDirectories(
    app: Application,
    baseDir: string,
    filenames: readonly string[]
  ): Promise<Map<string, SourceFile[]>> {
    const overlay = new DirectoryOverlay(baseDir, filenames);
    const ctx: ExtractionContext = {
      frontend: this.frontend,
      standardLibrary: this.standardLibrary,
      exemptions: this.exemptions,
    };
    const filesByDir = new Map<string, SourceFile[]>();

    for (const dir of overlay.directories()) {
      const selection = await discoverPackageDir(overlay, dir, this.buildContext);
      if (selection.goFiles.length === 0) {
        // Every file was excluded by build constraints.
        this.log.debug(`skipping ${dir}: no buildable files`, { ignored: selection.ignoredFiles });
        continue;
      }

      const files: SourceFile[] = [];
      for (const selected of selection.goFiles) {
        files.push(await extractFile(baseDir, selected.relativePath, ctx, selected.content));
      }
      checkSinglePackage(dir, files);

      app.files.push(...files);
      filesByDir.set(dir, files);
    }

    return filesByDir;
  }
}
