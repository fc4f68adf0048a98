/**
 * `gopack plan`: print the build order of a Go application.
 */
import { Command } from 'commander';
import * as path from 'node:path';
import { loadConfig } from '../../core/config/loader.js';
import type { Config } from '../../core/config/schema.js';
import { ApplicationBuilder } from '../../core/app/builder.js';
import { globFiles } from '../../utils/file-system.js';
import { logger as log } from '../../utils/logger.js';
import { GopackError } from '../../utils/errors.js';
import { formatPlan, type OutputFormat } from '../formatters/plan.js';

export interface PlanOptions {
  base: string;
  config?: string;
  goroot?: string;
  gopath?: string;
  allowShadow?: string;
  excludeFiles?: string;
  format: string;
  color: boolean;
  debug?: boolean;
  quiet?: boolean;
}

const VALID_FORMATS: OutputFormat[] = ['human', 'json'];

function isOutputFormat(value: string): value is OutputFormat {
  return VALID_FORMATS.some(f => f === value);
}

/**
 * Create the plan command.
 */
export function createPlanCommand(): Command {
  return new Command('plan')
    .description('Assemble the package graph and print the build order')
    .argument('[files...]', 'Go source files relative to --base (default: every non-test .go file under it)')
    .option('-b, --base <dir>', 'Base directory of the application', '.')
    .option('-c, --config <path>', 'Path to config file (default: .gopack/config.yaml under --base)')
    .option('--goroot <dir>', 'Standard library root')
    .option('--gopath <dir>', 'Workspace root; enables external resolution')
    .option('--allow-shadow <names>', 'Comma-separated import paths allowed to shadow standard packages')
    .option('--exclude-files <regex>', 'Exclude workspace files whose "importPath/file" matches')
    .option('-f, --format <format>', 'Output format (human, json)', 'human')
    .option('--no-color', 'Disable colored output')
    .option('--debug', 'Log every pipeline step')
    .option('-q, --quiet', 'Only log errors')
    .action(async (files: string[], options: PlanOptions) => {
      try {
        await runPlan(files, options);
      } catch (error) {
        log.error(error instanceof Error ? error.message : 'Unknown error', error instanceof Error && !(error instanceof GopackError) ? error : undefined);
        process.exitCode = 1;
      }
    });
}

/**
 * Apply command-line overrides on top of the loaded configuration.
 */
export function applyOverrides(config: Config, options: PlanOptions): Config {
  const shadow = options.allowShadow
    ?.split(',')
    .map(s => s.trim())
    .filter(Boolean);
  return {
    ...config,
    ...(options.goroot ? { standard_library_root: options.goroot } : {}),
    ...(options.gopath ? { workspace_root: options.gopath } : {}),
    ...(options.excludeFiles ? { exclude_files: options.excludeFiles } : {}),
    ...(shadow ? { allowed_shadow_names: [...config.allowed_shadow_names, ...shadow] } : {}),
  };
}

export async function runPlan(files: string[], options: PlanOptions): Promise<string> {
  if (!isOutputFormat(options.format)) {
    throw new Error(`Invalid format: ${options.format}. Use: ${VALID_FORMATS.join(', ')}`);
  }

  const baseDir = path.resolve(options.base);
  const config = applyOverrides(await loadConfig(baseDir, options.config), options);

  log.setLevel(options.debug ? 'debug' : options.quiet ? 'error' : config.log_level);

  const filenames = files.length > 0
    ? files
    : await globFiles(['**/*.go'], { cwd: baseDir, ignore: ['**/*_test.go', '**/testdata/**', '**/vendor/**'] });
  log.debug(`planning ${filenames.length} file(s) under ${baseDir}`);

  const builder = ApplicationBuilder.fromConfig(config, { logger: log });
  const app = await builder.build(baseDir, filenames);

  const output = formatPlan(app.toPlan(), options.format, { colors: options.color });
  console.log(output);
  return output;
}
