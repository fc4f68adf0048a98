/**
 * Configuration loading and conversion into build options.
 */
import * as path from 'node:path';
import { ConfigSchema, type Config } from './schema.js';
import { loadYamlWithSchema } from '../../utils/yaml.js';
import { ConfigError, ErrorCodes, GopackError } from '../../utils/errors.js';
import { fileExists } from '../../utils/file-system.js';
import type { BuildContext } from '../discovery/build-constraints.js';

export const DEFAULT_CONFIG_PATH = '.gopack/config.yaml';

/**
 * Default configuration values.
 * Used when no config file exists.
 */
export function getDefaultConfig(): Config {
  return ConfigSchema.parse({});
}

/**
 * Load configuration from a file.
 * Falls back to defaults when the default file doesn't exist; an explicitly
 * named file must exist.
 */
export async function loadConfig(
  projectRoot: string,
  configPath?: string
): Promise<Config> {
  const fullPath = path.resolve(projectRoot, configPath ?? DEFAULT_CONFIG_PATH);

  if (!(await fileExists(fullPath))) {
    if (configPath) {
      throw new ConfigError(
        ErrorCodes.CONFIG_LOAD_ERROR,
        `Config file not found: ${fullPath}`,
        { path: fullPath }
      );
    }
    return getDefaultConfig();
  }

  try {
    return await loadYamlWithSchema(fullPath, ConfigSchema);
  } catch (error) {
    if (error instanceof GopackError) {
      throw new ConfigError(
        ErrorCodes.CONFIG_LOAD_ERROR,
        `Failed to load config from ${fullPath}: ${error.message}`,
        { path: fullPath, originalError: error.message }
      );
    }
    throw error;
  }
}

/**
 * Merge partial config with defaults.
 */
export function mergeConfig(partial: Partial<Config>): Config {
  return ConfigSchema.parse(partial);
}

export function toBuildContext(config: Config): BuildContext {
  return {
    goos: config.build.goos,
    goarch: config.build.goarch,
    compiler: 'gc',
    tags: config.build.tags,
    releaseMinor: config.build.release,
  };
}

/**
 * Compile the workspace exclusion pattern, if configured.
 */
export function compileExcludePattern(pattern: string | undefined): RegExp | undefined {
  if (pattern === undefined || pattern === '') {
    return undefined;
  }
  try {
    return new RegExp(pattern);
  } catch (error) {
    throw new ConfigError(
      ErrorCodes.INVALID_EXCLUDE_PATTERN,
      `bad exclude_files pattern ${JSON.stringify(pattern)}: ${error instanceof Error ? error.message : String(error)}`,
      { pattern }
    );
  }
}
