/**
 * Configuration schema for gopack.
 */
import { z } from 'zod';

/**
 * Makes an object field optional and applies the inner schema's defaults
 * when it is missing. Both undefined and null count as missing.
 */
function withDefaults<T extends z.ZodType>(schema: T) {
  return z.preprocess((val) => val ?? {}, schema);
}

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

/** Build context used for file selection. */
export const BuildSettingsSchema = z.object({
  goos: z.string().min(1).default('linux'),
  goarch: z.string().min(1).default('amd64'),
  /** Extra build tags satisfied by every file selection */
  tags: z.array(z.string()).default(['appengine']),
  /** Minor version of the newest satisfied go1.N release tag */
  release: z.number().int().min(1).default(22),
});

/** "importPath.TypeName" */
const LiteralExemptionSchema = z.string().regex(/^[^\s]+\.[A-Za-z_][A-Za-z0-9_]*$/, 'expected "importPath.TypeName"');

export const ConfigSchema = z.object({
  /** GOROOT the standard-library oracle looks in */
  standard_library_root: z.string().default(process.env['GOROOT'] ?? '/usr/local/go'),
  /** Import paths allowed to coincide with standard-library names */
  allowed_shadow_names: z.array(z.string()).default([]),
  /** GOPATH for external resolution; absent disables it */
  workspace_root: z.string().optional(),
  /** Regular expression over "importPath/fileName" of workspace files */
  exclude_files: z.string().optional(),
  /** Extra composite-literal exemptions */
  literal_exemptions: z.array(LiteralExemptionSchema).default([]),
  build: withDefaults(BuildSettingsSchema),
  log_level: LogLevelSchema.default('info'),
});

export type Config = z.infer<typeof ConfigSchema>;
export type BuildSettings = z.infer<typeof BuildSettingsSchema>;
