export * from './types.js';
export { Application } from './application.js';
export { ApplicationBuilder, checkFilenames } from './builder.js';
export type { ApplicationBuilderOptions, FromConfigOverrides } from './builder.js';
export {
  assemblePackages,
  defaultRandom,
  importPathForDir,
  topLevelImportPath,
  RESERVED_ENTRY_PACKAGE,
  TOP_LEVEL_PACKAGE_PREFIX,
} from './assembler.js';
export type { AssemblyOptions, RandomSource } from './assembler.js';
export { resolveExternalPackages } from './external-resolver.js';
export type { ExternalResolutionOptions, ExternalResolutionResult } from './external-resolver.js';
export { populateDependencies, compareImportPaths } from './graph.js';
export { topologicalOrder, findCycle, sortApplication } from './topo-sort.js';
