/**
 * gopack: build planning for Go applications.
 * Library exports barrel file.
 */

// Configuration
export * from './core/config/index.js';

// Application model and pipeline
export * from './core/app/index.js';

// Language frontend
export * from './frontend/index.js';

// Oracles
export {
  StandardLibraryCache,
  goRootLookup,
  createGoRootStandardLibrary,
  type StandardLibraryOracle,
  type StandardLibraryLookup,
} from './core/stdlib/standard-library.js';
export { GoPathWorkspace, type WorkspaceOracle, type WorkspacePackage } from './core/workspace/gopath.js';

// Validation
export * from './core/imports/import-path.js';
export * from './core/literals/exemptions.js';
export { findUntaggedLiterals, trackStandardImports } from './core/literals/validator.js';
export { extractFile, type ExtractionContext } from './core/extract/file-extractor.js';

// Discovery
export * from './core/discovery/build-constraints.js';
export * from './core/discovery/package-dir.js';
export { DirectoryOverlay, toSlash, type OverlayEntry } from './core/overlay/directory-overlay.js';

// Utilities
export * from './utils/index.js';

// CLI
export { createCli } from './cli/index.js';
