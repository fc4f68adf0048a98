/**
 * Import path legality rules for application sources.
 */

export const MAX_IMPORT_PATH_LENGTH = 1024;

/** Packages that step outside the language's memory safety. */
const FORBIDDEN_IMPORT_PATHS: ReadonlySet<string> = new Set(['syscall', 'unsafe']);

const LEGAL_IMPORT_PATH = /^[a-zA-Z0-9_\-./~]+$/;

/**
 * Returns why an import path is illegal, or null when it is acceptable.
 */
export function describeImportPathProblem(path: string): string | null {
  if (path === '') {
    return 'empty import path';
  }
  if (path.length > MAX_IMPORT_PATH_LENGTH) {
    return `import path longer than ${MAX_IMPORT_PATH_LENGTH} characters`;
  }
  if (path.startsWith('/')) {
    return 'absolute import path';
  }
  if (path.includes('..')) {
    return 'import path contains ".."';
  }
  if (!LEGAL_IMPORT_PATH.test(path)) {
    return 'import path contains illegal characters';
  }
  if (FORBIDDEN_IMPORT_PATHS.has(path)) {
    return `package ${path} may not be imported`;
  }
  return null;
}

export function checkImportPath(path: string): boolean {
  return describeImportPathProblem(path) === null;
}
