/**
 * Tests for the package assembler.
 */
import { describe, it, expect, vi } from 'vitest';
import { Application } from '../../../../src/core/app/application.js';
import {
  assemblePackages,
  importPathForDir,
  topLevelImportPath,
  type AssemblyOptions,
} from '../../../../src/core/app/assembler.js';
import { BuildError, ErrorCodes } from '../../../../src/utils/errors.js';
import type { SourceFile } from '../../../../src/core/app/types.js';
import type { StandardLibraryOracle } from '../../../../src/core/stdlib/standard-library.js';

const stdlib: StandardLibraryOracle = {
  isStandard: async (p: string) => ['fmt', 'net/http', 'errors'].includes(p),
};

function src(name: string, hasInit = false): SourceFile {
  return { name, packageName: 'p', importPaths: [], hasInit };
}

function options(overrides: Partial<AssemblyOptions> = {}): AssemblyOptions {
  return {
    standardLibrary: stdlib,
    allowedShadowNames: new Set(),
    random: () => 42,
    ...overrides,
  };
}

describe('topLevelImportPath', () => {
  it('should pad the random suffix to five digits', () => {
    const random = vi.fn(() => 7);

    expect(topLevelImportPath(random)).toBe('main00007');
    expect(random).toHaveBeenCalledWith(100000);
  });

  it('should keep five-digit suffixes as they are', () => {
    expect(topLevelImportPath(() => 99999)).toBe('main99999');
  });
});

describe('importPathForDir', () => {
  it('should use the directory as the import path', () => {
    expect(importPathForDir('a/b', () => 0)).toBe('a/b');
    expect(importPathForDir('a\\b', () => 0)).toBe('a/b');
  });

  it('should give top-level files a synthetic path', () => {
    expect(importPathForDir('.', () => 123)).toBe('main00123');
  });
});

describe('assemblePackages', () => {
  it('should create one package per directory in sorted order', async () => {
    const app = new Application();
    await assemblePackages(app, new Map([
      ['web', [src('web/a.go'), src('web/b.go', true)]],
      ['.', [src('main.go')]],
      ['lib', [src('lib/lib.go')]],
    ]), options());

    expect(app.packages.map(p => p.importPath)).toEqual(['main00042', 'lib', 'web']);
    expect(app.lookup('web')?.files.map(f => f.name)).toEqual(['web/a.go', 'web/b.go']);
    expect(app.lookup('web')?.hasInit).toBe(true);
    expect(app.lookup('lib')?.hasInit).toBe(false);
    expect(app.rootPackages.map(p => p.importPath)).toEqual(['web']);
  });

  it('should forbid a directory named main', async () => {
    const app = new Application();

    await expect(assemblePackages(app, new Map([['main', [src('main/m.go')]]]), options()))
      .rejects.toMatchObject({
        code: ErrorCodes.RESERVED_IDENTIFIER,
        message: 'top-level main package is forbidden',
      });
  });

  it('should reject packages that shadow the standard library', async () => {
    const app = new Application();

    const result = assemblePackages(app, new Map([['errors', [src('errors/e.go')]]]), options());

    await expect(result).rejects.toBeInstanceOf(BuildError);
    await expect(result).rejects.toThrow('package "errors" has the same name as a standard package');
  });

  it('should mark allowed shadows', async () => {
    const app = new Application();
    await assemblePackages(
      app,
      new Map([['net/http', [src('net/http/h.go')]]]),
      options({ allowedShadowNames: new Set(['net/http']) })
    );

    expect(app.lookup('net/http')?.isShadow).toBe(true);
  });
});
