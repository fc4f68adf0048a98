/**
 * End-to-end planning over real files with the tree-sitter frontend.
 */
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { ApplicationBuilder, type ApplicationBuilderOptions } from '../../src/core/app/builder.js';
import { checkFilenames } from '../../src/core/app/builder.js';
import { createGoRootStandardLibrary } from '../../src/core/stdlib/standard-library.js';
import { GoPathWorkspace } from '../../src/core/workspace/gopath.js';
import { GoFrontend } from '../../src/frontend/go.js';
import { DEFAULT_BUILD_CONTEXT } from '../../src/core/discovery/build-constraints.js';
import { mergeConfig } from '../../src/core/config/loader.js';
import { ErrorCodes, UntaggedLiteralError } from '../../src/utils/errors.js';
import { Logger } from '../../src/utils/logger.js';

describe('ApplicationBuilder', () => {
  let tmp: string;
  let baseDir: string;
  let goRoot: string;
  let goPath: string;
  let log: Logger;

  async function write(root: string, files: Record<string, string>): Promise<string[]> {
    for (const [name, content] of Object.entries(files)) {
      const full = path.join(root, name);
      await fs.promises.mkdir(path.dirname(full), { recursive: true });
      await fs.promises.writeFile(full, content);
    }
    return Object.keys(files);
  }

  function builder(overrides: Partial<ApplicationBuilderOptions> = {}): ApplicationBuilder {
    return new ApplicationBuilder({
      standardLibrary: createGoRootStandardLibrary(goRoot),
      random: () => 42,
      logger: log,
      ...overrides,
    });
  }

  beforeEach(async () => {
    tmp = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'gopack-build-'));
    baseDir = path.join(tmp, 'app');
    goRoot = path.join(tmp, 'goroot');
    goPath = path.join(tmp, 'gopath');
    for (const std of ['fmt', 'errors', 'net/http', 'syscall']) {
      await fs.promises.mkdir(path.join(goRoot, 'src', ...std.split('/')), { recursive: true });
    }
    log = new Logger();
    log.setLevel('silent');
  });

  afterEach(async () => {
    await fs.promises.rm(tmp, { recursive: true, force: true });
  });

  it('should order a dependency chain', async () => {
    const files = await write(baseDir, {
      'x/x.go': 'package x\n',
      'y/y.go': 'package y\n\nimport "x"\n',
      'z/z.go': 'package z\n\nimport (\n\t"fmt"\n\t"y"\n)\n',
    });

    const app = await builder().build(baseDir, files);

    expect(app.packages.map(p => p.importPath)).toEqual(['x', 'y', 'z']);
    expect(app.files.map(f => f.name)).toEqual(['x/x.go', 'y/y.go', 'z/z.go']);
    expect(app.dependenciesOf(app.packages[2] ?? app.get(0)).map(p => p.importPath)).toEqual(['y']);
  });

  it('should move dependencies ahead of their importers', async () => {
    const files = await write(baseDir, {
      'x/x.go': 'package x\n\nimport "y"\n',
      'y/y.go': 'package y\n\nimport "z"\n',
      'z/z.go': 'package z\n',
    });

    const app = await builder().build(baseDir, files);

    expect(app.packages.map(p => p.importPath)).toEqual(['z', 'y', 'x']);
  });

  it('should report cycles', async () => {
    const files = await write(baseDir, {
      'q/q.go': 'package q\n\nimport "p"\n',
      'p/p.go': 'package p\n\nimport "q"\n',
    });

    await expect(builder().build(baseDir, files)).rejects.toThrow('cyclic dependency graph: p -> q -> p');
  });

  it('should give top-level files a synthetic package', async () => {
    const files = await write(baseDir, {
      'main.go': 'package main\n\nimport "lib"\n\nfunc init() {}\n',
      'lib/lib.go': 'package lib\n',
    });

    const app = await builder().build(baseDir, files);

    expect(app.packages.map(p => p.importPath)).toEqual(['lib', 'main00042']);
    expect(app.rootPackages.map(p => p.importPath)).toEqual(['main00042']);
    expect(app.files.map(f => f.name)).toEqual(['main.go', 'lib/lib.go']);
  });

  it('should only consider the listed files', async () => {
    await write(baseDir, { 'lib/extra.go': 'package other\n' });
    const files = await write(baseDir, { 'lib/lib.go': 'package lib\n' });

    const app = await builder().build(baseDir, files);

    expect(app.lookup('lib')?.files.map(f => f.name)).toEqual(['lib/lib.go']);
  });

  it('should skip files excluded by build constraints', async () => {
    const files = await write(baseDir, {
      'lib/lib.go': 'package lib\n',
      'lib/lib_windows.go': 'package lib\n\nimport "syscall"\n',
      'win/w_windows.go': 'package win\n',
    });

    const app = await builder().build(baseDir, files);

    expect(app.packages.map(p => p.importPath)).toEqual(['lib']);
    expect(app.files.map(f => f.name)).toEqual(['lib/lib.go']);
  });

  it('should reject malformed file names', async () => {
    await expect(builder().build(baseDir, ['/abs.go'])).rejects.toMatchObject({
      code: ErrorCodes.MALFORMED_INPUT,
      message: 'bad filename "/abs.go"',
    });
    expect(() => checkFilenames([''])).toThrow('bad filename ""');
  });

  it('should reject a directory named main', async () => {
    const files = await write(baseDir, { 'main/m.go': 'package main\n' });

    await expect(builder().build(baseDir, files)).rejects.toThrow('top-level main package is forbidden');
  });

  it('should reject shadowing unless allowed', async () => {
    const files = await write(baseDir, { 'errors/e.go': 'package errors\n' });

    await expect(builder().build(baseDir, files))
      .rejects.toThrow('package "errors" has the same name as a standard package');

    const app = await builder({ allowedShadowNames: ['errors'] }).build(baseDir, files);
    expect(app.lookup('errors')?.isShadow).toBe(true);
  });

  it('should reject forbidden imports with their position', async () => {
    const files = await write(baseDir, { 'v/v.go': 'package v\n\nimport "syscall"\n' });

    await expect(builder().build(baseDir, files)).rejects.toMatchObject({
      code: ErrorCodes.INVALID_IMPORT_PATH,
      message: 'v/v.go:3:8: bad import "syscall": package syscall may not be imported',
    });
  });

  it('should report every untagged literal of a file at once', async () => {
    const files = await write(baseDir, {
      'bad/bad.go': [
        'package bad',
        '',
        'import "net/http"',
        '',
        'var a = http.Cookie{"n", "v"}',
        'var b = http.Cookie{Name: "n"}',
        'var c = http.Header{}',
        'var d = http.Cookie{"x"}',
        '',
      ].join('\n'),
    });

    const result = builder().build(baseDir, files);

    await expect(result).rejects.toBeInstanceOf(UntaggedLiteralError);
    await expect(result).rejects.toThrow(
      'bad/bad.go:5:9: composite struct literal net/http.Cookie with untagged fields\n' +
      'bad/bad.go:8:9: composite struct literal net/http.Cookie with untagged fields'
    );
  });

  it('should reject directories mixing package names', async () => {
    const files = await write(baseDir, { 'm/a.go': 'package a\n', 'm/b.go': 'package b\n' });

    await expect(builder().build(baseDir, files)).rejects.toThrow('found packages a (m/a.go) and b (m/b.go) in m');
  });

  it('should surface syntax errors from the frontend', async () => {
    const files = await write(baseDir, { 's/s.go': 'package s\n\n)))\n' });

    await expect(builder().build(baseDir, files)).rejects.toMatchObject({ code: ErrorCodes.FRONTEND_SYNTAX });
  });

  it('should plan packages with large source files', async () => {
    const lines = ['package big', ''];
    for (let i = 0; i < 2000; i++) {
      lines.push(`var value${i} = "${'x'.repeat(24)}"`);
    }
    const files = await write(baseDir, {
      'big/big.go': lines.join('\n') + '\n',
      'web/web.go': 'package web\n\nimport "big"\n',
    });

    const app = await builder().build(baseDir, files);

    expect(app.packages.map(p => p.importPath)).toEqual(['big', 'web']);
  });

  describe('with a workspace', () => {
    beforeEach(async () => {
      await write(path.join(goPath, 'src'), {
        'example.com/a/a.go': 'package a\n\nimport "example.com/b"\n',
        'example.com/a/a_gen.go': 'package a\n',
        'example.com/b/b.go': 'package b\n\nimport "fmt"\n',
      });
    });

    it('should resolve transitive packages and order them first', async () => {
      const files = await write(baseDir, {
        'app/main.go': 'package app\n\nimport (\n\t"example.com/a"\n\t"missing.org/x"\n)\n\nfunc init() {}\n',
      });
      // The builder logs through a child of `log`.
      const warn = vi.spyOn(Logger.prototype, 'warn');

      const app = await builder({
        workspace: new GoPathWorkspace(goPath, new GoFrontend(), DEFAULT_BUILD_CONTEXT),
        excludeFiles: /_gen\.go$/,
      }).build(baseDir, files);

      expect(app.packages.map(p => p.importPath)).toEqual(['example.com/b', 'example.com/a', 'app']);
      expect(app.lookup('example.com/a')?.files.map(f => f.name)).toEqual(['a.go']);
      expect(app.lookup('example.com/b')?.baseDir).toBe(path.join(goPath, 'src', 'example.com', 'b'));
      expect(app.files.map(f => f.name)).toEqual(['app/main.go']);
      expect(warn).toHaveBeenCalledTimes(1);
      expect(warn.mock.calls[0]?.[0]).toMatch(/^Can't find package "missing\.org\/x" in the workspace: /);
      warn.mockRestore();
    });

    it('should warn about workspace packages that fail to load', async () => {
      await write(path.join(goPath, 'src'), {
        'example.com/w/w.go': 'package w\n\nfunc f() { ))) }\n',
        'example.com/m/a.go': 'package a\n',
        'example.com/m/b.go': 'package b\n',
      });
      const files = await write(baseDir, {
        'app/main.go': 'package app\n\nimport (\n\t"example.com/w"\n\t"example.com/m"\n)\n',
      });
      const warn = vi.spyOn(Logger.prototype, 'warn');

      const app = await builder({
        workspace: new GoPathWorkspace(goPath, new GoFrontend(), DEFAULT_BUILD_CONTEXT),
      }).build(baseDir, files);

      expect(app.packages.map(p => p.importPath)).toEqual(['app']);
      expect(warn).toHaveBeenCalledTimes(2);
      expect(warn.mock.calls[0]?.[0]).toMatch(/^Can't find package "example\.com\/w" in the workspace: .*w\.go:\d+:\d+: syntax error near /);
      expect(warn.mock.calls[1]?.[0]).toBe(
        `Can't find package "example.com/m" in the workspace: found packages a (a.go) and b (b.go) in ${path.join(goPath, 'src', 'example.com', 'm')}`
      );
      warn.mockRestore();
    });

    it('should be wired from configuration', async () => {
      const files = await write(baseDir, { 'app/main.go': 'package app\n\nimport "example.com/b"\n' });
      const config = mergeConfig({ standard_library_root: goRoot, workspace_root: goPath });

      const app = await ApplicationBuilder.fromConfig(config, { logger: log, random: () => 1 }).build(baseDir, files);

      expect(app.packages.map(p => p.importPath)).toEqual(['example.com/b', 'app']);
    });
  });
});
