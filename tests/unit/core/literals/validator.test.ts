/**
 * Tests for the literal tagging validator and its exemption set.
 */
import { describe, it, expect } from 'vitest';
import type { CompositeLiteralInfo, ImportSpecInfo, ParsedSourceFile } from '../../../../src/frontend/interface.types.js';
import {
  DEFAULT_LITERAL_EXEMPTIONS,
  createLiteralExemptions,
  literalKey,
} from '../../../../src/core/literals/exemptions.js';
import { findUntaggedLiterals, trackStandardImports } from '../../../../src/core/literals/validator.js';
import type { StandardLibraryOracle } from '../../../../src/core/stdlib/standard-library.js';

const stdlib: StandardLibraryOracle = {
  isStandard: async (p: string) => ['fmt', 'net/http', 'image', 'image/color', 'time', 'sync'].includes(p),
};

const at = { line: 1, column: 1 };

function imp(path: string, alias?: string): ImportSpecInfo {
  return alias === undefined ? { path, location: at } : { path, alias, location: at };
}

function lit(
  qualifier: string | undefined,
  typeName: string,
  elements: CompositeLiteralInfo['elements'],
  line = 10
): CompositeLiteralInfo {
  const location = { line, column: 5 };
  return qualifier === undefined
    ? { typeName, elements, location }
    : { qualifier, typeName, elements, location };
}

function file(imports: ImportSpecInfo[], compositeLiterals: CompositeLiteralInfo[]): ParsedSourceFile {
  return { filePath: '/base/a/a.go', packageName: 'a', imports, hasInit: false, compositeLiterals };
}

describe('exemptions', () => {
  it('should key literals by import path and type', () => {
    expect(literalKey('image/color', 'RGBA')).toBe('image/color.RGBA');
  });

  it('should include frozen standard and platform types', () => {
    expect(DEFAULT_LITERAL_EXEMPTIONS.has('image.Point')).toBe(true);
    expect(DEFAULT_LITERAL_EXEMPTIONS.has('unicode.Range16')).toBe(true);
    expect(DEFAULT_LITERAL_EXEMPTIONS.has('appengine/datastore.PropertyList')).toBe(true);
    expect(DEFAULT_LITERAL_EXEMPTIONS.has('net/http.Cookie')).toBe(false);
  });

  it('should add configured entries without touching the defaults', () => {
    const extra = createLiteralExemptions(['net/http.Cookie']);

    expect(extra.has('net/http.Cookie')).toBe(true);
    expect(extra.has('image.Point')).toBe(true);
    expect(DEFAULT_LITERAL_EXEMPTIONS.has('net/http.Cookie')).toBe(false);
  });
});

describe('trackStandardImports', () => {
  it('should map local names of standard imports only', async () => {
    const tracked = await trackStandardImports(
      file([imp('net/http'), imp('fmt', 'f'), imp('example.com/lib'), imp('time', '.'), imp('sync', '_')], []),
      stdlib
    );

    expect([...tracked.entries()]).toEqual([
      ['http', 'net/http'],
      ['f', 'fmt'],
      ['_', 'sync'],
    ]);
  });
});

describe('findUntaggedLiterals', () => {
  it('should report positional literals of standard types', async () => {
    const violations = await findUntaggedLiterals(
      file([imp('net/http')], [lit('http', 'Cookie', ['positional', 'positional'], 7)]),
      'a/a.go',
      stdlib,
      DEFAULT_LITERAL_EXEMPTIONS
    );

    expect(violations).toEqual([
      {
        position: { file: 'a/a.go', line: 7, column: 5 },
        message: 'composite struct literal net/http.Cookie with untagged fields',
      },
    ]);
  });

  it('should accept keyed and empty literals', async () => {
    const violations = await findUntaggedLiterals(
      file([imp('net/http')], [
        lit('http', 'Client', ['keyed', 'keyed']),
        lit('http', 'Header', []),
      ]),
      'a/a.go',
      stdlib,
      DEFAULT_LITERAL_EXEMPTIONS
    );

    expect(violations).toEqual([]);
  });

  it('should skip exempt types', async () => {
    const violations = await findUntaggedLiterals(
      file([imp('image'), imp('image/color')], [
        lit('image', 'Point', ['positional', 'positional']),
        lit('color', 'RGBA', ['positional', 'positional', 'positional', 'positional']),
      ]),
      'a/a.go',
      stdlib,
      DEFAULT_LITERAL_EXEMPTIONS
    );

    expect(violations).toEqual([]);
  });

  it('should ignore unqualified and application types', async () => {
    const violations = await findUntaggedLiterals(
      file([imp('example.com/lib')], [
        lit(undefined, 'point', ['positional']),
        lit('lib', 'Pair', ['positional', 'positional']),
        lit('http', 'Cookie', ['positional']),
      ]),
      'a/a.go',
      stdlib,
      DEFAULT_LITERAL_EXEMPTIONS
    );

    expect(violations).toEqual([]);
  });

  it('should resolve aliases to the import path', async () => {
    const violations = await findUntaggedLiterals(
      file([imp('time', 'tm')], [lit('tm', 'Timer', ['keyed', 'positional'], 3)]),
      'x.go',
      stdlib,
      DEFAULT_LITERAL_EXEMPTIONS
    );

    expect(violations.map(v => v.message)).toEqual(['composite struct literal time.Timer with untagged fields']);
  });

  it('should report every violation in source order', async () => {
    const violations = await findUntaggedLiterals(
      file([imp('net/http'), imp('time')], [
        lit('http', 'Cookie', ['positional'], 3),
        lit('time', 'Timer', ['positional'], 9),
      ]),
      'x.go',
      stdlib,
      DEFAULT_LITERAL_EXEMPTIONS
    );

    expect(violations.map(v => v.position.line)).toEqual([3, 9]);
  });
});
