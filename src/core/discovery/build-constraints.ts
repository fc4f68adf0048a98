/**
 * Build constraints: which Go files of a directory take part in a build.
 *
 * Covers file-name platform suffixes (`x_linux.go`, `x_linux_amd64.go`),
 * `//go:build` expressions and legacy `// +build` lines.
 */

export interface BuildContext {
  goos: string;
  goarch: string;
  /** Compiler tag, "gc" */
  compiler: string;
  /** Extra satisfied tags */
  tags: readonly string[];
  /** Highest satisfied release tag is go1.<releaseMinor> */
  releaseMinor: number;
}

export const DEFAULT_BUILD_CONTEXT: BuildContext = {
  goos: 'linux',
  goarch: 'amd64',
  compiler: 'gc',
  tags: ['appengine'],
  releaseMinor: 22,
};

const KNOWN_OS = new Set([
  'aix', 'android', 'darwin', 'dragonfly', 'freebsd', 'hurd', 'illumos', 'ios',
  'js', 'linux', 'nacl', 'netbsd', 'openbsd', 'plan9', 'solaris', 'wasip1',
  'windows', 'zos',
]);

const KNOWN_ARCH = new Set([
  '386', 'amd64', 'amd64p32', 'arm', 'armbe', 'arm64', 'arm64be', 'loong64',
  'mips', 'mipsle', 'mips64', 'mips64le', 'mips64p32', 'mips64p32le', 'ppc',
  'ppc64', 'ppc64le', 'riscv', 'riscv64', 's390', 's390x', 'sparc', 'sparc64',
  'wasm',
]);

const UNIX_OS = new Set([
  'aix', 'android', 'darwin', 'dragonfly', 'freebsd', 'hurd', 'illumos', 'ios',
  'linux', 'netbsd', 'openbsd', 'solaris',
]);

/** GOOS values that also satisfy another GOOS tag. */
const IMPLIED_OS: Record<string, string> = {
  android: 'linux',
  illumos: 'solaris',
  ios: 'darwin',
};

const TAG_PATTERN = /^[A-Za-z0-9_.]+$/;

export function matchTag(ctx: BuildContext, tag: string): boolean {
  if (tag === ctx.goos || tag === ctx.goarch || tag === ctx.compiler) {
    return true;
  }
  if (IMPLIED_OS[ctx.goos] === tag) {
    return true;
  }
  if (tag === 'unix' && UNIX_OS.has(ctx.goos)) {
    return true;
  }
  if (ctx.tags.includes(tag)) {
    return true;
  }
  const release = /^go1\.(\d+)$/.exec(tag);
  if (release?.[1] !== undefined) {
    const minor = Number(release[1]);
    return minor >= 1 && minor <= ctx.releaseMinor;
  }
  return false;
}

/**
 * Whether a file name's platform suffix matches the context.
 * Names without one always match.
 */
export function matchFileName(ctx: BuildContext, fileName: string): boolean {
  let name = fileName;
  const dot = name.indexOf('.');
  if (dot >= 0) {
    name = name.slice(0, dot);
  }
  const underscore = name.indexOf('_');
  if (underscore < 0) {
    return true;
  }

  const parts = name.slice(underscore).split('_');
  if (parts[parts.length - 1] === 'test') {
    parts.pop();
  }
  const last = parts[parts.length - 1];
  const beforeLast = parts[parts.length - 2];

  if (beforeLast !== undefined && last !== undefined && KNOWN_OS.has(beforeLast) && KNOWN_ARCH.has(last)) {
    return matchTag(ctx, beforeLast) && matchTag(ctx, last);
  }
  if (last !== undefined && (KNOWN_OS.has(last) || KNOWN_ARCH.has(last))) {
    return matchTag(ctx, last);
  }
  return true;
}

// =============================================================================
// //go:build expressions
// =============================================================================

export type ConstraintExpr =
  | { kind: 'tag'; tag: string }
  | { kind: 'not'; operand: ConstraintExpr }
  | { kind: 'and'; left: ConstraintExpr; right: ConstraintExpr }
  | { kind: 'or'; left: ConstraintExpr; right: ConstraintExpr };

export class ConstraintSyntaxError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConstraintSyntaxError';
  }
}

function tokenize(expr: string): string[] {
  const tokens: string[] = [];
  let i = 0;
  while (i < expr.length) {
    const ch = expr.charAt(i);
    if (ch === ' ' || ch === '\t') {
      i++;
    } else if (ch === '(' || ch === ')' || ch === '!') {
      tokens.push(ch);
      i++;
    } else if (expr.startsWith('&&', i) || expr.startsWith('||', i)) {
      tokens.push(expr.slice(i, i + 2));
      i += 2;
    } else {
      const match = /^[A-Za-z0-9_.]+/.exec(expr.slice(i));
      if (!match) {
        throw new ConstraintSyntaxError(`unexpected character ${JSON.stringify(ch)}`);
      }
      tokens.push(match[0]);
      i += match[0].length;
    }
  }
  return tokens;
}

/**
 * Parse the expression of a `//go:build` line (without the prefix).
 */
export function parseConstraintExpr(expr: string): ConstraintExpr {
  const tokens = tokenize(expr);
  let pos = 0;

  const peek = (): string | undefined => tokens[pos];

  const parseOr = (): ConstraintExpr => {
    let left = parseAnd();
    while (peek() === '||') {
      pos++;
      left = { kind: 'or', left, right: parseAnd() };
    }
    return left;
  };

  const parseAnd = (): ConstraintExpr => {
    let left = parseNot();
    while (peek() === '&&') {
      pos++;
      left = { kind: 'and', left, right: parseNot() };
    }
    return left;
  };

  const parseNot = (): ConstraintExpr => {
    if (peek() === '!') {
      pos++;
      return { kind: 'not', operand: parseNot() };
    }
    return parseAtom();
  };

  const parseAtom = (): ConstraintExpr => {
    const token = peek();
    if (token === undefined) {
      throw new ConstraintSyntaxError('unexpected end of expression');
    }
    pos++;
    if (token === '(') {
      const inner = parseOr();
      if (peek() !== ')') {
        throw new ConstraintSyntaxError('missing )');
      }
      pos++;
      return inner;
    }
    if (!TAG_PATTERN.test(token)) {
      throw new ConstraintSyntaxError(`unexpected token ${token}`);
    }
    return { kind: 'tag', tag: token };
  };

  const result = parseOr();
  if (pos !== tokens.length) {
    throw new ConstraintSyntaxError(`unexpected token ${tokens[pos] ?? ''}`);
  }
  return result;
}

export function evalConstraint(ctx: BuildContext, expr: ConstraintExpr): boolean {
  switch (expr.kind) {
    case 'tag':
      return matchTag(ctx, expr.tag);
    case 'not':
      return !evalConstraint(ctx, expr.operand);
    case 'and':
      return evalConstraint(ctx, expr.left) && evalConstraint(ctx, expr.right);
    case 'or':
      return evalConstraint(ctx, expr.left) || evalConstraint(ctx, expr.right);
  }
}

// =============================================================================
// // +build lines
// =============================================================================

/**
 * One `// +build` line: space-separated options are ORed, comma-separated
 * terms within an option are ANDed, `!` negates a term.
 */
export function matchPlusBuildLine(ctx: BuildContext, line: string): boolean {
  const options = line.trim().split(/\s+/).filter(Boolean);
  return options.some(option =>
    option.split(',').every(term => {
      const negated = term.startsWith('!');
      const tag = negated ? term.slice(1) : term;
      if (!TAG_PATTERN.test(tag)) {
        return false;
      }
      return negated ? !matchTag(ctx, tag) : matchTag(ctx, tag);
    })
  );
}

// =============================================================================
// File headers
// =============================================================================

export interface FileHeaderConstraints {
  /** Expression of the `//go:build` line, if any */
  goBuild?: string;
  /** Arguments of `// +build` lines that precede the header's last blank line */
  plusBuild: string[];
}

/**
 * Scan the leading comments and blank lines of a Go file for constraints.
 * Throws ConstraintSyntaxError for more than one `//go:build` line.
 */
export function scanFileHeader(content: string): FileHeaderConstraints {
  const lines = content.split('\n');
  let goBuild: string | undefined;
  const plusBuild: Array<{ line: number; args: string }> = [];
  let lastBlank = -1;
  let inBlockComment = false;

  for (let i = 0; i < lines.length; i++) {
    const line = (lines[i] ?? '').trim();

    if (inBlockComment) {
      if (line.includes('*/')) inBlockComment = false;
      continue;
    }
    if (line === '') {
      lastBlank = i;
      continue;
    }
    if (line.startsWith('/*')) {
      inBlockComment = !line.includes('*/', 2);
      continue;
    }
    if (!line.startsWith('//')) {
      break;
    }

    if (line.startsWith('//go:build') && /^\/\/go:build(\s|$)/.test(line)) {
      if (goBuild !== undefined) {
        throw new ConstraintSyntaxError('multiple //go:build comments');
      }
      goBuild = line.slice('//go:build'.length).trim();
      continue;
    }
    const plus = /^\/\/\s*\+build(\s+(.*))?$/.exec(line);
    if (plus) {
      plusBuild.push({ line: i, args: plus[2] ?? '' });
    }
  }

  return {
    ...(goBuild === undefined ? {} : { goBuild }),
    plusBuild: plusBuild.filter(p => p.line < lastBlank).map(p => p.args),
  };
}

/**
 * Whether a file's content constraints match the context. A `//go:build`
 * line takes precedence over `// +build` lines.
 */
export function matchFileContent(ctx: BuildContext, content: string): boolean {
  const header = scanFileHeader(content);
  if (header.goBuild !== undefined) {
    return evalConstraint(ctx, parseConstraintExpr(header.goBuild));
  }
  return header.plusBuild.every(args => matchPlusBuildLine(ctx, args));
}
