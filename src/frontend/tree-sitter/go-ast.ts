/**
 * Go fact extraction using tree-sitter.
 * Produces a ParsedSourceFile from Go source text.
 */

import Parser from 'tree-sitter';
import Go from 'tree-sitter-go';
import { FrontendSyntaxError } from '../../utils/errors.js';
import type {
  CompositeLiteralInfo,
  ImportSpecInfo,
  LiteralElementKind,
  ParsedSourceFile,
} from '../interface.types.js';
import {
  createContext,
  findFirstOfType,
  findNodesOfType,
  getChildrenOfType,
  getLocation,
  getNodeText,
  type TreeSitterContext,
} from './TreeSitterUtils.js';

// =============================================================================
// Tree-sitter Node Type Constants
// =============================================================================

const GoNodes = {
  ERROR: 'ERROR',
  PACKAGE_CLAUSE: 'package_clause',
  PACKAGE_IDENTIFIER: 'package_identifier',
  IMPORT_DECLARATION: 'import_declaration',
  IMPORT_SPEC_LIST: 'import_spec_list',
  IMPORT_SPEC: 'import_spec',
  BLANK_IDENTIFIER: 'blank_identifier',
  DOT: 'dot',
  INTERPRETED_STRING_LITERAL: 'interpreted_string_literal',
  RAW_STRING_LITERAL: 'raw_string_literal',
  FUNCTION_DECLARATION: 'function_declaration',
  PARAMETER_DECLARATION: 'parameter_declaration',
  VARIADIC_PARAMETER_DECLARATION: 'variadic_parameter_declaration',
  COMPOSITE_LITERAL: 'composite_literal',
  QUALIFIED_TYPE: 'qualified_type',
  TYPE_IDENTIFIER: 'type_identifier',
  LITERAL_VALUE: 'literal_value',
  KEYED_ELEMENT: 'keyed_element',
  COMMENT: 'comment',
} as const;

const INIT_FUNCTION_NAME = 'init';

/**
 * Creates a Go parser instance.
 *
 * The double assertion is needed because tree-sitter-go's type definitions
 * do not extend tree-sitter's Language type, though they match at runtime.
 */
export function createGoParser(): Parser {
  const parser = new Parser();
  parser.setLanguage(Go as unknown as Parser.Language);
  return parser;
}

/**
 * Extracts the planner's facts from Go source code.
 * Throws FrontendSyntaxError at the first syntax error.
 */
export function extractGoSourceFile(
  parser: Parser,
  sourceCode: string,
  filePath: string
): ParsedSourceFile {
  const ctx = createContext(parser, sourceCode);
  const root = ctx.tree.rootNode;

  const errorNode = findFirstOfType(root, GoNodes.ERROR);
  if (errorNode) {
    const loc = getLocation(errorNode);
    throw new FrontendSyntaxError(
      `${filePath}:${loc.line}:${loc.column}: syntax error near ${JSON.stringify(firstLine(getNodeText(errorNode, sourceCode)))}`,
      { file: filePath, ...loc }
    );
  }

  return {
    filePath,
    packageName: extractPackageName(root, ctx, filePath),
    imports: extractImports(root, ctx, filePath),
    hasInit: hasInitFunction(root, ctx),
    compositeLiterals: extractCompositeLiterals(root, ctx),
  };
}

function firstLine(text: string): string {
  const newline = text.indexOf('\n');
  return newline >= 0 ? text.slice(0, newline) : text;
}

function extractPackageName(
  root: Parser.SyntaxNode,
  ctx: TreeSitterContext,
  filePath: string
): string {
  const clause = root.children.find(c => c.type === GoNodes.PACKAGE_CLAUSE);
  const nameNode = clause?.children.find(c => c.type === GoNodes.PACKAGE_IDENTIFIER);
  if (!nameNode) {
    throw new FrontendSyntaxError(`${filePath}:1:1: expected 'package', found no package clause`, {
      file: filePath,
      line: 1,
      column: 1,
    });
  }
  return getNodeText(nameNode, ctx.sourceCode);
}

function extractImports(
  root: Parser.SyntaxNode,
  ctx: TreeSitterContext,
  filePath: string
): ImportSpecInfo[] {
  const imports: ImportSpecInfo[] = [];

  for (const decl of getChildrenOfType(root, GoNodes.IMPORT_DECLARATION)) {
    const specList = decl.children.find(c => c.type === GoNodes.IMPORT_SPEC_LIST);
    const specs = specList
      ? getChildrenOfType(specList, GoNodes.IMPORT_SPEC)
      : getChildrenOfType(decl, GoNodes.IMPORT_SPEC);
    for (const spec of specs) {
      imports.push(parseImportSpec(spec, ctx, filePath));
    }
  }

  return imports;
}

function parseImportSpec(
  spec: Parser.SyntaxNode,
  ctx: TreeSitterContext,
  filePath: string
): ImportSpecInfo {
  let alias: string | undefined;
  let pathNode: Parser.SyntaxNode | undefined;

  for (const child of spec.children) {
    if (
      child.type === GoNodes.PACKAGE_IDENTIFIER ||
      child.type === GoNodes.BLANK_IDENTIFIER ||
      child.type === GoNodes.DOT
    ) {
      alias = getNodeText(child, ctx.sourceCode);
    }
    if (
      child.type === GoNodes.INTERPRETED_STRING_LITERAL ||
      child.type === GoNodes.RAW_STRING_LITERAL
    ) {
      pathNode = child;
    }
  }

  const location = getLocation(spec);
  const quoted = pathNode ? getNodeText(pathNode, ctx.sourceCode) : '';
  const path = unquote(quoted);
  if (path === null) {
    throw new FrontendSyntaxError(
      `${filePath}:${location.line}:${location.column}: bad import spec ${quoted}`,
      { file: filePath, ...location }
    );
  }

  return alias === undefined ? { path, location } : { path, alias, location };
}

const SIMPLE_ESCAPES: ReadonlyMap<string, number> = new Map([
  ['a', 0x07], ['b', 0x08], ['f', 0x0c], ['n', 0x0a], ['r', 0x0d],
  ['t', 0x09], ['v', 0x0b], ['\\', 0x5c], ['"', 0x22],
]);

/** Hex digit counts of the \x, \u and \U escapes. */
const HEX_ESCAPE_WIDTHS: ReadonlyMap<string, number> = new Map([['x', 2], ['u', 4], ['U', 8]]);

const utf8Encoder = new TextEncoder();
const utf8Decoder = new TextDecoder('utf-8', { fatal: true });

/**
 * Unquotes a Go string literal. Returns null when the literal is malformed.
 */
export function unquote(literal: string): string | null {
  if (literal.length < 2) return null;
  const quote = literal[0];
  if (quote !== literal[literal.length - 1]) return null;
  const body = literal.slice(1, -1);

  if (quote === '`') {
    return body.includes('`') ? null : body;
  }
  if (quote !== '"') return null;
  return decodeInterpreted(body);
}

/**
 * Decodes the body of an interpreted string literal. \x and octal escapes
 * are single bytes; the result must be valid UTF-8.
 */
function decodeInterpreted(body: string): string | null {
  const bytes: number[] = [];

  for (let i = 0; i < body.length;) {
    const char = String.fromCodePoint(body.codePointAt(i) ?? 0);
    i += char.length;
    if (char === '"' || char === '\n') return null;
    if (char !== '\\') {
      bytes.push(...utf8Encoder.encode(char));
      continue;
    }

    const kind = body.charAt(i);
    const simple = SIMPLE_ESCAPES.get(kind);
    if (simple !== undefined) {
      bytes.push(simple);
      i += 1;
      continue;
    }

    if (kind >= '0' && kind <= '7') {
      const digits = body.slice(i, i + 3);
      if (!/^[0-7]{3}$/.test(digits)) return null;
      const value = parseInt(digits, 8);
      if (value > 0xff) return null;
      bytes.push(value);
      i += 3;
      continue;
    }

    const width = HEX_ESCAPE_WIDTHS.get(kind);
    if (width === undefined) return null;
    const digits = body.slice(i + 1, i + 1 + width);
    if (digits.length !== width || !/^[0-9a-fA-F]+$/.test(digits)) return null;
    i += 1 + width;
    const value = parseInt(digits, 16);
    if (kind === 'x') {
      bytes.push(value);
      continue;
    }
    if (value > 0x10ffff || (value >= 0xd800 && value <= 0xdfff)) return null;
    bytes.push(...utf8Encoder.encode(String.fromCodePoint(value)));
  }

  try {
    return utf8Decoder.decode(Uint8Array.from(bytes));
  } catch {
    // Invalid UTF-8 from byte escapes.
    return null;
  }
}

/**
 * A true init function: named init, no type parameters, no parameters,
 * no results. Methods are a different node type so never match.
 */
function hasInitFunction(root: Parser.SyntaxNode, ctx: TreeSitterContext): boolean {
  return getChildrenOfType(root, GoNodes.FUNCTION_DECLARATION).some((decl) => {
    const name = decl.childForFieldName('name');
    if (!name || getNodeText(name, ctx.sourceCode) !== INIT_FUNCTION_NAME) return false;
    if (decl.childForFieldName('type_parameters')) return false;
    if (decl.childForFieldName('result')) return false;

    const params = decl.childForFieldName('parameters');
    return !params || !params.children.some(c =>
      c.type === GoNodes.PARAMETER_DECLARATION ||
      c.type === GoNodes.VARIADIC_PARAMETER_DECLARATION
    );
  });
}

function extractCompositeLiterals(
  root: Parser.SyntaxNode,
  ctx: TreeSitterContext
): CompositeLiteralInfo[] {
  const literals: CompositeLiteralInfo[] = [];

  for (const lit of findNodesOfType(root, [GoNodes.COMPOSITE_LITERAL])) {
    const typeNode = lit.childForFieldName('type');
    const body = lit.childForFieldName('body') ??
      lit.children.find(c => c.type === GoNodes.LITERAL_VALUE);
    if (!typeNode || !body) continue;

    const elements: LiteralElementKind[] = body.namedChildren
      .filter(c => c.type !== GoNodes.COMMENT)
      .map(c => (c.type === GoNodes.KEYED_ELEMENT ? 'keyed' : 'positional'));

    if (typeNode.type === GoNodes.QUALIFIED_TYPE) {
      const pkg = typeNode.children.find(c => c.type === GoNodes.PACKAGE_IDENTIFIER);
      const name = typeNode.children.find(c => c.type === GoNodes.TYPE_IDENTIFIER);
      if (pkg && name) {
        literals.push({
          qualifier: getNodeText(pkg, ctx.sourceCode),
          typeName: getNodeText(name, ctx.sourceCode),
          elements,
          location: getLocation(lit),
        });
        continue;
      }
    }

    literals.push({
      typeName: getNodeText(typeNode, ctx.sourceCode),
      elements,
      location: getLocation(lit),
    });
  }

  return literals;
}
