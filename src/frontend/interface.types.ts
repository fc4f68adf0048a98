/**
 * Language frontend interface.
 *
 * The planner never looks at source text itself. A frontend turns one file
 * into the handful of facts the planner needs: the declared package, the
 * imports, whether a true init function exists, and every composite literal
 * with its element shape.
 */

/**
 * 1-based position in a source file.
 */
export interface SourceLocation {
  line: number;
  column: number;
}

/**
 * One import spec of a file.
 */
export interface ImportSpecInfo {
  /** The unquoted import path */
  path: string;
  /** Explicit local name: an identifier, "." or "_" */
  alias?: string;
  location: SourceLocation;
}

export type LiteralElementKind = 'keyed' | 'positional';

/**
 * A composite literal expression such as `http.Client{Timeout: t}`.
 */
export interface CompositeLiteralInfo {
  /** Package qualifier when the type is written `pkg.Type` */
  qualifier?: string;
  /** The type name (selector of a qualified type, or the plain type text) */
  typeName: string;
  elements: LiteralElementKind[];
  location: SourceLocation;
}

/**
 * Everything the planner reads from one parsed source file.
 */
export interface ParsedSourceFile {
  /** Path the file was parsed from */
  filePath: string;
  packageName: string;
  /** Imports in source order */
  imports: ImportSpecInfo[];
  /** Whether the file declares `func init()` with no receiver, params or results */
  hasInit: boolean;
  compositeLiterals: CompositeLiteralInfo[];
}

/**
 * A language frontend. Implementations throw FrontendSyntaxError for
 * files that do not parse.
 */
export interface LanguageFrontend {
  /**
   * Parse a source file.
   * @param filePath Path to the file
   * @param content Optional pre-loaded content to avoid re-reading from disk
   */
  parseFile(filePath: string, content?: string): Promise<ParsedSourceFile>;
}
