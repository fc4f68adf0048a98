/**
 * Go language frontend backed by tree-sitter.
 */
import type { LanguageFrontend, ParsedSourceFile } from './interface.types.js';
import { createGoParser, extractGoSourceFile } from './tree-sitter/go-ast.js';
import { readFile } from '../utils/file-system.js';
import type Parser from 'tree-sitter';

export class GoFrontend implements LanguageFrontend {
  private parser: Parser | null = null;

  async parseFile(filePath: string, content?: string): Promise<ParsedSourceFile> {
    const source = content ?? await readFile(filePath);
    return extractGoSourceFile(this.getParser(), source, filePath);
  }

  private getParser(): Parser {
    if (!this.parser) {
      this.parser = createGoParser();
    }
    return this.parser;
  }
}
