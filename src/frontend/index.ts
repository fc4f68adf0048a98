export * from './interface.types.js';
export { GoFrontend } from './go.js';
export { createGoParser, extractGoSourceFile, unquote } from './tree-sitter/go-ast.js';
