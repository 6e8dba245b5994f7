/**
 * yaml-tree
 * Exports lexer, parser, AST model, errors and printers
 */

export { tokenize, type TokenizeOptions } from './lexer/index.js';
export { TokenStream, BufferPool } from './lexer/index.js';
export {
  parse,
  safeParse,
  groupTokens,
  type DocumentTokens,
  type Element,
  type GroupType,
  type TokenGroup,
} from './parser/index.js';

// ============================================================
// TOKENS AND POSITIONS
// ============================================================
export {
  TOKEN_TYPES,
  RESERVED_TAGS,
  isScalarType,
  isQuotedType,
  leadingOf,
  type Token,
  type TokenInit,
  type TokenType,
  type TagKind,
} from './token-types.js';
export {
  formatLocation,
  type Position,
  type SourceLocation,
} from './source-location.js';

// ============================================================
// AST
// ============================================================
export * from './ast-nodes.js';
export {
  ROOT_PATH,
  PathBuilder,
  childPath,
  indexPath,
  quotePathKey,
} from './path.js';
export {
  walk,
  filterNodes,
  childrenOf,
  type NodeVisitor,
  type NodeOfType,
} from './visitor.js';
export { renameAnchor, renameAlias } from './rename.js';

// ============================================================
// ERROR TAXONOMY
// ============================================================
export {
  type ErrorCategory,
  type ErrorDefinition,
  type ErrorExample,
  type ErrorRegistry,
  ERROR_REGISTRY,
  renderMessage,
} from './error-registry.js';
export {
  YamlSyntaxError,
  LexicalError,
  StructuralError,
  createError,
  wrapError,
  findSyntaxError,
  formatError,
  type ErrorFormatOptions,
  type ErrorSource,
  type YamlErrorData,
} from './error-classes.js';

// ============================================================
// PRINTERS
// ============================================================
export {
  printTokens,
  highlightCategory,
  colorize,
  TOKEN_HIGHLIGHT_MAP,
  type HighlightCategory,
  type PrintOptions,
} from './printer/highlight.js';
export {
  printErrorSnippet,
  type SnippetOptions,
} from './printer/snippet.js';
export { render } from './printer/render.js';
export { dumpTree } from './printer/dump.js';

export * from './types.js';
