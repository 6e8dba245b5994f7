/**
 * Parser Class - Core
 *
 * Defines the Parser class structure. Methods are added via prototype
 * extension from separate modules, using TypeScript declaration merging
 * for type safety.
 */

import type { DocumentNode } from '../ast-nodes.js';
import type { TokenStream } from '../lexer/stream.js';
import { ParseContext, type ResolvedParseOptions } from './context.js';
import type { DocumentTokens } from './groups.js';

/**
 * Parser that turns one document's grouped tokens into a Document node.
 *
 * Methods are organized across multiple files:
 * - parser-document.ts: Document, directives, dispatch of values
 * - parser-mapping.ts: Block and flow mappings, keys, value rules
 * - parser-sequence.ts: Block and flow sequences
 * - parser-scalar.ts: Scalars, block scalars, anchors, aliases, tags
 * - parser-comment.ts: Head, line and foot comment attachment
 *
 * @example
 * ```typescript
 * const parser = new Parser(doc, tokens, { comments: true, allowDuplicateKeys: false });
 * const node = parser.parse();
 * ```
 */
export class Parser {
  /** Root context; child contexts share its cursor */
  readonly ctx: ParseContext;

  constructor(
    readonly doc: DocumentTokens,
    readonly tokens: TokenStream,
    options: ResolvedParseOptions
  ) {
    this.ctx = ParseContext.create(doc.elements, tokens, options);
  }

  /**
   * Parse the document.
   */
  parse(): DocumentNode {
    return this.parseDocument();
  }
}
