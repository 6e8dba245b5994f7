/**
 * YAML Parser
 * Main entry point and re-exports
 */

import type { DocumentNode, FileNode } from '../ast-nodes.js';
import { YamlSyntaxError } from '../error-classes.js';
import { tokenize } from '../lexer/index.js';
import type { ParseOptions, ParseResult } from '../types.js';
import type { ResolvedParseOptions } from './context.js';
import { groupTokens } from './groups.js';
import { Parser } from './parser.js';

// Import extension modules to register prototype methods on Parser.
// These must be imported AFTER parser.js to ensure the class is defined.
import './parser-document.js';
import './parser-mapping.js';
import './parser-sequence.js';
import './parser-scalar.js';
import './parser-comment.js';

// ============================================================
// MAIN ENTRY POINT
// ============================================================

/**
 * Parse YAML source into a File node.
 *
 * Throws on the first syntax error; no partial tree is returned.
 *
 * @param source - YAML text, possibly holding several documents
 * @returns File node with one Document per document in the stream
 * @throws {LexicalError} on scanner errors (quoting, indentation, escapes)
 * @throws {StructuralError} on structural errors (keys, flow delimiters, tags)
 *
 * @example
 * ```typescript
 * const file = parse('a: 1\nb: [x, y]\n');
 * file.documents[0]?.body?.type; // 'Mapping'
 * ```
 */
export function parse(source: string, options: ParseOptions = {}): FileNode {
  const observability = options.observability;
  const resolved: ResolvedParseOptions = {
    comments: options.comments ?? true,
    allowDuplicateKeys: options.allowDuplicateKeys ?? false,
  };

  try {
    const startTime = Date.now();
    const tokens = tokenize(source, { pool: options.pool });
    observability?.onScan?.({
      tokenCount: tokens.size,
      durationMs: Date.now() - startTime,
    });

    const documents: DocumentNode[] = [];
    for (const doc of groupTokens(tokens)) {
      const node = new Parser(doc, tokens, resolved).parse();
      observability?.onDocument?.({
        index: documents.length,
        path: node.path,
        bodyType: node.body?.type ?? null,
      });
      documents.push(node);
    }

    return { type: 'File', documents, tokens };
  } catch (error) {
    if (error instanceof YamlSyntaxError) {
      observability?.onError?.({ error });
    }
    throw error;
  }
}

/**
 * Parse without throwing on syntax errors.
 *
 * @example
 * ```typescript
 * const result = safeParse('{ a: 1');
 * if (!result.success) {
 *   console.log(result.error.message); // '[1:1] could not find flow mapping end token '}''
 * }
 * ```
 */
export function safeParse(
  source: string,
  options: ParseOptions = {}
): ParseResult {
  try {
    return { success: true, file: parse(source, options) };
  } catch (error) {
    if (error instanceof YamlSyntaxError) {
      return { success: false, error };
    }
    throw error;
  }
}

// ============================================================
// RE-EXPORTS
// ============================================================

export { groupTokens, type DocumentTokens } from './groups.js';
export type { Element, GroupType, TokenGroup } from './groups.js';
export { Cursor, ParseContext } from './context.js';
export { Parser } from './parser.js';
