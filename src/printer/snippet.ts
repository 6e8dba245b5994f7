/**
 * Error Snippet
 * Source window around an error token with a caret under its column
 */

import type { TokenStream } from '../lexer/stream.js';
import type { Token } from '../token-types.js';
import { colorize, renderLines } from './highlight.js';

export interface SnippetOptions {
  /** Colorize tokens and the caret (default: false) */
  readonly color?: boolean | undefined;
  /** Lines shown before and after the error line (default: 3) */
  readonly contextLines?: number | undefined;
}

export const DEFAULT_CONTEXT_LINES = 3;

/**
 * Output format:
 * ```
 *    1 | a: 1
 * >  2 | a: 2
 *        ^
 *    3 | b: 3
 * ```
 *
 * The caret sits below the line holding the token's first character, so a
 * token spanning several lines is marked where it starts.
 */
export function printErrorSnippet(
  stream: TokenStream,
  token: Token,
  options: SnippetOptions = {}
): string {
  const color = options.color ?? false;
  const context = Math.max(0, options.contextLines ?? DEFAULT_CONTEXT_LINES);
  const lines = renderLines(stream, color);

  const errorLine = Math.min(token.position.line, lines.length);
  const first = Math.max(1, errorLine - context);
  const last = Math.min(lines.length, errorLine + context);
  const width = Math.max(2, String(last).length);

  const output: string[] = [];
  for (let lineNumber = first; lineNumber <= last; lineNumber++) {
    const marker = lineNumber === errorLine ? '>' : ' ';
    const prefix = `${marker} ${String(lineNumber).padStart(width)} | `;
    output.push(`${prefix}${lines[lineNumber - 1] ?? ''}`);

    if (lineNumber === errorLine) {
      const pad = ' '.repeat(prefix.length + token.position.column - 1);
      output.push(`${pad}${color ? colorize('^', 'error') : '^'}`);
    }
  }

  return output.join('\n');
}
