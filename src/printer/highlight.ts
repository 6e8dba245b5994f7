import type { TokenStream } from '../lexer/stream.js';
import type { Token, TokenType } from '../token-types.js';
import { TOKEN_TYPES, isScalarType, leadingOf } from '../token-types.js';

// ============================================================
// HIGHLIGHT CATEGORIES
// ============================================================

export type HighlightCategory =
  | 'string'
  | 'number'
  | 'bool'
  | 'null'
  | 'mapKey'
  | 'anchor'
  | 'alias'
  | 'tag'
  | 'comment'
  | 'error';

// ============================================================
// TOKEN HIGHLIGHT MAP
// ============================================================

export const TOKEN_HIGHLIGHT_MAP: ReadonlyMap<TokenType, HighlightCategory> =
  new Map<TokenType, HighlightCategory>([
    // Scalars
    ['STRING', 'string'],
    ['SINGLE_QUOTE', 'string'],
    ['DOUBLE_QUOTE', 'string'],
    ['INTEGER', 'number'],
    ['FLOAT', 'number'],
    ['INFINITY', 'number'],
    ['NAN', 'number'],
    ['BOOL', 'bool'],
    ['NULL', 'null'],

    // Node properties
    ['ANCHOR', 'anchor'],
    ['ALIAS', 'alias'],
    ['TAG', 'tag'],

    // Other
    ['COMMENT', 'comment'],
    ['INVALID', 'error'],
  ]);

/**
 * Category of a token in context. Scalars directly before a ':' are map
 * keys; the name after '&' or '*' takes the anchor or alias category.
 */
export function highlightCategory(
  stream: TokenStream,
  token: Token
): HighlightCategory | undefined {
  if (isScalarType(token.type)) {
    const prev = stream.prev(token);
    if (prev?.type === TOKEN_TYPES.ANCHOR) return 'anchor';
    if (prev?.type === TOKEN_TYPES.ALIAS) return 'alias';
    if (stream.next(token)?.type === TOKEN_TYPES.MAPPING_VALUE) return 'mapKey';
  }
  if (token.type === TOKEN_TYPES.MERGE_KEY) return 'mapKey';
  return TOKEN_HIGHLIGHT_MAP.get(token.type);
}

// ============================================================
// ANSI COLORS
// ============================================================

export const ANSI_RESET = '\x1b[0m';

export const ANSI_COLORS: Readonly<Record<HighlightCategory, string>> = {
  string: '\x1b[92m',
  number: '\x1b[95m',
  bool: '\x1b[95m',
  null: '\x1b[95m',
  mapKey: '\x1b[96m',
  anchor: '\x1b[93m',
  alias: '\x1b[93m',
  tag: '\x1b[94m',
  comment: '\x1b[90m',
  error: '\x1b[91m',
};

export function colorize(text: string, category: HighlightCategory): string {
  return `${ANSI_COLORS[category]}${text}${ANSI_RESET}`;
}

// ============================================================
// LINE RENDERING
// ============================================================

/**
 * Split the stream into source lines, optionally colorizing each token's
 * own text. Escape codes never span a line break.
 */
export function renderLines(stream: TokenStream, color: boolean): string[] {
  const lines: string[] = [];
  let current = '';

  const write = (text: string, category?: HighlightCategory): void => {
    text.split('\n').forEach((part, index) => {
      if (index > 0) {
        lines.push(current);
        current = '';
      }
      if (part === '') return;
      current += color && category ? colorize(part, category) : part;
    });
  };

  for (const token of stream) {
    const leading = leadingOf(token);
    const rest = token.origin.slice(leading.length + token.text.length);
    write(leading);
    write(token.text, highlightCategory(stream, token));
    write(rest);
  }

  lines.push(current);
  return lines;
}

export interface PrintOptions {
  /** Wrap tokens in ANSI escape codes by category (default: false) */
  readonly color?: boolean | undefined;
  /** Prefix each line with its 1-based number (default: false) */
  readonly lineNumbers?: boolean | undefined;
}

/** Render a whole token stream for display. The stream is not modified. */
export function printTokens(
  stream: TokenStream,
  options: PrintOptions = {}
): string {
  const lines = renderLines(stream, options.color ?? false);
  if (!options.lineNumbers) return lines.join('\n');

  const width = Math.max(2, String(lines.length).length);
  return lines
    .map((line, index) => `${String(index + 1).padStart(width)} | ${line}`)
    .join('\n');
}
