import type { Position, SourceLocation } from './source-location.js';

// ============================================================
// TOKEN TYPES
// ============================================================

export const TOKEN_TYPES = {
  // Scalars
  STRING: 'STRING',
  SINGLE_QUOTE: 'SINGLE_QUOTE', // '...'
  DOUBLE_QUOTE: 'DOUBLE_QUOTE', // "..."
  NULL: 'NULL',
  BOOL: 'BOOL',
  INTEGER: 'INTEGER',
  FLOAT: 'FLOAT',
  INFINITY: 'INFINITY',
  NAN: 'NAN',

  // Block indicators
  SEQUENCE_ENTRY: 'SEQUENCE_ENTRY', // -
  MAPPING_KEY: 'MAPPING_KEY', // ?
  MAPPING_VALUE: 'MAPPING_VALUE', // :
  MERGE_KEY: 'MERGE_KEY', // <<

  // Flow indicators
  COLLECT_ENTRY: 'COLLECT_ENTRY', // ,
  SEQUENCE_START: 'SEQUENCE_START', // [
  SEQUENCE_END: 'SEQUENCE_END', // ]
  MAPPING_START: 'MAPPING_START', // {
  MAPPING_END: 'MAPPING_END', // }

  // Node properties
  ANCHOR: 'ANCHOR', // &
  ALIAS: 'ALIAS', // *
  TAG: 'TAG', // !, !!, !<...>

  // Block scalar headers
  LITERAL: 'LITERAL', // |
  FOLDED: 'FOLDED', // >

  // Document structure
  DIRECTIVE: 'DIRECTIVE', // %
  DOCUMENT_HEADER: 'DOCUMENT_HEADER', // ---
  DOCUMENT_END: 'DOCUMENT_END', // ...

  // Special
  COMMENT: 'COMMENT',
  SPACE: 'SPACE',
  INVALID: 'INVALID',
} as const;

export type TokenType = (typeof TOKEN_TYPES)[keyof typeof TOKEN_TYPES];

export interface Token {
  /** Stable index in the owning TokenStream's arena */
  readonly id: number;
  readonly type: TokenType;
  /** Semantic text: unescaped, folded, chomped */
  readonly value: string;
  /** The token's own verbatim characters */
  readonly text: string;
  /** text preceded by the whitespace since the previous token */
  readonly origin: string;
  readonly position: Position;
  /** Location just past the token's last character */
  readonly end: SourceLocation;
}

export type TokenInit = Omit<Token, 'id'>;

// ============================================================
// CLASSIFICATION
// ============================================================

const SCALAR_TYPES: ReadonlySet<TokenType> = new Set<TokenType>([
  TOKEN_TYPES.STRING,
  TOKEN_TYPES.SINGLE_QUOTE,
  TOKEN_TYPES.DOUBLE_QUOTE,
  TOKEN_TYPES.NULL,
  TOKEN_TYPES.BOOL,
  TOKEN_TYPES.INTEGER,
  TOKEN_TYPES.FLOAT,
  TOKEN_TYPES.INFINITY,
  TOKEN_TYPES.NAN,
]);

export function isScalarType(type: TokenType): boolean {
  return SCALAR_TYPES.has(type);
}

export function isQuotedType(type: TokenType): boolean {
  return type === TOKEN_TYPES.SINGLE_QUOTE || type === TOKEN_TYPES.DOUBLE_QUOTE;
}

/** Leading whitespace carried in front of the token's own text */
export function leadingOf(token: Token): string {
  if (token.text === '') return token.origin;
  const index = token.origin.indexOf(token.text);
  return index < 0 ? '' : token.origin.slice(0, index);
}

// ============================================================
// RESERVED TAGS
// ============================================================

export type TagKind = 'map' | 'sequence' | 'scalar';

export const RESERVED_TAGS: ReadonlyMap<string, TagKind> = new Map<
  string,
  TagKind
>([
  ['!!map', 'map'],
  ['!!omap', 'map'],
  ['!!set', 'map'],
  ['!!seq', 'sequence'],
  ['!!str', 'scalar'],
  ['!!int', 'scalar'],
  ['!!float', 'scalar'],
  ['!!bool', 'scalar'],
  ['!!null', 'scalar'],
  ['!!binary', 'scalar'],
  ['!!timestamp', 'scalar'],
  ['!!merge', 'scalar'],
  ['!!value', 'scalar'],
]);

export function isSecondaryTag(tag: string): boolean {
  return tag.startsWith('!!');
}
