/**
 * Lexer Helpers
 * Character predicates and plain scalar classification
 */

import type { Position } from '../source-location.js';
import type { Token, TokenType } from '../token-types.js';
import { TOKEN_TYPES } from '../token-types.js';
import type { LexerState } from './state.js';
import { currentLocation } from './state.js';

export function isBreak(ch: string): boolean {
  return ch === '\n' || ch === '\r';
}

export function isBlank(ch: string): boolean {
  return ch === ' ' || ch === '\t';
}

/** Whitespace, line break or end of input */
export function isSeparator(ch: string): boolean {
  return ch === '' || isBlank(ch) || isBreak(ch);
}

export function isFlowIndicator(ch: string): boolean {
  return ch === ',' || ch === '[' || ch === ']' || ch === '{' || ch === '}';
}

export function isHexDigit(ch: string): boolean {
  return /^[0-9a-fA-F]$/.test(ch);
}

// ============================================================
// PLAIN SCALAR CLASSIFICATION
// ============================================================

const NULL_PATTERN = /^(?:null|Null|NULL|~)$/;
const BOOL_PATTERN = /^(?:true|True|TRUE|false|False|FALSE)$/;
const INFINITY_PATTERN = /^[-+]?\.(?:inf|Inf|INF)$/;
const NAN_PATTERN = /^\.(?:nan|NaN|NAN)$/;
const INTEGER_PATTERN =
  /^[-+]?(?:0b[01_]+|0o[0-7_]+|0x[0-9a-fA-F_]+|[0-9][0-9_]*)$/;
const FLOAT_PATTERN =
  /^[-+]?(?:[0-9][0-9_]*(?:\.[0-9_]*)?|\.[0-9][0-9_]*)(?:[eE][-+]?[0-9]+)?$/;

export function classifyPlain(value: string): TokenType {
  if (NULL_PATTERN.test(value)) return TOKEN_TYPES.NULL;
  if (BOOL_PATTERN.test(value)) return TOKEN_TYPES.BOOL;
  if (INFINITY_PATTERN.test(value)) return TOKEN_TYPES.INFINITY;
  if (NAN_PATTERN.test(value)) return TOKEN_TYPES.NAN;
  if (INTEGER_PATTERN.test(value)) return TOKEN_TYPES.INTEGER;
  if (FLOAT_PATTERN.test(value)) return TOKEN_TYPES.FLOAT;
  return TOKEN_TYPES.STRING;
}

// ============================================================
// TOKEN EMISSION
// ============================================================

/**
 * Append a token spanning `startPos..pos`. Its origin also claims the
 * whitespace left since the previous token.
 */
export function emit(
  state: LexerState,
  type: TokenType,
  value: string,
  start: Position,
  startPos: number
): Token {
  const token = state.stream.append({
    type,
    value,
    text: state.source.slice(startPos, state.pos),
    origin: state.source.slice(state.pendingStart, state.pos),
    position: start,
    end: currentLocation(state),
  });
  state.pendingStart = state.pos;
  trackLayout(state, token);
  return token;
}

/** Update indentation bookkeeping after a token is emitted */
function trackLayout(state: LexerState, token: Token): void {
  const { line, column, indentNum } = token.position;

  if (line !== state.lastTokenLine) {
    while ((state.indentStack.at(-1) ?? 0) > indentNum) state.indentStack.pop();
    if ((state.indentStack.at(-1) ?? 0) < indentNum) {
      state.indentStack.push(indentNum);
    }
  }

  if (state.flowStack.length === 0) {
    const prev = state.stream.prev(token);
    const afterIndicator =
      prev !== undefined &&
      prev.end.line === line &&
      (prev.type === TOKEN_TYPES.SEQUENCE_ENTRY ||
        prev.type === TOKEN_TYPES.MAPPING_KEY);
    if (line !== state.lastTokenLine || afterIndicator) {
      state.nodeColumn = column;
    }

    switch (token.type) {
      case TOKEN_TYPES.SEQUENCE_ENTRY:
      case TOKEN_TYPES.MAPPING_KEY:
        state.lastDelimColumn = column;
        break;
      case TOKEN_TYPES.MAPPING_VALUE:
        state.lastDelimColumn = state.nodeColumn;
        break;
      case TOKEN_TYPES.DOCUMENT_HEADER:
      case TOKEN_TYPES.DOCUMENT_END:
        state.lastDelimColumn = 0;
        break;
      default:
        break;
    }
  }

  state.lastTokenLine = token.end.line;
}
