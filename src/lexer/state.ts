/**
 * Lexer State
 * Tracks position, indentation and flow nesting during tokenization
 */

import type { Position, SourceLocation } from '../source-location.js';
import type { BufferPool } from './pool.js';
import { TokenStream } from './stream.js';

export interface LexerState {
  readonly source: string;
  readonly stream: TokenStream;
  readonly pool: BufferPool;
  pos: number;
  line: number;
  column: number;
  /** Offset of the first character of the current line */
  lineStartPos: number;
  /** Start of whitespace not yet claimed by a token's origin */
  pendingStart: number;
  /** Open flow brackets, innermost last */
  readonly flowStack: string[];
  /** Column of the most recent block key, '-' or '?'; 0 at document level */
  lastDelimColumn: number;
  /** Column where the current node started on the line being scanned */
  nodeColumn: number;
  /** Line on which the previously emitted token ended */
  lastTokenLine: number;
  /** Open indentation widths used for indentLevel */
  readonly indentStack: number[];
}

/** Saved cursor for bounded lookahead */
export interface Cursor {
  readonly pos: number;
  readonly line: number;
  readonly column: number;
  readonly lineStartPos: number;
}

export function createLexerState(
  source: string,
  pool: BufferPool
): LexerState {
  return {
    source,
    stream: new TokenStream(),
    pool,
    pos: 0,
    line: 1,
    column: 1,
    lineStartPos: 0,
    pendingStart: 0,
    flowStack: [],
    lastDelimColumn: 0,
    nodeColumn: 1,
    lastTokenLine: 0,
    indentStack: [0],
  };
}

export function currentLocation(state: LexerState): SourceLocation {
  return { line: state.line, column: state.column, offset: state.pos };
}

/** Current location plus the indentation of the current line */
export function currentPosition(state: LexerState): Position {
  const indentNum = lineIndent(state);
  let level = 0;
  for (const width of state.indentStack) {
    if (width < indentNum) level++;
  }
  return { ...currentLocation(state), indentNum, indentLevel: level };
}

/** Count of spaces at the start of the current line */
export function lineIndent(state: LexerState): number {
  let i = state.lineStartPos;
  while (state.source[i] === ' ') i++;
  return i - state.lineStartPos;
}

export function inFlow(state: LexerState): boolean {
  return state.flowStack.length > 0;
}

export function peek(state: LexerState, offset = 0): string {
  return state.source[state.pos + offset] ?? '';
}

export function peekString(state: LexerState, length: number): string {
  return state.source.slice(state.pos, state.pos + length);
}

export function advance(state: LexerState): string {
  const ch = state.source[state.pos] ?? '';
  state.pos++;
  if (ch === '\n') {
    state.line++;
    state.column = 1;
    state.lineStartPos = state.pos;
  } else {
    state.column++;
  }
  return ch;
}

export function isAtEnd(state: LexerState): boolean {
  return state.pos >= state.source.length;
}

export function saveCursor(state: LexerState): Cursor {
  return {
    pos: state.pos,
    line: state.line,
    column: state.column,
    lineStartPos: state.lineStartPos,
  };
}

export function restoreCursor(state: LexerState, cursor: Cursor): void {
  state.pos = cursor.pos;
  state.line = cursor.line;
  state.column = cursor.column;
  state.lineStartPos = cursor.lineStartPos;
}
