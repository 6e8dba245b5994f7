/**
 * Lexer Readers
 * Scanners for comments, scalars, block scalars and node properties
 */

import type { Position } from '../source-location.js';
import type { Token, TokenType } from '../token-types.js';
import { TOKEN_TYPES } from '../token-types.js';
import { throwLexError } from './errors.js';
import {
  classifyPlain,
  emit,
  isBlank,
  isBreak,
  isFlowIndicator,
  isHexDigit,
  isSeparator,
} from './helpers.js';
import { withBuffer } from './pool.js';
import {
  advance,
  currentPosition,
  type Cursor,
  inFlow,
  isAtEnd,
  type LexerState,
  peek,
  peekString,
  restoreCursor,
  saveCursor,
} from './state.js';

// ============================================================
// SHARED
// ============================================================

function skipBlanks(state: LexerState): void {
  while (isBlank(peek(state))) advance(state);
}

function skipLineBreak(state: LexerState): void {
  if (peek(state) === '\r') advance(state);
  if (peek(state) === '\n') advance(state);
}

/** Move back to an earlier offset on the current line */
function rewindTo(state: LexerState, pos: number): void {
  state.column -= state.pos - pos;
  state.pos = pos;
}

/** Offset just past the last non-blank character in `from..state.pos` */
function trimmedEnd(state: LexerState, from: number): number {
  let end = state.pos;
  while (end > from && isBlank(state.source[end - 1] ?? '')) end--;
  return end;
}

/** Emit a fixed-width indicator token */
export function readIndicator(
  state: LexerState,
  type: TokenType,
  length: number
): Token {
  const start = currentPosition(state);
  const startPos = state.pos;
  for (let i = 0; i < length; i++) advance(state);
  return emit(state, type, state.source.slice(startPos, state.pos), start, startPos);
}

// ============================================================
// COMMENTS
// ============================================================

export function readComment(state: LexerState): Token {
  const start = currentPosition(state);
  const startPos = state.pos;
  while (!isAtEnd(state) && !isBreak(peek(state))) advance(state);
  const text = state.source.slice(startPos, state.pos);
  return emit(state, TOKEN_TYPES.COMMENT, text.slice(1).trim(), start, startPos);
}

// ============================================================
// QUOTED SCALARS
// ============================================================

const SIMPLE_ESCAPES: Readonly<Record<string, string>> = {
  '0': '\0',
  a: '\x07',
  b: '\b',
  t: '\t',
  '\t': '\t',
  n: '\n',
  v: '\v',
  f: '\f',
  r: '\r',
  e: '\x1b',
  ' ': ' ',
  '"': '"',
  '/': '/',
  '\\': '\\',
  N: '\x85',
  _: '\xa0',
  L: '\u2028',
  P: '\u2029',
};

/** Escape letter -> number of hex digits that follow */
const HEX_ESCAPES: Readonly<Record<string, number>> = { x: 2, u: 4, U: 8 };

function readEscape(state: LexerState): string {
  const at = currentPosition(state);
  advance(state);
  const ch = peek(state);

  const simple = SIMPLE_ESCAPES[ch];
  if (simple !== undefined) {
    advance(state);
    return simple;
  }

  const width = HEX_ESCAPES[ch];
  if (width !== undefined) {
    const digits = state.source.slice(state.pos + 1, state.pos + 1 + width);
    const code = parseInt(digits, 16);
    if (
      digits.length === width &&
      [...digits].every(isHexDigit) &&
      code <= 0x10ffff
    ) {
      for (let i = 0; i <= width; i++) advance(state);
      return String.fromCodePoint(code);
    }
  }

  throwLexError(state, 'YAML-L006', { sequence: `\\${ch}` }, at);
}

/**
 * Consume a line break inside a quoted scalar and the blank lines after it.
 * One break folds to a space; each blank line contributes a newline.
 */
function foldQuotedBreak(state: LexerState): string {
  skipLineBreak(state);
  let emptyLines = 0;
  for (;;) {
    skipBlanks(state);
    if (!isBreak(peek(state))) break;
    skipLineBreak(state);
    emptyLines++;
  }
  return emptyLines > 0 ? '\n'.repeat(emptyLines) : ' ';
}

export function readQuoted(state: LexerState): Token {
  const double = peek(state) === '"';
  const start = currentPosition(state);
  const startPos = state.pos;
  advance(state);

  const value = withBuffer(state.pool, (buffer) => {
    // Blanks are held back until we know they are not trailing a line
    let blanks = '';
    for (;;) {
      if (isAtEnd(state)) {
        throwLexError(
          state,
          'YAML-L001',
          { style: double ? 'double' : 'single' },
          start
        );
      }
      const ch = peek(state);

      if (!double && ch === "'") {
        buffer.push(blanks);
        blanks = '';
        advance(state);
        if (peek(state) !== "'") return buffer.join('');
        buffer.push("'");
        advance(state);
        continue;
      }
      if (double && ch === '"') {
        buffer.push(blanks);
        advance(state);
        return buffer.join('');
      }
      if (double && ch === '\\') {
        buffer.push(blanks);
        blanks = '';
        if (isBreak(peek(state, 1))) {
          advance(state);
          skipLineBreak(state);
          skipBlanks(state);
        } else {
          buffer.push(readEscape(state));
        }
        continue;
      }
      if (isBlank(ch)) {
        blanks += ch;
        advance(state);
        continue;
      }
      if (isBreak(ch)) {
        blanks = '';
        buffer.push(foldQuotedBreak(state));
        continue;
      }

      buffer.push(blanks, ch);
      blanks = '';
      advance(state);
    }
  });

  return emit(
    state,
    double ? TOKEN_TYPES.DOUBLE_QUOTE : TOKEN_TYPES.SINGLE_QUOTE,
    value,
    start,
    startPos
  );
}

// ============================================================
// PLAIN SCALARS
// ============================================================

/**
 * Advance over one line of a plain scalar. Returns true when the scalar
 * ends on this line, false when it stopped at a line break.
 */
function scanPlainLine(state: LexerState, flow: boolean): boolean {
  for (;;) {
    if (isAtEnd(state)) return true;
    const ch = peek(state);
    if (isBreak(ch)) return false;
    if (ch === ':') {
      const next = peek(state, 1);
      if (isSeparator(next) || (flow && isFlowIndicator(next))) return true;
    }
    if (ch === '#' && isBlank(state.source[state.pos - 1] ?? '')) return true;
    if (flow && isFlowIndicator(ch)) return true;
    advance(state);
  }
}

interface Continuation {
  readonly cursor: Cursor;
  readonly emptyLines: number;
}

function isDocumentMarker(state: LexerState): boolean {
  const marker = peekString(state, 3);
  return (
    state.pos === state.lineStartPos &&
    (marker === '---' || marker === '...') &&
    isSeparator(peek(state, 3))
  );
}

/**
 * Look past the line break after a plain scalar line. The next non-blank
 * line continues the scalar when it is indented past the last block
 * delimiter (any indentation in flow context) and does not open a comment,
 * a document marker or an indicator.
 */
function probeContinuation(
  state: LexerState,
  flow: boolean
): Continuation | undefined {
  const saved = saveCursor(state);
  skipBlanks(state);
  skipLineBreak(state);

  let emptyLines = 0;
  for (;;) {
    if (state.pos === state.lineStartPos && isDocumentMarker(state)) break;
    skipBlanks(state);
    if (!isBreak(peek(state))) break;
    skipLineBreak(state);
    emptyLines++;
  }

  const ch = peek(state);
  const next = peek(state, 1);
  let accepted = !isAtEnd(state) && ch !== '#' && !isDocumentMarker(state);
  if (accepted && flow) {
    accepted = !isFlowIndicator(ch) && !(ch === ':' && (isSeparator(next) || isFlowIndicator(next)));
  } else if (accepted) {
    accepted =
      state.column > state.lastDelimColumn &&
      !((ch === ':' || ch === '?') && isSeparator(next));
  }

  const cursor = saveCursor(state);
  restoreCursor(state, saved);
  return accepted ? { cursor, emptyLines } : undefined;
}

export function readPlain(state: LexerState): Token {
  const start = currentPosition(state);
  const startPos = state.pos;
  const flow = inFlow(state);

  const value = withBuffer(state.pool, (buffer) => {
    let emptyLines = 0;
    for (;;) {
      const segmentStart = state.pos;
      const ended = scanPlainLine(state, flow);
      const end = trimmedEnd(state, segmentStart);

      if (buffer.length > 0) {
        buffer.push(emptyLines > 0 ? '\n'.repeat(emptyLines) : ' ');
      }
      buffer.push(state.source.slice(segmentStart, end));
      rewindTo(state, end);
      if (ended) break;

      const continuation = probeContinuation(state, flow);
      if (!continuation) break;
      emptyLines = continuation.emptyLines;
      restoreCursor(state, continuation.cursor);
    }
    return buffer.join('');
  });

  return emit(state, classifyPlain(value), value, start, startPos);
}

// ============================================================
// BLOCK SCALARS
// ============================================================

export type Chomping = 'clip' | 'keep' | 'strip';

interface BlockHeader {
  readonly folded: boolean;
  readonly chomping: Chomping;
  /** Explicit indentation indicator, 0 when absent */
  readonly indent: number;
}

function readBlockHeader(state: LexerState): BlockHeader {
  const start = currentPosition(state);
  const startPos = state.pos;
  const folded = advance(state) === '>';
  let chomping: Chomping = 'clip';
  let indent = 0;

  while (!isSeparator(peek(state))) {
    const ch = peek(state);
    if ((ch === '-' || ch === '+') && chomping === 'clip') {
      chomping = ch === '-' ? 'strip' : 'keep';
    } else if (ch >= '1' && ch <= '9' && indent === 0) {
      indent = Number(ch);
    } else {
      let end = state.pos;
      while (!isSeparator(state.source[end] ?? '')) end++;
      throwLexError(
        state,
        'YAML-L003',
        { header: state.source.slice(startPos, end) },
        start
      );
    }
    advance(state);
  }

  emit(
    state,
    folded ? TOKEN_TYPES.FOLDED : TOKEN_TYPES.LITERAL,
    state.source.slice(startPos, state.pos),
    start,
    startPos
  );
  return { folded, chomping, indent };
}

/**
 * Join block scalar lines. Blank lines arrive as ''; more-indented lines
 * keep their extra leading spaces.
 */
export function foldBlockLines(
  lines: readonly string[],
  folded: boolean,
  chomping: Chomping
): string {
  let result = '';
  let emptyLines = 0;
  let didReadContent = false;
  let atMoreIndented = false;

  for (const line of lines) {
    if (line === '') {
      emptyLines++;
      continue;
    }

    if (!folded) {
      result += '\n'.repeat(didReadContent ? 1 + emptyLines : emptyLines);
    } else if (isBlank(line.charAt(0))) {
      atMoreIndented = true;
      result += '\n'.repeat(didReadContent ? 1 + emptyLines : emptyLines);
    } else if (atMoreIndented) {
      atMoreIndented = false;
      result += '\n'.repeat(emptyLines + 1);
    } else if (emptyLines === 0) {
      if (didReadContent) result += ' ';
    } else {
      result += '\n'.repeat(emptyLines);
    }

    result += line;
    didReadContent = true;
    emptyLines = 0;
  }

  switch (chomping) {
    case 'keep':
      return result + '\n'.repeat(didReadContent ? 1 + emptyLines : emptyLines);
    case 'clip':
      return didReadContent ? `${result}\n` : '';
    case 'strip':
      return result;
  }
}

/**
 * Scan `|` / `>` with its header, an optional trailing comment and the
 * content lines. The content token's origin starts at the line break that
 * ends the header line and runs through the last line of the block,
 * trailing blank lines included.
 */
export function readBlockScalar(state: LexerState): void {
  const header = readBlockHeader(state);

  skipBlanks(state);
  if (peek(state) === '#') {
    readComment(state);
  } else if (!isAtEnd(state) && !isBreak(peek(state))) {
    const at = currentPosition(state);
    let end = state.pos;
    while (!isBreak(state.source[end] ?? '\n')) end++;
    throwLexError(
      state,
      'YAML-L003',
      { header: state.source.slice(at.offset, end) },
      at
    );
  }

  const parentIndent = state.lastDelimColumn - 1;
  let contentIndent =
    header.indent > 0 ? Math.max(parentIndent, 0) + header.indent : -1;
  const contentStartPos = state.pos;
  const fallbackStart = currentPosition(state);
  let contentStart: Position | undefined;
  skipLineBreak(state);

  const value = withBuffer(state.pool, (lines) => {
    while (!isAtEnd(state)) {
      const lineCursor = saveCursor(state);
      let indent = 0;
      while (peek(state) === ' ') {
        advance(state);
        indent++;
      }
      const at = currentPosition(state);
      if (indent === 0 && isDocumentMarker(state)) {
        restoreCursor(state, lineCursor);
        break;
      }

      const restStart = state.pos;
      while (!isAtEnd(state) && !isBreak(peek(state))) advance(state);
      const rest = state.source.slice(restStart, state.pos);

      if (rest.trim() === '') {
        // spaces past the content indent are content
        lines.push(
          contentIndent >= 0 && indent > contentIndent
            ? ' '.repeat(indent - contentIndent) + rest
            : ''
        );
        skipLineBreak(state);
        continue;
      }

      if (contentIndent < 0) {
        if (indent <= parentIndent) {
          restoreCursor(state, lineCursor);
          break;
        }
        contentIndent = indent;
      }
      if (indent < contentIndent) {
        if (indent > parentIndent && !rest.startsWith('#')) {
          throwLexError(state, 'YAML-L002', {}, at);
        }
        restoreCursor(state, lineCursor);
        break;
      }

      contentStart ??= at;
      lines.push(' '.repeat(indent - contentIndent) + rest);
      skipLineBreak(state);
    }
    return foldBlockLines(lines, header.folded, header.chomping);
  });

  emit(
    state,
    TOKEN_TYPES.STRING,
    value,
    contentStart ?? fallbackStart,
    contentStartPos
  );
}

// ============================================================
// NODE PROPERTIES
// ============================================================

function isNameEnd(state: LexerState, flow: boolean): boolean {
  const ch = peek(state);
  if (isSeparator(ch)) return true;
  if (flow && isFlowIndicator(ch)) return true;
  return ch === ':' && isSeparator(peek(state, 1));
}

/** `&name` / `*name`: the indicator token, then the name as a STRING */
export function readProperty(
  state: LexerState,
  type: typeof TOKEN_TYPES.ANCHOR | typeof TOKEN_TYPES.ALIAS
): void {
  readIndicator(state, type, 1);

  const flow = inFlow(state);
  const start = currentPosition(state);
  const startPos = state.pos;
  while (!isNameEnd(state, flow)) advance(state);
  if (state.pos > startPos) {
    const name = state.source.slice(startPos, state.pos);
    emit(state, TOKEN_TYPES.STRING, name, start, startPos);
  }
}

export function readTag(state: LexerState): void {
  const start = currentPosition(state);
  const startPos = state.pos;
  const flow = inFlow(state);

  if (peekString(state, 2) === '!<') {
    while (!isSeparator(peek(state)) && peek(state) !== '>') advance(state);
    if (peek(state) === '>') advance(state);
  } else {
    while (!isSeparator(peek(state)) && !(flow && isFlowIndicator(peek(state)))) {
      advance(state);
    }
  }

  const tag = state.source.slice(startPos, state.pos);
  emit(state, TOKEN_TYPES.TAG, tag, start, startPos);
}

// ============================================================
// DIRECTIVES
// ============================================================

/** `%NAME params...`: the indicator, then the rest of the line as a STRING */
export function readDirective(state: LexerState): void {
  readIndicator(state, TOKEN_TYPES.DIRECTIVE, 1);

  const start = currentPosition(state);
  const startPos = state.pos;
  while (
    !isAtEnd(state) &&
    !isBreak(peek(state)) &&
    !(peek(state) === '#' && isBlank(state.source[state.pos - 1] ?? ''))
  ) {
    advance(state);
  }
  const end = trimmedEnd(state, startPos);
  rewindTo(state, end);
  if (end > startPos) {
    const text = state.source.slice(startPos, end);
    emit(state, TOKEN_TYPES.STRING, text, start, startPos);
  }
}
