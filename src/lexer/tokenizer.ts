/**
 * Tokenizer
 * Main tokenization loop
 */

import { TOKEN_TYPES, isQuotedType } from '../token-types.js';
import { throwLexError } from './errors.js';
import {
  isBlank,
  isBreak,
  isFlowIndicator,
  isSeparator,
} from './helpers.js';
import { BufferPool } from './pool.js';
import {
  readBlockScalar,
  readComment,
  readDirective,
  readIndicator,
  readPlain,
  readProperty,
  readQuoted,
  readTag,
} from './readers.js';
import {
  advance,
  createLexerState,
  currentLocation,
  currentPosition,
  inFlow,
  isAtEnd,
  type LexerState,
  peek,
  peekString,
} from './state.js';
import type { TokenStream } from './stream.js';

export interface TokenizeOptions {
  /** Buffers for scalar accumulation; a fresh pool is used when omitted */
  readonly pool?: BufferPool | undefined;
}

// ============================================================
// SEPARATION
// ============================================================

/** Tabs may separate tokens but never indent block content */
function checkIndentation(state: LexerState): void {
  if (inFlow(state)) return;

  let i = state.pos;
  let tabAt = -1;
  while (isBlank(state.source[i] ?? '')) {
    if (state.source[i] === '\t' && tabAt < 0) tabAt = i;
    i++;
  }
  const next = state.source[i] ?? '';
  if (tabAt < 0 || next === '' || isBreak(next) || next === '#') return;

  while (state.pos < tabAt) advance(state);
  throwLexError(state, 'YAML-L004', {}, currentPosition(state));
}

/** Skip blanks and line breaks; they become part of the next origin */
function skipSeparation(state: LexerState): void {
  while (!isAtEnd(state)) {
    if (state.pos === state.lineStartPos) checkIndentation(state);
    const ch = peek(state);
    if (!isBlank(ch) && !isBreak(ch)) return;
    advance(state);
  }
}

// ============================================================
// INDICATORS
// ============================================================

function isMappingValue(state: LexerState): boolean {
  const next = peek(state, 1);
  if (isSeparator(next)) return true;
  if (inFlow(state) && isFlowIndicator(next)) return true;

  // JSON-like `"key":value` directly after a quoted scalar
  const prev = state.stream.last;
  return (
    prev !== undefined &&
    isQuotedType(prev.type) &&
    prev.end.offset === state.pos
  );
}

function isMergeKey(state: LexerState): boolean {
  if (peekString(state, 2) !== '<<') return false;
  let i = state.pos + 2;
  while (isBlank(state.source[i] ?? '')) i++;
  const next = state.source[i + 1] ?? '';
  return (
    state.source[i] === ':' &&
    (isSeparator(next) || (inFlow(state) && isFlowIndicator(next)))
  );
}

function closeFlow(state: LexerState, open: string): void {
  if (state.flowStack.at(-1) === open) state.flowStack.pop();
}

// ============================================================
// TOKEN DISPATCH
// ============================================================

function scanToken(state: LexerState): void {
  const ch = peek(state);
  const next = peek(state, 1);
  const flow = inFlow(state);

  if (ch === '#' && isSeparator(state.source[state.pos - 1] ?? '')) {
    readComment(state);
    return;
  }

  if (state.pos === state.lineStartPos && !flow) {
    const marker = peekString(state, 3);
    if ((marker === '---' || marker === '...') && isSeparator(peek(state, 3))) {
      const type =
        marker === '---' ? TOKEN_TYPES.DOCUMENT_HEADER : TOKEN_TYPES.DOCUMENT_END;
      readIndicator(state, type, 3);
      return;
    }
    if (ch === '%') {
      readDirective(state);
      return;
    }
  }

  switch (ch) {
    case '-':
      if (!flow && isSeparator(next)) {
        readIndicator(state, TOKEN_TYPES.SEQUENCE_ENTRY, 1);
        return;
      }
      break;
    case '?':
      if (!flow && isSeparator(next)) {
        readIndicator(state, TOKEN_TYPES.MAPPING_KEY, 1);
        return;
      }
      break;
    case ':':
      if (isMappingValue(state)) {
        readIndicator(state, TOKEN_TYPES.MAPPING_VALUE, 1);
        return;
      }
      break;
    case '{':
      state.flowStack.push('{');
      readIndicator(state, TOKEN_TYPES.MAPPING_START, 1);
      return;
    case '[':
      state.flowStack.push('[');
      readIndicator(state, TOKEN_TYPES.SEQUENCE_START, 1);
      return;
    case '}':
      closeFlow(state, '{');
      readIndicator(state, TOKEN_TYPES.MAPPING_END, 1);
      return;
    case ']':
      closeFlow(state, '[');
      readIndicator(state, TOKEN_TYPES.SEQUENCE_END, 1);
      return;
    case ',':
      if (flow) {
        readIndicator(state, TOKEN_TYPES.COLLECT_ENTRY, 1);
        return;
      }
      break;
    case '&':
      readProperty(state, TOKEN_TYPES.ANCHOR);
      return;
    case '*':
      readProperty(state, TOKEN_TYPES.ALIAS);
      return;
    case '!':
      readTag(state);
      return;
    case '|':
    case '>':
      if (!flow) {
        readBlockScalar(state);
        return;
      }
      break;
    case '"':
    case "'":
      readQuoted(state);
      return;
    case '@':
    case '`':
      throwLexError(state, 'YAML-L005', { char: ch }, currentPosition(state));
    case '<':
      if (isMergeKey(state)) {
        readIndicator(state, TOKEN_TYPES.MERGE_KEY, 2);
        return;
      }
      break;
    default:
      break;
  }

  readPlain(state);
}

// ============================================================
// ENTRY POINT
// ============================================================

/** Whitespace after the last token joins its origin */
function finish(state: LexerState): void {
  const trailing = state.source.slice(state.pendingStart);
  const last = state.stream.last;

  if (!last) {
    if (state.source.length > 0) {
      state.stream.append({
        type: TOKEN_TYPES.SPACE,
        value: '',
        text: state.source,
        origin: state.source,
        position: { line: 1, column: 1, offset: 0, indentNum: 0, indentLevel: 0 },
        end: currentLocation(state),
      });
    }
    return;
  }

  if (trailing !== '') {
    state.stream.replace(last, { ...last, origin: last.origin + trailing });
  }
  state.pendingStart = state.pos;
}

/**
 * Scan YAML source into a token stream.
 * Concatenating every token's origin reproduces `source` exactly.
 *
 * @throws {LexicalError} on unterminated quotes, bad block scalar
 *   indentation or headers, tabs used as indentation and reserved characters
 */
export function tokenize(
  source: string,
  options: TokenizeOptions = {}
): TokenStream {
  const state = createLexerState(source, options.pool ?? new BufferPool());

  skipSeparation(state);
  while (!isAtEnd(state)) {
    scanToken(state);
    skipSeparation(state);
  }
  finish(state);

  return state.stream;
}
