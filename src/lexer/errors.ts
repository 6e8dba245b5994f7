/**
 * Lexer Errors
 */

import { LexicalError } from '../error-classes.js';
import { ERROR_REGISTRY, renderMessage } from '../error-registry.js';
import type { Position } from '../source-location.js';
import { TOKEN_TYPES } from '../token-types.js';
import type { LexerState } from './state.js';
import { advance, currentLocation, isAtEnd } from './state.js';

/**
 * Raise a LexicalError at `at`. The unscanned remainder of the input is
 * appended as an INVALID token so the partial stream still covers the whole
 * source and the error can quote it.
 */
export function throwLexError(
  state: LexerState,
  errorId: string,
  context: Record<string, unknown>,
  at: Position
): never {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }

  const origin = state.source.slice(state.pendingStart);
  const text = origin.replace(/^\s+/, '');
  while (!isAtEnd(state)) advance(state);
  const token = state.stream.append({
    type: TOKEN_TYPES.INVALID,
    value: text,
    text,
    origin,
    position: at,
    end: currentLocation(state),
  });
  state.pendingStart = state.pos;

  throw new LexicalError(
    errorId,
    renderMessage(definition.messageTemplate, context),
    { token, tokens: state.stream },
    context
  );
}
