/**
 * Error Classes and Factory
 * Structured syntax errors with registry-based error codes
 */

import type { TokenStream } from './lexer/stream.js';
import { colorize } from './printer/highlight.js';
import { printErrorSnippet } from './printer/snippet.js';
import type { SourceLocation } from './source-location.js';
import type { Token } from './token-types.js';
import { ERROR_REGISTRY, renderMessage } from './error-registry.js';
import type { ErrorCategory } from './error-registry.js';

// ============================================================
// ERROR DATA
// ============================================================

/** Structured error data for host applications */
export interface YamlErrorData {
  readonly errorId: string;
  /** Message without position */
  readonly message: string;
  readonly location?: SourceLocation | undefined;
  readonly context?: Record<string, unknown> | undefined;
}

/** Token responsible for an error and the stream it was scanned into */
export interface ErrorSource {
  readonly token: Token;
  readonly tokens: TokenStream;
}

export interface ErrorFormatOptions {
  /** Append the source window with a caret (default: true) */
  readonly source?: boolean | undefined;
  /** ANSI colors in the header and snippet (default: false) */
  readonly color?: boolean | undefined;
  /** Lines shown around the error line (default: 3) */
  readonly contextLines?: number | undefined;
}

// ============================================================
// BASE ERROR CLASS
// ============================================================

/**
 * Base error class for all YAML syntax errors.
 * `message` is the short rendering: `[line:column] reason`.
 */
export class YamlSyntaxError extends Error {
  readonly errorId: string;
  readonly reason: string;
  readonly location: SourceLocation | undefined;
  readonly context: Record<string, unknown> | undefined;
  readonly token: Token | undefined;
  readonly tokens: TokenStream | undefined;

  constructor(data: YamlErrorData, source?: ErrorSource) {
    if (!data.errorId) {
      throw new TypeError('errorId is required');
    }
    if (!ERROR_REGISTRY.has(data.errorId)) {
      throw new TypeError(`Unknown error ID: ${data.errorId}`);
    }

    const location = data.location ?? source?.token.position;
    super(
      location
        ? `[${location.line}:${location.column}] ${data.message}`
        : data.message
    );
    this.name = 'YamlSyntaxError';
    this.errorId = data.errorId;
    this.reason = data.message;
    this.location = location;
    this.context = data.context;
    this.token = source?.token;
    this.tokens = source?.tokens;
  }

  /** Get structured error data for custom formatting */
  toData(): YamlErrorData {
    return {
      errorId: this.errorId,
      message: this.reason,
      location: this.location,
      context: this.context,
    };
  }

  /** Extended rendering: message plus the quoted source with a caret */
  format(options: ErrorFormatOptions = {}): string {
    const color = options.color ?? false;
    const header = color ? colorize(this.message, 'error') : this.message;
    if (options.source === false || !this.token || !this.tokens) {
      return header;
    }
    const snippet = printErrorSnippet(this.tokens, this.token, {
      color,
      contextLines: options.contextLines,
    });
    return `${header}\n${snippet}`;
  }
}

// ============================================================
// SPECIALIZED ERROR CLASSES
// ============================================================

function assertCategory(errorId: string, category: ErrorCategory): void {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }
  if (definition.category !== category) {
    throw new TypeError(`Expected ${category} error ID, got: ${errorId}`);
  }
}

/** Scanner errors: quoting, indentation, reserved characters */
export class LexicalError extends YamlSyntaxError {
  constructor(
    errorId: string,
    message: string,
    source: ErrorSource,
    context?: Record<string, unknown>
  ) {
    assertCategory(errorId, 'lexer');
    super({ errorId, message, context }, source);
    this.name = 'LexicalError';
  }
}

/** Parser errors: structure, keys, tags, documents */
export class StructuralError extends YamlSyntaxError {
  constructor(
    errorId: string,
    message: string,
    source: ErrorSource,
    context?: Record<string, unknown>
  ) {
    assertCategory(errorId, 'parse');
    super({ errorId, message, context }, source);
    this.name = 'StructuralError';
  }
}

// ============================================================
// ERROR FACTORY
// ============================================================

/**
 * Create an error from the registry, rendering its message template.
 *
 * @throws TypeError if errorId is not found in registry
 *
 * @example
 * createError('YAML-P005', { key: 'a', location: '[1:1]' }, source)
 * // StructuralError: '[2:1] mapping key "a" already defined at [1:1]'
 */
export function createError(
  errorId: string,
  context: Record<string, unknown>,
  source: ErrorSource
): LexicalError | StructuralError {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }

  const message = renderMessage(definition.messageTemplate, context);
  return definition.category === 'lexer'
    ? new LexicalError(errorId, message, source, context)
    : new StructuralError(errorId, message, source, context);
}

// ============================================================
// WRAPPING
// ============================================================

/** Chain an error under a new message, keeping it as `cause` */
export function wrapError(cause: unknown, message: string): Error {
  return new Error(message, { cause });
}

/** Innermost YamlSyntaxError along an error's `cause` chain */
export function findSyntaxError(error: unknown): YamlSyntaxError | undefined {
  let found: YamlSyntaxError | undefined;
  let current: unknown = error;
  const seen = new Set<unknown>();

  while (current instanceof Error && !seen.has(current)) {
    seen.add(current);
    if (current instanceof YamlSyntaxError) found = current;
    current = current.cause;
  }
  return found;
}

/**
 * Render an error for display. A wrapped syntax error is rendered from its
 * innermost YamlSyntaxError; anything else falls back to its message.
 */
export function formatError(
  error: unknown,
  options: ErrorFormatOptions = {}
): string {
  const syntaxError = findSyntaxError(error);
  if (syntaxError) return syntaxError.format(options);
  return error instanceof Error ? error.message : String(error);
}
