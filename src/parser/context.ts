/**
 * Parse Context
 * Shared cursor over grouped elements and the immutable path value
 */

import type { TokenStream } from '../lexer/stream.js';
import { ROOT_PATH, childPath, indexPath } from '../path.js';
import type { Token } from '../token-types.js';
import { TOKEN_TYPES } from '../token-types.js';
import { type Element, isTokenOf, lastToken } from './groups.js';

// ============================================================
// CURSOR
// ============================================================

/** Position within one document's elements; shared by every context */
export class Cursor {
  private index = 0;
  /** Last token of the most recently consumed element */
  lastConsumed: Token | undefined;

  constructor(private readonly elements: readonly Element[]) {}

  get current(): Element | undefined {
    return this.elements[this.index];
  }

  get done(): boolean {
    return this.index >= this.elements.length;
  }

  /** Consume `n` elements and return the first of them */
  advance(n = 1): Element | undefined {
    const first = this.current;
    for (let i = 0; i < n && !this.done; i++) {
      const element = this.elements[this.index];
      if (element !== undefined) this.lastConsumed = lastToken(element);
      this.index++;
    }
    return first;
  }

  isComment(element: Element | undefined = this.current): element is Token {
    return isTokenOf(element, TOKEN_TYPES.COMMENT);
  }

  /** First element at or after the cursor that is not a comment */
  nextNotComment(): Element | undefined {
    for (let i = this.index; i < this.elements.length; i++) {
      const element = this.elements[i];
      if (element !== undefined && !this.isComment(element)) return element;
    }
    return undefined;
  }

  /** Element following the next non-comment element */
  afterNotComment(): Element | undefined {
    let seen = false;
    for (let i = this.index; i < this.elements.length; i++) {
      const element = this.elements[i];
      if (element === undefined || this.isComment(element)) continue;
      if (seen) return element;
      seen = true;
    }
    return undefined;
  }

  /** Consume the comments at the cursor while `accept` holds */
  takeComments(accept: (comment: Token) => boolean = () => true): Token[] {
    const comments: Token[] = [];
    let element = this.current;
    while (this.isComment(element) && accept(element)) {
      comments.push(element);
      this.advance();
      element = this.current;
    }
    return comments;
  }

  /** Consume a comment sitting on `line`, if there is one */
  takeLineComment(line: number): Token | undefined {
    const element = this.current;
    if (this.isComment(element) && element.position.line === line) {
      this.advance();
      return element;
    }
    return undefined;
  }
}

// ============================================================
// PARSE CONTEXT
// ============================================================

export interface ResolvedParseOptions {
  readonly comments: boolean;
  readonly allowDuplicateKeys: boolean;
}

interface SharedState {
  readonly cursor: Cursor;
  readonly stream: TokenStream;
  readonly options: ResolvedParseOptions;
  /** Key paths of the current document and the key token that made them */
  readonly seenPaths: Map<string, Token>;
}

/**
 * Immutable per-node view of the parse. `withChild`, `withIndex`,
 * `withFlow` and `withColumn` return new contexts sharing the cursor,
 * stream and seen-paths map.
 */
export class ParseContext {
  private constructor(
    private readonly shared: SharedState,
    readonly path: string,
    /** Inside `{}` or `[]`, where columns do not matter */
    readonly flow: boolean,
    /** Column a block value on a later line must exceed */
    readonly column: number
  ) {}

  static create(
    elements: readonly Element[],
    stream: TokenStream,
    options: ResolvedParseOptions
  ): ParseContext {
    return new ParseContext(
      { cursor: new Cursor(elements), stream, options, seenPaths: new Map() },
      ROOT_PATH,
      false,
      0
    );
  }

  get cursor(): Cursor {
    return this.shared.cursor;
  }

  get stream(): TokenStream {
    return this.shared.stream;
  }

  get options(): ResolvedParseOptions {
    return this.shared.options;
  }

  withChild(key: string): ParseContext {
    return new ParseContext(
      this.shared,
      childPath(this.path, key),
      this.flow,
      this.column
    );
  }

  withIndex(index: number): ParseContext {
    return new ParseContext(
      this.shared,
      indexPath(this.path, index),
      this.flow,
      this.column
    );
  }

  withFlow(): ParseContext {
    return this.flow
      ? this
      : new ParseContext(this.shared, this.path, true, this.column);
  }

  withColumn(column: number): ParseContext {
    return column === this.column
      ? this
      : new ParseContext(this.shared, this.path, this.flow, column);
  }

  /**
   * Record a key path. Returns the key token that first claimed the path
   * when it was already taken.
   */
  claimPath(key: Token): Token | undefined {
    const previous = this.shared.seenPaths.get(this.path);
    if (previous) return previous;
    this.shared.seenPaths.set(this.path, key);
    return undefined;
  }

  /** Synthesize an empty null token right after `after` in the stream */
  insertNullToken(after: Token): Token {
    return this.stream.insertAfter(after, {
      type: TOKEN_TYPES.NULL,
      value: '',
      text: '',
      origin: '',
      position: {
        ...after.end,
        indentNum: after.position.indentNum,
        indentLevel: after.position.indentLevel,
      },
      end: after.end,
    });
  }
}
