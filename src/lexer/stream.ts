/**
 * Token Stream
 * Arena of immutable tokens with separate ordering metadata
 */

import type { Token, TokenInit } from '../token-types.js';

const NONE = -1;

/**
 * Tokens live in an append-only arena and keep their id for the life of the
 * stream. Order is tracked by next/prev id arrays, so inserting a synthetic
 * token never moves or rewrites existing tokens.
 */
export class TokenStream implements Iterable<Token> {
  private readonly arena: Token[] = [];
  private readonly nextIds: number[] = [];
  private readonly prevIds: number[] = [];
  /** Successor of each replaced token, NONE otherwise */
  private readonly replacedIds: number[] = [];
  private headId = NONE;
  private tailId = NONE;
  private count = 0;

  /** Tokens reachable in order; replaced tokens are not counted */
  get size(): number {
    return this.count;
  }

  get first(): Token | undefined {
    return this.at(this.headId);
  }

  get last(): Token | undefined {
    return this.at(this.tailId);
  }

  /** Look up a token by its arena id */
  at(id: number): Token | undefined {
    return id === NONE ? undefined : this.arena[id];
  }

  append(init: TokenInit): Token {
    const token = this.allocate(init);
    if (this.tailId === NONE) {
      this.headId = token.id;
    } else {
      this.nextIds[this.tailId] = token.id;
      this.prevIds[token.id] = this.tailId;
    }
    this.tailId = token.id;
    this.count++;
    return token;
  }

  /** Insert a new token directly after an existing one */
  insertAfter(anchor: Token, init: TokenInit): Token {
    this.assertOwned(anchor);
    const token = this.allocate(init);
    const nextId = this.nextIds[anchor.id] ?? NONE;

    this.nextIds[anchor.id] = token.id;
    this.prevIds[token.id] = anchor.id;
    this.nextIds[token.id] = nextId;
    if (nextId === NONE) {
      this.tailId = token.id;
    } else {
      this.prevIds[nextId] = token.id;
    }
    this.count++;
    return token;
  }

  /**
   * Swap a token for a new one at the same place in the ordering.
   * The old token stays in the arena but is no longer reachable by iteration.
   */
  replace(target: Token, init: TokenInit): Token {
    this.assertOwned(target);
    const token = this.allocate(init);
    const prevId = this.prevIds[target.id] ?? NONE;
    const nextId = this.nextIds[target.id] ?? NONE;

    this.prevIds[token.id] = prevId;
    this.nextIds[token.id] = nextId;
    if (prevId === NONE) this.headId = token.id;
    else this.nextIds[prevId] = token.id;
    if (nextId === NONE) this.tailId = token.id;
    else this.prevIds[nextId] = token.id;

    this.nextIds[target.id] = NONE;
    this.prevIds[target.id] = NONE;
    this.replacedIds[target.id] = token.id;
    return token;
  }

  /** The token now standing where `token` was, following replacements */
  resolve(token: Token): Token {
    this.assertOwned(token);
    let current = token;
    for (;;) {
      const successor = this.at(this.replacedIds[current.id] ?? NONE);
      if (successor === undefined) return current;
      current = successor;
    }
  }

  next(token: Token): Token | undefined {
    return this.at(this.nextIds[token.id] ?? NONE);
  }

  prev(token: Token): Token | undefined {
    return this.at(this.prevIds[token.id] ?? NONE);
  }

  /** Tokens from `from` to `to` inclusive, in stream order */
  range(from: Token, to: Token): Token[] {
    const result: Token[] = [];
    let current: Token | undefined = from;
    while (current) {
      result.push(current);
      if (current.id === to.id) break;
      current = this.next(current);
    }
    return result;
  }

  toArray(): Token[] {
    return [...this];
  }

  *[Symbol.iterator](): Iterator<Token> {
    let current = this.first;
    while (current) {
      yield current;
      current = this.next(current);
    }
  }

  private allocate(init: TokenInit): Token {
    const token: Token = { ...init, id: this.arena.length };
    this.arena.push(token);
    this.nextIds.push(NONE);
    this.prevIds.push(NONE);
    this.replacedIds.push(NONE);
    return token;
  }

  private assertOwned(token: Token): void {
    if (this.arena[token.id] !== token) {
      throw new RangeError(`Token ${token.id} does not belong to this stream`);
    }
  }
}
