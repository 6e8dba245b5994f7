/**
 * Token Stream and Buffer Pool Tests
 */

import { describe, expect, it } from 'vitest';

import {
  BufferPool,
  TOKEN_TYPES,
  type TokenInit,
  TokenStream,
  tokenize,
} from '../../src/index.js';
import { withBuffer } from '../../src/lexer/index.js';

function init(value: string): TokenInit {
  return {
    type: TOKEN_TYPES.STRING,
    value,
    text: value,
    origin: value,
    position: { line: 1, column: 1, offset: 0, indentNum: 0, indentLevel: 0 },
    end: { line: 1, column: 1, offset: 0 },
  };
}

function order(stream: TokenStream): string[] {
  return stream.toArray().map((token) => token.value);
}

describe('TokenStream', () => {
  it('assigns ids in arena order', () => {
    const stream = new TokenStream();
    const a = stream.append(init('a'));
    const b = stream.append(init('b'));

    expect([a.id, b.id]).toEqual([0, 1]);
    expect(stream.at(1)).toBe(b);
    expect(stream.at(-1)).toBeUndefined();
  });

  it('inserts after a token without moving existing ids', () => {
    const stream = new TokenStream();
    const a = stream.append(init('a'));
    const c = stream.append(init('c'));
    const b = stream.insertAfter(a, init('b'));

    expect(order(stream)).toEqual(['a', 'b', 'c']);
    expect(b.id).toBe(2);
    expect(c.id).toBe(1);
    expect(stream.next(a)).toBe(b);
    expect(stream.prev(c)).toBe(b);
    expect(stream.size).toBe(3);
  });

  it('moves the tail when inserting after the last token', () => {
    const stream = new TokenStream();
    const a = stream.append(init('a'));
    const b = stream.insertAfter(a, init('b'));

    expect(stream.last).toBe(b);
    expect(stream.next(b)).toBeUndefined();
  });

  it('replaces a token in place', () => {
    const stream = new TokenStream();
    const a = stream.append(init('a'));
    const b = stream.append(init('b'));
    stream.append(init('c'));
    const replacement = stream.replace(b, init('B'));

    expect(order(stream)).toEqual(['a', 'B', 'c']);
    expect(stream.next(a)).toBe(replacement);
    expect(stream.resolve(b)).toBe(replacement);
    expect(stream.resolve(a)).toBe(a);
    expect(stream.size).toBe(3);
  });

  it('follows chains of replacements', () => {
    const stream = new TokenStream();
    const a = stream.append(init('a'));
    const first = stream.replace(a, init('x'));
    const second = stream.replace(first, init('y'));

    expect(stream.resolve(a)).toBe(second);
    expect(stream.first).toBe(second);
    expect(stream.last).toBe(second);
  });

  it('returns an inclusive range in stream order', () => {
    const stream = new TokenStream();
    const a = stream.append(init('a'));
    const c = stream.append(init('c'));
    stream.insertAfter(a, init('b'));
    stream.append(init('d'));

    expect(stream.range(a, c).map((token) => token.value)).toEqual([
      'a',
      'b',
      'c',
    ]);
  });

  it('rejects tokens from another stream', () => {
    const stream = new TokenStream();
    const other = new TokenStream();
    other.append(init('x'));
    const foreign = other.append(init('y'));

    expect(() => stream.insertAfter(foreign, init('z'))).toThrow(RangeError);
  });
});

describe('BufferPool', () => {
  it('hands buffers back empty', () => {
    const pool = new BufferPool();
    const buffer = pool.acquire();
    buffer.push('left over');
    pool.release(buffer);

    expect(pool.acquire()).toEqual([]);
  });

  it('tracks lent and free buffers', () => {
    const pool = new BufferPool();
    const result = withBuffer(pool, (buffer) => {
      expect(pool.inUse).toBe(1);
      buffer.push('a', 'b');
      return buffer.join('');
    });

    expect(result).toBe('ab');
    expect(pool.inUse).toBe(0);
    expect(pool.available).toBe(1);
  });

  it('rejects a release without an acquire', () => {
    expect(() => new BufferPool().release([])).toThrow(RangeError);
  });

  it('is reused across scalars of one scan', () => {
    const pool = new BufferPool();
    tokenize('a: "x"\nb: plain\n', { pool });

    expect(pool.inUse).toBe(0);
    expect(pool.available).toBe(1);
  });

  it('gets every buffer back when a scan fails', () => {
    const pool = new BufferPool();

    expect(() => tokenize('a: "open', { pool })).toThrow();
    expect(pool.inUse).toBe(0);
  });
});
