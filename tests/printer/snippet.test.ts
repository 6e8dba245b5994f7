/**
 * Error Snippet Tests
 */

import { describe, expect, it } from 'vitest';

import {
  colorize,
  formatError,
  printErrorSnippet,
  tokenize,
  wrapError,
} from '../../src/index.js';
import { parseError } from '../helpers/yaml.js';

describe('printErrorSnippet', () => {
  it('marks the token column below its line', () => {
    const stream = tokenize('a: 1\nb: 2\nc: 3\n');
    const token = stream.toArray()[3];
    if (!token) throw new Error('expected a token');

    expect(printErrorSnippet(stream, token)).toBe(
      [
        '   1 | a: 1',
        '>  2 | b: 2',
        '       ^',
        '   3 | c: 3',
        '   4 | ',
      ].join('\n')
    );
  });

  it('marks a multi-line token on its first line', () => {
    const stream = tokenize('a: "x\n  y"\nb: 1\n');
    const token = stream.toArray()[2];
    if (!token) throw new Error('expected a token');

    expect(printErrorSnippet(stream, token)).toBe(
      [
        '>  1 | a: "x',
        '          ^',
        '   2 |   y"',
        '   3 | b: 1',
        '   4 | ',
      ].join('\n')
    );
  });

  it('limits the window with contextLines', () => {
    const stream = tokenize('a: 1\nb: 2\nc: 3\n');
    const token = stream.toArray()[5];
    if (!token) throw new Error('expected a token');

    expect(printErrorSnippet(stream, token, { contextLines: 0 })).toBe(
      ['>  2 | b: 2', '          ^'].join('\n')
    );
  });

  it('colors the caret', () => {
    const stream = tokenize('a');
    const token = stream.first;
    if (!token) throw new Error('expected a token');

    expect(printErrorSnippet(stream, token, { color: true })).toBe(
      `>  1 | ${colorize('a', 'string')}\n       ${colorize('^', 'error')}`
    );
  });
});

describe('error formatting', () => {
  it('appends the source window to the message', () => {
    expect(parseError('a: 1\na: 2').format()).toBe(
      [
        '[2:1] mapping key "a" already defined at [1:1]',
        '   1 | a: 1',
        '>  2 | a: 2',
        '       ^',
      ].join('\n')
    );
  });

  it('returns only the message without source', () => {
    expect(parseError('a: 1\na: 2').format({ source: false })).toBe(
      '[2:1] mapping key "a" already defined at [1:1]'
    );
  });

  it('renders the syntax error under a wrapper', () => {
    const wrapped = wrapError(parseError('a: [1'), 'could not load config');

    expect(formatError(wrapped, { source: false })).toBe(
      "[1:4] sequence end token ']' not found"
    );
    expect(formatError(new Error('plain'))).toBe('plain');
    expect(formatError('text')).toBe('text');
  });
});
