/**
 * AST Accessor Tests
 */

import { describe, expect, it } from 'vitest';

import {
  commentText,
  nodeComment,
  nodePath,
  nodeToken,
  nodeType,
  parse,
} from '../src/index.js';
import { expectType, parseBody } from './helpers/yaml.js';

describe('node accessors', () => {
  it('answer type, token and path of a value', () => {
    const map = expectType(parseBody('a: [x]\n'), 'Mapping');
    const seq = expectType(map.values[0]?.value, 'Sequence');

    expect(nodeType(seq)).toBe('Sequence');
    expect(nodeToken(seq)?.text).toBe('[');
    expect(nodePath(seq)).toBe('$.a');
  });

  it('answer for a file through its stream', () => {
    const file = parse('a: 1\n');

    expect(nodeType(file)).toBe('File');
    expect(nodeToken(file)?.value).toBe('a');
    expect(nodePath(file)).toBe('$');
    expect(nodeComment(file)).toBeNull();
  });

  it('return no token for an empty file', () => {
    expect(nodeToken(parse(''))).toBeUndefined();
  });

  it('return the head comment', () => {
    const map = expectType(parseBody('# about a\na: 1\n'), 'Mapping');
    const entry = map.values[0];
    if (!entry) throw new Error('expected an entry');
    const comment = nodeComment(entry);

    expect(comment && commentText(comment)).toBe('about a');
    expect(comment && nodeComment(comment)).toBeNull();
  });
});
