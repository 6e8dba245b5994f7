/**
 * Parser Tests: Comment Attachment
 */

import { describe, expect, it } from 'vitest';

import { type CommentGroupNode, commentText } from '../../src/index.js';
import { expectType, parseBody } from '../helpers/yaml.js';

function text(group: CommentGroupNode | null | undefined): string | null {
  return group ? commentText(group) : null;
}

describe('head comments', () => {
  it('gives comments above a mapping to its first entry', () => {
    const map = expectType(parseBody('# top\na: 1\n'), 'Mapping');

    expect(text(map.values[0]?.comment)).toBe('top');
    expect(map.comment).toBeNull();
  });

  it('joins consecutive comment lines', () => {
    const map = expectType(parseBody('# one\n# two\na: 1\n'), 'Mapping');

    expect(text(map.values[0]?.comment)).toBe('one\ntwo');
  });

  it('gives comments between entries to the next entry', () => {
    const map = expectType(parseBody('a: 1\n# about b\nb: 2\n'), 'Mapping');

    expect(text(map.values[1]?.comment)).toBe('about b');
    expect(map.values[1]?.comment?.path).toBe('$.b');
  });

  it('gives comments between sequence entries to the next value', () => {
    const seq = expectType(parseBody('- a\n# about b\n- b\n'), 'Sequence');

    expect(text(seq.values[1]?.comment)).toBe('about b');
  });
});

describe('line comments', () => {
  it('attaches a trailing comment to the value', () => {
    const map = expectType(parseBody('a: 1 # c\nb: 2\n'), 'Mapping');

    expect(text(map.values[0]?.value.lineComment)).toBe('c');
    expect(map.values[0]?.value.lineComment?.path).toBe('$.a');
    expect(map.values[1]?.value.lineComment).toBeNull();
  });

  it('attaches a comment after a bare key to the entry', () => {
    const map = expectType(parseBody('a: # note\n  b: 1\n'), 'Mapping');

    expect(text(map.values[0]?.lineComment)).toBe('note');
    expect(map.values[0]?.value.type).toBe('Mapping');
  });

  it('attaches a comment after a flow collection to the collection', () => {
    const map = expectType(parseBody('a: {x: 1} # c\n'), 'Mapping');

    expect(text(map.values[0]?.value.lineComment)).toBe('c');
  });

  it('attaches a comment on a block scalar header to the block scalar', () => {
    const map = expectType(parseBody('a: | # note\n  x\n'), 'Mapping');
    const literal = expectType(map.values[0]?.value, 'Literal');

    expect(text(literal.lineComment)).toBe('note');
    expect(literal.value.value).toBe('x\n');
  });
});

describe('foot comments', () => {
  it('gives comments below a sequence to the sequence', () => {
    const map = expectType(
      parseBody('a:\n  - x\n  - y\n  # foot\nb: 1\n'),
      'Mapping'
    );
    const seq = expectType(map.values[0]?.value, 'Sequence');

    expect(text(seq.footComment)).toBe('foot');
    expect(seq.footComment?.path).toBe('$.a[1]');
  });

  it('gives comments below a single entry to that entry', () => {
    const map = expectType(
      parseBody('a:\n  b: 1\n  # foot\nc: 2\n'),
      'Mapping'
    );
    const inner = expectType(map.values[0]?.value, 'Mapping');

    expect(text(inner.values[0]?.footComment)).toBe('foot');
    expect(inner.values[0]?.footComment?.path).toBe('$.a.b');
    expect(inner.footComment).toBeNull();
  });

  it('leaves comments left of a block to the enclosing entries', () => {
    const map = expectType(
      parseBody('a:\n  b: 1\n# about c\nc: 2\n'),
      'Mapping'
    );
    const inner = expectType(map.values[0]?.value, 'Mapping');

    expect(inner.values[0]?.footComment).toBeNull();
    expect(text(map.values[1]?.comment)).toBe('about c');
  });
});

describe('comments option', () => {
  it('attaches nothing when disabled', () => {
    const map = expectType(
      parseBody('# top\na: 1 # c\n', { comments: false }),
      'Mapping'
    );

    expect(map.values[0]?.comment).toBeNull();
    expect(map.values[0]?.value.lineComment).toBeNull();
  });
});
