/**
 * Node Path Tests
 */

import { describe, expect, it } from 'vitest';

import {
  PathBuilder,
  ROOT_PATH,
  childPath,
  filterNodes,
  indexPath,
  parse,
  quotePathKey,
} from '../src/index.js';

describe('quotePathKey', () => {
  it('leaves ordinary keys alone', () => {
    expect(quotePathKey('name')).toBe('name');
    expect(quotePathKey('with space')).toBe('with space');
  });

  it('quotes keys holding path characters', () => {
    expect(quotePathKey('a.b')).toBe("'a.b'");
    expect(quotePathKey('$ref')).toBe("'$ref'");
    expect(quotePathKey('x[0]')).toBe("'x[0]'");
  });

  it('doubles quotes inside quoted keys', () => {
    expect(quotePathKey("it's.here")).toBe("'it''s.here'");
  });
});

describe('path segments', () => {
  it('appends keys and indexes', () => {
    expect(childPath(ROOT_PATH, 'a')).toBe('$.a');
    expect(indexPath('$.a', 2)).toBe('$.a[2]');
  });
});

describe('PathBuilder', () => {
  it('builds paths step by step', () => {
    expect(PathBuilder.root().child('a').index(1).child('b.c').build()).toBe(
      "$.a[1].'b.c'"
    );
  });

  it('does not change the builder it extends', () => {
    const root = PathBuilder.root();
    root.child('a');

    expect(root.build()).toBe('$');
  });

  it('rejects negative and fractional indexes', () => {
    expect(() => PathBuilder.root().index(-1)).toThrow(RangeError);
    expect(() => PathBuilder.root().index(1.5)).toThrow(
      'Invalid sequence index: 1.5'
    );
  });
});

describe('parsed paths', () => {
  it('match the builder', () => {
    const [value] = filterNodes(parse('a:\n  - b: {c.d: 1}\n'), 'Integer');

    expect(value?.path).toBe(
      PathBuilder.root().child('a').index(0).child('b').child('c.d').build()
    );
  });
});
