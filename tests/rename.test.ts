/**
 * Anchor and Alias Rename Tests
 */

import { describe, expect, it } from 'vitest';

import {
  filterNodes,
  parse,
  render,
  renameAlias,
  renameAnchor,
} from '../src/index.js';

function firstOf<T>(nodes: T[]): T {
  const [node] = nodes;
  if (node === undefined) throw new Error('expected a node');
  return node;
}

describe('renameAnchor', () => {
  it('changes the anchor name and the rendered text', () => {
    const file = parse('a: &x 1\nb: *x\n');
    const anchor = firstOf(filterNodes(file, 'Anchor'));
    renameAnchor(file, anchor, 'base');

    expect(anchor.name).toBe('base');
    expect(anchor.nameToken.value).toBe('base');
    expect(render(file)).toBe('a: &base 1\nb: *x\n');
  });

  it('renames together with the aliases', () => {
    const file = parse('a: &x 1\nb: *x\n');
    renameAnchor(file, firstOf(filterNodes(file, 'Anchor')), 'base');
    renameAlias(file, firstOf(filterNodes(file, 'Alias')), 'base');

    expect(render(file)).toBe('a: &base 1\nb: *base\n');
    expect(render(file, { comments: false })).toBe('a: &base 1\nb: *base\n');
  });

  it('keeps the end position in step with the name', () => {
    const file = parse('a: &x 1\n');
    const anchor = firstOf(filterNodes(file, 'Anchor'));
    renameAnchor(file, anchor, 'longer');

    expect(anchor.nameToken.position).toMatchObject({ line: 1, column: 5 });
    expect(anchor.nameToken.end).toMatchObject({ line: 1, column: 11, offset: 10 });
  });

  it('can rename the same anchor twice', () => {
    const file = parse('&x a\n');
    const anchor = firstOf(filterNodes(file, 'Anchor'));
    renameAnchor(file, anchor, 'y');
    renameAnchor(file, anchor, 'z');

    expect(render(file)).toBe('&z a\n');
  });

  it('rejects names with whitespace or flow indicators', () => {
    const file = parse('a: &x 1\n');
    const anchor = firstOf(filterNodes(file, 'Anchor'));

    expect(() => renameAnchor(file, anchor, 'a b')).toThrow(
      "Invalid anchor name: 'a b'"
    );
    expect(() => renameAnchor(file, anchor, '')).toThrow(RangeError);
    expect(() => renameAnchor(file, anchor, 'x,y')).toThrow(RangeError);
    expect(anchor.name).toBe('x');
  });
});

describe('renameAlias', () => {
  it('keeps trailing whitespace of the last token', () => {
    const file = parse('a: &x 1\nb: *x\n\n');
    renameAlias(file, firstOf(filterNodes(file, 'Alias')), 'other');

    expect(render(file)).toBe('a: &x 1\nb: *other\n\n');
  });

  it('updates a rendered document', () => {
    const file = parse('a: &x 1\n---\nb: *x\n');
    const [, second] = file.documents;
    if (!second) throw new Error('expected two documents');
    renameAlias(second, firstOf(filterNodes(second, 'Alias')), 'y');

    expect(render(second)).toBe('\n---\nb: *y\n');
  });
});
