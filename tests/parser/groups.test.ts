/**
 * Token Grouper Tests
 */

import { describe, expect, it } from 'vitest';

import {
  type Element,
  type TokenGroup,
  groupTokens,
  tokenize,
} from '../../src/index.js';

function describeElement(element: Element): unknown {
  if ('kind' in element) {
    return { [element.type]: element.elements.map(describeElement) };
  }
  return element.value;
}

function shape(source: string): unknown[] {
  const [doc] = groupTokens(tokenize(source));
  return doc ? doc.elements.map(describeElement) : [];
}

function firstGroup(source: string): TokenGroup {
  const [doc] = groupTokens(tokenize(source));
  const element = doc?.elements[0];
  if (element === undefined || !('kind' in element)) {
    throw new Error('expected a group');
  }
  return element;
}

describe('groupTokens', () => {
  describe('elements', () => {
    it('pairs a key with its inline value', () => {
      expect(shape('a: 1\n')).toEqual([
        { MapKeyValue: [{ MapKey: ['a', ':'] }, '1'] },
      ]);
    });

    it('leaves a key alone when its value is on the next line', () => {
      expect(shape('a:\n  b\n')).toEqual([{ MapKey: ['a', ':'] }, 'b']);
    });

    it('groups anchors, aliases and scalar tags', () => {
      expect(shape('- &x !!str 1\n- *x\n')).toEqual([
        '-',
        { Anchor: [{ AnchorName: ['&', 'x'] }, { ScalarTag: ['!!str', '1'] }] },
        '-',
        { Alias: ['*', 'x'] },
      ]);
    });

    it('groups a block scalar with its header comment', () => {
      const group = firstGroup('| # c\n  text\n');

      expect(group.type).toBe('Literal');
      expect(group.elements).toHaveLength(3);
    });

    it('groups an explicit key', () => {
      expect(shape('? k\n: v\n')).toEqual([
        { MapKeyValue: [{ MapKey: ['?', 'k', ':'] }, 'v'] },
      ]);
    });

    it('groups an explicit key written on the next line', () => {
      expect(shape('?\n  a\n: b\n')).toEqual([
        { MapKeyValue: [{ MapKey: ['?', 'a', ':'] }, 'b'] },
      ]);
    });

    it('leaves a nested pair after the key indicator out of the key', () => {
      expect(shape('?\n  a: 1\n')).toEqual([
        { MapKey: ['?'] },
        { MapKeyValue: [{ MapKey: ['a', ':'] }, '1'] },
      ]);
    });

    it('groups a block scalar as an explicit key', () => {
      expect(shape('? |\n  k\n: v\n')).toEqual([
        {
          MapKeyValue: [
            { MapKey: ['?', { Literal: ['|', 'k\n'] }, ':'] },
            'v',
          ],
        },
      ]);
    });

    it('leaves collection tags ungrouped', () => {
      expect(shape('!!seq [1]')).toEqual(['!!seq', '[', '1', ']']);
    });
  });

  describe('documents', () => {
    it('returns one entry per document', () => {
      const docs = groupTokens(tokenize('a: 1\n---\nb: 2\n...\n'));

      expect(docs.map((doc) => [doc.start?.text ?? null, doc.end?.text ?? null])).toEqual([
        [null, null],
        ['---', '...'],
      ]);
    });

    it('collects directives before the marker', () => {
      const [doc] = groupTokens(tokenize('%YAML 1.2\n---\n'));

      expect(doc?.directives.map((group) => group.type)).toEqual(['Directive']);
      expect(doc?.elements).toEqual([]);
    });

    it('keeps comments before the marker apart', () => {
      const [doc] = groupTokens(tokenize('# c\n---\na\n'));

      expect(doc?.leading.map((token) => token.value)).toEqual(['c']);
      expect(doc?.elements.map(describeElement)).toEqual(['a']);
    });

    it('skips whitespace-only input', () => {
      expect(groupTokens(tokenize('   \n'))).toEqual([]);
    });
  });
});
