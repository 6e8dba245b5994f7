/**
 * Visitor Tests
 */

import { describe, expect, it } from 'vitest';

import {
  type ASTNode,
  childrenOf,
  filterNodes,
  parse,
  walk,
} from '../src/index.js';
import { expectType, parseBody } from './helpers/yaml.js';

describe('walk', () => {
  it('visits nodes in document order', () => {
    const types: string[] = [];
    walk(parse('a: 1 # c\n'), {
      enter(node) {
        types.push(node.type);
      },
    });

    expect(types).toEqual([
      'File',
      'Document',
      'Mapping',
      'MappingValue',
      'String',
      'Integer',
      'CommentGroup',
    ]);
  });

  it('calls exit after the children', () => {
    const events: string[] = [];
    walk(parseBody('[x]'), {
      enter(node) {
        events.push(`enter ${node.type}`);
      },
      exit(node) {
        events.push(`exit ${node.type}`);
      },
    });

    expect(events).toEqual([
      'enter Sequence',
      'enter String',
      'exit String',
      'exit Sequence',
    ]);
  });

  it('passes the parent', () => {
    const parents: Array<[string, string | null]> = [];
    walk(parseBody('- a\n'), {
      enter(node: ASTNode, parent: ASTNode | null) {
        parents.push([node.type, parent?.type ?? null]);
      },
    });

    expect(parents).toEqual([
      ['Sequence', null],
      ['String', 'Sequence'],
    ]);
  });
});

describe('childrenOf', () => {
  it('lists the head comment first and foot comments last', () => {
    const map = expectType(
      parseBody('a:\n  # head\n  b: 1\n  # foot\nc: 2\n'),
      'Mapping'
    );
    const inner = expectType(map.values[0]?.value, 'Mapping');
    const entry = inner.values[0];
    if (!entry) throw new Error('expected an entry');

    expect(childrenOf(entry).map((child) => child.type)).toEqual([
      'CommentGroup',
      'String',
      'Integer',
      'CommentGroup',
    ]);
  });

  it('returns nothing for a tag without value', () => {
    const map = expectType(parseBody('a: !!null\n'), 'Mapping');
    const tag = expectType(map.values[0]?.value, 'Tag');

    expect(childrenOf(tag)).toEqual([]);
  });

  it('includes directives of a document', () => {
    const [doc] = parse('%YAML 1.2\n---\na\n').documents;
    if (!doc) throw new Error('expected a document');

    expect(childrenOf(doc).map((child) => child.type)).toEqual([
      'Directive',
      'String',
    ]);
  });
});

describe('filterNodes', () => {
  it('collects nodes of one type', () => {
    const integers = filterNodes(parse('a: [1, 2]\nb: {c: 3}\n'), 'Integer');

    expect(integers.map((node) => node.value)).toEqual([1, 2, 3]);
  });

  it('includes the starting node', () => {
    const seq = parseBody('[1]');

    expect(filterNodes(seq, 'Sequence')).toEqual([seq]);
  });

  it('finds anchors and aliases across documents', () => {
    const file = parse('a: &x 1\n---\nb: *x\n');

    expect(filterNodes(file, 'Anchor').map((node) => node.name)).toEqual(['x']);
    expect(filterNodes(file, 'Alias').map((node) => node.path)).toEqual(['$.b']);
  });
});
