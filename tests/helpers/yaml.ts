/**
 * Test utilities for parser and printer tests
 */

import { expect } from 'vitest';

import {
  type ASTNode,
  type DocumentNode,
  type MapKeyNode,
  type ParseOptions,
  type ValueNode,
  YamlSyntaxError,
  parse,
} from '../../src/index.js';

/** Parse a single-document source and return its Document */
export function parseDocument(
  source: string,
  options: ParseOptions = {}
): DocumentNode {
  const file = parse(source, options);
  expect(file.documents).toHaveLength(1);
  const [doc] = file.documents;
  if (!doc) throw new Error('expected one document');
  return doc;
}

/** Parse a single-document source and return its body */
export function parseBody(source: string, options: ParseOptions = {}): ValueNode {
  const body = parseDocument(source, options).body;
  if (!body) throw new Error('expected a document body');
  return body;
}

/** Run `fn` and return the YamlSyntaxError it throws */
export function catchSyntaxError(fn: () => unknown): YamlSyntaxError {
  try {
    fn();
  } catch (error) {
    if (error instanceof YamlSyntaxError) return error;
    throw error;
  }
  throw new Error('expected a YamlSyntaxError');
}

/** The error thrown while parsing `source` */
export function parseError(source: string): YamlSyntaxError {
  return catchSyntaxError(() => parse(source));
}

/** Narrow a node to one type, failing the test otherwise */
export function expectType<T extends ASTNode['type']>(
  node: ASTNode | null | undefined,
  type: T
): Extract<ASTNode, { type: T }> {
  const isOfType = (
    candidate: ASTNode | null | undefined
  ): candidate is Extract<ASTNode, { type: T }> => candidate?.type === type;

  if (!isOfType(node)) {
    throw new Error(`expected ${type}, got ${node?.type ?? String(node)}`);
  }
  return node;
}

// ============================================================
// PLAIN VALUES
// ============================================================

export type PlainValue =
  | null
  | boolean
  | number
  | bigint
  | string
  | PlainValue[]
  | { [key: string]: PlainValue };

function keyText(key: MapKeyNode): string {
  switch (key.type) {
    case 'MergeKey':
      return '<<';
    case 'MappingKey':
      return String(toPlain(key.value));
    default:
      return String(toPlain(key));
  }
}

/**
 * Convert a tree into plain values for comparison with another parser.
 * Aliases are not resolved.
 */
export function toPlain(node: ValueNode | null): PlainValue {
  if (node === null) return null;
  switch (node.type) {
    case 'Null':
    case 'Bool':
    case 'Integer':
    case 'Float':
    case 'Infinity':
    case 'NaN':
    case 'String':
      return node.value;
    case 'Literal':
      return node.value.value;
    case 'Anchor':
    case 'Tag':
      return toPlain(node.value);
    case 'Alias':
      throw new Error(`alias *${node.name} cannot be converted`);
    case 'Sequence':
      return node.values.map(toPlain);
    case 'Mapping': {
      const result: { [key: string]: PlainValue } = {};
      for (const entry of node.values) {
        result[keyText(entry.key)] = toPlain(entry.value);
      }
      return result;
    }
  }
}
