/**
 * Parser Extension: Sequences
 */

import type { SequenceNode, ValueNode } from '../ast-nodes.js';
import type { Token } from '../token-types.js';
import { TOKEN_TYPES } from '../token-types.js';
import type { ParseContext } from './context.js';
import { firstToken, isTokenOf } from './groups.js';
import { base, columnOf, commentGroup, fail, onSameLine } from './helpers.js';
import { Parser } from './parser.js';

declare module './parser.js' {
  interface Parser {
    parseSequence(ctx: ParseContext): SequenceNode;
    parseFlowSequence(ctx: ParseContext): SequenceNode;
  }
}

// ============================================================
// BLOCK SEQUENCES
// ============================================================

/** Entries continue while `-` stays in the first entry's column */
Parser.prototype.parseSequence = function (
  this: Parser,
  ctx: ParseContext
): SequenceNode {
  const { cursor } = ctx;
  const first = cursor.current;
  if (!isTokenOf(first, TOKEN_TYPES.SEQUENCE_ENTRY)) {
    return this.unexpected(ctx, first);
  }

  const column = first.position.column;
  const entries: Token[] = [];
  const values: ValueNode[] = [];
  let head: Token[] = [];

  for (;;) {
    const dash = cursor.current;
    if (!isTokenOf(dash, TOKEN_TYPES.SEQUENCE_ENTRY)) {
      return this.unexpected(ctx, dash);
    }
    cursor.advance();
    entries.push(dash);

    const itemCtx = ctx.withIndex(values.length).withColumn(column);
    const target = cursor.nextNotComment();
    const value =
      target !== undefined &&
      (onSameLine(dash, target) || columnOf(target) > column)
        ? this.parseValue(itemCtx)
        : this.parseNull(itemCtx, dash);
    this.attachHeadComment(itemCtx, value, head);
    values.push(value);

    const next = cursor.nextNotComment();
    if (
      !isTokenOf(next, TOKEN_TYPES.SEQUENCE_ENTRY) ||
      next.position.column !== column
    ) {
      break;
    }
    head = cursor.takeComments();
  }

  const node: SequenceNode = {
    type: 'Sequence',
    ...base(first, ctx.path),
    style: 'block',
    start: null,
    end: null,
    entries,
    values,
  };
  this.attachFootComment(ctx, node, column);
  return node;
};

// ============================================================
// FLOW SEQUENCES
// ============================================================

Parser.prototype.parseFlowSequence = function (
  this: Parser,
  ctx: ParseContext
): SequenceNode {
  const { cursor } = ctx;
  const open = cursor.current;
  if (!isTokenOf(open, TOKEN_TYPES.SEQUENCE_START)) {
    return this.unexpected(ctx, open);
  }
  cursor.advance();

  const flowCtx = ctx.withFlow();
  const values: ValueNode[] = [];
  let head: Token[] = [];
  let close: Token | undefined;

  while (close === undefined) {
    head.push(...cursor.takeComments());
    const element = cursor.current;
    if (element === undefined) fail(ctx, 'YAML-P002', {}, open);
    if (isTokenOf(element, TOKEN_TYPES.SEQUENCE_END)) {
      cursor.advance();
      close = element;
      break;
    }

    // Single-pair mappings such as `[a: 1]` come through parseMap
    const value = this.parseValue(flowCtx.withIndex(values.length));
    this.attachHeadComment(ctx, value, head);
    head = [];
    values.push(value);

    head.push(...cursor.takeComments());
    const separator = cursor.current;
    if (separator === undefined) fail(ctx, 'YAML-P002', {}, open);
    if (isTokenOf(separator, TOKEN_TYPES.COLLECT_ENTRY)) {
      cursor.advance();
    } else if (!isTokenOf(separator, TOKEN_TYPES.SEQUENCE_END)) {
      fail(ctx, 'YAML-P004', { close: ']' }, firstToken(separator));
    }
  }

  const node: SequenceNode = {
    type: 'Sequence',
    ...base(open, ctx.path),
    style: 'flow',
    start: open,
    end: close,
    entries: [],
    values,
  };
  node.footComment = commentGroup(ctx, head, ctx.path);
  this.checkFlowKey(ctx, open, close);
  this.attachLineComment(ctx, node);
  return node;
};
