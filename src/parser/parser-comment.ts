/**
 * Parser Extension: Comment Attachment
 */

import type { MappingNode, SequenceNode, ValueNode } from '../ast-nodes.js';
import { ROOT_PATH } from '../path.js';
import type { Token } from '../token-types.js';
import type { ParseContext } from './context.js';
import { commentGroup, endsWithBlockScalar } from './helpers.js';
import { Parser } from './parser.js';

declare module './parser.js' {
  interface Parser {
    attachHeadComment(
      ctx: ParseContext,
      node: ValueNode,
      comments: readonly Token[]
    ): void;
    attachLineComment(ctx: ParseContext, node: ValueNode): void;
    attachFootComment(
      ctx: ParseContext,
      node: MappingNode | SequenceNode,
      column: number
    ): void;
  }
}

/** Comments above a node; a mapping hands them to its first entry */
Parser.prototype.attachHeadComment = function (
  this: Parser,
  ctx: ParseContext,
  node: ValueNode,
  comments: readonly Token[]
): void {
  if (comments.length === 0) return;
  const target =
    node.type === 'Mapping' && node.values[0] ? node.values[0] : node;
  target.comment = commentGroup(ctx, comments, target.path);
};

/** Comment after the node on the line where it ends */
Parser.prototype.attachLineComment = function (
  this: Parser,
  ctx: ParseContext,
  node: ValueNode
): void {
  const last = ctx.cursor.lastConsumed;
  if (last === undefined || endsWithBlockScalar(node)) return;

  const comment = ctx.cursor.takeLineComment(last.end.line);
  if (comment) {
    node.lineComment = commentGroup(ctx, [comment], node.path);
  }
};

/**
 * Comments below a closed block, at or deeper than its column. A single
 * entry takes them; otherwise the block does. At the end of a document
 * the root block leaves them to the document.
 */
Parser.prototype.attachFootComment = function (
  this: Parser,
  ctx: ParseContext,
  node: MappingNode | SequenceNode,
  column: number
): void {
  const { cursor } = ctx;
  if (ctx.path === ROOT_PATH && cursor.nextNotComment() === undefined) return;

  const comments = cursor.takeComments(
    (comment) => comment.position.column >= column
  );
  if (comments.length === 0) return;

  if (node.type === 'Mapping') {
    const [single] = node.values;
    const target = node.values.length === 1 && single ? single : node;
    target.footComment = commentGroup(ctx, comments, target.path);
    return;
  }

  const [single] = node.values;
  if (node.values.length === 1 && single) {
    single.footComment = commentGroup(ctx, comments, single.path);
    return;
  }
  const last = node.values.at(-1);
  node.footComment = commentGroup(ctx, comments, last?.path ?? node.path);
};
