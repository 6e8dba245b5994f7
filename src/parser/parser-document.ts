/**
 * Parser Extension: Documents and Value Dispatch
 */

import type {
  DirectiveNode,
  DocumentNode,
  ValueNode,
} from '../ast-nodes.js';
import { ROOT_PATH } from '../path.js';
import { TOKEN_TYPES, isScalarType } from '../token-types.js';
import type { ParseContext } from './context.js';
import {
  type Element,
  type TokenGroup,
  firstToken,
  isGroup,
} from './groups.js';
import { base, commentGroup, fail } from './helpers.js';
import { Parser } from './parser.js';

declare module './parser.js' {
  interface Parser {
    parseDocument(): DocumentNode;
    parseDirective(group: TokenGroup): DirectiveNode;
    parseValue(ctx: ParseContext): ValueNode;
    unexpected(ctx: ParseContext, element: Element | undefined): never;
  }
}

// ============================================================
// DOCUMENT PARSING
// ============================================================

Parser.prototype.parseDocument = function (this: Parser): DocumentNode {
  const { ctx, doc } = this;
  const directives = doc.directives.map((group) => this.parseDirective(group));

  const body =
    ctx.cursor.nextNotComment() === undefined ? null : this.parseValue(ctx);

  const trailing = ctx.cursor.takeComments();
  if (!ctx.cursor.done) {
    this.unexpected(ctx, ctx.cursor.current);
  }

  const node: DocumentNode = {
    type: 'Document',
    ...base(doc.start ?? doc.first, ROOT_PATH),
    start: doc.start,
    end: doc.end,
    directives,
    body,
    first: doc.first,
    last: doc.last,
    tokens: this.tokens,
  };
  node.comment = commentGroup(ctx, doc.leading, ROOT_PATH);
  node.footComment = commentGroup(ctx, trailing, ROOT_PATH);
  return node;
};

Parser.prototype.parseDirective = function (
  this: Parser,
  group: TokenGroup
): DirectiveNode {
  const indicator = firstToken(group);
  const words = group.elements
    .slice(1)
    .flatMap((element) => firstToken(element).value.split(/[ \t]+/))
    .filter((word) => word !== '');

  return {
    type: 'Directive',
    ...base(indicator, ROOT_PATH),
    name: words[0] ?? '',
    parameters: words.slice(1),
  };
};

// ============================================================
// VALUE DISPATCH
// ============================================================

/**
 * Parse the value at the cursor. Comments in front of it become its head
 * comment; a mapping hands them to its first entry.
 */
Parser.prototype.parseValue = function (
  this: Parser,
  ctx: ParseContext
): ValueNode {
  const { cursor } = ctx;
  const head = cursor.takeComments();
  const element = cursor.current;
  if (element === undefined) return this.unexpected(ctx, element);

  let node: ValueNode;
  if (isGroup(element)) {
    switch (element.type) {
      case 'MapKey':
      case 'MapKeyValue':
        node = this.parseMap(ctx);
        break;
      case 'AnchorName':
        node = this.parseAnchor(ctx);
        break;
      default:
        cursor.advance();
        node = this.parseAtom(ctx, element);
        this.attachLineComment(ctx, node);
        break;
    }
  } else {
    switch (element.type) {
      case TOKEN_TYPES.SEQUENCE_ENTRY:
        node = this.parseSequence(ctx);
        break;
      case TOKEN_TYPES.MAPPING_START:
        node = this.parseFlowMapping(ctx);
        break;
      case TOKEN_TYPES.SEQUENCE_START:
        node = this.parseFlowSequence(ctx);
        break;
      case TOKEN_TYPES.TAG:
        node = this.parseTag(ctx);
        break;
      default:
        if (!isScalarType(element.type)) this.unexpected(ctx, element);
        cursor.advance();
        node = this.parseScalar(ctx, element);
        this.attachLineComment(ctx, node);
        break;
    }
  }

  this.attachHeadComment(ctx, node, head);
  return node;
};

/**
 * Raise the most specific error for an element that cannot start or
 * continue a node here.
 */
Parser.prototype.unexpected = function (
  this: Parser,
  ctx: ParseContext,
  element: Element | undefined
): never {
  if (element !== undefined && isGroup(element)) {
    return fail(ctx, 'YAML-P011', {}, firstToken(element));
  }
  const token = element ?? ctx.cursor.lastConsumed ?? this.doc.last;

  switch (token.type) {
    case TOKEN_TYPES.MAPPING_END:
      return fail(ctx, 'YAML-P003', { open: '{', close: '}' }, token);
    case TOKEN_TYPES.SEQUENCE_END:
      return fail(ctx, 'YAML-P003', { open: '[', close: ']' }, token);
    case TOKEN_TYPES.ANCHOR:
      return fail(ctx, 'YAML-P013', {}, token);
    case TOKEN_TYPES.ALIAS:
      return fail(ctx, 'YAML-P014', {}, token);
    case TOKEN_TYPES.MAPPING_VALUE:
    case TOKEN_TYPES.MAPPING_KEY:
    case TOKEN_TYPES.SEQUENCE_ENTRY:
    case TOKEN_TYPES.COLLECT_ENTRY:
    case TOKEN_TYPES.MERGE_KEY:
      return fail(ctx, 'YAML-P019', { token: `'${token.text}'` }, token);
    default:
      return fail(ctx, 'YAML-P011', {}, token);
  }
};
