/**
 * Parser Extension: Scalars and Node Properties
 * Plain and quoted scalars, block scalars, anchors, aliases and tags
 */

import type {
  AliasNode,
  AnchorNode,
  LiteralNode,
  NullNode,
  ScalarNode,
  TagNode,
  ValueNode,
} from '../ast-nodes.js';
import type { Token } from '../token-types.js';
import {
  RESERVED_TAGS,
  TOKEN_TYPES,
  type TagKind,
  isSecondaryTag,
} from '../token-types.js';
import type { ParseContext } from './context.js';
import {
  type Element,
  type TokenGroup,
  firstToken,
  isGroup,
  isGroupOf,
  isTokenOf,
  lastToken,
} from './groups.js';
import {
  base,
  commentGroup,
  fail,
  isMapKeyGroup,
  onSameLine,
  parseBool,
  parseFloatValue,
  parseInteger,
  propertyTakesValue,
} from './helpers.js';
import { Parser } from './parser.js';

declare module './parser.js' {
  interface Parser {
    parseScalar(ctx: ParseContext, token: Token): ScalarNode;
    parseAtom(ctx: ParseContext, element: Element): ValueNode;
    parseLiteral(ctx: ParseContext, group: TokenGroup): LiteralNode;
    parseAlias(ctx: ParseContext, group: TokenGroup): AliasNode;
    parseAnchor(ctx: ParseContext): AnchorNode;
    parseTag(ctx: ParseContext): TagNode;
    parseNull(ctx: ParseContext, after: Token): NullNode;
  }
}

// ============================================================
// SCALARS
// ============================================================

Parser.prototype.parseScalar = function (
  this: Parser,
  ctx: ParseContext,
  token: Token
): ScalarNode {
  const props = base(token, ctx.path);
  switch (token.type) {
    case TOKEN_TYPES.NULL:
      return { type: 'Null', ...props, value: null };
    case TOKEN_TYPES.BOOL:
      return { type: 'Bool', ...props, value: parseBool(token.value) };
    case TOKEN_TYPES.INTEGER:
      return { type: 'Integer', ...props, value: parseInteger(token.value) };
    case TOKEN_TYPES.FLOAT:
      return { type: 'Float', ...props, value: parseFloatValue(token.value) };
    case TOKEN_TYPES.INFINITY:
      return {
        type: 'Infinity',
        ...props,
        value: token.value.startsWith('-') ? -Infinity : Infinity,
      };
    case TOKEN_TYPES.NAN:
      return { type: 'NaN', ...props, value: NaN };
    case TOKEN_TYPES.SINGLE_QUOTE:
      return { type: 'String', ...props, value: token.value, style: 'single' };
    case TOKEN_TYPES.DOUBLE_QUOTE:
      return { type: 'String', ...props, value: token.value, style: 'double' };
    case TOKEN_TYPES.STRING:
      return { type: 'String', ...props, value: token.value, style: 'plain' };
    default:
      return this.unexpected(ctx, token);
  }
};

/** Null node over a synthesized empty token placed after `after` */
Parser.prototype.parseNull = function (
  this: Parser,
  ctx: ParseContext,
  after: Token
): NullNode {
  const token = ctx.insertNullToken(after);
  return { type: 'Null', ...base(token, ctx.path), value: null };
};

/**
 * Parse a self-contained element: a scalar token or a Literal, Folded,
 * Alias, Anchor or ScalarTag group. The cursor is not moved.
 */
Parser.prototype.parseAtom = function (
  this: Parser,
  ctx: ParseContext,
  element: Element
): ValueNode {
  if (!isGroup(element)) return this.parseScalar(ctx, element);

  switch (element.type) {
    case 'Literal':
    case 'Folded':
      return this.parseLiteral(ctx, element);
    case 'Alias':
      return this.parseAlias(ctx, element);
    case 'Anchor': {
      const [name, value] = element.elements;
      if (!isGroupOf(name, 'AnchorName') || value === undefined) {
        return this.unexpected(ctx, element);
      }
      return {
        type: 'Anchor',
        ...base(firstToken(name), ctx.path),
        name: lastToken(name).value,
        nameToken: lastToken(name),
        value: this.parseAtom(ctx, value),
      };
    }
    case 'ScalarTag': {
      const [tag, value] = element.elements;
      if (!isTokenOf(tag, TOKEN_TYPES.TAG) || value === undefined) {
        return this.unexpected(ctx, element);
      }
      return {
        type: 'Tag',
        ...base(tag, ctx.path),
        tag: tag.value,
        value: this.parseAtom(ctx, value),
      };
    }
    default:
      return this.unexpected(ctx, element);
  }
};

// ============================================================
// BLOCK SCALARS
// ============================================================

Parser.prototype.parseLiteral = function (
  this: Parser,
  ctx: ParseContext,
  group: TokenGroup
): LiteralNode {
  const header = firstToken(group);
  const content = lastToken(group);
  const comment = group.elements.length === 3 ? group.elements[1] : undefined;

  const node: LiteralNode = {
    type: 'Literal',
    ...base(header, ctx.path),
    folded: header.type === TOKEN_TYPES.FOLDED,
    value: {
      type: 'String',
      ...base(content, ctx.path),
      value: content.value,
      style: 'block',
    },
  };
  if (isTokenOf(comment, TOKEN_TYPES.COMMENT)) {
    node.lineComment = commentGroup(ctx, [comment], ctx.path);
  }
  return node;
};

// ============================================================
// ANCHORS AND ALIASES
// ============================================================

Parser.prototype.parseAlias = function (
  this: Parser,
  ctx: ParseContext,
  group: TokenGroup
): AliasNode {
  const nameToken = lastToken(group);
  return {
    type: 'Alias',
    ...base(firstToken(group), ctx.path),
    name: nameToken.value,
    nameToken,
  };
};

/**
 * `&name` whose value follows elsewhere: later on the line, indented on the
 * lines below, or nowhere (null).
 */
Parser.prototype.parseAnchor = function (
  this: Parser,
  ctx: ParseContext
): AnchorNode {
  const { cursor } = ctx;
  const group = cursor.current;
  if (!isGroupOf(group, 'AnchorName')) return this.unexpected(ctx, group);
  cursor.advance();

  const nameToken = lastToken(group);
  const target = cursor.nextNotComment();
  const takesValue = propertyTakesValue(ctx, group, target);
  const node: AnchorNode = {
    type: 'Anchor',
    ...base(firstToken(group), ctx.path),
    name: nameToken.value,
    nameToken,
    value: takesValue ? this.parseValue(ctx) : this.parseNull(ctx, nameToken),
  };
  if (!takesValue) this.attachLineComment(ctx, node);
  return node;
};

// ============================================================
// TAGS
// ============================================================

function unwrapAnchor(node: ValueNode | null): ValueNode | null {
  return node?.type === 'Anchor' ? unwrapAnchor(node.value) : node;
}

function matchesKind(kind: TagKind, node: ValueNode | null): boolean {
  const inner = unwrapAnchor(node);
  if (inner?.type === 'Alias') return true;
  switch (kind) {
    case 'map':
      return inner?.type === 'Mapping';
    case 'sequence':
      return inner?.type === 'Sequence';
    case 'scalar':
      return (
        inner === null ||
        !(
          inner.type === 'Mapping' ||
          inner.type === 'Sequence' ||
          inner.type === 'Tag'
        )
      );
  }
}

/**
 * A tag followed by its value. Reserved `!!` tags are checked against the
 * kind of value they describe; custom tags pass through.
 */
Parser.prototype.parseTag = function (
  this: Parser,
  ctx: ParseContext
): TagNode {
  const { cursor } = ctx;
  const tag = cursor.current;
  if (!isTokenOf(tag, TOKEN_TYPES.TAG)) return this.unexpected(ctx, tag);
  cursor.advance();

  const kind = RESERVED_TAGS.get(tag.value);
  if (kind === undefined && isSecondaryTag(tag.value)) {
    fail(ctx, 'YAML-P016', { tag: tag.value }, tag);
  }

  const target = cursor.nextNotComment();
  // A scalar tag on its own line never adopts the collection below it
  const adoptsCollection =
    kind !== 'scalar' ||
    target === undefined ||
    onSameLine(tag, target) ||
    !(isMapKeyGroup(target) || isTokenOf(target, TOKEN_TYPES.SEQUENCE_ENTRY));
  const value =
    adoptsCollection && propertyTakesValue(ctx, tag, target)
      ? this.parseValue(ctx)
      : null;

  if (kind !== undefined && !matchesKind(kind, value)) {
    fail(ctx, 'YAML-P017', { tag: tag.value, expected: kind }, tag);
  }

  const node: TagNode = {
    type: 'Tag',
    ...base(tag, ctx.path),
    tag: tag.value,
    value,
  };
  if (value === null) this.attachLineComment(ctx, node);
  return node;
};
