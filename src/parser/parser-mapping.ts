/**
 * Parser Extension: Mappings
 * Block and flow mappings, keys, duplicate detection and value rules
 */

import type {
  MapKeyNode,
  MappingKeyNode,
  MappingNode,
  MappingValueNode,
  ValueNode,
} from '../ast-nodes.js';
import { formatLocation } from '../source-location.js';
import type { Token } from '../token-types.js';
import { TOKEN_TYPES, isScalarType } from '../token-types.js';
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
  columnOf,
  commentGroup,
  fail,
  isFlowBoundary,
  isMapKeyGroup,
  keyTextOf,
  onSameLine,
} from './helpers.js';
import { Parser } from './parser.js';

declare module './parser.js' {
  interface Parser {
    parseMap(ctx: ParseContext): MappingNode;
    parseMapEntry(ctx: ParseContext, keyColumn: number): MappingValueNode;
    parseMapKey(
      ctx: ParseContext,
      group: TokenGroup
    ): { key: MapKeyNode; colon: Token | undefined };
    parseMapValue(
      ctx: ParseContext,
      colon: Token,
      keyColumn: number
    ): ValueNode;
    parseFlowMapping(ctx: ParseContext): MappingNode;
    parseFlowMapEntry(ctx: ParseContext): MappingValueNode;
    checkMergeValue(ctx: ParseContext, value: ValueNode): void;
    checkKeyLines(ctx: ParseContext, element: Element): void;
    checkFlowKey(ctx: ParseContext, open: Token, close: Token): void;
  }
}

// ============================================================
// VALUE RULES
// ============================================================

/** What follows a `key:` when its value is decided */
interface ValueLayout {
  readonly colon: Token;
  readonly keyColumn: number;
  readonly flow: boolean;
  /** First non-comment element after the colon */
  readonly target: Element | undefined;
  /** Non-comment element after the target */
  readonly after: Element | undefined;
}

function laterLine(layout: ValueLayout, element: Element): boolean {
  return !onSameLine(layout.colon, element);
}

function isSequenceEntry(element: Element | undefined): boolean {
  return isTokenOf(element, TOKEN_TYPES.SEQUENCE_ENTRY);
}

function isProperty(element: Element | undefined): boolean {
  return (
    isGroupOf(element, 'AnchorName') || isTokenOf(element, TOKEN_TYPES.TAG)
  );
}

/** `key:` at the end of the document, or before `,` `}` `]` in flow */
function noValue(layout: ValueLayout): boolean {
  return (
    layout.target === undefined ||
    (layout.flow && isFlowBoundary(layout.target))
  );
}

/** A later line starts at the key column, and not with `-` */
function siblingAtKeyColumn(layout: ValueLayout): boolean {
  const { target } = layout;
  return (
    target !== undefined &&
    !layout.flow &&
    laterLine(layout, target) &&
    columnOf(target) === layout.keyColumn &&
    !isSequenceEntry(target) &&
    !isGroupOf(target, 'AnchorName')
  );
}

/** A later line starts left of the key */
function dedentedBelowKey(layout: ValueLayout): boolean {
  const { target } = layout;
  return (
    target !== undefined &&
    !layout.flow &&
    laterLine(layout, target) &&
    columnOf(target) < layout.keyColumn
  );
}

/** `key: &a` with a sibling key on the next line */
function anchorThenSibling(layout: ValueLayout): boolean {
  const { target, after } = layout;
  return (
    !layout.flow &&
    isGroupOf(target, 'AnchorName') &&
    !laterLine(layout, target) &&
    after !== undefined &&
    !onSameLine(target, after) &&
    columnOf(after) === layout.keyColumn &&
    !isSequenceEntry(after)
  );
}

/** `key: &a` followed by a line left of the key */
function anchorThenDedent(layout: ValueLayout): boolean {
  const { target, after } = layout;
  return (
    !layout.flow &&
    isGroupOf(target, 'AnchorName') &&
    !laterLine(layout, target) &&
    after !== undefined &&
    !onSameLine(target, after) &&
    columnOf(after) < layout.keyColumn
  );
}

/** `a: b: c` */
function valueIsKeyOnSameLine(layout: ValueLayout): boolean {
  const { target } = layout;
  return (
    target !== undefined && isMapKeyGroup(target) && !laterLine(layout, target)
  );
}

/** `a:` then `&x` alone at the key column */
function anchorAtKeyColumn(layout: ValueLayout): boolean {
  const { target } = layout;
  return (
    target !== undefined &&
    !layout.flow &&
    isGroupOf(target, 'AnchorName') &&
    laterLine(layout, target) &&
    columnOf(target) === layout.keyColumn
  );
}

/** `a: - b` */
function sequenceOnKeyLine(layout: ValueLayout): boolean {
  const { target } = layout;
  return (
    target !== undefined &&
    isSequenceEntry(target) &&
    !laterLine(layout, target)
  );
}

/**
 * Column a block value on a later line must exceed. A `-` at the key
 * column still belongs to the key (compact sequence), also behind an
 * anchor or tag on the key line.
 */
function valueColumn(layout: ValueLayout): number {
  const { target, after, keyColumn } = layout;
  const entry =
    target !== undefined && isProperty(target) && !laterLine(layout, target)
      ? after
      : target;
  if (
    entry !== undefined &&
    isSequenceEntry(entry) &&
    columnOf(entry) === keyColumn
  ) {
    return keyColumn - 1;
  }
  return keyColumn;
}

// ============================================================
// BLOCK MAPPINGS
// ============================================================

/**
 * Mapping starting at the key group under the cursor. Entries continue
 * while keys sit at the first key's column. In flow context the mapping is
 * a single `key: value` pair inside a sequence.
 */
Parser.prototype.parseMap = function (
  this: Parser,
  ctx: ParseContext
): MappingNode {
  const { cursor } = ctx;
  const first = cursor.current;
  if (first === undefined) return this.unexpected(ctx, first);

  const keyColumn = columnOf(first);
  const values: MappingValueNode[] = [];
  let head: Token[] = [];

  for (;;) {
    const entry = this.parseMapEntry(ctx, keyColumn);
    entry.comment = commentGroup(ctx, head, entry.path);
    values.push(entry);
    if (ctx.flow) break;

    const next = cursor.nextNotComment();
    if (
      next === undefined ||
      !isMapKeyGroup(next) ||
      columnOf(next) !== keyColumn
    ) {
      break;
    }
    head = cursor.takeComments();
  }

  const rest = cursor.nextNotComment();
  if (
    !ctx.flow &&
    rest !== undefined &&
    !isGroup(rest) &&
    isScalarType(rest.type) &&
    columnOf(rest) === keyColumn
  ) {
    fail(ctx, 'YAML-P012', {}, rest);
  }

  const node: MappingNode = {
    type: 'Mapping',
    ...base(firstToken(first), ctx.path),
    style: ctx.flow ? 'flow' : 'block',
    start: null,
    end: null,
    values,
  };
  if (!ctx.flow) this.attachFootComment(ctx, node, keyColumn);
  return node;
};

Parser.prototype.parseMapEntry = function (
  this: Parser,
  ctx: ParseContext,
  keyColumn: number
): MappingValueNode {
  const { cursor } = ctx;
  const element = cursor.current;
  if (!isGroupOf(element, 'MapKey') && !isGroupOf(element, 'MapKeyValue')) {
    return this.unexpected(ctx, element);
  }
  cursor.advance();

  const pair = element.type === 'MapKeyValue';
  const keyGroup = pair ? element.elements[0] : element;
  const inline = pair ? element.elements[1] : undefined;
  if (!isGroupOf(keyGroup, 'MapKey')) return this.unexpected(ctx, element);

  const keyElement = keyGroup.elements.find(
    (member) =>
      !isTokenOf(member, TOKEN_TYPES.MAPPING_KEY) &&
      !isTokenOf(member, TOKEN_TYPES.MAPPING_VALUE)
  );
  const child = ctx.withChild(
    keyElement === undefined ? '' : keyTextOf(keyElement)
  );
  const { key, colon } = this.parseMapKey(child, keyGroup);

  if (!ctx.options.allowDuplicateKeys) {
    const keyToken = firstToken(keyGroup);
    const previous = child.claimPath(keyToken);
    if (previous) {
      fail(
        ctx,
        'YAML-P005',
        {
          key: keyElement === undefined ? '' : keyTextOf(keyElement),
          location: formatLocation(previous.position),
        },
        keyToken
      );
    }
  }

  let value: ValueNode;
  let lineComment: Token | undefined;
  if (inline !== undefined) {
    value = this.parseAtom(child, inline);
    this.attachLineComment(child, value);
  } else if (colon === undefined) {
    value = this.parseNull(child, lastToken(keyGroup));
  } else {
    lineComment = cursor.takeLineComment(colon.position.line);
    value = this.parseMapValue(child, colon, keyColumn);
  }

  const entry: MappingValueNode = {
    type: 'MappingValue',
    ...base(colon ?? firstToken(keyGroup), child.path),
    key,
    value,
  };
  if (lineComment) {
    entry.lineComment = commentGroup(ctx, [lineComment], child.path);
  }
  if (key.type === 'MergeKey') this.checkMergeValue(child, value);
  return entry;
};

/**
 * Key node of a MapKey group. Explicit `? key` keys become MappingKey
 * nodes; their colon may be missing.
 */
Parser.prototype.parseMapKey = function (
  this: Parser,
  ctx: ParseContext,
  group: TokenGroup
): { key: MapKeyNode; colon: Token | undefined } {
  const [head] = group.elements;
  const tail = group.elements.at(-1);
  const colon = isTokenOf(tail, TOKEN_TYPES.MAPPING_VALUE) ? tail : undefined;
  if (head === undefined) return this.unexpected(ctx, head);

  if (isTokenOf(head, TOKEN_TYPES.MAPPING_KEY)) {
    const inner = group.elements[1];
    let value: ValueNode;
    if (inner !== undefined && inner !== colon) {
      if (!isGroupOf(inner, 'Literal') && !isGroupOf(inner, 'Folded')) {
        this.checkKeyLines(ctx, inner);
      }
      value = this.parseAtom(ctx, inner);
    } else {
      const next = ctx.cursor.current;
      if (
        next !== undefined &&
        colon === undefined &&
        !ctx.cursor.isComment(next) &&
        onSameLine(head, next)
      ) {
        fail(ctx, 'YAML-P006', {}, firstToken(next));
      }
      value = this.parseNull(ctx, head);
    }
    const key: MappingKeyNode = {
      type: 'MappingKey',
      ...base(head, ctx.path),
      value,
    };
    return { key, colon };
  }

  if (isTokenOf(head, TOKEN_TYPES.MERGE_KEY)) {
    return { key: { type: 'MergeKey', ...base(head, ctx.path) }, colon };
  }

  this.checkKeyLines(ctx, head);
  return { key: this.parseAtom(ctx, head), colon };
};

/**
 * Decide the value of `key:` from what follows the colon, applying the
 * named value rules in order.
 */
Parser.prototype.parseMapValue = function (
  this: Parser,
  ctx: ParseContext,
  colon: Token,
  keyColumn: number
): ValueNode {
  const { cursor } = ctx;
  const layout: ValueLayout = {
    colon,
    keyColumn,
    flow: ctx.flow,
    target: cursor.nextNotComment(),
    after: cursor.afterNotComment(),
  };
  const { target } = layout;

  if (noValue(layout) || target === undefined) {
    return this.parseNull(ctx, colon);
  }
  if (valueIsKeyOnSameLine(layout)) {
    fail(ctx, 'YAML-P008', {}, lastToken(firstKeyGroup(target)));
  }
  if (sequenceOnKeyLine(layout)) {
    fail(ctx, 'YAML-P009', {}, firstToken(target));
  }
  if (anchorAtKeyColumn(layout)) {
    fail(ctx, 'YAML-P010', {}, firstToken(target));
  }
  if (anchorThenSibling(layout) || anchorThenDedent(layout)) {
    return this.parseAnchor(ctx.withColumn(keyColumn));
  }
  if (siblingAtKeyColumn(layout) || dedentedBelowKey(layout)) {
    return this.parseNull(ctx, colon);
  }
  return this.parseValue(ctx.withColumn(valueColumn(layout)));
};

function firstKeyGroup(element: Element): Element {
  if (!isGroupOf(element, 'MapKeyValue')) return element;
  return element.elements[0] ?? element;
}

// ============================================================
// FLOW MAPPINGS
// ============================================================

Parser.prototype.parseFlowMapping = function (
  this: Parser,
  ctx: ParseContext
): MappingNode {
  const { cursor } = ctx;
  const open = cursor.current;
  if (!isTokenOf(open, TOKEN_TYPES.MAPPING_START)) {
    return this.unexpected(ctx, open);
  }
  cursor.advance();

  const flowCtx = ctx.withFlow();
  const values: MappingValueNode[] = [];
  let head: Token[] = [];
  let close: Token | undefined;

  while (close === undefined) {
    head.push(...cursor.takeComments());
    const element = cursor.current;
    if (element === undefined) fail(ctx, 'YAML-P001', {}, open);
    if (isTokenOf(element, TOKEN_TYPES.MAPPING_END)) {
      cursor.advance();
      close = element;
      break;
    }

    const entry = this.parseFlowMapEntry(flowCtx);
    entry.comment = commentGroup(ctx, head, entry.path);
    head = [];
    values.push(entry);

    head.push(...cursor.takeComments());
    const separator = cursor.current;
    if (separator === undefined) fail(ctx, 'YAML-P001', {}, open);
    if (isTokenOf(separator, TOKEN_TYPES.COLLECT_ENTRY)) {
      cursor.advance();
    } else if (!isTokenOf(separator, TOKEN_TYPES.MAPPING_END)) {
      fail(ctx, 'YAML-P004', { close: '}' }, firstToken(separator));
    }
  }

  const node: MappingNode = {
    type: 'Mapping',
    ...base(open, ctx.path),
    style: 'flow',
    start: open,
    end: close,
    values,
  };
  node.footComment = commentGroup(ctx, head, ctx.path);
  this.checkFlowKey(ctx, open, close);
  this.attachLineComment(ctx, node);
  return node;
};

/** `key: value`, `key:` or a bare `key` inside `{}` */
Parser.prototype.parseFlowMapEntry = function (
  this: Parser,
  ctx: ParseContext
): MappingValueNode {
  const { cursor } = ctx;
  const element = cursor.current;
  if (element === undefined) return this.unexpected(ctx, element);
  if (isMapKeyGroup(element)) {
    return this.parseMapEntry(ctx, columnOf(element));
  }
  if (
    isTokenOf(element, TOKEN_TYPES.MAPPING_START) ||
    isTokenOf(element, TOKEN_TYPES.SEQUENCE_START)
  ) {
    fail(ctx, 'YAML-P006', {}, element);
  }
  if (isFlowBoundary(element)) return this.unexpected(ctx, element);

  cursor.advance();
  const child = ctx.withChild(keyTextOf(element));
  const keyToken = firstToken(element);
  if (!ctx.options.allowDuplicateKeys) {
    const previous = child.claimPath(keyToken);
    if (previous) {
      fail(
        ctx,
        'YAML-P005',
        {
          key: keyTextOf(element),
          location: formatLocation(previous.position),
        },
        keyToken
      );
    }
  }
  const key = this.parseAtom(child, element);
  return {
    type: 'MappingValue',
    ...base(keyToken, child.path),
    key,
    value: this.parseNull(child, lastToken(element)),
  };
};

// ============================================================
// KEY CHECKS
// ============================================================

/** Implicit keys live on one line */
Parser.prototype.checkKeyLines = function (
  this: Parser,
  ctx: ParseContext,
  element: Element
): void {
  const token = lastToken(element);
  if (token.end.line > token.position.line) {
    fail(ctx, 'YAML-P007', {}, firstToken(element));
  }
};

/** A flow collection followed by `:` would be used as a key */
Parser.prototype.checkFlowKey = function (
  this: Parser,
  ctx: ParseContext,
  open: Token,
  close: Token
): void {
  const next = ctx.cursor.current;
  if (
    isTokenOf(next, TOKEN_TYPES.MAPPING_VALUE) &&
    next.position.line === close.end.line
  ) {
    fail(ctx, 'YAML-P006', {}, open);
  }
};

/** `<<` takes an alias or a sequence of aliases */
Parser.prototype.checkMergeValue = function (
  this: Parser,
  ctx: ParseContext,
  value: ValueNode
): void {
  if (value.type === 'Alias') return;
  if (
    value.type === 'Sequence' &&
    value.values.every((entry) => entry.type === 'Alias')
  ) {
    return;
  }
  fail(ctx, 'YAML-P018', {}, value.token);
};
