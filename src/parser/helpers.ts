/**
 * Parser Helpers
 * Node construction, layout predicates and scalar conversion
 * @internal This module contains internal parser utilities
 */

import type { CommentGroupNode, ValueNode } from '../ast-nodes.js';
import { createError } from '../error-classes.js';
import type { Token } from '../token-types.js';
import { TOKEN_TYPES } from '../token-types.js';
import type { ParseContext } from './context.js';
import {
  type Element,
  firstToken,
  isGroup,
  isGroupOf,
  isTokenOf,
  lastToken,
} from './groups.js';

// ============================================================
// NODE CONSTRUCTION
// ============================================================

/** @internal */
export interface NodeBase {
  readonly token: Token;
  readonly path: string;
  comment: CommentGroupNode | null;
  lineComment: CommentGroupNode | null;
  footComment: CommentGroupNode | null;
}

/** @internal */
export function base(token: Token, path: string): NodeBase {
  return { token, path, comment: null, lineComment: null, footComment: null };
}

/**
 * Comment group for attachment, or null when comments are disabled or
 * there is nothing to attach.
 * @internal
 */
export function commentGroup(
  ctx: ParseContext,
  comments: readonly Token[],
  path: string
): CommentGroupNode | null {
  const head = comments[0];
  if (!ctx.options.comments || head === undefined) return null;
  return { type: 'CommentGroup', token: head, path, comments: [...comments] };
}

/** @internal */
export function fail(
  ctx: ParseContext,
  errorId: string,
  context: Record<string, unknown>,
  token: Token
): never {
  throw createError(errorId, context, { token, tokens: ctx.stream });
}

// ============================================================
// LAYOUT PREDICATES
// ============================================================

/** @internal */
export function columnOf(element: Element): number {
  return firstToken(element).position.column;
}

/** @internal */
export function onSameLine(a: Element, b: Element): boolean {
  return lastToken(a).end.line === firstToken(b).position.line;
}

/** @internal */
export function isMapKeyGroup(element: Element | undefined): boolean {
  return isGroupOf(element, 'MapKey') || isGroupOf(element, 'MapKeyValue');
}

/** `,` `}` `]`: nothing more belongs to the current flow entry */
export function isFlowBoundary(element: Element | undefined): boolean {
  return (
    isTokenOf(element, TOKEN_TYPES.COLLECT_ENTRY) ||
    isTokenOf(element, TOKEN_TYPES.MAPPING_END) ||
    isTokenOf(element, TOKEN_TYPES.SEQUENCE_END)
  );
}

/**
 * Whether a node property (anchor or tag) takes the element at `target` as
 * its value. Values on a later line must be indented past `ctx.column`.
 * @internal
 */
export function propertyTakesValue(
  ctx: ParseContext,
  property: Element,
  target: Element | undefined
): target is Element {
  if (target === undefined || isFlowBoundary(target)) return false;
  if (onSameLine(property, target)) return true;
  return ctx.flow || columnOf(target) > ctx.column;
}

/** Block scalar content ends on a later line than anything after it */
export function endsWithBlockScalar(node: ValueNode): boolean {
  switch (node.type) {
    case 'Literal':
      return true;
    case 'Anchor':
      return endsWithBlockScalar(node.value);
    case 'Tag':
      return node.value !== null && endsWithBlockScalar(node.value);
    default:
      return false;
  }
}

// ============================================================
// KEYS
// ============================================================

/** Text a key element contributes to the path */
export function keyTextOf(element: Element): string {
  if (!isGroup(element)) {
    return element.type === TOKEN_TYPES.MERGE_KEY ? '<<' : element.value;
  }
  switch (element.type) {
    case 'Alias':
      return `*${lastToken(element).value}`;
    case 'Anchor':
    case 'ScalarTag': {
      const value = element.elements[1];
      return value === undefined ? '' : keyTextOf(value);
    }
    default:
      return lastToken(element).value;
  }
}

// ============================================================
// SCALAR CONVERSION
// ============================================================

const TRUE_PATTERN = /^(?:true|True|TRUE)$/;
const RADIX_PATTERN = /^0[box]/;

export function parseBool(text: string): boolean {
  return TRUE_PATTERN.test(text);
}

/**
 * Convert an integer literal. Values beyond the safe integer range are
 * returned as bigint.
 *
 * @example
 * parseInteger('0x_ff') // 255
 * parseInteger('-9007199254740993') // -9007199254740993n
 */
export function parseInteger(text: string): number | bigint {
  const cleaned = text.replace(/_/g, '');
  const negative = cleaned.startsWith('-');
  const digits = cleaned.replace(/^[-+]/, '');
  const magnitude = BigInt(
    RADIX_PATTERN.test(digits) && digits.length === 2 ? '0' : digits
  );
  const value = negative ? -magnitude : magnitude;

  if (
    value >= BigInt(Number.MIN_SAFE_INTEGER) &&
    value <= BigInt(Number.MAX_SAFE_INTEGER)
  ) {
    return Number(value);
  }
  return value;
}

export function parseFloatValue(text: string): number {
  return Number(text.replace(/_/g, ''));
}
