/**
 * Token Grouper
 * Splits the stream into documents and classifies runs of tokens
 */

import { createError } from '../error-classes.js';
import type { TokenStream } from '../lexer/stream.js';
import type { Token } from '../token-types.js';
import { RESERVED_TAGS, TOKEN_TYPES, isScalarType } from '../token-types.js';

// ============================================================
// GROUP TYPES
// ============================================================

export type GroupType =
  | 'MapKey'
  | 'MapKeyValue'
  | 'Anchor'
  | 'AnchorName'
  | 'Alias'
  | 'Literal'
  | 'Folded'
  | 'ScalarTag'
  | 'Directive';

/** Contiguous run of tokens or nested groups; never overlaps another group */
export interface TokenGroup {
  readonly kind: 'group';
  readonly type: GroupType;
  readonly elements: readonly Element[];
}

export type Element = Token | TokenGroup;

export function isGroup(element: Element): element is TokenGroup {
  return 'kind' in element;
}

export function isGroupOf(
  element: Element | undefined,
  type: GroupType
): element is TokenGroup {
  return element !== undefined && isGroup(element) && element.type === type;
}

export function isTokenOf(
  element: Element | undefined,
  type: Token['type']
): element is Token {
  return element !== undefined && !isGroup(element) && element.type === type;
}

export function firstToken(element: Element): Token {
  let current = element;
  while (isGroup(current)) {
    const head = current.elements[0];
    if (!head) throw new RangeError(`Empty ${current.type} group`);
    current = head;
  }
  return current;
}

export function lastToken(element: Element): Token {
  let current = element;
  while (isGroup(current)) {
    const tail = current.elements.at(-1);
    if (!tail) throw new RangeError(`Empty ${current.type} group`);
    current = tail;
  }
  return current;
}

function group(type: GroupType, elements: readonly Element[]): TokenGroup {
  return { kind: 'group', type, elements };
}

// ============================================================
// DOCUMENT SPLITTING
// ============================================================

/** Tokens belonging to one document, before structural parsing */
export interface DocumentTokens {
  /** Directive groups preceding the `---` marker */
  readonly directives: readonly TokenGroup[];
  /** Comments written before the `---` marker */
  readonly leading: readonly Token[];
  readonly start: Token | null;
  readonly end: Token | null;
  /** Grouped body elements, comments included */
  readonly elements: readonly Element[];
  readonly first: Token;
  readonly last: Token;
}

interface PendingDocument {
  directives: TokenGroup[];
  leading: Token[];
  start: Token | null;
  end: Token | null;
  body: Token[];
  first: Token | null;
  last: Token | null;
}

function createPending(): PendingDocument {
  return {
    directives: [],
    leading: [],
    start: null,
    end: null,
    body: [],
    first: null,
    last: null,
  };
}

function hasContent(doc: PendingDocument): boolean {
  return (
    doc.start !== null ||
    doc.end !== null ||
    doc.body.some((token) => token.type !== TOKEN_TYPES.COMMENT)
  );
}

function isEmpty(doc: PendingDocument): boolean {
  return doc.first === null;
}

/**
 * Split a stream into documents and group each body.
 *
 * @throws {StructuralError} when directives are not followed by `---`
 */
export function groupTokens(tokens: TokenStream): DocumentTokens[] {
  const pending: PendingDocument[] = [];
  let current = createPending();
  let directiveName: Token | null = null;

  const close = (): void => {
    if (!isEmpty(current)) pending.push(current);
    current = createPending();
  };

  for (const token of tokens) {
    if (token.type === TOKEN_TYPES.SPACE) continue;

    if (directiveName !== null) {
      const indicator = directiveName;
      directiveName = null;
      if (
        token.type === TOKEN_TYPES.STRING &&
        token.position.line === indicator.position.line
      ) {
        current.directives.push(group('Directive', [indicator, token]));
        current.last = token;
        continue;
      }
      current.directives.push(group('Directive', [indicator]));
    }

    switch (token.type) {
      case TOKEN_TYPES.DIRECTIVE:
        if (hasContent(current)) close();
        directiveName = token;
        break;
      case TOKEN_TYPES.DOCUMENT_HEADER:
        if (hasContent(current)) close();
        current.leading.push(...current.body);
        current.body = [];
        current.start = token;
        break;
      case TOKEN_TYPES.DOCUMENT_END:
        current.first ??= token;
        current.end = token;
        current.last = token;
        close();
        continue;
      default:
        current.body.push(token);
        break;
    }
    current.first ??= token;
    current.last = token;
  }
  if (directiveName !== null) {
    current.directives.push(group('Directive', [directiveName]));
  }

  // Comments after the last marker become the previous document's foot
  const previous = pending.at(-1);
  if (previous && !hasContent(current) && current.directives.length === 0) {
    if (current.last !== null) {
      previous.body.push(...current.body);
      previous.last = current.last;
    }
  } else {
    close();
  }

  return pending.map((doc) => finishDocument(doc, tokens));
}

function finishDocument(
  doc: PendingDocument,
  tokens: TokenStream
): DocumentTokens {
  const directive = doc.directives[0];
  if (directive && doc.start === null) {
    throw createError('YAML-P015', {}, { token: firstToken(directive), tokens });
  }
  if (doc.first === null || doc.last === null) {
    throw new RangeError('Document without tokens');
  }
  return {
    directives: doc.directives,
    leading: doc.leading,
    start: doc.start,
    end: doc.end,
    elements: groupElements(doc.body),
    first: doc.first,
    last: doc.last,
  };
}

// ============================================================
// ELEMENT GROUPING
// ============================================================

function sameLine(a: Element, b: Element): boolean {
  return lastToken(a).end.line === firstToken(b).position.line;
}

function isScalarToken(element: Element | undefined): element is Token {
  return (
    element !== undefined && !isGroup(element) && isScalarType(element.type)
  );
}

function isBlockScalar(
  element: Element | undefined
): element is TokenGroup {
  return isGroupOf(element, 'Literal') || isGroupOf(element, 'Folded');
}

function isKeyElement(element: Element | undefined): element is Element {
  return (
    isScalarToken(element) ||
    isGroupOf(element, 'Anchor') ||
    isGroupOf(element, 'Alias') ||
    isGroupOf(element, 'ScalarTag') ||
    isTokenOf(element, TOKEN_TYPES.MERGE_KEY)
  );
}

function isInlineValue(element: Element | undefined): element is Element {
  return (
    isScalarToken(element) ||
    isBlockScalar(element) ||
    isGroupOf(element, 'Anchor') ||
    isGroupOf(element, 'Alias') ||
    isGroupOf(element, 'ScalarTag')
  );
}

/** A group built at some index and the number of elements it consumed */
type GroupMatch = { group: TokenGroup; length: number } | null;

type Matcher = (elements: readonly Element[], i: number) => GroupMatch;

/** One left-to-right pass replacing every match with its group */
function pass(elements: readonly Element[], match: Matcher): Element[] {
  const result: Element[] = [];
  let i = 0;
  while (i < elements.length) {
    const matched = match(elements, i);
    if (matched) {
      result.push(matched.group);
      i += matched.length;
      continue;
    }
    const element = elements[i];
    if (element !== undefined) result.push(element);
    i++;
  }
  return result;
}

function matchBlockScalar(elements: readonly Element[], i: number): GroupMatch {
  const header = elements[i];
  if (
    !isTokenOf(header, TOKEN_TYPES.LITERAL) &&
    !isTokenOf(header, TOKEN_TYPES.FOLDED)
  ) {
    return null;
  }
  const type = header.type === TOKEN_TYPES.LITERAL ? 'Literal' : 'Folded';
  const comment = elements[i + 1];
  if (isTokenOf(comment, TOKEN_TYPES.COMMENT)) {
    const content = elements[i + 2];
    if (!isTokenOf(content, TOKEN_TYPES.STRING)) return null;
    return { group: group(type, [header, comment, content]), length: 3 };
  }
  if (!isTokenOf(comment, TOKEN_TYPES.STRING)) return null;
  return { group: group(type, [header, comment]), length: 2 };
}

function matchProperty(elements: readonly Element[], i: number): GroupMatch {
  const indicator = elements[i];
  const name = elements[i + 1];
  if (
    !isTokenOf(name, TOKEN_TYPES.STRING) ||
    indicator === undefined ||
    isGroup(indicator) ||
    name.position.offset !== indicator.end.offset
  ) {
    return null;
  }
  if (indicator.type === TOKEN_TYPES.ANCHOR) {
    return { group: group('AnchorName', [indicator, name]), length: 2 };
  }
  if (indicator.type === TOKEN_TYPES.ALIAS) {
    return { group: group('Alias', [indicator, name]), length: 2 };
  }
  return null;
}

function matchScalarTag(elements: readonly Element[], i: number): GroupMatch {
  const tag = elements[i];
  const value = elements[i + 1];
  if (
    !isTokenOf(tag, TOKEN_TYPES.TAG) ||
    RESERVED_TAGS.get(tag.value) !== 'scalar' ||
    value === undefined ||
    !(isScalarToken(value) || isBlockScalar(value)) ||
    !sameLine(tag, value)
  ) {
    return null;
  }
  return { group: group('ScalarTag', [tag, value]), length: 2 };
}

function matchAnchor(elements: readonly Element[], i: number): GroupMatch {
  const name = elements[i];
  const value = elements[i + 1];
  if (
    !isGroupOf(name, 'AnchorName') ||
    value === undefined ||
    !(
      isScalarToken(value) ||
      isBlockScalar(value) ||
      isGroupOf(value, 'ScalarTag')
    ) ||
    !sameLine(name, value)
  ) {
    return null;
  }
  return { group: group('Anchor', [name, value]), length: 2 };
}

/**
 * Scalar after `?`: on the same line, or on a later line indented past the
 * `?` when it is not itself the key of a nested `key:` pair.
 */
function isExplicitKey(
  indicator: Token,
  key: Element | undefined,
  after: Element | undefined
): key is Element {
  if (!isKeyElement(key) && !isBlockScalar(key)) return false;
  if (sameLine(indicator, key)) return true;
  return (
    firstToken(key).position.column > indicator.position.column &&
    !(isTokenOf(after, TOKEN_TYPES.MAPPING_VALUE) && sameLine(key, after))
  );
}

function matchMapKey(elements: readonly Element[], i: number): GroupMatch {
  const head = elements[i];
  if (head === undefined) return null;

  if (isTokenOf(head, TOKEN_TYPES.MAPPING_KEY)) {
    const members: Element[] = [head];
    const key = elements[i + 1];
    if (isExplicitKey(head, key, elements[i + 2])) members.push(key);
    const colon = elements[i + members.length];
    if (isTokenOf(colon, TOKEN_TYPES.MAPPING_VALUE)) members.push(colon);
    return { group: group('MapKey', members), length: members.length };
  }

  const colon = elements[i + 1];
  if (
    isKeyElement(head) &&
    isTokenOf(colon, TOKEN_TYPES.MAPPING_VALUE) &&
    sameLine(head, colon)
  ) {
    return { group: group('MapKey', [head, colon]), length: 2 };
  }
  return null;
}

function matchMapKeyValue(elements: readonly Element[], i: number): GroupMatch {
  const key = elements[i];
  const value = elements[i + 1];
  if (
    !isGroupOf(key, 'MapKey') ||
    !isTokenOf(key.elements.at(-1), TOKEN_TYPES.MAPPING_VALUE) ||
    !isInlineValue(value) ||
    !sameLine(key, value)
  ) {
    return null;
  }
  return { group: group('MapKeyValue', [key, value]), length: 2 };
}

/** Build the structural groups of one document body, innermost first */
export function groupElements(tokens: readonly Token[]): Element[] {
  let elements: Element[] = [...tokens];
  elements = pass(elements, matchBlockScalar);
  elements = pass(elements, matchProperty);
  elements = pass(elements, matchScalarTag);
  elements = pass(elements, matchAnchor);
  elements = pass(elements, matchMapKey);
  elements = pass(elements, matchMapKeyValue);
  return elements;
}
