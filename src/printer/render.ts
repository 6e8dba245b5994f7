/**
 * Render
 * Text from a parsed tree: the exact source, or a canonical layout
 */

import type {
  DocumentNode,
  FileNode,
  LiteralNode,
  MapKeyNode,
  MappingNode,
  MappingValueNode,
  SequenceNode,
  StringNode,
  ValueNode,
} from '../ast-nodes.js';
import type { RenderOptions } from '../types.js';

const INDENT = 2;

/**
 * Render a file or a single document.
 *
 * With `comments: true` (default) the token origins are concatenated, which
 * reproduces the parsed source byte for byte. With `comments: false` the
 * tree is laid out canonically: 2-space block indentation, inline flow
 * collections, re-indented block scalars and no comments. Rendering that
 * output again gives the same text.
 *
 * @example
 * render(parse('a:   1 # one\n'));                     // 'a:   1 # one\n'
 * render(parse('a:   1 # one\n'), { comments: false }); // 'a: 1\n'
 */
export function render(
  tree: FileNode | DocumentNode,
  options: RenderOptions = {}
): string {
  const exact = options.comments ?? true;
  if (tree.type === 'File') {
    if (exact) return [...tree.tokens].map((token) => token.origin).join('');
    return tree.documents.map(renderCanonical).join('');
  }
  if (exact) {
    const { tokens } = tree;
    return tokens
      .range(tokens.resolve(tree.first), tokens.resolve(tree.last))
      .map((token) => token.origin)
      .join('');
  }
  return renderCanonical(tree, 0);
}

// ============================================================
// CANONICAL LAYOUT
// ============================================================

function renderCanonical(doc: DocumentNode, index: number): string {
  const lines: string[] = [];
  for (const directive of doc.directives) {
    lines.push(['%' + directive.name, ...directive.parameters].join(' '));
  }
  if (doc.directives.length > 0 || doc.start !== null || index > 0) {
    lines.push('---');
  }
  if (doc.body !== null) emitEntry(lines, '', doc.body, 0);
  if (doc.end !== null) lines.push('...');
  return lines.map((line) => `${line}\n`).join('');
}

function pad(indent: number): string {
  return ' '.repeat(indent);
}

function joinParts(...parts: string[]): string {
  return parts.filter((part) => part !== '').join(' ');
}

/** Anchors and tags in front of a value, and the value they decorate */
function splitProperties(node: ValueNode): {
  properties: string[];
  inner: ValueNode | null;
} {
  const properties: string[] = [];
  let current: ValueNode | null = node;
  while (current?.type === 'Anchor' || current?.type === 'Tag') {
    if (current.type === 'Anchor') {
      properties.push(`&${current.name}`);
      current = current.value;
    } else {
      properties.push(current.tag);
      current = current.value;
    }
  }
  return { properties, inner: current };
}

function isBlockCollection(
  node: ValueNode | null
): node is MappingNode | SequenceNode {
  return (
    node !== null &&
    (node.type === 'Mapping' || node.type === 'Sequence') &&
    node.style === 'block'
  );
}

/**
 * Emit `prefix value` at `indent`. The prefix is `key:`, `-`, `:` or empty
 * for a document body.
 */
function emitEntry(
  lines: string[],
  prefix: string,
  node: ValueNode,
  indent: number
): void {
  const { properties, inner } = splitProperties(node);
  const head = joinParts(prefix, ...properties);

  if (isBlockCollection(inner)) {
    if (prefix === '') {
      if (head !== '') lines.push(pad(indent) + head);
      emitCollection(lines, inner, indent);
      return;
    }
    if (prefix === '-' && properties.length === 0) {
      // `- a: 1` and `- - x` keep the first entry on the dash line
      const start = lines.length;
      emitCollection(lines, inner, indent + INDENT);
      const first = lines[start];
      if (first !== undefined) {
        lines[start] = pad(indent) + '- ' + first.slice(indent + INDENT);
      }
      return;
    }
    lines.push(pad(indent) + head);
    emitCollection(lines, inner, indent + INDENT);
    return;
  }

  if (inner?.type === 'Literal') {
    emitLiteral(lines, head, inner, indent);
    return;
  }

  lines.push(
    pad(indent) + joinParts(head, inner === null ? '' : inline(inner))
  );
}

function emitCollection(
  lines: string[],
  node: MappingNode | SequenceNode,
  indent: number
): void {
  if (node.type === 'Sequence') {
    for (const value of node.values) emitEntry(lines, '-', value, indent);
    return;
  }
  for (const entry of node.values) emitMappingValue(lines, entry, indent);
}

function emitMappingValue(
  lines: string[],
  entry: MappingValueNode,
  indent: number
): void {
  if (entry.key.type === 'MappingKey') {
    lines.push(pad(indent) + joinParts('?', inline(entry.key.value)));
    emitEntry(lines, ':', entry.value, indent);
    return;
  }
  emitEntry(lines, `${inlineKey(entry.key)}:`, entry.value, indent);
}

// ============================================================
// BLOCK SCALARS
// ============================================================

function leadingSpaces(line: string): number {
  return line.length - line.trimStart().length;
}

/**
 * Header plus content lines re-indented two columns past `indent`. An
 * indentation indicator is written when the first line starts with spaces.
 */
function emitLiteral(
  lines: string[],
  head: string,
  node: LiteralNode,
  indent: number
): void {
  const content = node.value;
  const source = content.token.text.split('\n').slice(1);
  if (source.at(-1) === '') source.pop();

  const firstSource = source.find((line) => line.trim() !== '');
  const firstValue = content.value.split('\n').find((line) => line !== '');
  const contentIndent =
    firstSource === undefined
      ? 0
      : leadingSpaces(firstSource) -
        (firstValue === undefined ? 0 : leadingSpaces(firstValue));

  const body = source.map((line) =>
    line.trim() === '' ? '' : pad(indent + INDENT) + line.slice(contentIndent)
  );
  const firstBody = body.find((line) => line !== '');
  const indicator =
    firstBody !== undefined && leadingSpaces(firstBody) > indent + INDENT
      ? String(INDENT)
      : '';

  lines.push(pad(indent) + joinParts(head, blockHeader(node, indicator)));
  lines.push(...body);
}

function blockHeader(node: LiteralNode, indicator: string): string {
  const style = node.folded ? '>' : '|';
  const chomping = /[-+]/.exec(node.token.text)?.[0] ?? '';
  return style + indicator + chomping;
}

// ============================================================
// INLINE FORMS
// ============================================================

function inlineKey(key: MapKeyNode): string {
  switch (key.type) {
    case 'MergeKey':
      return '<<';
    case 'MappingKey':
      return inline(key.value);
    default:
      return inline(key);
  }
}

function inline(node: ValueNode): string {
  switch (node.type) {
    case 'Null':
    case 'Bool':
    case 'Integer':
    case 'Float':
    case 'Infinity':
    case 'NaN':
      return node.token.text;
    case 'String':
      return inlineString(node);
    case 'Literal':
      return quote(node.value.value);
    case 'Alias':
      return `*${node.name}`;
    case 'Anchor':
      return joinParts(`&${node.name}`, inline(node.value));
    case 'Tag':
      return joinParts(node.tag, node.value === null ? '' : inline(node.value));
    case 'Mapping': {
      const pairs = node.values.map(inlinePair).join(', ');
      return node.style === 'flow' && node.start === null
        ? pairs
        : `{${pairs}}`;
    }
    case 'Sequence':
      return `[${node.values.map(inline).join(', ')}]`;
  }
}

function inlinePair(entry: MappingValueNode): string {
  const value = inline(entry.value);
  const key = inlineKey(entry.key);
  return value === '' ? `${key}:` : `${key}: ${value}`;
}

function inlineString(node: StringNode): string {
  if (node.value.includes('\n')) return quote(node.value);
  switch (node.style) {
    case 'single':
      return `'${node.value.replace(/'/g, "''")}'`;
    case 'double':
      return quote(node.value);
    default:
      return node.value;
  }
}

const ESCAPES: Record<string, string> = {
  '\\': '\\\\',
  '"': '\\"',
  '\n': '\\n',
  '\t': '\\t',
  '\r': '\\r',
};

/** Double-quoted form with escapes */
function quote(value: string): string {
  let result = '"';
  for (const ch of value) {
    const escaped = ESCAPES[ch];
    if (escaped !== undefined) {
      result += escaped;
    } else if (ch < ' ' || ch === '\x7f') {
      result += `\\x${ch.charCodeAt(0).toString(16).padStart(2, '0')}`;
    } else {
      result += ch;
    }
  }
  return `${result}"`;
}
