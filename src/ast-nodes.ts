import type { TokenStream } from './lexer/stream.js';
import type { Token } from './token-types.js';

/**
 * Comment slots are filled while the node is being parsed and are not
 * changed afterwards.
 */
interface BaseNode {
  /** Token that anchors the node's position */
  readonly token: Token;
  /** `$`-rooted address of the node within its document */
  readonly path: string;
  /** Comments on the lines directly above the node */
  comment: CommentGroupNode | null;
  /** Comment after the node on its last line */
  lineComment: CommentGroupNode | null;
  /** Comments below the node, at or deeper than its column */
  footComment: CommentGroupNode | null;
}

// ============================================================
// COMMENTS
// ============================================================

export interface CommentGroupNode {
  readonly type: 'CommentGroup';
  readonly token: Token;
  readonly path: string;
  /** COMMENT tokens in source order */
  readonly comments: readonly Token[];
}

// ============================================================
// SCALARS
// ============================================================

export interface NullNode extends BaseNode {
  readonly type: 'Null';
  readonly value: null;
}

export interface BoolNode extends BaseNode {
  readonly type: 'Bool';
  readonly value: boolean;
}

/** Integers outside the safe range are kept as bigint */
export interface IntegerNode extends BaseNode {
  readonly type: 'Integer';
  readonly value: number | bigint;
}

export interface FloatNode extends BaseNode {
  readonly type: 'Float';
  readonly value: number;
}

export interface InfinityNode extends BaseNode {
  readonly type: 'Infinity';
  readonly value: number;
}

export interface NanNode extends BaseNode {
  readonly type: 'NaN';
  readonly value: number;
}

export type StringStyle = 'plain' | 'single' | 'double' | 'block';

export interface StringNode extends BaseNode {
  readonly type: 'String';
  readonly value: string;
  readonly style: StringStyle;
}

/**
 * Block scalar: `|` (literal) or `>` (folded).
 * The token is the header; `value` holds the chomped content.
 */
export interface LiteralNode extends BaseNode {
  readonly type: 'Literal';
  readonly folded: boolean;
  readonly value: StringNode;
}

export type ScalarNode =
  | NullNode
  | BoolNode
  | IntegerNode
  | FloatNode
  | InfinityNode
  | NanNode
  | StringNode
  | LiteralNode;

// ============================================================
// COLLECTIONS
// ============================================================

export type CollectionStyle = 'block' | 'flow';

export interface MappingNode extends BaseNode {
  readonly type: 'Mapping';
  readonly style: CollectionStyle;
  /** `{` and `}` for flow mappings */
  readonly start: Token | null;
  readonly end: Token | null;
  readonly values: readonly MappingValueNode[];
}

/** One `key: value` entry; the token is the `:` */
export interface MappingValueNode extends BaseNode {
  readonly type: 'MappingValue';
  readonly key: MapKeyNode;
  readonly value: ValueNode;
}

/** Explicit `? key` */
export interface MappingKeyNode extends BaseNode {
  readonly type: 'MappingKey';
  readonly value: ValueNode;
}

/** `<<` key; its value names the mappings to merge */
export interface MergeKeyNode extends BaseNode {
  readonly type: 'MergeKey';
}

export interface SequenceNode extends BaseNode {
  readonly type: 'Sequence';
  readonly style: CollectionStyle;
  /** `[` and `]` for flow sequences */
  readonly start: Token | null;
  readonly end: Token | null;
  /** `-` tokens of a block sequence, parallel to values */
  readonly entries: readonly Token[];
  readonly values: readonly ValueNode[];
}

// ============================================================
// NODE PROPERTIES
// ============================================================

/**
 * `&name value`. `name` and `nameToken` change only through renameAnchor().
 */
export interface AnchorNode extends BaseNode {
  readonly type: 'Anchor';
  name: string;
  nameToken: Token;
  readonly value: ValueNode;
}

/**
 * `*name`. Holds the target's name, never the target itself.
 * `name` and `nameToken` change only through renameAlias().
 */
export interface AliasNode extends BaseNode {
  readonly type: 'Alias';
  name: string;
  nameToken: Token;
}

export interface TagNode extends BaseNode {
  readonly type: 'Tag';
  readonly tag: string;
  /** null when the tag stands alone, as in `a: !!null` */
  readonly value: ValueNode | null;
}

export type ValueNode =
  | ScalarNode
  | MappingNode
  | SequenceNode
  | AnchorNode
  | AliasNode
  | TagNode;

export type MapKeyNode = ValueNode | MappingKeyNode | MergeKeyNode;

// ============================================================
// DOCUMENT STRUCTURE
// ============================================================

/** `%NAME parameters...` */
export interface DirectiveNode extends BaseNode {
  readonly type: 'Directive';
  readonly name: string;
  readonly parameters: readonly string[];
}

export interface DocumentNode extends BaseNode {
  readonly type: 'Document';
  /** `---` marker */
  readonly start: Token | null;
  /** `...` marker */
  readonly end: Token | null;
  readonly directives: readonly DirectiveNode[];
  readonly body: ValueNode | null;
  /** Stream tokens spanned by this document, including comments */
  readonly first: Token;
  readonly last: Token;
  /** The stream the document was parsed from */
  readonly tokens: TokenStream;
}

export interface FileNode {
  readonly type: 'File';
  readonly documents: readonly DocumentNode[];
  /** The scanned stream, including synthesized null tokens */
  readonly tokens: TokenStream;
}

export type ASTNode =
  | ValueNode
  | MappingValueNode
  | MappingKeyNode
  | MergeKeyNode
  | DirectiveNode
  | DocumentNode
  | CommentGroupNode
  | FileNode;

export type NodeType = ASTNode['type'];

// ============================================================
// ACCESSORS
// ============================================================

export function nodeType(node: ASTNode): NodeType {
  return node.type;
}

/** Anchoring token; the first token of the stream for a File */
export function nodeToken(node: ASTNode): Token | undefined {
  return node.type === 'File' ? node.tokens.first : node.token;
}

export function nodePath(node: ASTNode): string {
  return node.type === 'File' ? '$' : node.path;
}

/** Head comment group; files and comment groups have none */
export function nodeComment(node: ASTNode): CommentGroupNode | null {
  if (node.type === 'File' || node.type === 'CommentGroup') return null;
  return node.comment;
}

/** Comment texts of a group, one per line */
export function commentText(group: CommentGroupNode): string {
  return group.comments.map((token) => token.value).join('\n');
}
