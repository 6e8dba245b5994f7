/**
 * AST Visitor
 * Recursive traversal with enter/exit callbacks.
 */

import type { ASTNode, CommentGroupNode, NodeType } from './ast-nodes.js';

// ============================================================
// VISITOR INTERFACE
// ============================================================

/**
 * Callbacks invoked around each node's children. Both are optional.
 */
export interface NodeVisitor {
  /** Called before the node's children */
  enter?(node: ASTNode, parent: ASTNode | null): void;
  /** Called after the node's children */
  exit?(node: ASTNode, parent: ASTNode | null): void;
}

export type NodeOfType<T extends NodeType> = Extract<ASTNode, { type: T }>;

// ============================================================
// TRAVERSAL
// ============================================================

/**
 * Direct children in document order. A node's head comment comes first,
 * its line and foot comments last.
 */
export function childrenOf(node: ASTNode): ASTNode[] {
  const children: ASTNode[] = [];
  const pushComment = (group: CommentGroupNode | null): void => {
    if (group) children.push(group);
  };

  if (node.type !== 'File' && node.type !== 'CommentGroup') {
    pushComment(node.comment);
  }

  switch (node.type) {
    case 'File':
      children.push(...node.documents);
      break;
    case 'Document':
      children.push(...node.directives);
      if (node.body) children.push(node.body);
      break;
    case 'Mapping':
      children.push(...node.values);
      break;
    case 'MappingValue':
      children.push(node.key, node.value);
      break;
    case 'MappingKey':
    case 'Anchor':
    case 'Literal':
      children.push(node.value);
      break;
    case 'Tag':
      if (node.value) children.push(node.value);
      break;
    case 'Sequence':
      children.push(...node.values);
      break;
    case 'Null':
    case 'Bool':
    case 'Integer':
    case 'Float':
    case 'Infinity':
    case 'NaN':
    case 'String':
    case 'Alias':
    case 'MergeKey':
    case 'Directive':
    case 'CommentGroup':
      break;
  }

  if (node.type !== 'File' && node.type !== 'CommentGroup') {
    pushComment(node.lineComment);
    pushComment(node.footComment);
  }
  return children;
}

/**
 * Visit `node` and everything below it in document order.
 *
 * @example
 * walk(parse('a: [1, 2]\n'), {
 *   enter(node) { console.log(nodePath(node)); },
 * });
 */
export function walk(
  node: ASTNode,
  visitor: NodeVisitor,
  parent: ASTNode | null = null
): void {
  visitor.enter?.(node, parent);
  for (const child of childrenOf(node)) {
    walk(child, visitor, node);
  }
  visitor.exit?.(node, parent);
}

/** Nodes of one type under `node` (inclusive), in document order */
export function filterNodes<T extends NodeType>(
  node: ASTNode,
  type: T
): NodeOfType<T>[] {
  const isOfType = (candidate: ASTNode): candidate is NodeOfType<T> =>
    candidate.type === type;

  const found: NodeOfType<T>[] = [];
  walk(node, {
    enter(candidate) {
      if (isOfType(candidate)) found.push(candidate);
    },
  });
  return found;
}
