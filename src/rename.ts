/**
 * Anchor and alias renames
 * The only mutations a parsed tree accepts. The name token is replaced in
 * the stream, so an exact render shows the new name.
 */

import type {
  AliasNode,
  AnchorNode,
  DocumentNode,
  FileNode,
} from './ast-nodes.js';
import type { Token } from './token-types.js';
import { leadingOf } from './token-types.js';

const INVALID_NAME = /[\s,[\]{}]/;

function replaceName(
  tree: FileNode | DocumentNode,
  nameToken: Token,
  name: string
): Token {
  if (name === '' || INVALID_NAME.test(name)) {
    throw new RangeError(`Invalid anchor name: '${name}'`);
  }
  const current = tree.tokens.resolve(nameToken);
  const leading = leadingOf(current);
  // the stream's last token also carries the input's trailing whitespace
  const trailing = current.origin.slice(leading.length + current.text.length);
  return tree.tokens.replace(current, {
    type: current.type,
    value: name,
    text: name,
    origin: leading + name + trailing,
    position: current.position,
    end: {
      ...current.end,
      column: current.position.column + name.length,
      offset: current.position.offset + name.length,
    },
  });
}

/**
 * Rename `&name`. Aliases that refer to it keep the old name; rename them
 * with renameAlias().
 *
 * @throws {RangeError} when the name is empty or holds whitespace or a flow
 * indicator
 */
export function renameAnchor(
  tree: FileNode | DocumentNode,
  node: AnchorNode,
  name: string
): void {
  node.nameToken = replaceName(tree, node.nameToken, name);
  node.name = name;
}

/** Rename `*name` */
export function renameAlias(
  tree: FileNode | DocumentNode,
  node: AliasNode,
  name: string
): void {
  node.nameToken = replaceName(tree, node.nameToken, name);
  node.name = name;
}
