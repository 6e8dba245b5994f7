/**
 * Tree dump
 * Indented debug listing, one node per line
 */

import type { ASTNode } from '../ast-nodes.js';
import { commentText, nodePath } from '../ast-nodes.js';
import { formatLocation } from '../source-location.js';
import { walk } from '../visitor.js';

function describeValue(node: ASTNode): string {
  switch (node.type) {
    case 'String':
      return JSON.stringify(node.value);
    case 'Null':
      return 'null';
    case 'Bool':
    case 'Integer':
    case 'Float':
    case 'Infinity':
    case 'NaN':
      return String(node.value);
    case 'Literal':
      return node.folded ? '>' : '|';
    case 'Anchor':
      return `&${node.name}`;
    case 'Alias':
      return `*${node.name}`;
    case 'Tag':
      return node.tag;
    case 'Mapping':
    case 'Sequence':
      return node.style;
    case 'Directive':
      return ['%' + node.name, ...node.parameters].join(' ');
    case 'CommentGroup':
      return JSON.stringify(commentText(node));
    default:
      return '';
  }
}

/**
 * Render a subtree as an indented listing of
 * `Type value [line:column] path`, two spaces per level.
 *
 * @example
 * dumpTree(parse('a: 1\n'));
 * // File $
 * //   Document [1:1] $
 * //     Mapping block [1:1] $
 * //       MappingValue [1:2] $.a
 * //         String "a" [1:1] $.a
 * //         Integer 1 [1:4] $.a
 */
export function dumpTree(node: ASTNode): string {
  const lines: string[] = [];
  let depth = 0;

  walk(node, {
    enter(current) {
      const location =
        current.type === 'File' ? '' : formatLocation(current.token.position);
      const parts = [
        current.type,
        describeValue(current),
        location,
        nodePath(current),
      ];
      lines.push(
        '  '.repeat(depth) + parts.filter((part) => part !== '').join(' ')
      );
      depth++;
    },
    exit() {
      depth--;
    },
  });

  return lines.join('\n');
}
