/**
 * Tree Dump Tests
 */

import { describe, expect, it } from 'vitest';

import { dumpTree, parse } from '../../src/index.js';
import { parseBody } from '../helpers/yaml.js';

describe('dumpTree', () => {
  it('lists every node with value, location and path', () => {
    expect(dumpTree(parse('a: 1\n'))).toBe(
      [
        'File $',
        '  Document [1:1] $',
        '    Mapping block [1:1] $',
        '      MappingValue [1:2] $.a',
        '        String "a" [1:1] $.a',
        '        Integer 1 [1:4] $.a',
      ].join('\n')
    );
  });

  it('describes properties and comments', () => {
    expect(dumpTree(parseBody('- &x [*x] # c\n'))).toBe(
      [
        'Sequence block [1:1] $',
        '  Anchor &x [1:3] $[0]',
        '    Sequence flow [1:6] $[0]',
        '      Alias *x [1:7] $[0][0]',
        '      CommentGroup "c" [1:11] $[0]',
      ].join('\n')
    );
  });

  it('describes directives and synthesized nulls', () => {
    expect(dumpTree(parse('%YAML 1.2\n---\na:\n'))).toBe(
      [
        'File $',
        '  Document [2:1] $',
        '    Directive %YAML 1.2 [1:1] $',
        '    Mapping block [3:1] $',
        '      MappingValue [3:2] $.a',
        '        String "a" [3:1] $.a',
        '        Null null [3:3] $.a',
      ].join('\n')
    );
  });
});
