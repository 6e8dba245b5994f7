/**
 * Error Registry
 * Central error definition registry with template rendering.
 */

// ============================================================
// ERROR CATEGORIES
// ============================================================

/** Error category determining error ID prefix */
export type ErrorCategory = 'lexer' | 'parse';

/**
 * Example demonstrating an error condition.
 * Used in error documentation to show common scenarios.
 */
export interface ErrorExample {
  /** Description of the example scenario */
  readonly description: string;
  /** YAML source demonstrating the error */
  readonly code: string;
}

/** Error registry entry containing all metadata for a single error condition */
export interface ErrorDefinition {
  /** Format: YAML-{category}{3-digit} (e.g., YAML-P001) */
  readonly errorId: string;
  readonly category: ErrorCategory;
  /** Human-readable description */
  readonly description: string;
  /** Message template with {placeholder} syntax */
  readonly messageTemplate: string;
  /** What causes this error */
  readonly cause?: string | undefined;
  /** How to resolve this error */
  readonly resolution?: string | undefined;
  readonly examples?: readonly ErrorExample[] | undefined;
}

// ============================================================
// ERROR REGISTRY
// ============================================================

/**
 * Central registry for all error definitions with O(1) lookup.
 * Immutable after initialization.
 */
export interface ErrorRegistry {
  get(errorId: string): ErrorDefinition | undefined;
  has(errorId: string): boolean;
  readonly size: number;
  entries(): IterableIterator<[string, ErrorDefinition]>;
}

class ErrorRegistryImpl implements ErrorRegistry {
  private readonly byId: ReadonlyMap<string, ErrorDefinition>;

  constructor(definitions: readonly ErrorDefinition[]) {
    const idMap = new Map<string, ErrorDefinition>();

    for (const def of definitions) {
      if (idMap.has(def.errorId)) {
        throw new TypeError(`Duplicate error ID: ${def.errorId}`);
      }
      idMap.set(def.errorId, def);
    }

    this.byId = idMap;
  }

  get(errorId: string): ErrorDefinition | undefined {
    return this.byId.get(errorId);
  }

  has(errorId: string): boolean {
    return this.byId.has(errorId);
  }

  get size(): number {
    return this.byId.size;
  }

  entries(): IterableIterator<[string, ErrorDefinition]> {
    return this.byId.entries();
  }
}

const ERROR_DEFINITIONS: readonly ErrorDefinition[] = [
  // Lexer Errors (YAML-L0xx)
  {
    errorId: 'YAML-L001',
    category: 'lexer',
    description: 'Unterminated quoted scalar',
    messageTemplate: 'could not find end character of {style}-quotated text',
    cause: 'A quoted scalar was opened but the input ended before its closing quote.',
    resolution:
      'Add the closing quote. Inside single quotes a literal quote is written as two quotes.',
    examples: [
      { description: 'Missing closing double quote', code: 'a: "hello' },
      { description: 'Missing closing single quote', code: "a: 'open" },
    ],
  },
  {
    errorId: 'YAML-L002',
    category: 'lexer',
    description: 'Invalid block scalar indentation',
    messageTemplate:
      'invalid number of indent is specified in the block scalar',
    cause:
      'A block scalar content line is indented less than the content indentation but more than its parent.',
    resolution:
      'Indent every content line at least as deep as the first one, or fix the explicit indentation indicator.',
    examples: [
      { description: 'Indicator larger than the content', code: 'a: |4\n  x' },
      { description: 'Second line less indented', code: 'a: |\n    x\n  y' },
    ],
  },
  {
    errorId: 'YAML-L003',
    category: 'lexer',
    description: 'Invalid block scalar header',
    messageTemplate: 'invalid header option: {header}',
    cause: 'A block scalar header carries characters other than one chomping indicator and one indentation digit.',
    resolution: 'Use a header such as |, |-, |+, |2 or >-2.',
    examples: [{ description: 'Unknown header option', code: 'a: |x\n  text' }],
  },
  {
    errorId: 'YAML-L004',
    category: 'lexer',
    description: 'Tab used for indentation',
    messageTemplate:
      'found a tab character where an indentation space is expected',
    cause: 'Block structure is indented with a tab character.',
    resolution: 'Indent with spaces.',
    examples: [{ description: 'Tab before a nested key', code: 'a:\n\tb: 1' }],
  },
  {
    errorId: 'YAML-L005',
    category: 'lexer',
    description: 'Reserved character',
    messageTemplate: '"{char}" is a reserved character',
    cause: 'The characters @ and ` are reserved and cannot start a plain scalar.',
    resolution: 'Quote the scalar.',
    examples: [{ description: 'Scalar starting with @', code: 'user: @admin' }],
  },
  {
    errorId: 'YAML-L006',
    category: 'lexer',
    description: 'Invalid escape sequence',
    messageTemplate: 'invalid escape sequence {sequence} in double-quoted text',
    cause: 'A backslash in a double-quoted scalar is followed by an unsupported character.',
    resolution:
      'Use a supported escape (\\n, \\t, \\", \\\\, \\xXX, \\uXXXX, ...) or single quotes.',
    examples: [{ description: 'Unknown escape', code: 'a: "\\q"' }],
  },

  // Parse Errors (YAML-P0xx)
  {
    errorId: 'YAML-P001',
    category: 'parse',
    description: 'Unterminated flow mapping',
    messageTemplate: "could not find flow mapping end token '}'",
    cause: 'A flow mapping opened with { was never closed.',
    resolution: 'Add the closing } after the last entry.',
    examples: [{ description: 'Missing closing brace', code: '{ "key": "value"' }],
  },
  {
    errorId: 'YAML-P002',
    category: 'parse',
    description: 'Unterminated flow sequence',
    messageTemplate: "sequence end token ']' not found",
    cause: 'A flow sequence opened with [ was never closed.',
    resolution: 'Add the closing ] after the last entry.',
    examples: [{ description: 'Missing closing bracket', code: 'a: [1, 2' }],
  },
  {
    errorId: 'YAML-P003',
    category: 'parse',
    description: 'Unmatched closing delimiter',
    messageTemplate: "could not find '{open}' character corresponding to '{close}'",
    cause: 'A flow closing delimiter appears without a matching opener.',
    resolution: 'Remove the stray delimiter or add the opener.',
    examples: [{ description: 'Stray bracket', code: 'a: 1\n]' }],
  },
  {
    errorId: 'YAML-P004',
    category: 'parse',
    description: 'Missing flow entry separator',
    messageTemplate: "',' or '{close}' must be specified",
    cause: 'Two flow collection entries are not separated by a comma.',
    resolution: 'Separate entries with commas.',
    examples: [{ description: 'Missing comma', code: '["a" b]' }],
  },
  {
    errorId: 'YAML-P005',
    category: 'parse',
    description: 'Duplicate mapping key',
    messageTemplate: 'mapping key "{key}" already defined at {location}',
    cause: 'A mapping defines the same key twice.',
    resolution:
      'Remove or rename one of the entries, or parse with allowDuplicateKeys.',
    examples: [{ description: 'Repeated key', code: 'a: 1\na: 2' }],
  },
  {
    errorId: 'YAML-P006',
    category: 'parse',
    description: 'Non-scalar mapping key',
    messageTemplate: 'non-scalar mapping keys are not supported',
    cause: 'A flow collection or block collection is used as a mapping key.',
    resolution: 'Use a scalar key.',
    examples: [{ description: 'Sequence as key', code: '[a, b]: c' }],
  },
  {
    errorId: 'YAML-P007',
    category: 'parse',
    description: 'Multi-line mapping key',
    messageTemplate: 'unexpected key name',
    cause: 'An implicit mapping key spans more than one line.',
    resolution: 'Put the key on one line or use an explicit ? key.',
    examples: [{ description: 'Key folded over two lines', code: 'a\n b: c' }],
  },
  {
    errorId: 'YAML-P008',
    category: 'parse',
    description: 'Mapping value in invalid position',
    messageTemplate: 'mapping value is not allowed in this context',
    cause: 'A mapping key appears where only a scalar value is allowed.',
    resolution: 'Quote the value or move the nested mapping to its own line.',
    examples: [{ description: 'Nested key on the same line', code: 'a: b: c' }],
  },
  {
    errorId: 'YAML-P009',
    category: 'parse',
    description: 'Sequence entry in invalid position',
    messageTemplate: 'block sequence entries are not allowed in this context',
    cause: 'A block sequence starts on the same line as a mapping key.',
    resolution: 'Move the sequence to the following lines.',
    examples: [{ description: 'Dash after key', code: 'a: - b' }],
  },
  {
    errorId: 'YAML-P010',
    category: 'parse',
    description: 'Anchor in invalid position',
    messageTemplate: 'anchor is not allowed in this context',
    cause: 'An anchor sits at or left of the key column it should belong to.',
    resolution: 'Place the anchor after the key on the same line.',
    examples: [{ description: 'Anchor at key column', code: 'a:\n&x\nb: 1' }],
  },
  {
    errorId: 'YAML-P011',
    category: 'parse',
    description: 'Unexpected value',
    messageTemplate: 'value is not allowed in this context',
    cause: 'A value follows a complete node without a separating structure.',
    resolution: 'Check indentation of the reported line.',
    examples: [
      { description: 'Text after a quoted scalar', code: 'a: "x" y' },
    ],
  },
  {
    errorId: 'YAML-P012',
    category: 'parse',
    description: 'Non-map value in mapping',
    messageTemplate: 'non-map value is specified',
    cause: 'A block mapping contains an entry at the key column that is not a key.',
    resolution: 'Add the missing key and colon, or fix indentation.',
    examples: [{ description: 'Scalar among keys', code: 'a: 1\nb\nc: 2' }],
  },
  {
    errorId: 'YAML-P013',
    category: 'parse',
    description: 'Missing anchor name',
    messageTemplate: 'could not find anchor value',
    cause: 'An & indicator is not followed by a name.',
    resolution: 'Write the anchor as &name.',
    examples: [{ description: 'Bare ampersand', code: 'a: & 1' }],
  },
  {
    errorId: 'YAML-P014',
    category: 'parse',
    description: 'Missing alias name',
    messageTemplate: 'could not find alias value',
    cause: 'A * indicator is not followed by a name.',
    resolution: 'Write the alias as *name.',
    examples: [{ description: 'Bare asterisk', code: 'a: *' }],
  },
  {
    errorId: 'YAML-P015',
    category: 'parse',
    description: 'Document not started',
    messageTemplate: 'directive must be followed by a document start marker',
    cause: 'A % directive is not followed by ---.',
    resolution: 'Add --- after the directives.',
    examples: [{ description: 'Directive without marker', code: '%YAML 1.2\na: 1' }],
  },
  {
    errorId: 'YAML-P016',
    category: 'parse',
    description: 'Unknown secondary tag',
    messageTemplate: 'unknown secondary tag name "{tag}" specified',
    cause: 'A !! tag is not one of the reserved core tags.',
    resolution: 'Use a reserved tag such as !!str, or a custom ! tag.',
    examples: [{ description: 'Misspelled tag', code: 'a: !!string x' }],
  },
  {
    errorId: 'YAML-P017',
    category: 'parse',
    description: 'Tag and value mismatch',
    messageTemplate: '{tag} tag requires a {expected} value',
    cause: 'A reserved tag is applied to a node of the wrong kind.',
    resolution: 'Remove the tag or change the value.',
    examples: [
      { description: 'Map tag on a scalar', code: 'a: !!map b' },
      { description: 'Scalar tag on a sequence', code: 'a: !!str [1]' },
    ],
  },
  {
    errorId: 'YAML-P018',
    category: 'parse',
    description: 'Invalid merge key value',
    messageTemplate: 'merge key value must be an alias or a sequence of aliases',
    cause: 'The value of << is not an alias, nor a sequence made only of aliases.',
    resolution: 'Reference anchored mappings: <<: *base or <<: [*a, *b].',
    examples: [{ description: 'Scalar merge value', code: '<<: base' }],
  },
  {
    errorId: 'YAML-P019',
    category: 'parse',
    description: 'Unexpected token',
    messageTemplate: 'unexpected {token} token',
    cause: 'An indicator appears where the grammar does not allow it.',
    resolution: 'Check the syntax at the reported position.',
    examples: [
      { description: 'Colon without a key', code: ': a' },
      { description: 'Sequence entry after a mapping', code: 'a: 1\n- b' },
    ],
  },
];

/**
 * Global error registry instance.
 * Read-only singleton initialized at module load.
 */
export const ERROR_REGISTRY: ErrorRegistry = new ErrorRegistryImpl(
  ERROR_DEFINITIONS
);

// ============================================================
// TEMPLATE RENDERING
// ============================================================

/**
 * Renders a message template by replacing placeholders with context values.
 *
 * Placeholder format: {varName}
 * Missing context values render as empty string.
 * Non-string values are coerced via String().
 * Invalid templates (unclosed braces) return template unchanged.
 *
 * @example
 * renderMessage('mapping key "{key}" already defined at {location}', { key: 'a', location: '[1:1]' })
 * // Returns: 'mapping key "a" already defined at [1:1]'
 */
export function renderMessage(
  template: string,
  context: Record<string, unknown>
): string {
  let result = '';
  let i = 0;

  while (i < template.length) {
    const char = template.charAt(i);

    if (char === '{') {
      const close = template.indexOf('}', i + 1);
      if (close < 0) {
        return template;
      }

      const value = context[template.slice(i + 1, close)];
      if (value !== undefined) {
        result += String(value);
      }

      i = close + 1;
      continue;
    }

    result += char;
    i++;
  }

  return result;
}
