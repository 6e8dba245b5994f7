/**
 * Error Registry Tests
 */

import { describe, expect, it } from 'vitest';

import {
  ERROR_REGISTRY,
  LexicalError,
  StructuralError,
  TOKEN_TYPES,
  TokenStream,
  createError,
  renderMessage,
  safeParse,
} from '../src/index.js';

const definitions = [...ERROR_REGISTRY.entries()].map(([, def]) => def);

const examples = definitions.flatMap((def) =>
  (def.examples ?? []).map(
    (example) => [def.errorId, example.description, example.code] as const
  )
);

function source() {
  const tokens = new TokenStream();
  const token = tokens.append({
    type: TOKEN_TYPES.STRING,
    value: 'a',
    text: 'a',
    origin: 'a',
    position: { line: 2, column: 3, offset: 7, indentNum: 2, indentLevel: 1 },
    end: { line: 2, column: 4, offset: 8 },
  });
  return { token, tokens };
}

describe('ERROR_REGISTRY', () => {
  it('holds the lexer and parser errors', () => {
    expect(ERROR_REGISTRY.size).toBe(25);
    expect(definitions.filter((def) => def.category === 'lexer')).toHaveLength(6);
  });

  it('prefixes ids by category', () => {
    for (const def of definitions) {
      const prefix = def.category === 'lexer' ? 'YAML-L' : 'YAML-P';
      expect(def.errorId).toMatch(new RegExp(`^${prefix}\\d{3}$`));
    }
  });

  it.each(examples)('%s: %s', (errorId, _description, code) => {
    const result = safeParse(code);

    expect(result.success).toBe(false);
    if (!result.success) expect(result.error.errorId).toBe(errorId);
  });
});

describe('renderMessage', () => {
  it('fills placeholders', () => {
    expect(renderMessage('{a} and {b}', { a: 1, b: 'two' })).toBe('1 and two');
  });

  it('drops missing values', () => {
    expect(renderMessage('x{missing}y', {})).toBe('xy');
  });

  it('returns an unclosed template unchanged', () => {
    expect(renderMessage('open {brace', { brace: 1 })).toBe('open {brace');
  });
});

describe('createError', () => {
  it('builds the class of the category', () => {
    const lexical = createError('YAML-L005', { char: '@' }, source());
    const structural = createError('YAML-P013', {}, source());

    expect(lexical).toBeInstanceOf(LexicalError);
    expect(lexical.message).toBe('[2:3] "@" is a reserved character');
    expect(structural).toBeInstanceOf(StructuralError);
    expect(structural.name).toBe('StructuralError');
  });

  it('rejects unknown ids', () => {
    expect(() => createError('YAML-X999', {}, source())).toThrow(
      'Unknown error ID: YAML-X999'
    );
  });

  it('rejects ids of the other category', () => {
    expect(() => new LexicalError('YAML-P001', 'x', source())).toThrow(
      'Expected lexer error ID, got: YAML-P001'
    );
  });
});
