/**
 * Parser Tests: Documents and Directives
 */

import { describe, expect, it } from 'vitest';

import { commentText, parse, safeParse } from '../../src/index.js';
import { expectType, parseDocument, parseError, toPlain } from '../helpers/yaml.js';

describe('documents', () => {
  it('returns no documents for empty input', () => {
    expect(parse('').documents).toEqual([]);
    expect(parse('\n\n').documents).toEqual([]);
  });

  it('splits the stream at document markers', () => {
    const file = parse('---\na: 1\n---\nb: 2\n');

    expect(file.documents.map((doc) => toPlain(doc.body))).toEqual([
      { a: 1 },
      { b: 2 },
    ]);
    expect(file.documents.map((doc) => doc.start?.text)).toEqual(['---', '---']);
  });

  it('records the document end marker', () => {
    const doc = parseDocument('a: 1\n...\n');

    expect(doc.start).toBeNull();
    expect(doc.end?.text).toBe('...');
  });

  it('starts a new document after an end marker', () => {
    const file = parse('a: 1\n...\nb: 2\n');

    expect(file.documents).toHaveLength(2);
    expect(toPlain(file.documents[1]?.body ?? null)).toEqual({ b: 2 });
  });

  it('gives a marker without content a null body', () => {
    const doc = parseDocument('---\n');

    expect(doc.body).toBeNull();
    expect(doc.path).toBe('$');
  });

  it('records the document span and stream', () => {
    const file = parse('---\na: 1\n');
    const doc = file.documents[0];

    expect(doc?.first.text).toBe('---');
    expect(doc?.last.value).toBe('1');
    expect(doc?.tokens).toBe(file.tokens);
  });

  it('accepts a document holding one scalar', () => {
    const doc = parseDocument('--- hello\n');

    expect(expectType(doc.body, 'String').value).toBe('hello');
  });
});

describe('directives', () => {
  it('splits directive names and parameters', () => {
    const doc = parseDocument('%YAML 1.2\n%TAG ! tag:example.com,2000:\n---\n');

    expect(
      doc.directives.map((directive) => [directive.name, directive.parameters])
    ).toEqual([
      ['YAML', ['1.2']],
      ['TAG', ['!', 'tag:example.com,2000:']],
    ]);
    expect(doc.body).toBeNull();
  });

  it('requires a document start after directives', () => {
    const error = parseError('%YAML 1.2\na: 1\n');

    expect(error.errorId).toBe('YAML-P015');
    expect(error.message).toBe(
      '[1:1] directive must be followed by a document start marker'
    );
  });
});

describe('document comments', () => {
  it('keeps a comment-only stream as one document', () => {
    const doc = parseDocument('# only\n');

    expect(doc.body).toBeNull();
    expect(doc.footComment && commentText(doc.footComment)).toBe('only');
  });

  it('attaches comments before the start marker to the document', () => {
    const doc = parseDocument('# lead\n---\na: 1\n');

    expect(doc.comment && commentText(doc.comment)).toBe('lead');
  });

  it('attaches comments after the end marker to the document foot', () => {
    const doc = parseDocument('a: 1\n...\n# tail\n');

    expect(doc.footComment && commentText(doc.footComment)).toBe('tail');
  });

  it('attaches trailing comments of the root block to the document', () => {
    const doc = parseDocument('a: 1\nb: 2\n# end\n');

    expect(doc.footComment && commentText(doc.footComment)).toBe('end');
    expect(expectType(doc.body, 'Mapping').footComment).toBeNull();
  });
});

describe('safeParse', () => {
  it('returns the file on success', () => {
    const result = safeParse('a: 1');

    expect(result.success).toBe(true);
    if (result.success) expect(result.file.documents).toHaveLength(1);
  });

  it('returns the error instead of throwing', () => {
    const result = safeParse('{ a: 1');

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.errorId).toBe('YAML-P001');
      expect(result.error.message).toBe(
        "[1:1] could not find flow mapping end token '}'"
      );
    }
  });
});
