/**
 * Observability Tests
 * Tests for parse event callbacks
 */

import { describe, expect, it, vi } from 'vitest';

import {
  BufferPool,
  type DocumentEvent,
  type ErrorEvent,
  type ObservabilityCallbacks,
  type ScanEvent,
  parse,
} from '../src/index.js';

function createEventCollector() {
  const events = {
    scan: [] as ScanEvent[],
    document: [] as DocumentEvent[],
    error: [] as ErrorEvent[],
  };
  const callbacks: ObservabilityCallbacks = {
    onScan: (event) => events.scan.push(event),
    onDocument: (event) => events.document.push(event),
    onError: (event) => events.error.push(event),
  };
  return { events, callbacks };
}

describe('observability', () => {
  describe('onScan', () => {
    it('fires once with the token count', () => {
      const { events, callbacks } = createEventCollector();
      parse('a: 1\n', { observability: callbacks });

      expect(events.scan).toHaveLength(1);
      expect(events.scan[0]?.tokenCount).toBe(3);
      expect(events.scan[0]?.durationMs).toBeGreaterThanOrEqual(0);
    });
  });

  describe('onDocument', () => {
    it('fires for each document in order', () => {
      const { events, callbacks } = createEventCollector();
      parse('a: 1\n---\n- x\n---\n', { observability: callbacks });

      expect(events.document).toEqual([
        { index: 0, path: '$', bodyType: 'Mapping' },
        { index: 1, path: '$', bodyType: 'Sequence' },
        { index: 2, path: '$', bodyType: null },
      ]);
    });
  });

  describe('onError', () => {
    it('receives scanner errors before they are thrown', () => {
      const { events, callbacks } = createEventCollector();

      expect(() => parse('a: "open', { observability: callbacks })).toThrow();
      expect(events.error[0]?.error.errorId).toBe('YAML-L001');
      expect(events.scan).toEqual([]);
    });

    it('receives parser errors', () => {
      const { events, callbacks } = createEventCollector();

      expect(() => parse('a: 1\na: 2', { observability: callbacks })).toThrow();
      expect(events.error.map((event) => event.error.errorId)).toEqual([
        'YAML-P005',
      ]);
      expect(events.document).toEqual([]);
    });
  });

  it('works with only some callbacks', () => {
    const onDocument = vi.fn();
    parse('a: 1', { observability: { onDocument } });

    expect(onDocument).toHaveBeenCalledTimes(1);
  });

  it('returns borrowed buffers to a shared pool', () => {
    const pool = new BufferPool();
    parse('a: "x"\n', { pool });
    parse('b: "y"\n', { pool });

    expect(pool.inUse).toBe(0);
    expect(pool.available).toBe(1);
  });
});
