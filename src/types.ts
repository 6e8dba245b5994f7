/**
 * Public option and result types
 */

import type { FileNode } from './ast-nodes.js';
import type { YamlSyntaxError } from './error-classes.js';
import type { BufferPool } from './lexer/pool.js';

// ============================================================
// OBSERVABILITY
// ============================================================

/** Observability callbacks for monitoring a parse */
export interface ObservabilityCallbacks {
  /** Called once the source has been scanned */
  onScan?: (event: ScanEvent) => void;
  /** Called after each document is parsed */
  onDocument?: (event: DocumentEvent) => void;
  /** Called when scanning or parsing fails, before the error is thrown */
  onError?: (event: ErrorEvent) => void;
}

/** Event emitted after scanning */
export interface ScanEvent {
  /** Tokens in the stream */
  tokenCount: number;
  /** Scan time in milliseconds */
  durationMs: number;
}

/** Event emitted after a document is parsed */
export interface DocumentEvent {
  /** Document index (0-based) */
  index: number;
  /** Path of the document root */
  path: string;
  /** Node type of the body, or null for an empty document */
  bodyType: string | null;
}

/** Event emitted on failure */
export interface ErrorEvent {
  /** The error about to be thrown */
  error: YamlSyntaxError;
}

// ============================================================
// OPTIONS
// ============================================================

export interface ParseOptions {
  /** Attach comments to nodes (default: true); the stream keeps them either way */
  readonly comments?: boolean | undefined;
  /** Accept repeated keys in one mapping (default: false) */
  readonly allowDuplicateKeys?: boolean | undefined;
  /** Buffers borrowed while scanning; a fresh pool is used when omitted */
  readonly pool?: BufferPool | undefined;
  readonly observability?: ObservabilityCallbacks | undefined;
}

export interface RenderOptions {
  /**
   * true (default): the exact source text.
   * false: canonical layout without comments.
   */
  readonly comments?: boolean | undefined;
}

// ============================================================
// RESULTS
// ============================================================

/** Outcome of safeParse() */
export type ParseResult =
  | { readonly success: true; readonly file: FileNode }
  | { readonly success: false; readonly error: YamlSyntaxError };
