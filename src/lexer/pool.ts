/**
 * Buffer Pool
 * Reusable string buffers for scalar accumulation
 */

/**
 * Owned by one tokenize call at a time. Buffers come back empty, so a value
 * left over from a previous scalar never leaks into the next one.
 */
export class BufferPool {
  private readonly free: string[][] = [];
  private borrowed = 0;

  acquire(): string[] {
    this.borrowed++;
    return this.free.pop() ?? [];
  }

  release(buffer: string[]): void {
    if (this.borrowed === 0) {
      throw new RangeError('release() called without a matching acquire()');
    }
    this.borrowed--;
    buffer.length = 0;
    this.free.push(buffer);
  }

  /** Buffers currently lent out */
  get inUse(): number {
    return this.borrowed;
  }

  /** Buffers ready for reuse */
  get available(): number {
    return this.free.length;
  }
}

/** Run `fn` with a borrowed buffer, returning it to the pool afterwards */
export function withBuffer<T>(pool: BufferPool, fn: (buffer: string[]) => T): T {
  const buffer = pool.acquire();
  try {
    return fn(buffer);
  } finally {
    pool.release(buffer);
  }
}
