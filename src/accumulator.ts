/**
 * Growable byte buffer for response bodies
 */

import { AllocationError } from './exceptions.js';

const INITIAL_CAPACITY = 1024;

export interface AccumulatorOptions {
  /** Largest body the accumulator may hold, in bytes (default: unbounded) */
  maxBytes?: number;
}

/**
 * Collects a response body chunk by chunk as the transport delivers it.
 *
 * `length` only grows. A failed append leaves the bytes already collected
 * intact and reports 0 bytes consumed, which the transport treats as an
 * aborted transfer.
 *
 * @example
 * ```typescript
 * const acc = new ResponseAccumulator();
 * acc.append(new TextEncoder().encode('{"id":'));
 * acc.append(new TextEncoder().encode('"1"}'));
 * acc.toString(); // '{"id":"1"}'
 * ```
 */
export class ResponseAccumulator {
  private buffer: Uint8Array = new Uint8Array(0);
  private size = 0;
  private failure: AllocationError | null = null;
  private readonly maxBytes: number;

  constructor(options: AccumulatorOptions = {}) {
    this.maxBytes = options.maxBytes ?? Number.POSITIVE_INFINITY;
  }

  /** Number of bytes accumulated */
  get length(): number {
    return this.size;
  }

  /** True once an append could not be satisfied */
  get failed(): boolean {
    return this.failure !== null;
  }

  /** The allocation failure that stopped accumulation, if any */
  get error(): AllocationError | null {
    return this.failure;
  }

  /**
   * Append a chunk after the bytes already held.
   *
   * @returns Number of bytes consumed: `chunk.length`, or 0 on allocation failure
   */
  append(chunk: Uint8Array): number {
    const needed = this.size + chunk.length;

    if (needed > this.buffer.length) {
      const grown = this.grow(needed);
      if (!grown) {
        return 0;
      }
      grown.set(this.buffer.subarray(0, this.size));
      this.buffer = grown;
    }

    this.buffer.set(chunk, this.size);
    this.size = needed;
    return chunk.length;
  }

  /** Copy of exactly the accumulated bytes */
  bytes(): Uint8Array {
    return this.buffer.slice(0, this.size);
  }

  /** UTF-8 decode of the accumulated bytes */
  toString(): string {
    return new TextDecoder().decode(this.buffer.subarray(0, this.size));
  }

  private grow(needed: number): Uint8Array | null {
    if (needed > this.maxBytes) {
      this.failure = new AllocationError(
        `response exceeds ${this.maxBytes} bytes (needed ${needed})`,
        needed
      );
      return null;
    }

    // Amortized doubling, clamped to the configured limit
    let capacity = Math.max(this.buffer.length, INITIAL_CAPACITY);
    while (capacity < needed) {
      capacity *= 2;
    }
    capacity = Math.min(capacity, this.maxBytes);

    try {
      return new Uint8Array(capacity);
    } catch (error) {
      if (error instanceof RangeError) {
        this.failure = new AllocationError(
          `not enough memory for ${capacity} bytes`,
          needed
        );
        return null;
      }
      throw error;
    }
  }
}
