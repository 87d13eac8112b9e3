import { ConfigurationError } from "./errors";
import { deriveInputVector } from "./index-hasher";
import type { InputVector, StreamOptions } from "./types";
import { isNonNegativeInteger, isPositiveInteger, normalizeSeed } from "./utils";

export const DEFAULT_LENGTH = 1;

/**
 * Lazy sequence of input vectors for index 0, 1, 2, ...
 *
 * Each iteration starts again from index 0 and only keeps its own cursor,
 * so independent iterators never interfere and unbounded consumption stays O(1).
 */
export class InputStream implements Iterable<InputVector> {
  readonly length: number;
  readonly limit: number | undefined;
  private readonly seedBytes: Uint8Array;

  constructor(options: StreamOptions = {}) {
    const length = options.length ?? DEFAULT_LENGTH;
    if (!isPositiveInteger(length)) {
      throw new ConfigurationError(`length must be a positive integer; got ${length}`);
    }
    this.length = length;
    this.limit = resolveLimit(options.limit);
    this.seedBytes = normalizeSeed(options.seed);
  }

  /**
   * Exact element count, or undefined when unbounded
   */
  get size(): number | undefined {
    return this.limit;
  }

  get bounded(): boolean {
    return this.limit !== undefined;
  }

  /**
   * Canonical bytes of this stream's seed (a copy)
   */
  get seed(): Uint8Array {
    return Uint8Array.from(this.seedBytes);
  }

  /**
   * Random access to one element; does not touch any iterator
   */
  at(index: number): InputVector {
    if (this.limit !== undefined && isNonNegativeInteger(index) && index >= this.limit) {
      throw new ConfigurationError(`index ${index} is outside a stream of ${this.limit} elements`);
    }
    return deriveInputVector(this.seedBytes, index, this.length);
  }

  /**
   * First `count` elements, capped by the limit
   */
  take(count: number): InputVector[] {
    if (!isNonNegativeInteger(count)) {
      throw new ConfigurationError(`count must be a non-negative integer; got ${count}`);
    }
    const total = this.limit === undefined ? count : Math.min(count, this.limit);
    const result: InputVector[] = [];
    for (let index = 0; index < total; index += 1) {
      result.push(deriveInputVector(this.seedBytes, index, this.length));
    }
    return result;
  }

  *[Symbol.iterator](): Iterator<InputVector> {
    for (let index = 0; this.limit === undefined || index < this.limit; index += 1) {
      yield deriveInputVector(this.seedBytes, index, this.length);
    }
  }
}

function resolveLimit(limit: number | undefined): number | undefined {
  if (limit === undefined || limit === Number.POSITIVE_INFINITY) {
    return undefined;
  }
  if (!isNonNegativeInteger(limit)) {
    throw new ConfigurationError(`limit must be a non-negative integer; got ${limit}`);
  }
  return limit;
}
