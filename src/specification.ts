/**
 * Specification encoding and verification.
 *
 * A specification records one output bit per test case. Verifying a candidate
 * replays the same inputs and bit positions; a `false` result always means the
 * candidate's sampled bit really differs from the reference's, while `true`
 * only certifies agreement on that one bit.
 */

import { bitsFromBytes, BitPacker, hexPacker } from "./bit-packing";
import { isBitSequence, readVerificationBit, selectBitPosition } from "./bit-selector";
import { ConfigurationError, ValidationError } from "./errors";
import { InputStream } from "./input-stream";
import { globalLogger } from "./logger";
import type { Bit, Check, FountainOptions, FunctionCapability, FunctionOutput } from "./types";
import { isNonNegativeInteger, isPositiveInteger } from "./utils";

export type SpecificationSource = Specification | string | Uint8Array | readonly number[];

export type FromHexOptions = {
  limit?: number;
  packer?: BitPacker;
};

export class Specification implements Iterable<Bit> {
  private readonly bits: readonly Bit[];

  private constructor(bits: readonly Bit[]) {
    this.bits = Object.freeze([...bits]);
  }

  static fromBits(bits: readonly number[], limit?: number): Specification {
    if (!isBitSequence(bits)) {
      throw new ValidationError("specification bits must each be 0 or 1");
    }
    if (limit !== undefined && bits.length !== limit) {
      throw new ValidationError(`specification has ${bits.length} bits but limit is ${limit}`);
    }
    return new Specification(bits);
  }

  /**
   * Eight bits per byte, most significant first.
   */
  static fromBytes(bytes: Uint8Array, limit?: number): Specification {
    return new Specification(trimPadding(bitsFromBytes(bytes), limit));
  }

  /**
   * With a limit, up to seven leading zero pad bits are dropped.
   */
  static fromHex(text: string, options: FromHexOptions = {}): Specification {
    const packer = options.packer ?? hexPacker;
    return new Specification(trimPadding(packer.unpack(text), options.limit));
  }

  static from(source: SpecificationSource, limit?: number): Specification {
    if (source instanceof Specification) {
      if (limit !== undefined && source.length !== limit) {
        throw new ValidationError(`specification has ${source.length} bits but limit is ${limit}`);
      }
      return source;
    }
    if (typeof source === "string") {
      return Specification.fromHex(source, { limit });
    }
    if (source instanceof Uint8Array) {
      return Specification.fromBytes(source, limit);
    }
    if (Array.isArray(source)) {
      return Specification.fromBits(source, limit);
    }
    throw new ValidationError(
      "specification must be a Specification, a hex string, a Uint8Array, or an array of bits"
    );
  }

  get length(): number {
    return this.bits.length;
  }

  bitAt(index: number): Bit {
    if (!Number.isInteger(index) || index < 0 || index >= this.bits.length) {
      throw new ValidationError(`index ${index} is outside a specification of ${this.bits.length} bits`);
    }
    return this.bits[index];
  }

  toBits(): Bit[] {
    return [...this.bits];
  }

  toHex(packer: BitPacker = hexPacker): string {
    return packer.pack(this.bits);
  }

  equals(other: Specification): boolean {
    return other.length === this.length && this.bits.every((bit, index) => other.bitAt(index) === bit);
  }

  [Symbol.iterator](): Iterator<Bit> {
    return this.bits[Symbol.iterator]();
  }
}

function trimPadding(bits: Bit[], limit: number | undefined): Bit[] {
  if (limit === undefined || limit === bits.length) {
    return bits;
  }
  const padding = bits.length - limit;
  if (padding > 0 && padding < 8 && bits.slice(0, padding).every((bit) => bit === 0)) {
    return bits.slice(padding);
  }
  throw new ValidationError(`specification has ${bits.length} bits but limit is ${limit}`);
}

/**
 * Wraps a generator factory so every iteration starts from the beginning.
 */
function restartable<T>(factory: () => Iterator<T>): Iterable<T> {
  return { [Symbol.iterator]: factory };
}

export function assertCapability(fn: unknown): asserts fn is FunctionCapability {
  if (typeof fn !== "function") {
    throw new ConfigurationError("function must be callable with a single input vector");
  }
}

function resolveOutputBits(outputBits: number | undefined): number | undefined {
  if (outputBits !== undefined && !isPositiveInteger(outputBits)) {
    throw new ConfigurationError(`outputBits must be a positive integer; got ${outputBits}`);
  }
  return outputBits;
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

/**
 * Lazy verification bits of `fn` over a stream, one call per index, in index order.
 */
export function encodeBits(stream: InputStream, fn: FunctionCapability, outputBits?: number): Iterable<Bit> {
  assertCapability(fn);
  const width = resolveOutputBits(outputBits);
  return restartable(function* () {
    let index = 0;
    for (const input of stream) {
      yield readVerificationBit(fn(input), index, width).bit;
      index += 1;
    }
  });
}

export function encode(options: FountainOptions, fn: FunctionCapability): Specification {
  const logger = options.logger ?? globalLogger;
  const stream = new InputStream(options);
  if (!stream.bounded) {
    throw new ConfigurationError("encoding a specification needs a finite limit");
  }

  logger.startTimer("encode");
  const specification = Specification.fromBits([...encodeBits(stream, fn, options.outputBits)]);
  logger.endTimer("encode", "Encoded specification");
  logger.debug("Specification ready", { limit: specification.length });
  return specification;
}

/**
 * Lazy per-test-case agreement of `fn` with a specification.
 * The limit is the specification's length; a conflicting `options.limit` is rejected up front.
 */
export function verify(
  options: FountainOptions,
  fn: FunctionCapability,
  source: SpecificationSource
): Iterable<boolean> {
  assertCapability(fn);
  const logger = options.logger ?? globalLogger;
  const specification = Specification.from(source, resolveLimit(options.limit));
  const width = resolveOutputBits(options.outputBits);
  const stream = new InputStream({ ...options, limit: specification.length });

  return restartable(function* () {
    let index = 0;
    let mismatches = 0;
    for (const input of stream) {
      const { position, bit } = readVerificationBit(fn(input), index, width);
      const consistent = bit === specification.bitAt(index);
      if (!consistent) {
        mismatches += 1;
        logger.debug("Output bit differs from specification", { index, position });
      }
      yield consistent;
      index += 1;
    }
    logger.debug("Verification complete", { total: specification.length, mismatches });
  });
}

/**
 * Input/predicate pairs for callers that apply the function under test themselves.
 */
export function checks(options: FountainOptions, source: SpecificationSource): Iterable<Check> {
  const specification = Specification.from(source, resolveLimit(options.limit));
  const width = resolveOutputBits(options.outputBits);
  const stream = new InputStream({ ...options, limit: specification.length });

  return restartable(function* () {
    let index = 0;
    for (const input of stream) {
      const expected = specification.bitAt(index);
      const at = index;
      const position = width === undefined ? undefined : selectBitPosition(at, width);
      yield {
        index: at,
        input,
        position,
        expected,
        check: (output: FunctionOutput): boolean => readVerificationBit(output, at, width).bit === expected,
      };
      index += 1;
    }
  });
}
