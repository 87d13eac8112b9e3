/**
 * Which output bit is recorded for a given test index, and how it is read.
 *
 * Positions count from the most significant bit of the first byte. For an
 * integer output of declared width W, position p is bit W-1-p from the
 * least significant end, so an integer and its big-endian bytes agree.
 */

import { ConfigurationError, DomainError } from "./errors";
import type { Bit, FunctionOutput, VerificationBit } from "./types";
import { isNonNegativeInteger, isPositiveInteger } from "./utils";

/**
 * Cycles through every position of the output as the index grows,
 * so indices 0..n-1 sample min(n, width) distinct positions.
 */
export function selectBitPosition(index: number, outputBitWidth: number): number {
  if (!isNonNegativeInteger(index)) {
    throw new ConfigurationError(`index must be a non-negative integer; got ${index}`);
  }
  if (!isPositiveInteger(outputBitWidth)) {
    throw new DomainError(`output bit width must be a positive integer; got ${outputBitWidth}`, {
      index,
      width: outputBitWidth,
    });
  }
  return index % outputBitWidth;
}

export function isBitSequence(value: unknown): value is readonly Bit[] {
  return Array.isArray(value) && value.every((bit) => bit === 0 || bit === 1);
}

/**
 * Number of addressable bits the output itself carries (undefined for integers)
 */
function naturalWidth(output: FunctionOutput): number | undefined {
  if (output instanceof Uint8Array) {
    return output.length * 8;
  }
  if (Array.isArray(output)) {
    return output.length;
  }
  return undefined;
}

function assertWellFormed(output: unknown): asserts output is FunctionOutput {
  if (output instanceof Uint8Array || isBitSequence(output) || typeof output === "bigint") {
    return;
  }
  if (typeof output === "number" && Number.isSafeInteger(output)) {
    return;
  }
  throw new ConfigurationError(
    "function output must be a Uint8Array, a sequence of bits (0 or 1), or a safe integer"
  );
}

/**
 * Bit width used to select positions: the declared width when given,
 * otherwise whatever the output carries.
 */
export function outputWidth(output: FunctionOutput, index: number, outputBits?: number): number {
  if (outputBits !== undefined) {
    return outputBits;
  }
  const width = naturalWidth(output);
  if (width === undefined) {
    throw new DomainError(`integer output at index ${index} needs a declared outputBits width`, { index });
  }
  return width;
}

/**
 * The verification bit for one test case.
 */
export function readVerificationBit(output: unknown, index: number, outputBits?: number): VerificationBit {
  assertWellFormed(output);

  const width = outputWidth(output, index, outputBits);
  const position = selectBitPosition(index, width);

  if (typeof output === "number" || typeof output === "bigint") {
    const value = BigInt(output);
    if (value < 0n) {
      throw new ConfigurationError(`integer output at index ${index} must be non-negative`);
    }
    if (value >> BigInt(width) !== 0n) {
      throw new DomainError(`integer output at index ${index} does not fit in ${width} bits`, {
        index,
        position,
        width,
      });
    }
    return { position, bit: (value >> BigInt(width - 1 - position)) & 1n ? 1 : 0 };
  }

  const available = naturalWidth(output) ?? 0;
  if (position >= available) {
    throw new DomainError(
      `output at index ${index} has ${available} bits; position ${position} is not addressable`,
      { index, position, width: available }
    );
  }

  if (output instanceof Uint8Array) {
    return { position, bit: (output[position >> 3] >> (7 - (position & 7))) & 1 ? 1 : 0 };
  }
  return { position, bit: output[position] };
}
