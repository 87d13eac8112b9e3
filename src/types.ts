/**
 * Shared type definitions for the input generator and the specification protocol
 */

import type { Logger } from "./logger";

/**
 * Selects a distinct pseudorandom stream. Integers are encoded little-endian,
 * strings as UTF-8, byte arrays as given.
 */
export type Seed = number | bigint | string | Uint8Array;

export type Bit = 0 | 1;

export type BitSequence = readonly Bit[];

export type InputVector = Uint8Array;

/**
 * Bytes and bit sequences carry their own width. Integers need `outputBits`.
 */
export type FunctionOutput = Uint8Array | BitSequence | number | bigint;

/**
 * The single operation a reference or candidate function has to provide.
 */
export type FunctionCapability = (input: InputVector) => FunctionOutput;

export type StreamOptions = {
  seed?: Seed;
  length?: number;
  /** Omit (or pass Infinity) for an unbounded stream. */
  limit?: number;
};

export type FountainOptions = StreamOptions & {
  /** Declared bit width of every function output. */
  outputBits?: number;
  logger?: Logger;
};

export type VerificationBit = {
  position: number;
  bit: Bit;
};

/**
 * One specification entry, for callers that run the function under test themselves.
 */
export type Check = {
  index: number;
  input: InputVector;
  /** Known up front only when outputBits is declared. */
  position?: number;
  expected: Bit;
  check(output: FunctionOutput): boolean;
};
