import { createHash } from "crypto";
import { ConfigurationError } from "./errors";
import type { InputVector, Seed } from "./types";
import { isNonNegativeInteger, isPositiveInteger, normalizeSeed } from "./utils";

export const DIGEST_SIZE = 32;

/**
 * Bytes for one stream position, as a pure function of (seed, index, length).
 *
 * Block k of the output is SHA-256(u32le(|seed|) ‖ seed ‖ u64le(index) ‖ u32le(k));
 * blocks are concatenated and truncated to `length`, so a shorter vector is
 * always a prefix of a longer one for the same seed and index.
 */
export function hashInput(seed: Seed, index: number, length: number): InputVector {
  return deriveInputVector(normalizeSeed(seed), index, length);
}

/**
 * Same as hashInput, for callers that hold an already normalized seed.
 */
export function deriveInputVector(seedBytes: Uint8Array, index: number, length: number): InputVector {
  if (!isPositiveInteger(length)) {
    throw new ConfigurationError(`length must be a positive integer; got ${length}`);
  }
  if (!isNonNegativeInteger(index)) {
    throw new ConfigurationError(`index must be a non-negative integer; got ${index}`);
  }

  const prefix = Buffer.alloc(4 + seedBytes.length + 8);
  prefix.writeUInt32LE(seedBytes.length, 0);
  prefix.set(seedBytes, 4);
  prefix.writeBigUInt64LE(BigInt(index), 4 + seedBytes.length);

  const blocks = Math.ceil(length / DIGEST_SIZE);
  const output = new Uint8Array(blocks * DIGEST_SIZE);
  const counter = Buffer.alloc(4);
  for (let block = 0; block < blocks; block += 1) {
    counter.writeUInt32LE(block, 0);
    const digest = createHash("sha256").update(prefix).update(counter).digest();
    output.set(digest, block * DIGEST_SIZE);
  }

  return output.slice(0, length);
}
