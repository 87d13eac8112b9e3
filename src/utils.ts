/**
 * Utility functions used across the generator
 */

import { ConfigurationError } from "./errors";
import type { Seed } from "./types";

export const DEFAULT_SEED: Uint8Array = new Uint8Array(0);

/**
 * Canonical byte encoding of a seed.
 * Integers use the fewest little-endian bytes that hold them, and at least one.
 */
export function normalizeSeed(seed: Seed = DEFAULT_SEED): Uint8Array {
  if (seed instanceof Uint8Array) {
    return Uint8Array.from(seed);
  }
  if (typeof seed === "string") {
    return Uint8Array.from(Buffer.from(seed, "utf8"));
  }
  if (typeof seed === "number") {
    if (!Number.isSafeInteger(seed)) {
      throw new ConfigurationError("seed must be an integer, string, or Uint8Array");
    }
    return integerToLittleEndian(BigInt(seed));
  }
  if (typeof seed === "bigint") {
    return integerToLittleEndian(seed);
  }
  throw new ConfigurationError("seed must be an integer, string, or Uint8Array");
}

function integerToLittleEndian(value: bigint): Uint8Array {
  if (value < 0n) {
    throw new ConfigurationError("integer seed must be non-negative");
  }
  const bytes: number[] = [];
  let rest = value;
  do {
    bytes.push(Number(rest & 0xffn));
    rest >>= 8n;
  } while (rest > 0n);
  return Uint8Array.from(bytes);
}

/**
 * Check that text is an even-length hex string (empty allowed)
 */
export function isHexString(text: string): boolean {
  return text.length % 2 === 0 && /^[0-9a-fA-F]*$/.test(text);
}

export function bytesToHex(bytes: Uint8Array): string {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString("hex");
}

export function hexToBytes(text: string): Uint8Array {
  return Uint8Array.from(Buffer.from(text, "hex"));
}

/**
 * Positive safe integer check used for lengths and bit widths
 */
export function isPositiveInteger(value: unknown): value is number {
  return typeof value === "number" && Number.isSafeInteger(value) && value > 0;
}

export function isNonNegativeInteger(value: unknown): value is number {
  return typeof value === "number" && Number.isSafeInteger(value) && value >= 0;
}

/**
 * Check if value is a plain object (not null, not array)
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}
