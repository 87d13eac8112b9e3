/**
 * Bit sequence <-> text packing.
 *
 * The hex convention treats a bit sequence like a big-endian integer: it is
 * left-padded with zero bits to whole bytes, so "10110" packs to "16".
 * Unpacking cannot tell pad bits from data; callers that know the intended
 * length strip them (see Specification.fromHex).
 */

import { ValidationError } from "./errors";
import type { Bit, BitSequence } from "./types";
import { bytesToHex, hexToBytes, isHexString } from "./utils";

export interface BitPacker {
  readonly name: string;
  pack(bits: BitSequence): string;
  unpack(text: string): Bit[];
}

export function bitsFromBytes(bytes: Uint8Array): Bit[] {
  const bits: Bit[] = [];
  for (const byte of bytes) {
    for (let shift = 7; shift >= 0; shift -= 1) {
      bits.push((byte >> shift) & 1 ? 1 : 0);
    }
  }
  return bits;
}

export function bytesFromBits(bits: BitSequence): Uint8Array {
  const padding = (8 - (bits.length % 8)) % 8;
  const bytes = new Uint8Array((bits.length + padding) / 8);
  bits.forEach((bit, offset) => {
    const position = offset + padding;
    bytes[position >> 3] |= bit << (7 - (position & 7));
  });
  return bytes;
}

export const hexPacker: BitPacker = {
  name: "hex",
  pack(bits: BitSequence): string {
    return bytesToHex(bytesFromBits(bits));
  },
  unpack(text: string): Bit[] {
    if (!isHexString(text)) {
      throw new ValidationError(`specification text must be an even-length hex string; got "${text}"`);
    }
    return bitsFromBytes(hexToBytes(text));
  },
};
