/**
 * Persisted store of named specifications
 * Keeps the seed, stream shape and packed bits needed to re-run a verification later
 */

import { writeFileSync, readFileSync, existsSync, mkdirSync } from "fs";
import { dirname } from "path";
import { z } from "zod";
import { ValidationError } from "../../src/errors";
import { Specification } from "../../src/specification";
import type { Seed } from "../../src/types";
import { bytesToHex, hexToBytes, isHexString, normalizeSeed } from "../../src/utils";

const hexText = z.string().refine(isHexString, { message: "must be an even-length hex string" });

export const seedRecordSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("text"), value: z.string() }),
  z.object({ kind: z.literal("integer"), value: z.string().regex(/^\d+$/) }),
  z.object({ kind: z.literal("bytes"), value: hexText }),
]);

export type SeedRecord = z.infer<typeof seedRecordSchema>;

export const storedSpecificationSchema = z.object({
  id: z.string().min(1),
  description: z.string().optional(),
  seed: seedRecordSchema,
  length: z.number().int().positive(),
  limit: z.number().int().nonnegative(),
  outputBits: z.number().int().positive().optional(),
  bits: hexText,
  createdAt: z.string(),
});

export type StoredSpecification = z.infer<typeof storedSpecificationSchema>;

/**
 * Tagged form of a seed, so that "12" the string and 12 the integer stay distinct
 */
export function toSeedRecord(seed: Seed | undefined): SeedRecord {
  if (seed === undefined) {
    return { kind: "bytes", value: "" };
  }
  if (typeof seed === "string") {
    return { kind: "text", value: seed };
  }
  if (typeof seed === "number" || typeof seed === "bigint") {
    normalizeSeed(seed); // rejects negative and fractional integers
    return { kind: "integer", value: BigInt(seed).toString(10) };
  }
  return { kind: "bytes", value: bytesToHex(seed) };
}

export function fromSeedRecord(record: SeedRecord): Seed {
  switch (record.kind) {
    case "text":
      return record.value;
    case "integer":
      return BigInt(record.value);
    case "bytes":
      return hexToBytes(record.value);
  }
}

export class SpecificationRegistry {
  private entries: Record<string, StoredSpecification> = {};
  private dirty = false;

  constructor(private registryPath: string) {
    this.load();
  }

  private load(): void {
    if (!existsSync(this.registryPath)) {
      this.entries = {};
      return;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(this.registryPath, "utf8"));
    } catch (error) {
      throw new ValidationError(`${this.registryPath} is not valid JSON: ${String(error)}`);
    }

    const parsed = z.array(storedSpecificationSchema).safeParse(raw);
    if (!parsed.success) {
      throw new ValidationError(`${this.registryPath} is not a specification registry: ${parsed.error.message}`);
    }

    this.entries = {};
    for (const entry of parsed.data) {
      this.entries[entry.id] = entry;
    }
  }

  register(entry: StoredSpecification): void {
    const result = storedSpecificationSchema.safeParse(entry);
    if (!result.success) {
      throw new ValidationError(`invalid stored specification: ${result.error.message}`);
    }
    const validated = result.data;
    // bits and limit must agree
    Specification.fromHex(validated.bits, { limit: validated.limit });

    const existing = this.entries[validated.id];
    if (!existing) {
      this.entries[validated.id] = validated;
      this.dirty = true;
      return;
    }

    // Check if anything changed
    if (JSON.stringify(existing) !== JSON.stringify(validated)) {
      this.entries[validated.id] = validated;
      this.dirty = true;
    }
  }

  get(id: string): StoredSpecification | undefined {
    return this.entries[id];
  }

  /**
   * The stored bits, trimmed to the stored limit
   */
  toSpecification(id: string): Specification {
    const entry = this.entries[id];
    if (!entry) {
      throw new ValidationError(`no stored specification named "${id}"`);
    }
    return Specification.fromHex(entry.bits, { limit: entry.limit });
  }

  remove(id: string): boolean {
    if (!this.entries[id]) {
      return false;
    }
    delete this.entries[id];
    this.dirty = true;
    return true;
  }

  all(): StoredSpecification[] {
    return Object.values(this.entries);
  }

  isDirty(): boolean {
    return this.dirty;
  }

  persist(): void {
    if (!this.dirty) {
      return;
    }

    mkdirSync(dirname(this.registryPath), { recursive: true });

    const entries = this.all().sort((a, b) => a.id.localeCompare(b.id));
    writeFileSync(this.registryPath, JSON.stringify(entries, null, 2), "utf8");

    this.dirty = false;
  }

  clear(): void {
    this.entries = {};
    this.dirty = true;
  }

  size(): number {
    return Object.keys(this.entries).length;
  }
}
