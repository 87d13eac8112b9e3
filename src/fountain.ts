/**
 * ═══════════════════════════════════════════════════════════════════════════
 * FOUNTAIN: reproducible test inputs and compact behaviour specifications
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * A Fountain is built once from an immutable configuration. Every method
 * returns a fresh lazy sequence derived from (seed, index), so the same
 * configuration always replays the same inputs.
 *
 * Usage:
 * const source = new Fountain({ length: 4, limit: 64 });
 * const spec = source.encode(reference);
 * const results = [...source.verify(candidate, spec.toHex())];
 */

import { ConfigurationError } from "./errors";
import { InputStream } from "./input-stream";
import { globalLogger, Logger } from "./logger";
import { checks, encode, encodeBits, Specification, SpecificationSource, verify } from "./specification";
import type { Bit, Check, FountainOptions, FunctionCapability, InputVector } from "./types";
import { isPositiveInteger, normalizeSeed } from "./utils";

export type FountainConfig = {
  readonly seed: Uint8Array;
  readonly length: number;
  readonly limit: number | undefined;
  readonly outputBits: number | undefined;
};

export class Fountain implements Iterable<InputVector> {
  readonly config: FountainConfig;
  private readonly logger: Logger;
  private readonly stream: InputStream;

  constructor(options: FountainOptions = {}) {
    this.stream = new InputStream(options);
    this.logger = options.logger ?? globalLogger;
    if (options.outputBits !== undefined && !isPositiveInteger(options.outputBits)) {
      throw new ConfigurationError(`outputBits must be a positive integer; got ${options.outputBits}`);
    }
    this.config = Object.freeze({
      seed: normalizeSeed(options.seed),
      length: this.stream.length,
      limit: this.stream.limit,
      outputBits: options.outputBits,
    });
  }

  /**
   * Seed comes from the stream's copy, not from config.seed
   */
  private get options(): FountainOptions {
    return {
      seed: this.stream.seed,
      length: this.config.length,
      limit: this.config.limit,
      outputBits: this.config.outputBits,
      logger: this.logger,
    };
  }

  /**
   * Raw generation mode: the input vectors themselves
   */
  inputs(): InputStream {
    return this.stream;
  }

  [Symbol.iterator](): Iterator<InputVector> {
    return this.stream[Symbol.iterator]();
  }

  /**
   * Lazy verification bits of a reference function; unbounded when the fountain is
   */
  bits(fn: FunctionCapability): Iterable<Bit> {
    return encodeBits(this.stream, fn, this.config.outputBits);
  }

  encode(fn: FunctionCapability): Specification {
    return encode(this.options, fn);
  }

  verify(fn: FunctionCapability, specification: SpecificationSource): Iterable<boolean> {
    return verify(this.options, fn, specification);
  }

  checks(specification: SpecificationSource): Iterable<Check> {
    return checks(this.options, specification);
  }
}

export type FountainsOptions = FountainOptions & {
  function?: FunctionCapability;
  specification?: SpecificationSource;
};

/**
 * One lazily produced sequence whose element type follows the options:
 * inputs, encoded bits, verification results, or checks.
 */
export function fountains(
  options: FountainsOptions & { function: FunctionCapability; specification: SpecificationSource }
): Iterable<boolean>;
export function fountains(options: FountainsOptions & { function: FunctionCapability; specification?: undefined }): Iterable<Bit>;
export function fountains(options: FountainsOptions & { function?: undefined; specification: SpecificationSource }): Iterable<Check>;
export function fountains(options?: FountainsOptions & { function?: undefined; specification?: undefined }): Iterable<InputVector>;
export function fountains(
  options: FountainsOptions = {}
): Iterable<InputVector> | Iterable<Bit> | Iterable<boolean> | Iterable<Check> {
  const { function: fn, specification, ...rest } = options;
  const source = new Fountain(rest);
  if (fn !== undefined && specification !== undefined) {
    return source.verify(fn, specification);
  }
  if (fn !== undefined) {
    return source.bits(fn);
  }
  if (specification !== undefined) {
    return source.checks(specification);
  }
  return source.inputs();
}
