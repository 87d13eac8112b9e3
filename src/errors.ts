/**
 * Error taxonomy shared by the generator, the encoder and the verifier.
 * Every error is deterministic misconfiguration, so nothing here is retried.
 */

export type FountainErrorKind = "ConfigurationError" | "ValidationError" | "DomainError";

export abstract class FountainError extends Error {
  abstract readonly kind: FountainErrorKind;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Invalid length, limit or seed, a capability that is not a function,
 * or a function output of an unsupported shape.
 */
export class ConfigurationError extends FountainError {
  readonly kind = "ConfigurationError";
}

/**
 * A supplied specification is malformed or disagrees with the requested limit.
 */
export class ValidationError extends FountainError {
  readonly kind = "ValidationError";
}

export type DomainErrorDetails = {
  index: number;
  position?: number;
  width?: number;
};

/**
 * A function output cannot be addressed at the selected bit position.
 */
export class DomainError extends FountainError {
  readonly kind = "DomainError";
  readonly index: number;
  readonly position?: number;
  readonly width?: number;

  constructor(message: string, details: DomainErrorDetails) {
    super(message);
    this.index = details.index;
    this.position = details.position;
    this.width = details.width;
  }
}

export const isFountainError = (value: unknown): value is FountainError => value instanceof FountainError;
