/**
 * fountain-spec: Main entry point
 * Exports the input generator, the specification protocol and its error types
 */

export { Fountain, FountainConfig, FountainsOptions, fountains } from "./fountain";

export { InputStream, DEFAULT_LENGTH } from "./input-stream";

export { hashInput, deriveInputVector, DIGEST_SIZE } from "./index-hasher";

export { selectBitPosition, readVerificationBit, outputWidth, isBitSequence } from "./bit-selector";

export { BitPacker, hexPacker, bitsFromBytes, bytesFromBits } from "./bit-packing";

export {
  Specification,
  SpecificationSource,
  FromHexOptions,
  encode,
  encodeBits,
  verify,
  checks,
  assertCapability,
} from "./specification";

export {
  FountainError,
  FountainErrorKind,
  ConfigurationError,
  ValidationError,
  DomainError,
  DomainErrorDetails,
  isFountainError,
} from "./errors";

export { Logger, LogLevel, LogEntry, LogContext, LOG_LEVELS, isLogLevel, globalLogger } from "./logger";

export { normalizeSeed, DEFAULT_SEED } from "./utils";

export {
  Seed,
  Bit,
  BitSequence,
  InputVector,
  FunctionOutput,
  FunctionCapability,
  StreamOptions,
  FountainOptions,
  VerificationBit,
  Check,
} from "./types";
