/**
 * Configuration loading and path expansion utilities
 *
 * Precedence: FOUNTAIN_* environment variables (including those found in the
 * .env search paths), then fountain.config.json, then the defaults below.
 */

import { existsSync, readFileSync } from "fs";
import { isAbsolute, join } from "path";
import { parse as parseEnv } from "dotenv";
import { z } from "zod";
import { ConfigurationError } from "../../src/errors";
import { DEFAULT_LENGTH } from "../../src/input-stream";
import { LogLevel } from "../../src/logger";
import type { Seed, StreamOptions } from "../../src/types";
import { hexToBytes, isHexString } from "../../src/utils";

export const DEFAULT_CONFIG_FILE = "fountain.config.json";
export const DEFAULT_ENV_SEARCH_PATHS = [".env"];
export const DEFAULT_LIMIT = 10;
export const DEFAULT_LOG_LEVEL: LogLevel = "info";
export const DEFAULT_REGISTRY_PATH = ".fountain/specifications.json";

export const configSchema = z
  .object({
    seed: z.union([z.string(), z.number().int().nonnegative()]).optional(),
    length: z.number().int().positive().optional(),
    limit: z.number().int().nonnegative().optional(),
    outputBits: z.number().int().positive().optional(),
    logLevel: z.enum(["debug", "info", "warn", "error"]).optional(),
    registryPath: z.string().min(1).optional(),
    envSearchPaths: z.array(z.string()).optional(),
  })
  .strict();

export type Config = z.infer<typeof configSchema>;

export type Environment = Record<string, string | undefined>;

/**
 * Seed text as written in config files, env vars and CLI flags:
 * "int:<decimal>" is an integer seed, "hex:<bytes>" a byte seed, anything else a string seed.
 */
export function parseSeed(text: string): Seed {
  if (text.startsWith("int:")) {
    const digits = text.slice(4);
    if (!/^\d+$/.test(digits)) {
      throw new ConfigurationError(`integer seed must be a non-negative decimal; got "${digits}"`);
    }
    return BigInt(digits);
  }
  if (text.startsWith("hex:")) {
    const hex = text.slice(4);
    if (!isHexString(hex)) {
      throw new ConfigurationError(`byte seed must be an even-length hex string; got "${hex}"`);
    }
    return hexToBytes(hex);
  }
  return text;
}

export class ConfigManager {
  private config: Config;
  private projectRoot: string;
  private env: Environment;

  constructor(projectRoot: string, configPath: string, env: Environment = process.env) {
    this.projectRoot = projectRoot;
    this.config = this.readConfig(configPath);
    this.env = this.loadEnvironment(env);
  }

  private readConfig(configPath: string): Config {
    if (!existsSync(configPath)) {
      return {};
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(readFileSync(configPath, "utf8"));
    } catch (error) {
      throw new ConfigurationError(`${configPath} is not valid JSON: ${String(error)}`);
    }

    const result = configSchema.safeParse(parsed);
    if (!result.success) {
      const issues = result.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
      throw new ConfigurationError(`${configPath} is invalid: ${issues.join("; ")}`);
    }
    return result.data;
  }

  /**
   * Variables from .env files fill gaps only; the given environment always wins.
   */
  private loadEnvironment(env: Environment): Environment {
    const merged: Environment = { ...env };
    for (const candidate of this.getEnvSearchPaths()) {
      const expanded = this.expandPath(candidate);
      if (!existsSync(expanded)) {
        continue;
      }
      const parsed = parseEnv(readFileSync(expanded));
      for (const [key, value] of Object.entries(parsed)) {
        if (merged[key] === undefined) {
          merged[key] = value;
        }
      }
    }
    return merged;
  }

  private readIntegerVariable(name: string, minimum: number): number | undefined {
    const raw = this.env[name];
    if (raw === undefined || raw === "") {
      return undefined;
    }
    const value = Number(raw);
    if (!/^\d+$/.test(raw) || !Number.isSafeInteger(value) || value < minimum) {
      throw new ConfigurationError(`${name} must be an integer >= ${minimum}; got "${raw}"`);
    }
    return value;
  }

  expandPath(rawPath: string): string {
    if (rawPath.startsWith("~/")) {
      const home = this.env.HOME ?? process.env.HOME;
      if (!home) {
        return rawPath.slice(2);
      }
      return join(home, rawPath.slice(2));
    }

    if (isAbsolute(rawPath)) {
      return rawPath;
    }

    return join(this.projectRoot, rawPath);
  }

  getEnvSearchPaths(): string[] {
    return this.config.envSearchPaths ?? DEFAULT_ENV_SEARCH_PATHS;
  }

  getSeed(): Seed | undefined {
    const fromEnv = this.env.FOUNTAIN_SEED;
    if (fromEnv !== undefined && fromEnv !== "") {
      return parseSeed(fromEnv);
    }
    const fromFile = this.config.seed;
    if (typeof fromFile === "string") {
      return parseSeed(fromFile);
    }
    return fromFile;
  }

  getLength(): number {
    return this.readIntegerVariable("FOUNTAIN_LENGTH", 1) ?? this.config.length ?? DEFAULT_LENGTH;
  }

  getLimit(): number {
    return this.readIntegerVariable("FOUNTAIN_LIMIT", 0) ?? this.config.limit ?? DEFAULT_LIMIT;
  }

  getOutputBits(): number | undefined {
    return this.readIntegerVariable("FOUNTAIN_OUTPUT_BITS", 1) ?? this.config.outputBits;
  }

  getLogLevel(): LogLevel {
    const raw = this.env.FOUNTAIN_LOG_LEVEL;
    if (raw === undefined || raw === "") {
      return this.config.logLevel ?? DEFAULT_LOG_LEVEL;
    }
    const result = configSchema.shape.logLevel.safeParse(raw);
    if (!result.success || result.data === undefined) {
      throw new ConfigurationError(`FOUNTAIN_LOG_LEVEL must be one of debug, info, warn, error; got "${raw}"`);
    }
    return result.data;
  }

  getRegistryPath(): string {
    return this.expandPath(this.config.registryPath ?? DEFAULT_REGISTRY_PATH);
  }

  /**
   * Stream settings for the generator, before any per-command overrides
   */
  getStreamOptions(): StreamOptions & { outputBits?: number } {
    return {
      seed: this.getSeed(),
      length: this.getLength(),
      limit: this.getLimit(),
      outputBits: this.getOutputBits(),
    };
  }

  getConfig(): Config {
    return this.config;
  }
}
