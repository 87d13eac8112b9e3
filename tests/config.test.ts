/**
 * Test suite for ConfigManager
 */

import { describe, it, expect, beforeEach, afterEach } from "@jest/globals";
import {
  ConfigManager,
  DEFAULT_CONFIG_FILE,
  DEFAULT_ENV_SEARCH_PATHS,
  DEFAULT_LIMIT,
  DEFAULT_REGISTRY_PATH,
  parseSeed,
} from "../tooling/lib/config";
import { ConfigurationError } from "../src/errors";
import { writeFileSync, existsSync, mkdirSync, rmSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";

describe("ConfigManager", () => {
  let configPath: string;
  let projectRoot: string;

  beforeEach(() => {
    projectRoot = join(tmpdir(), `project-${Date.now()}-${Math.random().toString(16).slice(2)}`);
    mkdirSync(projectRoot, { recursive: true });
    configPath = join(projectRoot, DEFAULT_CONFIG_FILE);
  });

  afterEach(() => {
    if (existsSync(projectRoot)) {
      rmSync(projectRoot, { recursive: true, force: true });
    }
  });

  it("should load default config when file does not exist", () => {
    const manager = new ConfigManager(projectRoot, configPath, {});

    expect(manager.getEnvSearchPaths()).toEqual(DEFAULT_ENV_SEARCH_PATHS);
    expect(manager.getSeed()).toBeUndefined();
    expect(manager.getLength()).toBe(1);
    expect(manager.getLimit()).toBe(DEFAULT_LIMIT);
    expect(manager.getOutputBits()).toBeUndefined();
    expect(manager.getLogLevel()).toBe("info");
    expect(manager.getRegistryPath()).toBe(join(projectRoot, DEFAULT_REGISTRY_PATH));
    expect(manager.getConfig()).toEqual({});
  });

  it("should load custom config from file", () => {
    const customConfig = {
      seed: "int:7",
      length: 3,
      limit: 8,
      outputBits: 8,
      logLevel: "debug",
      registryPath: "specs/registry.json",
    };

    writeFileSync(configPath, JSON.stringify(customConfig), "utf8");
    const manager = new ConfigManager(projectRoot, configPath, {});

    expect(manager.getStreamOptions()).toEqual({ seed: 7n, length: 3, limit: 8, outputBits: 8 });
    expect(manager.getLogLevel()).toBe("debug");
    expect(manager.getRegistryPath()).toBe(join(projectRoot, "specs/registry.json"));
  });

  it("should accept a numeric seed in the config file", () => {
    writeFileSync(configPath, JSON.stringify({ seed: 5 }), "utf8");
    expect(new ConfigManager(projectRoot, configPath, {}).getSeed()).toBe(5);
  });

  it("should let environment variables override the config file", () => {
    writeFileSync(configPath, JSON.stringify({ seed: "file", length: 3, limit: 8 }), "utf8");
    const manager = new ConfigManager(projectRoot, configPath, {
      FOUNTAIN_SEED: "hex:0a0b",
      FOUNTAIN_LENGTH: "5",
      FOUNTAIN_LOG_LEVEL: "warn",
    });

    expect(manager.getSeed()).toEqual(Uint8Array.of(10, 11));
    expect(manager.getLength()).toBe(5);
    expect(manager.getLimit()).toBe(8);
    expect(manager.getLogLevel()).toBe("warn");
  });

  it("should fill gaps from .env files without overriding the environment", () => {
    writeFileSync(join(projectRoot, ".env"), "FOUNTAIN_LIMIT=4\nFOUNTAIN_LENGTH=9\n", "utf8");
    const manager = new ConfigManager(projectRoot, configPath, { FOUNTAIN_LENGTH: "2" });

    expect(manager.getLength()).toBe(2);
    expect(manager.getLimit()).toBe(4);
  });

  it("should read .env files from custom search paths", () => {
    writeFileSync(configPath, JSON.stringify({ envSearchPaths: [".env.local"] }), "utf8");
    writeFileSync(join(projectRoot, ".env.local"), "FOUNTAIN_OUTPUT_BITS=16\n", "utf8");

    expect(new ConfigManager(projectRoot, configPath, {}).getOutputBits()).toBe(16);
  });

  it("should reject malformed environment values", () => {
    expect(() => new ConfigManager(projectRoot, configPath, { FOUNTAIN_LIMIT: "-1" }).getLimit()).toThrow(
      ConfigurationError
    );
    expect(() => new ConfigManager(projectRoot, configPath, { FOUNTAIN_LENGTH: "0" }).getLength()).toThrow(
      ConfigurationError
    );
    expect(() => new ConfigManager(projectRoot, configPath, { FOUNTAIN_OUTPUT_BITS: "8x" }).getOutputBits()).toThrow(
      ConfigurationError
    );
    expect(() => new ConfigManager(projectRoot, configPath, { FOUNTAIN_LOG_LEVEL: "loud" }).getLogLevel()).toThrow(
      ConfigurationError
    );
  });

  it("should accept a limit of zero from the environment", () => {
    expect(new ConfigManager(projectRoot, configPath, { FOUNTAIN_LIMIT: "0" }).getLimit()).toBe(0);
  });

  it("should reject invalid config files", () => {
    writeFileSync(configPath, "{ not json", "utf8");
    expect(() => new ConfigManager(projectRoot, configPath, {})).toThrow(ConfigurationError);

    writeFileSync(configPath, JSON.stringify({ length: 0 }), "utf8");
    expect(() => new ConfigManager(projectRoot, configPath, {})).toThrow(ConfigurationError);

    writeFileSync(configPath, JSON.stringify({ maxAttempts: 3 }), "utf8");
    expect(() => new ConfigManager(projectRoot, configPath, {})).toThrow(ConfigurationError);
  });

  it("should expand relative paths", () => {
    const manager = new ConfigManager(projectRoot, configPath, {});
    expect(manager.expandPath("relative/path")).toBe(join(projectRoot, "relative/path"));
  });

  it("should keep absolute paths", () => {
    const manager = new ConfigManager(projectRoot, configPath, {});
    const absolutePath = join(tmpdir(), "absolute");
    expect(manager.expandPath(absolutePath)).toBe(absolutePath);
  });

  it("should expand home directory paths", () => {
    const manager = new ConfigManager(projectRoot, configPath, { HOME: "/home/tester" });
    expect(manager.expandPath("~/specs.json")).toBe(join("/home/tester", "specs.json"));
  });
});

describe("parseSeed", () => {
  it("should read the integer, hex and text forms", () => {
    expect(parseSeed("int:123")).toBe(123n);
    expect(parseSeed("hex:0102")).toEqual(Uint8Array.of(1, 2));
    expect(parseSeed("hex:")).toEqual(new Uint8Array(0));
    expect(parseSeed("plain words")).toBe("plain words");
    expect(parseSeed("")).toBe("");
  });

  it("should reject malformed integer and hex seeds", () => {
    expect(() => parseSeed("int:-4")).toThrow(ConfigurationError);
    expect(() => parseSeed("int:")).toThrow(ConfigurationError);
    expect(() => parseSeed("hex:abc")).toThrow(ConfigurationError);
  });
});
