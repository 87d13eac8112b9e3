/**
 * Command definitions for the fountain CLI
 *
 *   fountain generate --length 3 --limit 4
 *   fountain encode ./reference.js --limit 64 --save sum-v1
 *   fountain verify ./candidate.js --id sum-v1
 */

import { resolve } from "path";
import { Command, InvalidArgumentError, Option } from "commander";
import { ConfigurationError, ValidationError } from "../../src/errors";
import { Logger } from "../../src/logger";
import { assertCapability, encode, Specification, verify } from "../../src/specification";
import { InputStream } from "../../src/input-stream";
import type { FunctionCapability, Seed } from "../../src/types";
import { bytesToHex, isPlainObject } from "../../src/utils";
import { AuditLog } from "./audit";
import { ConfigManager, parseSeed } from "./config";
import { fromSeedRecord, SpecificationRegistry, toSeedRecord } from "./registry";

export interface CliIO {
  write(line: string): void;
  writeError(line: string): void;
  setExitCode(code: number): void;
}

export type FunctionLoader = (modulePath: string, exportName: string) => Promise<FunctionCapability>;

export type CliDependencies = {
  config: ConfigManager;
  logger: Logger;
  audit: AuditLog;
  io: CliIO;
  loadFunction: FunctionLoader;
  openRegistry: () => SpecificationRegistry;
  /** Throw CommanderError instead of exiting the process on parse errors and --help. */
  exitOverride?: boolean;
};

type StreamFlags = {
  seed?: Seed;
  length?: number;
  limit?: number;
  outputBits?: number;
};

/**
 * Load a compiled JS module and pick one exported function from it
 */
export async function loadFunctionFromModule(modulePath: string, exportName: string): Promise<FunctionCapability> {
  const loaded: unknown = await import(resolve(modulePath));
  if (!isPlainObject(loaded)) {
    throw new ConfigurationError(`${modulePath} did not load as a module`);
  }
  const candidate = loaded[exportName];
  if (typeof candidate !== "function") {
    throw new ConfigurationError(`${modulePath} has no exported function "${exportName}"`);
  }
  assertCapability(candidate);
  return candidate;
}

function integerOption(minimum: number): (value: string) => number {
  return (value: string) => {
    const parsed = Number(value);
    if (!/^\d+$/.test(value) || !Number.isSafeInteger(parsed) || parsed < minimum) {
      throw new InvalidArgumentError(`expected an integer >= ${minimum}`);
    }
    return parsed;
  };
}

function seedOption(value: string): Seed {
  try {
    return parseSeed(value);
  } catch (error) {
    throw new InvalidArgumentError(error instanceof Error ? error.message : String(error));
  }
}

/**
 * Little-endian integer value of a byte vector
 */
export function littleEndianValue(bytes: Uint8Array): bigint {
  let value = 0n;
  for (let index = bytes.length - 1; index >= 0; index -= 1) {
    value = (value << 8n) | BigInt(bytes[index]);
  }
  return value;
}

function withStreamOptions(command: Command): Command {
  return command
    .option("--seed <seed>", 'seed text; "int:<n>" for an integer, "hex:<bytes>" for bytes', seedOption)
    .option("--length <n>", "bytes per input vector", integerOption(1))
    .option("--limit <n>", "number of test cases", integerOption(0))
    .option("--output-bits <n>", "declared bit width of every function output", integerOption(1));
}

export function createProgram(deps: CliDependencies): Command {
  const { config, logger, audit, io } = deps;
  logger.setLevel(config.getLogLevel());

  const defaults = (flags: StreamFlags): Required<Pick<StreamFlags, "length" | "limit">> & StreamFlags => ({
    seed: flags.seed ?? config.getSeed(),
    length: flags.length ?? config.getLength(),
    limit: flags.limit ?? config.getLimit(),
    outputBits: flags.outputBits ?? config.getOutputBits(),
  });

  // Subcommands created through program.command() inherit output and exit settings.
  const program = new Command();
  program
    .name("fountain")
    .description("Reproducible test inputs and compact behaviour specifications")
    .configureOutput({
      writeOut: (text) => io.write(text.trimEnd()),
      writeErr: (text) => io.writeError(text.trimEnd()),
    });
  if (deps.exitOverride) {
    program.exitOverride();
  }
  program.hook("preAction", (_program, actionCommand) => {
    logger.setContext({ command: actionCommand.name() });
  });

  withStreamOptions(program.command("generate"))
    .description("Print pseudorandom input vectors, one per line")
    .addOption(new Option("--format <format>", "output format").choices(["hex", "int"]).default("hex"))
    .action((flags: StreamFlags & { format: "hex" | "int" }) => {
      const options = defaults(flags);
      logger.setContext({ mode: "generate" });
      for (const input of new InputStream(options)) {
        io.write(flags.format === "int" ? littleEndianValue(input).toString(10) : bytesToHex(input));
      }
      logger.debug("Generated inputs", { limit: options.limit, length: options.length });
    });

  withStreamOptions(program.command("encode"))
    .description("Encode a reference function's behaviour as a hex specification")
    .argument("<module>", "path to a JS module exporting the reference function")
    .option("--export <name>", "exported function name", "default")
    .option("--save <id>", "store the specification under this id")
    .option("--description <text>", "description for the stored specification")
    .action(async (modulePath: string, flags: StreamFlags & { export: string; save?: string; description?: string }) => {
      const options = defaults(flags);
      logger.setContext({ mode: "encode" });
      const fn = await deps.loadFunction(modulePath, flags.export);
      const specification = encode({ ...options, logger }, fn);
      audit.recordEncoding(flags.save ?? modulePath, specification);
      io.write(specification.toHex());

      if (flags.save !== undefined) {
        const registry = deps.openRegistry();
        registry.register({
          id: flags.save,
          description: flags.description,
          seed: toSeedRecord(options.seed),
          length: options.length,
          limit: specification.length,
          outputBits: options.outputBits,
          bits: specification.toHex(),
          createdAt: new Date().toISOString(),
        });
        registry.persist();
        logger.info("Stored specification", { id: flags.save, limit: specification.length });
      }
    });

  withStreamOptions(program.command("verify"))
    .description("Check a candidate function against a specification")
    .argument("<module>", "path to a JS module exporting the candidate function")
    .option("--export <name>", "exported function name", "default")
    .option("--spec <hex>", "hex specification")
    .option("--id <id>", "id of a stored specification")
    .action(async (modulePath: string, flags: StreamFlags & { export: string; spec?: string; id?: string }) => {
      logger.setContext({ mode: "verify" });
      let options: StreamFlags;
      let specification: Specification;
      if (flags.id !== undefined) {
        // stored stream settings replace the flags
        const registry = deps.openRegistry();
        const stored = registry.get(flags.id);
        if (!stored) {
          throw new ValidationError(`no stored specification named "${flags.id}"`);
        }
        options = {
          seed: fromSeedRecord(stored.seed),
          length: stored.length,
          outputBits: stored.outputBits,
        };
        specification = registry.toSpecification(flags.id);
      } else if (flags.spec !== undefined) {
        // same limit encode would use, so hex padding is stripped
        options = defaults(flags);
        specification = Specification.fromHex(flags.spec, { limit: options.limit });
      } else {
        throw new ValidationError("verify needs either --spec or --id");
      }

      const fn = await deps.loadFunction(modulePath, flags.export);
      const results = [...verify({ ...options, logger }, fn, specification)];
      const report = audit.recordVerification(flags.id ?? modulePath, results);

      for (const index of report.mismatches) {
        io.write(`mismatch at index ${index}`);
      }
      io.write(`${report.consistent}/${report.total} consistent`);
      if (report.mismatches.length > 0) {
        io.setExitCode(1);
      }
    });

  program
    .command("list")
    .description("List stored specifications")
    .action(() => {
      const entries = deps.openRegistry().all();
      if (entries.length === 0) {
        io.write("No stored specifications.");
        return;
      }
      io.write("ID\tLIMIT\tBITS\tDESCRIPTION");
      for (const entry of entries) {
        io.write(`${entry.id}\t${entry.limit}\t${entry.bits}\t${entry.description ?? ""}`);
      }
    });

  return program;
}
