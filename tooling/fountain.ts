#!/usr/bin/env node
import { join } from "path";
import { isFountainError } from "../src/errors";
import { globalLogger } from "../src/logger";
import {
  ConfigManager,
  createProgram,
  DEFAULT_CONFIG_FILE,
  globalAuditLog,
  loadFunctionFromModule,
  SpecificationRegistry,
} from "./lib";

function writeLine(line: string): void {
  process.stdout.write(`${line}\n`);
}

function writeErrorLine(line: string): void {
  process.stderr.write(`${line}\n`);
}

async function main(): Promise<void> {
  const projectRoot = process.cwd();
  const configPath = process.env.FOUNTAIN_CONFIG || join(projectRoot, DEFAULT_CONFIG_FILE);
  const config = new ConfigManager(projectRoot, configPath);

  const program = createProgram({
    config,
    logger: globalLogger,
    audit: globalAuditLog,
    io: {
      write: writeLine,
      writeError: writeErrorLine,
      setExitCode: (code) => {
        process.exitCode = code;
      },
    },
    loadFunction: loadFunctionFromModule,
    openRegistry: () => new SpecificationRegistry(config.getRegistryPath()),
  });

  await program.parseAsync(process.argv);
}

main().catch((error: unknown) => {
  if (isFountainError(error)) {
    writeErrorLine(`${error.kind}: ${error.message}`);
  } else {
    writeErrorLine(error instanceof Error ? error.stack ?? error.message : String(error));
  }
  process.exitCode = 1;
});
