#!/usr/bin/env node
import { readFileSync } from "fs";
import { Command } from "commander";
import { z } from "zod";
import { initContext } from "./lib/cli-context.js";
import { renderUnknownError } from "./lib/errors/renderer.js";
import { createRuntime, type RuntimeFactory } from "./lib/runtime.js";
import { registerSyncCommand } from "./modules/sync.js";
import { registerListCommand } from "./modules/list.js";

const PackageSchema = z.object({ version: z.string() });

function readVersion(): string {
  const raw = readFileSync(new URL("../package.json", import.meta.url), "utf-8");
  return PackageSchema.parse(JSON.parse(raw)).version;
}

export function buildProgram(runtimeFactory: RuntimeFactory = createRuntime): Command {
  const program = new Command()
    .name("app-sync")
    .description("Download, archive and unpack application source through the platform CLI")
    .version(readVersion())
    .option("-c, --config <path>", "Path to a config file")
    .option("--json", "Print results as JSON")
    .option("-q, --quiet", "Hide progress output")
    .option("--verbose", "Log every command and file operation");

  registerSyncCommand(program, runtimeFactory);
  registerListCommand(program, runtimeFactory);

  return program;
}

export async function main(argv = process.argv): Promise<void> {
  initContext(argv);

  try {
    await buildProgram().parseAsync(argv);
  } catch (error) {
    renderUnknownError(error);
    process.exitCode = 1;
  }
}

void main();
