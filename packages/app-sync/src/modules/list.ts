import { Command } from "commander";
import chalk from "chalk";
import CliTable3 from "cli-table3";
import { loadConfig } from "../lib/config.js";
import { getContext, isJsonMode } from "../lib/cli-context.js";
import { createSpinner } from "../lib/spinner.js";
import { outputSuccess, type ApplicationListJson } from "../lib/json-output.js";
import { renderUnknownError } from "../lib/errors/renderer.js";
import type { ApplicationEntry } from "../lib/listing.js";
import type { PlatformCli } from "../lib/platform-cli.js";
import type { RuntimeFactory } from "../lib/runtime.js";

/**
 * Fetch the applications visible to the logged-in account, sorted by reference id.
 */
export async function listApplications(cli: PlatformCli, login = true): Promise<ApplicationEntry[]> {
  if (login) {
    await cli.authenticate();
  }
  const entries = await cli.listApplications();
  return [...entries].sort((a, b) => a.referenceId.localeCompare(b.referenceId));
}

/**
 * Render applications as a table.
 */
export function formatApplicationTable(entries: ApplicationEntry[]): string {
  const table = new CliTable3({
    head: [chalk.cyan("Reference ID"), chalk.cyan("ID"), chalk.cyan("Name")],
  });

  for (const entry of entries) {
    table.push([entry.referenceId, entry.id, entry.name ?? chalk.gray("-")]);
  }

  return table.toString();
}

export function registerListCommand(program: Command, createRuntime: RuntimeFactory): void {
  program
    .command("list")
    .description("List the applications you can download, with their reference ids")
    .option("--no-login", "Skip the login step and use the existing session")
    .action(async (options: { login: boolean }, command: Command) => {
      const spinner = createSpinner("Fetching applications").start();
      try {
        const globals = command.optsWithGlobals<{ config?: string }>();
        const { config } = loadConfig(globals.config);
        const { cli } = createRuntime(config, getContext());

        const entries = await listApplications(cli, options.login);
        spinner.stop();

        if (isJsonMode()) {
          const result: ApplicationListJson = { applications: entries, total: entries.length };
          outputSuccess(result);
          return;
        }

        if (entries.length === 0) {
          console.log(chalk.yellow("No applications found."));
          return;
        }

        console.log(formatApplicationTable(entries));
      } catch (error) {
        spinner.fail("Couldn't list applications");
        renderUnknownError(error);
        process.exitCode = 1;
      }
    });
}
