import { Command } from "commander";
import chalk from "chalk";
import { join, resolve } from "path";
import { DOWNLOAD_METHODS, loadConfig, type DownloadMethod, type ResolvedConfig } from "../lib/config.js";
import { getContext, isJsonMode } from "../lib/cli-context.js";
import { createSpinner, SilentSpinner, type Spinner } from "../lib/spinner.js";
import { outputSuccess, type SyncResultJson } from "../lib/json-output.js";
import { renderUnknownError } from "../lib/errors/renderer.js";
import { invalidOption, toCLIError } from "../lib/errors/catalog.js";
import type { SyncStep } from "../lib/errors/types.js";
import type { Runtime, RuntimeFactory } from "../lib/runtime.js";
import type { Logger } from "../lib/logger.js";
import { ensureDirectory, validateDirectory } from "../lib/directories.js";
import { findApplicationId, normalizeReferenceId } from "../lib/listing.js";
import { sourceArchiveUrl } from "../lib/platform-cli.js";
import { snapshotDirectory, waitForDownload } from "../lib/download-watcher.js";
import { archiveDownload } from "../lib/archive.js";
import {
  cleanDirectory,
  extractArchive,
  formatOrchestrations,
  renameDescriptors,
} from "../lib/source-tree.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface SyncOptions {
  referenceId: string;
  appDir: string;
  downloadDir: string;
  downloadMethod: DownloadMethod;
  apiBaseUrl: string;
  timeoutSeconds: number;
  pollIntervalMs: number;
  companyCode?: string;
}

export type SyncResult = SyncResultJson;

interface SyncCommandOptions {
  downloadDir?: string;
  method?: string;
  timeout?: string;
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

export const SRC_DIRECTORY = "src";
export const ARCHIVE_DIRECTORY = "archive";

const STEP_LABELS: Record<SyncStep, string> = {
  prepare: "Checking directories",
  authenticate: "Logging in to the platform",
  resolve: "Looking up the application",
  download: "Downloading the source archive",
  archive: "Archiving the download",
  clean: "Deleting old source files",
  extract: "Extracting the archive",
  rename: "Renaming descriptor files",
  format: "Pretty-printing orchestrations",
};

// ---------------------------------------------------------------------------
// Core Logic
// ---------------------------------------------------------------------------

/**
 * Run one step, reporting progress and tagging failures with the step name.
 */
async function runStep<T>(
  step: SyncStep,
  spinner: Spinner,
  log: Logger,
  fn: () => T | Promise<T>,
  summarize: (result: T) => string
): Promise<T> {
  spinner.start(STEP_LABELS[step]);
  let result: T;
  try {
    result = await fn();
  } catch (error) {
    spinner.fail(`${STEP_LABELS[step]} failed`);
    throw toCLIError(error).atStep(step);
  }

  const summary = summarize(result);
  spinner.succeed(summary);
  log.info(summary, { step });
  return result;
}

/**
 * Bring `<appDir>/src` in line with the latest source of an application.
 * Stops at the first failing step; nothing is rolled back.
 */
export async function runSync(
  options: SyncOptions,
  runtime: Runtime,
  spinner: Spinner = new SilentSpinner()
): Promise<SyncResult> {
  const { cli, browser, clock, delay, logger } = runtime;
  const referenceId = normalizeReferenceId(options.referenceId);
  const appDir = resolve(options.appDir);
  const downloadDir = resolve(options.downloadDir);
  const srcDir = join(appDir, SRC_DIRECTORY);
  const archiveDir = join(appDir, ARCHIVE_DIRECTORY);
  const log = logger.child({ referenceId });

  await runStep(
    "prepare",
    spinner,
    log,
    () => {
      validateDirectory(downloadDir, "Download directory");
      validateDirectory(appDir, "App directory");
      ensureDirectory(srcDir, "Source directory", log);
      ensureDirectory(archiveDir, "Archive directory", log);
    },
    () => `Using ${appDir}`
  );

  await runStep("authenticate", spinner, log, () => cli.authenticate(), () => "Logged in");

  const applicationId = await runStep(
    "resolve",
    spinner,
    log,
    async () => findApplicationId(await cli.listApplications(), referenceId),
    (id) => `Found ${referenceId} (id ${id})`
  );
  log.debug("Resolved application id", { applicationId });

  const downloadedFile = await runStep(
    "download",
    spinner,
    log,
    async () => {
      const before = snapshotDirectory(downloadDir);

      if (options.downloadMethod === "browser") {
        const url = sourceArchiveUrl(options.apiBaseUrl, applicationId);
        log.debug("Opening source archive URL", { url });
        await browser.open(url);
      } else {
        await cli.downloadSource(applicationId);
      }

      return waitForDownload({
        directory: downloadDir,
        before,
        timeoutSeconds: options.timeoutSeconds,
        pollIntervalMs: options.pollIntervalMs,
        delay,
        logger: log,
      });
    },
    (path) => `Downloaded ${path}`
  );

  const archivePath = await runStep(
    "archive",
    spinner,
    log,
    () => archiveDownload(downloadedFile, archiveDir, clock, log),
    (path) => `Archived to ${path}`
  );

  const removedEntries = await runStep(
    "clean",
    spinner,
    log,
    () => cleanDirectory(srcDir, log),
    (count) => `Deleted ${count} old ${count === 1 ? "entry" : "entries"}`
  );

  const extractedFiles = await runStep(
    "extract",
    spinner,
    log,
    () => extractArchive(archivePath, srcDir, log),
    (count) => `Extracted ${count} ${count === 1 ? "file" : "files"}`
  );

  const renamed = await runStep(
    "rename",
    spinner,
    log,
    () => renameDescriptors(srcDir, options.companyCode, log),
    (files) => files.length > 0 ? "Renamed descriptor files" : "Descriptor files already renamed"
  );

  const formatted = await runStep(
    "format",
    spinner,
    log,
    () => formatOrchestrations(srcDir, log),
    (files) => `Pretty-printed ${files.length} orchestration ${files.length === 1 ? "file" : "files"}`
  );

  const result: SyncResult = {
    referenceId,
    applicationId,
    archivePath,
    sourceDir: srcDir,
    extractedFiles,
    removedEntries,
    renamed,
    formatted,
  };

  log.info("App download complete", { applicationId, archivePath, extractedFiles });
  return result;
}

// ---------------------------------------------------------------------------
// Option Parsing
// ---------------------------------------------------------------------------

function parseMethod(value: string | undefined): DownloadMethod | undefined {
  if (value === undefined) return undefined;
  const method = DOWNLOAD_METHODS.find((m) => m === value);
  if (!method) {
    throw invalidOption("method", `"${value}" is not a download method`, [...DOWNLOAD_METHODS]);
  }
  return method;
}

function parseTimeout(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const seconds = Number(value);
  if (!Number.isInteger(seconds) || seconds <= 0) {
    throw invalidOption("timeout", `"${value}" is not a positive number of seconds`);
  }
  return seconds;
}

/**
 * Translate command-line input into config overrides.
 */
export function syncOverrides(
  downloadDirArg: string | undefined,
  options: SyncCommandOptions
): Partial<ResolvedConfig> {
  return {
    downloadDir: options.downloadDir ?? downloadDirArg,
    downloadMethod: parseMethod(options.method),
    downloadTimeoutSeconds: parseTimeout(options.timeout),
  };
}

// ---------------------------------------------------------------------------
// Command Registration
// ---------------------------------------------------------------------------

export function registerSyncCommand(program: Command, createRuntime: RuntimeFactory): void {
  program
    .command("sync", { isDefault: true })
    .description("Download an application's source and unpack it into <app-dir>/src")
    .argument("<reference-id>", "Reference id of the application (wcp_ prefix optional)")
    .argument("<app-dir>", "Directory holding the src and archive folders")
    .argument("[download-dir]", "Directory the browser saves downloads to")
    .option("-d, --download-dir <dir>", "Directory the browser saves downloads to")
    .option("-m, --method <method>", "How to trigger the download: browser or cli")
    .option("-t, --timeout <seconds>", "Seconds to wait for the download to appear")
    .addHelpText(
      "after",
      `
${chalk.bold.cyan("Layout:")}
  <app-dir>/archive/   ${chalk.gray("Timestamped copies of every downloaded archive")}
  <app-dir>/src/       ${chalk.gray("Replaced with the archive contents on each run")}

${chalk.bold.cyan("Examples:")}
  app-sync foo_abc123 ./foo              ${chalk.gray("Sync using the configured download directory")}
  app-sync foo_abc123 ./foo ~/Downloads  ${chalk.gray("Override the download directory")}
  app-sync foo_abc123 ./foo --json       ${chalk.gray("Print the result as JSON")}
`
    )
    .action(async (
      referenceId: string,
      appDir: string,
      downloadDirArg: string | undefined,
      options: SyncCommandOptions,
      command: Command
    ) => {
      try {
        const globals = command.optsWithGlobals<{ config?: string }>();
        const { config } = loadConfig(globals.config, syncOverrides(downloadDirArg, options));
        const runtime = createRuntime(config, getContext());
        const spinner = createSpinner();

        const result = await runSync(
          {
            referenceId,
            appDir,
            downloadDir: config.downloadDir,
            downloadMethod: config.downloadMethod,
            apiBaseUrl: config.apiBaseUrl,
            timeoutSeconds: config.downloadTimeoutSeconds,
            pollIntervalMs: config.pollIntervalMs,
            companyCode: config.companyCode,
          },
          runtime,
          spinner
        );

        if (isJsonMode()) {
          outputSuccess(result);
        } else {
          console.log(chalk.green(`\n✓ ${result.referenceId} synced into ${result.sourceDir}`));
        }
      } catch (error) {
        renderUnknownError(error);
        process.exitCode = 1;
      }
    });
}
