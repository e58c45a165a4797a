/**
 * Detects the archive a download drops into the browser's download directory.
 *
 * The directory is snapshotted before the download starts; afterwards the
 * newest ZIP that is new or modified since the snapshot, non-empty and no
 * longer being written is taken as the download.
 */

import { existsSync, readdirSync, statSync } from "fs";
import { extname, join } from "path";
import type { DelayFn } from "./ports/timer.js";
import type { Logger } from "./logger.js";
import { poll } from "./polling.js";
import { downloadTimedOut, fileOperationFailed } from "./errors/catalog.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** ZIP file name -> modification time in ms */
export type DirectorySnapshot = ReadonlyMap<string, number>;

export interface WaitForDownloadOptions {
  directory: string;
  before: DirectorySnapshot;
  timeoutSeconds: number;
  pollIntervalMs: number;
  delay?: DelayFn;
  logger?: Logger;
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** Suffixes browsers use for files still being written */
const IN_PROGRESS_SUFFIXES = [".part", ".crdownload", ".download", ".partial"];

// ---------------------------------------------------------------------------
// Implementation
// ---------------------------------------------------------------------------

function listZipFiles(directory: string): string[] {
  try {
    return readdirSync(directory).filter((name) => extname(name).toLowerCase() === ".zip");
  } catch (error) {
    throw fileOperationFailed("read", directory, (error as Error).message);
  }
}

/**
 * Record the ZIP files currently present in a directory.
 */
export function snapshotDirectory(directory: string): DirectorySnapshot {
  const snapshot = new Map<string, number>();
  for (const name of listZipFiles(directory)) {
    try {
      snapshot.set(name, statSync(join(directory, name)).mtimeMs);
    } catch {
      // Removed between readdir and stat
    }
  }
  return snapshot;
}

function isStillDownloading(directory: string, name: string): boolean {
  return IN_PROGRESS_SUFFIXES.some((suffix) => existsSync(join(directory, name + suffix)));
}

/**
 * Path of the newest completed ZIP that differs from the snapshot, if any.
 */
export function findNewDownload(directory: string, before: DirectorySnapshot): string | undefined {
  let newest: { path: string; mtimeMs: number } | undefined;

  for (const name of listZipFiles(directory)) {
    const path = join(directory, name);

    let stats;
    try {
      stats = statSync(path);
    } catch {
      continue;
    }

    if (!stats.isFile() || stats.size === 0) continue;

    const previous = before.get(name);
    if (previous !== undefined && stats.mtimeMs <= previous) continue;

    if (isStillDownloading(directory, name)) continue;

    if (!newest || stats.mtimeMs > newest.mtimeMs) {
      newest = { path, mtimeMs: stats.mtimeMs };
    }
  }

  return newest?.path;
}

/**
 * Poll the download directory until a new archive shows up.
 */
export async function waitForDownload(options: WaitForDownloadOptions): Promise<string> {
  const { directory, before, timeoutSeconds, pollIntervalMs, delay, logger } = options;
  const maxAttempts = Math.max(1, Math.ceil((timeoutSeconds * 1000) / pollIntervalMs) + 1);

  const path = await poll({
    fetch: () => findNewDownload(directory, before),
    intervalMs: pollIntervalMs,
    maxAttempts,
    onTimeout: () => downloadTimedOut(directory, timeoutSeconds),
    delay,
  });

  logger?.debug("Download detected", { path });
  return path;
}
