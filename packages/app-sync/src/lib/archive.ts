import { copyFileSync, existsSync, unlinkSync } from "fs";
import { rename as renameFile } from "fs/promises";
import { basename, extname, join } from "path";
import type { Clock } from "./ports/clock.js";
import type { Logger } from "./logger.js";
import { archiveExists, fileOperationFailed } from "./errors/catalog.js";

// ---------------------------------------------------------------------------
// Naming
// ---------------------------------------------------------------------------

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

/**
 * Local date and time as "YYYY-MM-DD_HH-mm-ss".
 */
export function formatTimestamp(date: Date): string {
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}-${pad(date.getMinutes())}-${pad(date.getSeconds())}`;
  return `${day}_${time}`;
}

/**
 * Archive name for a downloaded file: "Foo App.zip" -> "Foo App_2024-01-15_13-45-02.zip".
 */
export function archiveFileName(downloadedFile: string, date: Date): string {
  const name = basename(downloadedFile);
  const ext = extname(name);
  const base = name.slice(0, name.length - ext.length);
  return `${base}_${formatTimestamp(date)}${ext}`;
}

// ---------------------------------------------------------------------------
// File Movement
// ---------------------------------------------------------------------------

/**
 * Move a file, falling back to copy+delete across devices.
 */
export async function moveFile(sourcePath: string, destPath: string, logger?: Logger): Promise<void> {
  try {
    await renameFile(sourcePath, destPath);
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code !== "EXDEV") {
      throw fileOperationFailed("move", sourcePath, (error as Error).message);
    }

    logger?.debug("Cross-device move, using copy+delete", { from: sourcePath, to: destPath });
    try {
      copyFileSync(sourcePath, destPath);
      unlinkSync(sourcePath);
    } catch (copyError) {
      throw fileOperationFailed("move", sourcePath, (copyError as Error).message);
    }
  }
}

/**
 * Move a downloaded archive into the archive directory under a timestamped name.
 * Never overwrites an existing archive.
 *
 * @returns Path of the archived file
 */
export async function archiveDownload(
  downloadedFile: string,
  archiveDir: string,
  clock: Clock,
  logger?: Logger
): Promise<string> {
  const destination = join(archiveDir, archiveFileName(downloadedFile, clock.newDate()));

  if (existsSync(destination)) {
    throw archiveExists(destination);
  }

  await moveFile(downloadedFile, destination, logger);
  logger?.debug("Archived download", { from: downloadedFile, to: destination });

  return destination;
}
