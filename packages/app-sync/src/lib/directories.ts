import { mkdirSync, statSync } from "fs";
import type { Logger } from "./logger.js";
import { directoryNotFound, fileOperationFailed, notADirectory } from "./errors/catalog.js";

/**
 * Ensure a path exists and is a directory.
 *
 * @param label - Human name used in errors ("Download directory")
 */
export function validateDirectory(path: string, label: string): void {
  let stats;
  try {
    stats = statSync(path);
  } catch {
    throw directoryNotFound(label, path);
  }

  if (!stats.isDirectory()) {
    throw notADirectory(label, path);
  }
}

/**
 * Create a directory when it is missing, then validate it.
 *
 * @returns true when the directory was created
 */
export function ensureDirectory(path: string, label: string, logger?: Logger): boolean {
  let created = false;
  try {
    statSync(path);
  } catch {
    try {
      mkdirSync(path, { recursive: true });
    } catch (error) {
      throw fileOperationFailed("create", path, (error as Error).message);
    }
    logger?.info(`${label} not found, created it`, { path });
    created = true;
  }

  validateDirectory(path, label);
  return created;
}
