import { existsSync, readdirSync, readFileSync, renameSync, rmSync, statSync, writeFileSync } from "fs";
import { dirname, extname, join } from "path";
import AdmZip from "adm-zip";
import type { Logger } from "./logger.js";
import {
  archiveInvalid,
  fileOperationFailed,
  metadataAmbiguous,
  metadataNotFound,
} from "./errors/catalog.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface DescriptorKind {
  /** File extension, including the dot */
  suffix: string;
  /** Stable file name without company code or extension */
  stem: string;
}

export interface RenamedFile {
  from: string;
  to: string;
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

export const DESCRIPTOR_KINDS: readonly DescriptorKind[] = [
  { suffix: ".amd", stem: "application_metadata" },
  { suffix: ".smd", stem: "site_metadata" },
];

/** Searched in order, relative to the source directory */
const DESCRIPTOR_DIRS = ["presentation", "."];

const ORCHESTRATION_DIR = "orchestration";
const ORCHESTRATION_EXTENSIONS = [".orchestration", ".suborchestration"];

// ---------------------------------------------------------------------------
// Cleanup
// ---------------------------------------------------------------------------

/**
 * Remove every entry of a directory, keeping the directory itself.
 *
 * @returns Number of entries removed
 */
export function cleanDirectory(directory: string, logger?: Logger): number {
  let entries: string[];
  try {
    entries = readdirSync(directory);
  } catch (error) {
    throw fileOperationFailed("read", directory, (error as Error).message);
  }

  for (const entry of entries) {
    const path = join(directory, entry);
    try {
      rmSync(path, { recursive: true, force: true });
    } catch (error) {
      throw fileOperationFailed("delete", path, (error as Error).message);
    }
  }

  logger?.debug("Cleaned directory", { directory, removed: entries.length });
  return entries.length;
}

// ---------------------------------------------------------------------------
// Extraction
// ---------------------------------------------------------------------------

/**
 * Extract a ZIP archive into a directory, preserving its structure.
 *
 * @returns Number of files extracted
 */
export function extractArchive(zipPath: string, targetDir: string, logger?: Logger): number {
  let zip: AdmZip;
  let fileCount: number;
  try {
    zip = new AdmZip(zipPath);
    // The central directory is read lazily, so a damaged one surfaces here
    fileCount = zip.getEntries().filter((entry) => !entry.isDirectory).length;
  } catch (error) {
    throw archiveInvalid(zipPath, (error as Error).message);
  }

  try {
    zip.extractAllTo(targetDir, true);
  } catch (error) {
    const code = (error as NodeJS.ErrnoException).code;
    // Errors with an errno code come from the filesystem, the rest from the archive
    if (code) {
      throw fileOperationFailed("extract into", targetDir, (error as Error).message);
    }
    throw archiveInvalid(zipPath, (error as Error).message);
  }

  logger?.debug("Extracted archive", { zipPath, targetDir, files: fileCount });
  return fileCount;
}

// ---------------------------------------------------------------------------
// Descriptor Rename
// ---------------------------------------------------------------------------

/**
 * Stable name for a descriptor, e.g. "application_metadata_acme.amd".
 */
export function stableDescriptorName(kind: DescriptorKind, companyCode?: string): string {
  return companyCode ? `${kind.stem}_${companyCode}${kind.suffix}` : `${kind.stem}${kind.suffix}`;
}

function findDescriptorFiles(sourceDir: string, suffix: string): string[] {
  const found: string[] = [];

  for (const relative of DESCRIPTOR_DIRS) {
    const directory = join(sourceDir, relative);
    if (!existsSync(directory)) continue;

    for (const name of readdirSync(directory)) {
      if (extname(name).toLowerCase() !== suffix) continue;
      const path = join(directory, name);
      if (statSync(path).isFile()) found.push(path);
    }
  }

  return found;
}

/**
 * Rename the application and site descriptors to names that do not depend on
 * the reference id, so checkouts of different versions diff cleanly.
 *
 * @returns The renames performed; a descriptor already carrying its stable name is skipped
 */
export function renameDescriptors(
  sourceDir: string,
  companyCode?: string,
  logger?: Logger
): RenamedFile[] {
  const renamed: RenamedFile[] = [];

  // Locate both before renaming either, so a missing one leaves the tree untouched
  const located = DESCRIPTOR_KINDS.map((kind) => {
    const files = findDescriptorFiles(sourceDir, kind.suffix);
    if (files.length === 0) throw metadataNotFound(kind.suffix, sourceDir);
    if (files.length > 1) throw metadataAmbiguous(kind.suffix, files);
    return { kind, file: files[0] };
  });

  for (const { kind, file } of located) {
    const target = join(dirname(file), stableDescriptorName(kind, companyCode));
    if (target === file) {
      logger?.debug("Descriptor already has its stable name", { file });
      continue;
    }

    try {
      renameSync(file, target);
    } catch (error) {
      throw fileOperationFailed("rename", file, (error as Error).message);
    }
    renamed.push({ from: file, to: target });
    logger?.debug("Renamed descriptor", { from: file, to: target });
  }

  return renamed;
}

// ---------------------------------------------------------------------------
// Orchestration Formatting
// ---------------------------------------------------------------------------

/**
 * Pretty-print orchestration files (JSON on a single line) with two-space indentation.
 * Files that are not valid JSON are left as they are.
 *
 * @returns Paths of the files rewritten
 */
export function formatOrchestrations(sourceDir: string, logger?: Logger): string[] {
  const directory = join(sourceDir, ORCHESTRATION_DIR);
  if (!existsSync(directory)) {
    return [];
  }

  const formatted: string[] = [];

  for (const name of readdirSync(directory).sort()) {
    if (!ORCHESTRATION_EXTENSIONS.includes(extname(name).toLowerCase())) continue;

    const path = join(directory, name);
    let content: string;
    try {
      content = readFileSync(path, "utf-8");
    } catch (error) {
      throw fileOperationFailed("read", path, (error as Error).message);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      logger?.warn("Skipping orchestration that is not valid JSON", {
        path,
        error: (error as Error).message,
      });
      continue;
    }

    try {
      writeFileSync(path, JSON.stringify(parsed, null, 2), "utf-8");
    } catch (error) {
      throw fileOperationFailed("write", path, (error as Error).message);
    }
    formatted.push(path);
  }

  return formatted;
}
