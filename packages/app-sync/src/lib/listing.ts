import { z } from "zod";
import { applicationNotFound, cliOutputInvalid } from "./errors/catalog.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** One row of the platform's application listing */
export interface ApplicationEntry {
  id: string;
  referenceId: string;
  name?: string;
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

const LIST_COMMAND_LABEL = "apps:list";

/** Prefix the platform puts in front of reference ids in some views */
const REFERENCE_ID_PREFIX = "wcp_";

const JsonEntrySchema = z.object({
  // Larger numbers have already lost digits in JSON.parse
  id: z.union([z.string().min(1), z.number().int().safe()]),
  referenceId: z.string(),
  name: z.string().optional(),
});

const JsonListingSchema = z.array(JsonEntrySchema);

/** Header spellings accepted for each column, compared without case or separators */
const HEADER_ALIASES: Record<keyof ApplicationEntry, string[]> = {
  id: ["id", "appid", "applicationid"],
  referenceId: ["referenceid", "refid", "reference"],
  name: ["name", "appname", "applicationname"],
};

// "[", "[]" or "[{", but not a bracketed banner such as "[INFO] ..."
const JSON_ARRAY_START = /^\s*\[\s*(\{|\]|$)/;

const RULE_LINE = /^[\s\-=+|│┃─━┼┬┴╪═╤╧╔╗╚╝╠╣╦╩╬┌┐└┘├┤]*$/;
const BORDER = /[|│┃]/;
const GAP_SEPARATOR = /\t+|\s{2,}/;

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

/**
 * Strip the platform prefix from a reference id ("wcp_foo_abc123" -> "foo_abc123").
 */
export function normalizeReferenceId(referenceId: string): string {
  const trimmed = referenceId.trim();
  return trimmed.startsWith(REFERENCE_ID_PREFIX)
    ? trimmed.slice(REFERENCE_ID_PREFIX.length)
    : trimmed;
}

function normalizeHeader(cell: string): string {
  return cell.toLowerCase().replace(/[^a-z0-9]/g, "");
}

/**
 * Split a table row into cells. Bordered rows keep empty interior cells so
 * later columns stay in place; only the outer border cells are dropped.
 */
function splitCells(line: string): string[] {
  const trimmed = line.trim();
  if (!BORDER.test(trimmed)) {
    return trimmed.split(GAP_SEPARATOR).map((cell) => cell.trim());
  }

  const cells = trimmed.split(BORDER).map((cell) => cell.trim());
  if (cells[0] === "") cells.shift();
  if (cells[cells.length - 1] === "") cells.pop();
  return cells;
}

/**
 * Parse a JSON listing, skipping banner lines printed before the array.
 * Returns undefined when the output holds no JSON array.
 */
function parseJsonListing(lines: string[]): ApplicationEntry[] | undefined {
  const start = lines.findIndex((line) => JSON_ARRAY_START.test(line));
  if (start === -1) {
    return undefined;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(lines.slice(start).join("\n"));
  } catch (err) {
    throw cliOutputInvalid(LIST_COMMAND_LABEL, `invalid JSON: ${(err as Error).message}`);
  }

  const result = JsonListingSchema.safeParse(parsed);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw cliOutputInvalid(
      LIST_COMMAND_LABEL,
      `unexpected entry at ${issue.path.join(".")}: ${issue.message}`
    );
  }

  return result.data.map((entry) => ({
    id: String(entry.id),
    referenceId: entry.referenceId,
    ...(entry.name !== undefined && { name: entry.name }),
  }));
}

/**
 * Map header cells to column indexes.
 */
function findColumns(cells: string[]): Partial<Record<keyof ApplicationEntry, number>> {
  const normalized = cells.map(normalizeHeader);
  const columns: Partial<Record<keyof ApplicationEntry, number>> = {};

  for (const key of ["id", "referenceId", "name"] as const) {
    const index = normalized.findIndex((cell) => HEADER_ALIASES[key].includes(cell));
    if (index !== -1) columns[key] = index;
  }

  return columns;
}

/**
 * Parse a text table with a header row naming the id and reference id columns.
 * Returns undefined when no such header exists.
 */
function parseTableListing(lines: string[]): ApplicationEntry[] | undefined {
  const rows = lines.filter((line) => line.trim() && !RULE_LINE.test(line));

  const headerIndex = rows.findIndex((line) => {
    const columns = findColumns(splitCells(line));
    return columns.id !== undefined && columns.referenceId !== undefined;
  });
  if (headerIndex === -1) {
    return undefined;
  }

  const columns = findColumns(splitCells(rows[headerIndex]));
  const idColumn = columns.id;
  const referenceColumn = columns.referenceId;
  if (idColumn === undefined || referenceColumn === undefined) {
    return undefined;
  }

  const entries: ApplicationEntry[] = [];
  for (const line of rows.slice(headerIndex + 1)) {
    const cells = splitCells(line);
    const id = cells[idColumn];
    const referenceId = cells[referenceColumn];
    if (!id || !referenceId) continue;

    const name = columns.name !== undefined ? cells[columns.name] : undefined;
    entries.push({ id, referenceId, ...(name && { name }) });
  }

  return entries;
}

/**
 * Parse the output of the platform's list command.
 * Accepts a JSON array (optionally preceded by banner lines) or a text table.
 */
export function parseApplicationListing(stdout: string): ApplicationEntry[] {
  const lines = stdout.replace(/\r\n/g, "\n").split("\n");

  if (!stdout.trim()) {
    throw cliOutputInvalid(LIST_COMMAND_LABEL, "empty response");
  }

  const entries = parseJsonListing(lines) ?? parseTableListing(lines);
  if (!entries) {
    throw cliOutputInvalid(LIST_COMMAND_LABEL, "neither a JSON list nor a table with id and reference id columns");
  }

  return entries;
}

/**
 * Find the application id for a reference id.
 */
export function findApplicationId(entries: ApplicationEntry[], referenceId: string): string {
  const match = entries.find((entry) => entry.referenceId === referenceId);
  if (!match) {
    throw applicationNotFound(referenceId);
  }
  return match.id;
}
