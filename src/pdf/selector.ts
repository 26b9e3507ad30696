/**
 * Page selection: which PDFs to read and which of their pages.
 *
 * Ranges are 1-based and inclusive, shared by every document in a run.
 */

import { readdir } from "node:fs/promises";
import { join } from "node:path";
import { ConfigError } from "../errors.ts";

export interface PageRange {
  start?: number;
  end?: number;
}

export interface ResolvedPageRange {
  start: number;
  end: number;
}

/**
 * Reject flag values that are wrong for every document, before any PDF is
 * opened. A start below 1 is not rejected: it is raised to the first page.
 */
export function validateRequestedRange(range: PageRange): void {
  for (const [flag, value] of [["--start", range.start], ["--end", range.end]] as const) {
    if (value === undefined) continue;
    if (!Number.isInteger(value)) {
      throw new ConfigError(`${flag} must be a whole number (got ${value})`);
    }
    if (flag === "--end" && value < 1) {
      throw new ConfigError(`${flag} must be 1 or greater (got ${value})`);
    }
  }

  if (range.start !== undefined && range.end !== undefined && range.start > range.end) {
    throw new ConfigError(
      `--start (${range.start}) must not be after --end (${range.end})`,
    );
  }
}

/**
 * Clamp a requested range to a document's pages.
 *
 * `end` is capped at the page count; `start` is raised to 1. A range that is
 * empty after clamping (e.g. --start past the last page) is a configuration
 * error.
 */
export function resolvePageRange(range: PageRange, pageCount: number): ResolvedPageRange {
  const start = Math.max(1, range.start ?? 1);
  const end = Math.min(range.end ?? pageCount, pageCount);

  if (start > end) {
    throw new ConfigError(
      `Page range ${start}-${range.end ?? "end"} is outside a document with ${pageCount} page(s)`,
    );
  }

  return { start, end };
}

/** Page numbers in the range, in order. Each call starts over. */
export function* selectPages(range: ResolvedPageRange): Generator<number> {
  for (let page = range.start; page <= range.end; page++) {
    yield page;
  }
}

/**
 * PDF files directly inside `inputDir` (not recursive), sorted by name.
 */
export async function listPdfFiles(inputDir: string): Promise<string[]> {
  let entries;
  try {
    entries = await readdir(inputDir, { withFileTypes: true });
  } catch (err) {
    throw new ConfigError(`Cannot read input directory ${inputDir}`, { cause: err });
  }

  return entries
    .filter((e) => e.isFile() && /\.pdf$/i.test(e.name))
    .map((e) => e.name)
    .sort((a, b) => a.localeCompare(b))
    .map((name) => join(inputDir, name));
}
