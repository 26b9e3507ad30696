import { describe, expect, test, beforeEach, afterEach } from "vitest";
import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { ConfigError } from "../src/errors.ts";
import {
  listPdfFiles,
  resolvePageRange,
  selectPages,
  validateRequestedRange,
} from "../src/pdf/selector.ts";

describe("resolvePageRange", () => {
  test("defaults to the whole document", () => {
    expect(resolvePageRange({}, 12)).toEqual({ start: 1, end: 12 });
  });

  test("keeps a range inside the document", () => {
    expect(resolvePageRange({ start: 3, end: 7 }, 12)).toEqual({ start: 3, end: 7 });
  });

  test("clamps end to the page count", () => {
    expect(resolvePageRange({ start: 2, end: 50 }, 5)).toEqual({ start: 2, end: 5 });
  });

  test("raises start to the first page", () => {
    expect(resolvePageRange({ start: 0, end: 2 }, 5)).toEqual({ start: 1, end: 2 });
  });

  test("start past the last page is a configuration error", () => {
    expect(() => resolvePageRange({ start: 9 }, 5)).toThrow(ConfigError);
  });

  test("start after end is a configuration error", () => {
    expect(() => resolvePageRange({ start: 4, end: 2 }, 5)).toThrow(ConfigError);
  });
});

describe("selectPages", () => {
  test("yields end - start + 1 pages for every valid range", () => {
    const pageCount = 6;
    for (let start = 1; start <= pageCount; start++) {
      for (let end = start; end <= pageCount; end++) {
        const pages = [...selectPages(resolvePageRange({ start, end }, pageCount))];
        expect(pages).toHaveLength(end - start + 1);
        expect(pages[0]).toBe(start);
        expect(pages[pages.length - 1]).toBe(end);
      }
    }
  });

  test("can be restarted", () => {
    const range = { start: 2, end: 4 };
    expect([...selectPages(range)]).toEqual([2, 3, 4]);
    expect([...selectPages(range)]).toEqual([2, 3, 4]);
  });
});

describe("validateRequestedRange", () => {
  test("accepts an absent range", () => {
    expect(() => validateRequestedRange({})).not.toThrow();
  });

  test("accepts start equal to end", () => {
    expect(() => validateRequestedRange({ start: 1, end: 1 })).not.toThrow();
  });

  test("rejects start after end", () => {
    expect(() => validateRequestedRange({ start: 5, end: 2 })).toThrow(
      "--start (5) must not be after --end (2)",
    );
  });

  test("leaves a start below 1 for clamping", () => {
    expect(() => validateRequestedRange({ start: 0, end: 2 })).not.toThrow();
    expect(() => validateRequestedRange({ start: -4 })).not.toThrow();
    expect(resolvePageRange({ start: -4 }, 3)).toEqual({ start: 1, end: 3 });
  });

  test("rejects an end below 1", () => {
    expect(() => validateRequestedRange({ end: 0 })).toThrow("--end must be 1 or greater (got 0)");
    expect(() => validateRequestedRange({ end: -3 })).toThrow("--end must be 1 or greater (got -3)");
  });

  test("rejects values that are not whole numbers", () => {
    expect(() => validateRequestedRange({ start: Number.NaN })).toThrow(
      "--start must be a whole number (got NaN)",
    );
    expect(() => validateRequestedRange({ end: 2.5 })).toThrow(ConfigError);
  });
});

describe("listPdfFiles", () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await mkdtemp(join(tmpdir(), "recipe-harvest-select-"));
  });

  afterEach(async () => {
    await rm(tmpDir, { recursive: true, force: true });
  });

  test("lists only PDFs at the top level, sorted", async () => {
    await writeFile(join(tmpDir, "b-soups.pdf"), "");
    await writeFile(join(tmpDir, "a-breads.PDF"), "");
    await writeFile(join(tmpDir, "notes.txt"), "");
    await mkdir(join(tmpDir, "nested"));
    await writeFile(join(tmpDir, "nested", "c-cakes.pdf"), "");

    expect(await listPdfFiles(tmpDir)).toEqual([
      join(tmpDir, "a-breads.PDF"),
      join(tmpDir, "b-soups.pdf"),
    ]);
  });

  test("returns nothing for an empty directory", async () => {
    expect(await listPdfFiles(tmpDir)).toEqual([]);
  });

  test("a missing directory is a configuration error", async () => {
    await expect(listPdfFiles(join(tmpDir, "missing"))).rejects.toThrow(ConfigError);
  });
});
