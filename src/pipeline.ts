/**
 * The run loop: documents → pages → extract → format → write.
 *
 * Strictly sequential. Each page either produces files or is skipped;
 * only configuration and output errors escape a page.
 */

import { basename } from "node:path";
import { PageReadError, errorMessage, isFatal } from "./errors.ts";
import type { Logger } from "./logger.ts";
import { openPdfDocument, type DocumentLoader, type SourceDocument } from "./pdf/document.ts";
import {
  listPdfFiles,
  resolvePageRange,
  selectPages,
  validateRequestedRange,
  type PageRange,
  type ResolvedPageRange,
} from "./pdf/selector.ts";
import type { RecipeExtractor } from "./recipes/extractor.ts";
import type { RecipeFormatter } from "./recipes/formatter.ts";
import { RecipeWriter } from "./recipes/writer.ts";

export interface PipelineOptions {
  inputDir: string;
  outputDir: string;
  range: PageRange;
  extractor: RecipeExtractor;
  formatter: RecipeFormatter;
  logger: Logger;
  loadDocument?: DocumentLoader;
}

export interface RunSummary {
  documents: number;
  documentsSkipped: number;
  pagesProcessed: number;
  pagesSkipped: number;
  recipesWritten: number;
  files: string[];
}

export type PageOutcome =
  | { status: "written"; files: string[] }
  | { status: "not_found" }
  | { status: "failed"; error: string };

interface PlannedDocument {
  path: string;
  range: ResolvedPageRange;
}

function pageLabel(path: string, pageNumber: number): string {
  return `${basename(path)} p.${pageNumber}`;
}

/**
 * Read every document's page count and resolve its range before any page is
 * processed, so a range error aborts the run with nothing written. Documents
 * are closed again; each is reopened when its turn comes.
 */
async function planDocuments(
  paths: string[],
  range: PageRange,
  loadDocument: DocumentLoader,
  logger: Logger,
): Promise<PlannedDocument[]> {
  const planned: PlannedDocument[] = [];

  for (const path of paths) {
    let document: SourceDocument;
    try {
      document = await loadDocument(path);
    } catch (err) {
      if (isFatal(err)) throw err;
      logger.warn(`Skipping ${basename(path)}: ${errorMessage(err)}`);
      continue;
    }

    const pageCount = document.pageCount;
    await document.close?.();

    if (pageCount === 0) {
      logger.warn(`Skipping ${basename(path)}: document has no pages`);
      continue;
    }

    planned.push({ path, range: resolvePageRange(range, pageCount) });
  }

  return planned;
}

export async function processPage(
  document: SourceDocument,
  pageNumber: number,
  extractor: RecipeExtractor,
  formatter: RecipeFormatter,
  writer: RecipeWriter,
  logger: Logger,
): Promise<PageOutcome> {
  const label = pageLabel(document.path, pageNumber);

  try {
    const page = await document.readPage(pageNumber);

    const extraction = await extractor.extract(page);
    if (extraction.kind === "not_found") {
      logger.debug(
        extraction.reason === "blank_page"
          ? `${label}: no text on page, skipped`
          : `${label}: no recipe found, skipped`,
      );
      return { status: "not_found" };
    }

    const recipes = await formatter.format(extraction.text);
    const files: string[] = [];
    for (const recipe of recipes) {
      const path = await writer.write(recipe);
      logger.info(`Saved recipe: ${path}`);
      files.push(path);
    }
    return { status: "written", files };
  } catch (err) {
    if (isFatal(err)) throw err;
    const reason = err instanceof PageReadError ? `unreadable page (${errorMessage(err)})` : errorMessage(err);
    logger.warn(`${label}: ${reason}; skipped`);
    return { status: "failed", error: errorMessage(err) };
  }
}

export async function runPipeline(options: PipelineOptions): Promise<RunSummary> {
  const { inputDir, outputDir, range, extractor, formatter, logger } = options;
  const loadDocument = options.loadDocument ?? openPdfDocument;

  validateRequestedRange(range);

  const paths = await listPdfFiles(inputDir);
  if (paths.length === 0) {
    logger.warn(`No PDF files found in ${inputDir}`);
  }

  const planned = await planDocuments(paths, range, loadDocument, logger);

  const writer = new RecipeWriter(outputDir);
  await writer.prepare();

  const summary: RunSummary = {
    documents: planned.length,
    documentsSkipped: paths.length - planned.length,
    pagesProcessed: 0,
    pagesSkipped: 0,
    recipesWritten: 0,
    files: [],
  };

  for (const { path, range: pages } of planned) {
    let document: SourceDocument;
    try {
      document = await loadDocument(path);
    } catch (err) {
      if (isFatal(err)) throw err;
      logger.warn(`Skipping ${basename(path)}: ${errorMessage(err)}`);
      summary.documents -= 1;
      summary.documentsSkipped += 1;
      continue;
    }

    logger.info(`Processing: ${basename(path)} from pages ${pages.start} to ${pages.end}`);

    for (const pageNumber of selectPages(pages)) {
      const outcome = await processPage(document, pageNumber, extractor, formatter, writer, logger);
      summary.pagesProcessed += 1;

      if (outcome.status === "written") {
        summary.recipesWritten += outcome.files.length;
        summary.files.push(...outcome.files);
      } else {
        summary.pagesSkipped += 1;
      }
    }

    await document.close?.();
    logger.info(`Completed processing: ${basename(path)}`);
  }

  return summary;
}

export function formatSummary(summary: RunSummary): string {
  const lines = [
    `Documents: ${summary.documents}` +
      (summary.documentsSkipped > 0 ? ` (${summary.documentsSkipped} unreadable, skipped)` : ""),
    `Pages processed: ${summary.pagesProcessed}`,
    `Pages skipped: ${summary.pagesSkipped}`,
    `Recipes written: ${summary.recipesWritten}`,
  ];
  return lines.join("\n");
}
