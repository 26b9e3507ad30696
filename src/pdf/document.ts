/**
 * PDF page reading.
 *
 * pdfjs-dist parses the document once and hands out each page's text
 * layer on request, so each extraction call sees exactly one page.
 */

import { readFile } from "node:fs/promises";
import {
  getDocument,
  type PDFDocumentProxy,
  type PDFPageProxy,
} from "pdfjs-dist/legacy/build/pdf.mjs";
import { PageReadError, errorMessage } from "../errors.ts";

type TextContentItem = Awaited<ReturnType<PDFPageProxy["getTextContent"]>>["items"][number];
type TextItem = Extract<TextContentItem, { str: string }>;

export interface PageContent {
  documentPath: string;
  /** 1-based */
  pageNumber: number;
  text: string;
}

export interface SourceDocument {
  readonly path: string;
  readonly pageCount: number;
  readPage(pageNumber: number): Promise<PageContent>;
  /** Release the parsed document. */
  close?(): Promise<void>;
}

export type DocumentLoader = (path: string) => Promise<SourceDocument>;

/**
 * Tidy the raw text layer: unify line endings, drop trailing spaces,
 * collapse runs of blank lines.
 */
export function normalizePageText(text: string): string {
  return text
    .replace(/\r\n?/g, "\n")
    .replace(/[ \t]+\n/g, "\n")
    .replace(/\n{3,}/g, "\n\n")
    .trim();
}

function isTextItem(item: TextContentItem): item is TextItem {
  return "str" in item;
}

/**
 * Join text items into lines, starting a new line whenever the baseline
 * moves or pdf.js marks an end of line.
 */
export function joinTextItems(items: TextContentItem[]): string {
  let text = "";
  let lastY: unknown;

  for (const item of items) {
    if (!isTextItem(item)) continue;
    const y: unknown = item.transform[5];
    if (text && lastY !== undefined && y !== lastY && !text.endsWith("\n")) {
      text += "\n";
    }
    text += item.str;
    if (item.hasEOL && !text.endsWith("\n")) text += "\n";
    lastY = y;
  }

  return text;
}

class PdfSourceDocument implements SourceDocument {
  constructor(
    readonly path: string,
    private readonly pdfDoc: PDFDocumentProxy,
  ) {}

  get pageCount(): number {
    return this.pdfDoc.numPages;
  }

  async readPage(pageNumber: number): Promise<PageContent> {
    if (pageNumber < 1 || pageNumber > this.pageCount) {
      throw new PageReadError(
        `Page ${pageNumber} is outside ${this.path} (${this.pageCount} pages)`,
        this.path,
        pageNumber,
      );
    }

    try {
      const page = await this.pdfDoc.getPage(pageNumber);
      const content = await page.getTextContent();
      page.cleanup();
      return {
        documentPath: this.path,
        pageNumber,
        text: normalizePageText(joinTextItems(content.items)),
      };
    } catch (err) {
      throw new PageReadError(
        `Cannot read page ${pageNumber} of ${this.path}: ${errorMessage(err)}`,
        this.path,
        pageNumber,
        { cause: err },
      );
    }
  }

  async close(): Promise<void> {
    await this.pdfDoc.destroy();
  }
}

/**
 * Load a PDF from disk.
 *
 * @throws PageReadError if the file is missing, corrupt or encrypted.
 */
export async function openPdfDocument(path: string): Promise<SourceDocument> {
  try {
    const data = new Uint8Array(await readFile(path));
    const pdfDoc = await getDocument({ data, isEvalSupported: false, verbosity: 0 }).promise;
    return new PdfSourceDocument(path, pdfDoc);
  } catch (err) {
    throw new PageReadError(
      `Cannot open ${path}: ${errorMessage(err)}`,
      path,
      null,
      { cause: err },
    );
  }
}
