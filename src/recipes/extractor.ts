/**
 * First model pass: transcribe the recipe on a page, if any.
 */

import { ModelError, errorMessage } from "../errors.ts";
import { complete, type Completion } from "../llm/messages.ts";
import type { LLMProvider } from "../llm/provider.ts";
import type { PageContent } from "../pdf/document.ts";
import {
  NO_RECIPE_SENTINEL,
  RECIPE_EXTRACTION_SYSTEM_PROMPT,
  buildExtractionPrompt,
} from "./prompts.ts";

export type ExtractionResult =
  | { kind: "found"; text: string }
  | { kind: "not_found"; reason: "blank_page" | "no_recipe" };

const NO_RECIPE_PATTERNS: RegExp[] = [
  new RegExp(`^${NO_RECIPE_SENTINEL}$`, "i"),
  /^no[\s_-]recipes?\b/i,
  /\bno recipes? (was |were |is |are )?(found|present|detected)\b/i,
  /\b(does not|doesn't|did not|do not) (contain|include|have) (a|any) recipes?\b/i,
  /\bthere(?:'s|’s| is| are) no recipes?\b/i,
];

/**
 * Whether a model reply means "this page has no recipe".
 *
 * Only the first line is checked, after markdown emphasis and quotes are
 * stripped. Pattern based, so unusual phrasing can slip through either way.
 */
export function isNoRecipeResponse(reply: string): boolean {
  const trimmed = reply.trim();
  if (!trimmed) return true;

  const firstLine = (trimmed.split("\n")[0] ?? "")
    .replace(/[*`"“”]/g, "")
    .trim()
    .replace(/^_+|_+$/g, "")
    .replace(/[.!]+$/, "")
    .trim();

  return NO_RECIPE_PATTERNS.some((pattern) => pattern.test(firstLine));
}

export class RecipeExtractor {
  constructor(private readonly provider: LLMProvider) {}

  async extract(page: PageContent): Promise<ExtractionResult> {
    if (!page.text.trim()) {
      return { kind: "not_found", reason: "blank_page" };
    }

    let completion: Completion;
    try {
      completion = await complete(
        this.provider,
        RECIPE_EXTRACTION_SYSTEM_PROMPT,
        buildExtractionPrompt(page),
      );
    } catch (err) {
      throw new ModelError(
        `Extraction failed for page ${page.pageNumber} of ${page.documentPath}: ${errorMessage(err)}`,
        "extract",
        { cause: err },
      );
    }

    if (completion.stopReason === "max_tokens") {
      throw new ModelError(
        `Extraction for page ${page.pageNumber} of ${page.documentPath} was cut off at the token limit`,
        "extract",
      );
    }

    if (isNoRecipeResponse(completion.text)) {
      return { kind: "not_found", reason: "no_recipe" };
    }
    return { kind: "found", text: completion.text.trim() };
  }
}
