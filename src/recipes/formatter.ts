/**
 * Second model pass: rewrite a transcription into the .recipe layout.
 */

import { ModelError, errorMessage } from "../errors.ts";
import { complete, type Completion } from "../llm/messages.ts";
import type { LLMProvider } from "../llm/provider.ts";
import { RECIPE_FORMAT_SYSTEM_PROMPT, buildFormatPrompt } from "./prompts.ts";

export interface FormattedRecipe {
  /** Text of the `# ` heading, or null when the model gave none */
  title: string | null;
  markdown: string;
}

const TITLE_LINE = /^#[ \t]+(.*?)[ \t#]*$/;

/**
 * Remove markdown code fences the model wraps its answer in.
 */
export function stripCodeFences(text: string): string {
  return text
    .replace(/```[a-zA-Z]*[ \t]*\n?/g, "")
    .trim();
}

export function extractTitle(markdown: string): string | null {
  for (const line of markdown.split("\n")) {
    const match = TITLE_LINE.exec(line.trim());
    if (match?.[1]) return match[1].trim();
  }
  return null;
}

/**
 * Split a reply into one recipe per top-level `# ` heading.
 *
 * Text before the first heading (e.g. "Here is the recipe:") is dropped.
 * A reply with no heading at all is one untitled recipe.
 */
export function splitRecipes(markdown: string): FormattedRecipe[] {
  const lines = markdown.split("\n");
  const chunks: string[][] = [];
  let current: string[] | null = null;

  for (const line of lines) {
    if (TITLE_LINE.test(line)) {
      current = [line];
      chunks.push(current);
    } else if (current) {
      current.push(line);
    }
  }

  if (chunks.length === 0) {
    const body = markdown.trim();
    return body ? [{ title: null, markdown: body }] : [];
  }

  return chunks.map((chunk) => {
    const text = chunk.join("\n").trim();
    return { title: extractTitle(text), markdown: text };
  });
}

export class RecipeFormatter {
  constructor(private readonly provider: LLMProvider) {}

  async format(transcription: string): Promise<FormattedRecipe[]> {
    let completion: Completion;
    try {
      completion = await complete(
        this.provider,
        RECIPE_FORMAT_SYSTEM_PROMPT,
        buildFormatPrompt(transcription),
      );
    } catch (err) {
      throw new ModelError(`Formatting failed: ${errorMessage(err)}`, "format", { cause: err });
    }

    if (completion.stopReason === "max_tokens") {
      throw new ModelError("Formatting was cut off at the token limit", "format");
    }

    const recipes = splitRecipes(stripCodeFences(completion.text));
    if (recipes.length === 0) {
      throw new ModelError("Formatting returned an empty reply", "format");
    }
    return recipes;
  }
}
