/**
 * LLM prompt templates for recipe extraction and formatting.
 */

import type { PageContent } from "../pdf/document.ts";

/** Exact reply the extraction prompt asks for when a page has no recipe */
export const NO_RECIPE_SENTINEL = "NO_RECIPE";

/**
 * System prompt for the first pass: transcribe, don't rewrite.
 */
export const RECIPE_EXTRACTION_SYSTEM_PROMPT = `You are a recipe transcription specialist. You receive the text of one page of a cookbook, as extracted from a PDF. The layout may be broken: columns can be interleaved, lines can be split, and page headers, footers and page numbers can be mixed in.

## Task

If the page contains a recipe, transcribe it faithfully:
- The recipe title
- Every ingredient line, with its quantity
- Every preparation step, in order
- Any servings, timing and nutrition information printed with the recipe

Leave out page numbers, running headers, and text that belongs to other recipes or to the book's narrative.

## When there is no recipe

If the page holds no recipe (front matter, table of contents, index, photos, essays), reply with exactly:

${NO_RECIPE_SENTINEL}

and nothing else.

## Important

- Do not invent ingredients or steps that are not on the page
- Do not reformat into a different structure; that happens in a later step
- Return only the transcription (or ${NO_RECIPE_SENTINEL})`;

/**
 * Build the user prompt for one page.
 */
export function buildExtractionPrompt(page: PageContent): string {
  return [
    `Transcribe the recipe on page ${page.pageNumber} of this cookbook, if there is one.`,
    "",
    "---",
    page.text,
    "---",
  ].join("\n");
}

/**
 * System prompt for the second pass: rewrite into the .recipe layout.
 */
export const RECIPE_FORMAT_SYSTEM_PROMPT = `Format recipe transcriptions as structured Markdown for a recipe manager, including nutritional information from any format (nutrition labels, inline text, etc.).`;

/**
 * Build the formatting prompt around a transcription.
 */
export function buildFormatPrompt(transcription: string): string {
  return `Extract structured recipe data from the following text:
---
${transcription}
---
Format the output as structured Markdown. Each recipe should have:
- A \`# Recipe Title\` at the top
- A \`## Macros\` section that includes any nutritional information like:
  - Calories (cal/kcal)
  - Protein (g)
  - Carbohydrates (g)
  - Fat (g)
  Look for this information anywhere in the text, including in nutrition labels,
  nutrition facts panels, or inline text. Convert all formats to the standard format shown below.
  Leave the section out if the text has no nutritional information.
- A \`## Details\` section with servings, prep time and cook time when the text gives them
- A \`## Ingredients\` section with ingredients formatted as \`- Ingredient | Quantity | Brand/Type\`
  - Remove personal pronouns or phrases like "I used" or "We recommend"
  - Convert statements like "I used Brand X" to just "Brand X"
- A \`## Instructions\` section with numbered steps
  - Keep instructions objective and direct, removing personal pronouns

Return **only the structured Markdown recipes**, nothing else.

Example conversions:
Input: "1 scoop protein powder (I used 1UP brand)"
Output: "- Protein powder | 1 scoop | 1UP"

Input: "Nutrition: 345 calories, 40g protein, 21g carbs, 6g fat"
Output:
## Macros
- Calories: 345
- Protein: 40g
- Carbohydrates: 21g
- Fat: 6g

Input: "Serves 4. Prep 10 minutes, cook 25 minutes"
Output:
## Details
- Servings: 4
- Prep time: 10 minutes
- Cook time: 25 minutes`;
}
