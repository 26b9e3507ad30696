/**
 * Shared test fixtures: in-memory documents, generated PDFs and a mock
 * model that answers from the prompt it receives.
 */

import { PDFDocument, StandardFonts } from "pdf-lib";
import { PageReadError } from "../src/errors.ts";
import { MockProvider, type MockResponse } from "../src/llm/mock.ts";
import type { PageContent, SourceDocument } from "../src/pdf/document.ts";
import { RECIPE_FORMAT_SYSTEM_PROMPT } from "../src/recipes/prompts.ts";

/**
 * Build a PDF with one page per entry; each entry is the page's lines.
 * An empty array makes a blank page.
 */
export async function makePdf(pages: string[][]): Promise<Uint8Array> {
  const doc = await PDFDocument.create();
  const font = await doc.embedFont(StandardFonts.Helvetica);

  for (const lines of pages) {
    const page = doc.addPage([595.28, 841.89]);
    lines.forEach((line, i) => {
      page.drawText(line, { x: 50, y: 780 - i * 20, size: 12, font });
    });
  }

  return doc.save();
}

export interface FakeDocument extends SourceDocument {
  reads: number[];
  closes: number;
}

/**
 * A document whose pages are plain strings. `null` marks a page that
 * cannot be read.
 */
export function fakeDocument(path: string, pages: Array<string | null>): FakeDocument {
  const reads: number[] = [];
  const doc: FakeDocument = {
    path,
    pageCount: pages.length,
    reads,
    closes: 0,
    async close() {
      doc.closes += 1;
    },
    async readPage(pageNumber: number): Promise<PageContent> {
      reads.push(pageNumber);
      const text = pages[pageNumber - 1];
      if (text === null || text === undefined) {
        throw new PageReadError(`Cannot read page ${pageNumber} of ${path}`, path, pageNumber);
      }
      return { documentPath: path, pageNumber, text };
    },
  };
  return doc;
}

export interface FakeRecipe {
  title: string;
  ingredients: string[];
  steps: string[];
}

export function transcriptionOf(recipe: FakeRecipe): string {
  return [
    recipe.title,
    "Ingredients:",
    ...recipe.ingredients,
    "Method:",
    ...recipe.steps.map((s, i) => `${i + 1}. ${s}`),
  ].join("\n");
}

export function formattedOf(recipe: FakeRecipe): string {
  return [
    `# ${recipe.title}`,
    "",
    "## Ingredients",
    ...recipe.ingredients.map((i) => `- ${i}`),
    "",
    "## Instructions",
    ...recipe.steps.map((s, i) => `${i + 1}. ${s}`),
  ].join("\n");
}

/**
 * A model that finds a recipe when the page text mentions its title, and
 * formats any transcription it is handed back.
 */
export function recipeModel(recipes: FakeRecipe[]): MockProvider {
  return new MockProvider((prompt, systemPrompt): MockResponse => {
    const recipe = recipes.find((r) => prompt.includes(r.title));

    if (systemPrompt === RECIPE_FORMAT_SYSTEM_PROMPT) {
      return recipe ? { text: "```markdown\n" + formattedOf(recipe) + "\n```" } : { text: "" };
    }
    return recipe ? { text: transcriptionOf(recipe) } : { text: "NO_RECIPE" };
  });
}

export const PANCAKES: FakeRecipe = {
  title: "Buttermilk Pancakes",
  ingredients: ["Flour | 2 cups |", "Buttermilk | 2 cups |", "Eggs | 2 |"],
  steps: ["Whisk everything together.", "Cook on a hot griddle."],
};

export const LEMON_TART: FakeRecipe = {
  title: "Lemon Tart",
  ingredients: ["Lemons | 4 |", "Sugar | 1 cup |", "Butter | 100 g |"],
  steps: ["Make the curd.", "Bake in the shell."],
};
