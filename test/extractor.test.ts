import { describe, expect, test } from "vitest";
import { ModelError } from "../src/errors.ts";
import { MockProvider } from "../src/llm/mock.ts";
import { RecipeExtractor, isNoRecipeResponse } from "../src/recipes/extractor.ts";
import { RECIPE_EXTRACTION_SYSTEM_PROMPT } from "../src/recipes/prompts.ts";

const page = (text: string) => ({ documentPath: "/books/bakes.pdf", pageNumber: 4, text });

describe("isNoRecipeResponse", () => {
  test.each([
    "NO_RECIPE",
    "  no_recipe.  ",
    "**NO_RECIPE**",
    "NO_RECIPE\n\nThis page is the table of contents.",
    "No recipe found on this page.",
    "This page does not contain a recipe.",
    "The page doesn't contain any recipes",
    "There is no recipe on this page.",
    "There's no recipe on this page.",
    "there’s no recipe here",
    "",
    "   \n ",
  ])("%j means no recipe", (reply) => {
    expect(isNoRecipeResponse(reply)).toBe(true);
  });

  test.each([
    "Lemon Tart\nIngredients:\n4 lemons",
    "No-Bake Cookies\n1 cup oats",
    "Shortbread\nThere is no recipe simpler than this one.",
  ])("%j is a recipe", (reply) => {
    expect(isNoRecipeResponse(reply)).toBe(false);
  });
});

describe("RecipeExtractor", () => {
  test("returns the transcription when the model finds a recipe", async () => {
    const mock = new MockProvider([{ text: "  Lemon Tart\n4 lemons\nBake.\n" }]);
    const result = await new RecipeExtractor(mock).extract(page("LEMON TART ..."));

    expect(result).toEqual({ kind: "found", text: "Lemon Tart\n4 lemons\nBake." });
    expect(mock.lastCall?.systemPrompt).toBe(RECIPE_EXTRACTION_SYSTEM_PROMPT);
  });

  test("sends the page text and number", async () => {
    const mock = new MockProvider([{ text: "NO_RECIPE" }]);
    await new RecipeExtractor(mock).extract(page("Contents\nBreads 12"));

    expect(mock.lastCall?.messages[0]?.content[0]?.text).toBe(
      "Transcribe the recipe on page 4 of this cookbook, if there is one.\n\n---\nContents\nBreads 12\n---",
    );
  });

  test("a no-recipe reply is not found, not an error", async () => {
    const mock = new MockProvider([{ text: "NO_RECIPE" }]);
    const result = await new RecipeExtractor(mock).extract(page("Foreword"));
    expect(result).toEqual({ kind: "not_found", reason: "no_recipe" });
  });

  test("a blank page skips the model", async () => {
    const mock = new MockProvider();
    const result = await new RecipeExtractor(mock).extract(page("  \n "));

    expect(result).toEqual({ kind: "not_found", reason: "blank_page" });
    expect(mock.calls).toHaveLength(0);
  });

  test("a reply cut off at the token limit is an extraction error", async () => {
    const mock = new MockProvider([{ text: "Lemon Tart\n4 lem", stopReason: "max_tokens" }]);

    await expect(new RecipeExtractor(mock).extract(page("LEMON TART ..."))).rejects.toMatchObject({
      stage: "extract",
      message: "Extraction for page 4 of /books/bakes.pdf was cut off at the token limit",
    });
  });

  test("API failures become extraction model errors", async () => {
    const mock = new MockProvider([{ error: new Error("401 Unauthorized") }]);
    const error = await new RecipeExtractor(mock).extract(page("Scones")).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ModelError);
    expect(error).toMatchObject({
      stage: "extract",
      message: "Extraction failed for page 4 of /books/bakes.pdf: 401 Unauthorized",
    });
  });
});
