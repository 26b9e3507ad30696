/**
 * Persists formatted recipes as `<output_dir>/<name>.recipe`.
 *
 * Files are never overwritten: a name already used in this run, or already
 * on disk, gets a numeric suffix.
 */

import { access, mkdir, writeFile } from "node:fs/promises";
import { constants } from "node:fs";
import { join } from "node:path";
import { OutputError, errorMessage } from "../errors.ts";
import type { FormattedRecipe } from "./formatter.ts";

export const RECIPE_EXTENSION = ".recipe";
export const MAX_FILENAME_LENGTH = 80;

/**
 * Turn a recipe title into a safe file stem.
 * "Grandma's Apple Pie!" → "grandmas_apple_pie", "Crème Brûlée" → "creme_brulee"
 *
 * Returns "" when nothing usable is left.
 */
export function sanitizeFilename(title: string): string {
  return title
    .normalize("NFKD")
    .replace(/\p{M}/gu, "")
    .replace(/[^\w\s-]/g, "")
    .trim()
    .replace(/\s+/g, "_")
    .toLowerCase()
    .replace(/_+/g, "_")
    .slice(0, MAX_FILENAME_LENGTH)
    .replace(/^[_-]+|[_-]+$/g, "");
}

function hasErrorCode(err: unknown, code: string): boolean {
  return err instanceof Error && "code" in err && err.code === code;
}

export class RecipeWriter {
  /** Stems already written during this run */
  private readonly used = new Set<string>();
  private untitledCount = 0;

  constructor(readonly outputDir: string) {}

  /**
   * Create the output directory and check it is writable.
   *
   * @throws OutputError if the directory cannot be created or written to.
   */
  async prepare(): Promise<void> {
    try {
      await mkdir(this.outputDir, { recursive: true });
      await access(this.outputDir, constants.W_OK);
    } catch (err) {
      throw new OutputError(
        `Output directory ${this.outputDir} is not writable: ${errorMessage(err)}`,
        this.outputDir,
        { cause: err },
      );
    }
  }

  /** Base stem for a recipe, before collision handling. */
  stemFor(recipe: FormattedRecipe): string {
    const fromTitle = recipe.title ? sanitizeFilename(recipe.title) : "";
    if (fromTitle) return fromTitle;
    this.untitledCount += 1;
    return `recipe_${this.untitledCount}`;
  }

  /**
   * Write one recipe and return the path of the new file.
   */
  async write(recipe: FormattedRecipe): Promise<string> {
    const base = this.stemFor(recipe);
    const content = recipe.markdown.endsWith("\n") ? recipe.markdown : `${recipe.markdown}\n`;

    for (let attempt = 1; ; attempt++) {
      const stem = attempt === 1 ? base : `${base}_${attempt}`;
      if (this.used.has(stem)) continue;

      const path = join(this.outputDir, `${stem}${RECIPE_EXTENSION}`);
      try {
        await writeFile(path, content, { encoding: "utf8", flag: "wx" });
      } catch (err) {
        if (hasErrorCode(err, "EEXIST")) {
          this.used.add(stem);
          continue;
        }
        throw new OutputError(`Cannot write ${path}: ${errorMessage(err)}`, path, { cause: err });
      }

      this.used.add(stem);
      return path;
    }
  }
}
