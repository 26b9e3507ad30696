/**
 * Error taxonomy for a run.
 *
 * Configuration and output errors end the run. Everything else is scoped
 * to one page: the pipeline logs it and moves on.
 */

export class RecipeHarvestError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Bad flags, missing credentials, unknown provider, missing input directory. */
export class ConfigError extends RecipeHarvestError {}

/** A document or page whose text layer could not be read. */
export class PageReadError extends RecipeHarvestError {
  constructor(
    message: string,
    readonly documentPath: string,
    readonly pageNumber: number | null,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export type ModelStage = "extract" | "format";

/** The model call failed (network, auth, rate limit) or returned nothing usable. */
export class ModelError extends RecipeHarvestError {
  constructor(
    message: string,
    readonly stage: ModelStage,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

/** The output directory cannot be created or written to. */
export class OutputError extends RecipeHarvestError {
  constructor(
    message: string,
    readonly path: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export function isFatal(err: unknown): boolean {
  return err instanceof ConfigError || err instanceof OutputError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
