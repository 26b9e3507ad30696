/**
 * Run configuration.
 *
 * Read once at startup from the environment (the entry point loads `.env`
 * through dotenv first). CLI flags are layered on top in bootstrap/.
 */

export type Env = Record<string, string | undefined>;

export const DEFAULT_PROVIDER = "openai";
export const DEFAULT_INPUT_DIR = "pdf";
export const DEFAULT_OUTPUT_DIR = "recipeFiles";

/** Marker for providers that run without a credential */
export const NO_KEY_REQUIRED = "not-required";

export interface RecipeHarvestConfig {
  provider: string;
  model?: string;
  /** Directory scanned for *.pdf files */
  inputDir: string;
  /** Directory the .recipe files are written to */
  outputDir: string;
  /** Ollama server URL; the client default when unset */
  ollamaHost?: string;
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

export function loadConfig(env: Env = process.env): RecipeHarvestConfig {
  const provider = nonEmpty(env.RECIPE_PROVIDER)?.toLowerCase() ?? DEFAULT_PROVIDER;
  return {
    provider,
    model: resolveModel(provider, env),
    inputDir: nonEmpty(env.PDF_FOLDER) ?? DEFAULT_INPUT_DIR,
    outputDir: nonEmpty(env.RECIPE_OUTPUT_FOLDER) ?? DEFAULT_OUTPUT_DIR,
    ollamaHost: nonEmpty(env.OLLAMA_HOST),
  };
}

/**
 * Model override for a provider.
 * Priority: RECIPE_MODEL > provider-specific variable.
 */
export function resolveModel(provider: string, env: Env = process.env): string | undefined {
  const generic = nonEmpty(env.RECIPE_MODEL);
  if (generic) return generic;

  switch (provider) {
    case "openai":
      return nonEmpty(env.OPENAI_MODEL);
    case "anthropic":
      return nonEmpty(env.ANTHROPIC_MODEL);
    case "gemini":
      return nonEmpty(env.GEMINI_MODEL);
    case "ollama":
      return nonEmpty(env.OLLAMA_MODEL);
    default:
      return undefined;
  }
}

/**
 * Resolve the API key for a provider.
 */
export function resolveApiKey(provider: string, env: Env = process.env): string | undefined {
  switch (provider) {
    case "anthropic":
      return nonEmpty(env.ANTHROPIC_API_KEY);
    case "openai":
      return nonEmpty(env.OPENAI_API_KEY);
    case "gemini":
      return nonEmpty(env.GOOGLE_API_KEY) ?? nonEmpty(env.GEMINI_API_KEY);
    case "ollama":
    case "mock":
      return NO_KEY_REQUIRED;
    default:
      return undefined;
  }
}

/** Name of the variable a user should set for a provider's key */
export function apiKeyVariable(provider: string): string {
  switch (provider) {
    case "anthropic":
      return "ANTHROPIC_API_KEY";
    case "gemini":
      return "GOOGLE_API_KEY";
    default:
      return "OPENAI_API_KEY";
  }
}
