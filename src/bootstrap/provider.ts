import { createProvider, hasProvider, listProviders } from "../llm/index.ts";
import type { LLMProvider } from "../llm/provider.ts";
import { listLocalModels, ollamaClient } from "../llm/ollama.ts";
import {
  NO_KEY_REQUIRED,
  apiKeyVariable,
  resolveApiKey,
  resolveModel,
  type Env,
  type RecipeHarvestConfig,
} from "../config.ts";
import { ConfigError, errorMessage } from "../errors.ts";
import type { CliArgs } from "./args.ts";

export interface ProviderResolution {
  providerName: string;
  provider: LLMProvider;
}

/**
 * Pick the provider and model, and check its credential.
 *
 * @throws ConfigError before any page is processed.
 */
export async function resolveProvider(
  config: RecipeHarvestConfig,
  args: Pick<CliArgs, "provider" | "model">,
  env: Env = process.env,
): Promise<ProviderResolution> {
  const providerName = (args.provider ?? config.provider).toLowerCase();

  if (!hasProvider(providerName)) {
    throw new ConfigError(
      `Unknown LLM provider "${providerName}". Available: ${listProviders().join(", ")}`,
    );
  }

  const apiKey = resolveApiKey(providerName, env);
  if (!apiKey) {
    throw new ConfigError(
      `Missing API key for ${providerName}. Add ${apiKeyVariable(providerName)} to the .env file or set it as an environment variable.`,
    );
  }

  let modelName = args.model ?? (args.provider ? resolveModel(providerName, env) : config.model);

  if (providerName === "ollama" && !modelName) {
    let models: Array<{ name: string }>;
    try {
      models = await listLocalModels(ollamaClient(config.ollamaHost));
    } catch (err) {
      throw new ConfigError(
        errorMessage(err) === "not-running"
          ? "Cannot connect to Ollama.\n  Start it with:  ollama serve"
          : `Cannot list Ollama models: ${errorMessage(err)}`,
        { cause: err },
      );
    }
    const first = models[0];
    if (!first) {
      throw new ConfigError(
        "No Ollama models found.\n  Download one with:  ollama pull llama3.2",
      );
    }
    modelName = first.name;
  }

  return {
    providerName,
    provider: createProvider(providerName, {
      model: modelName,
      apiKey: apiKey === NO_KEY_REQUIRED ? undefined : apiKey,
      host: providerName === "ollama" ? config.ollamaHost : undefined,
    }),
  };
}
