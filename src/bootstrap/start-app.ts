import { resolve } from "node:path";
import { loadConfig, type Env } from "../config.ts";
import { errorMessage } from "../errors.ts";
import type { LLMProvider } from "../llm/provider.ts";
import { createLogger, type Logger } from "../logger.ts";
import { formatSummary, runPipeline, type RunSummary } from "../pipeline.ts";
import { RecipeExtractor } from "../recipes/extractor.ts";
import { RecipeFormatter } from "../recipes/formatter.ts";
import type { CliArgs } from "./args.ts";
import { resolveProvider } from "./provider.ts";

export interface StartOptions {
  env?: Env;
  logger?: Logger;
  /** Use this provider instead of resolving one from config */
  provider?: LLMProvider;
}

/**
 * Resolve config and provider, then run the pipeline.
 */
export async function startRecipeHarvest(args: CliArgs, options: StartOptions = {}): Promise<RunSummary> {
  const env = options.env ?? process.env;
  const logger = options.logger ?? createLogger(args.verbose ? "debug" : "info");
  const config = loadConfig(env);

  const provider = options.provider ?? (await resolveProvider(config, args, env)).provider;
  logger.debug(`Using ${provider.name} model ${provider.model}`);

  const inputDir = resolve(args.input ?? config.inputDir);
  const outputDir = resolve(args.output ?? config.outputDir);

  const summary = await runPipeline({
    inputDir,
    outputDir,
    range: { start: args.start, end: args.end },
    extractor: new RecipeExtractor(provider),
    formatter: new RecipeFormatter(provider),
    logger,
  });

  logger.info(formatSummary(summary));
  return summary;
}

/**
 * Run and map the outcome to an exit status: 0 when the run completes,
 * even with skipped pages; 1 on configuration or fatal output errors.
 */
export async function main(args: CliArgs, options: StartOptions = {}): Promise<number> {
  const logger = options.logger ?? createLogger(args.verbose ? "debug" : "info");
  try {
    await startRecipeHarvest(args, { ...options, logger });
    return 0;
  } catch (err) {
    logger.error(errorMessage(err));
    return 1;
  }
}
