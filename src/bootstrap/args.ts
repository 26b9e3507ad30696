import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import { ConfigError } from "../errors.ts";

export interface CliArgs {
  start?: number;
  end?: number;
  input?: string;
  output?: string;
  provider?: string;
  model?: string;
  verbose: boolean;
}

export async function parseCliArgs(argv = process.argv): Promise<CliArgs> {
  const parsed = await yargs(hideBin(argv))
    .scriptName("recipe-harvest")
    .usage("$0 [--start N] [--end N]\n\nExtract recipes from PDF pages into .recipe files")
    .option("start", {
      type: "number",
      describe: "First page to process (1-based, inclusive)",
    })
    .option("end", {
      type: "number",
      describe: "Last page to process (1-based, inclusive)",
    })
    .option("input", {
      type: "string",
      describe: "Directory of PDF files (default: $PDF_FOLDER or ./pdf)",
    })
    .option("output", {
      type: "string",
      describe: "Directory for .recipe files (default: $RECIPE_OUTPUT_FOLDER or ./recipeFiles)",
    })
    .option("provider", {
      type: "string",
      describe: "LLM provider (openai, anthropic, gemini, or ollama)",
    })
    .option("model", {
      type: "string",
      describe: "Specific model ID",
    })
    .option("verbose", {
      type: "boolean",
      default: false,
      describe: "Log every page decision",
    })
    .strict()
    .fail((msg, err) => {
      throw new ConfigError(msg || (err ? err.message : "Invalid arguments"));
    })
    .help()
    .parse();

  return {
    start: parsed.start,
    end: parsed.end,
    input: parsed.input,
    output: parsed.output,
    provider: parsed.provider,
    model: parsed.model,
    verbose: parsed.verbose,
  };
}
