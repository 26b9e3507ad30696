#!/usr/bin/env tsx
/**
 * recipe-harvest: PDF cookbook pages to .recipe files
 *
 * Entry point: loads .env, parses flags, runs the pipeline and sets the
 * exit status.
 */

import "dotenv/config";
import { parseCliArgs } from "./src/bootstrap/args.ts";
import { main } from "./src/bootstrap/start-app.ts";
import { createLogger } from "./src/logger.ts";
import { errorMessage } from "./src/errors.ts";

try {
  const args = await parseCliArgs();
  process.exitCode = await main(args);
} catch (err) {
  createLogger().error(errorMessage(err));
  process.exitCode = 1;
}
