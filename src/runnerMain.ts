/**
 * Runner entrypoint — runs the job-board ETL pipelines once and exits
 *
 * Usage:
 *   npm start                      # adzuna, jooble, remoteok
 *   npm start -- remoteok          # selected providers only
 *
 * Environment variables:
 *   - CONFIG_PATH: Path to the INI settings file (optional, defaults to ./config.ini)
 *   - LOG_LEVEL: Logging level (debug, info, warn, error)
 *
 * Provider and database failures are logged and do not change the exit
 * code; only an unexpected error exits with 1.
 */

import "dotenv/config";
import { parseProviderArgs, runAllPipelines } from "./ingestion";
import * as logger from "./logger";

async function main(): Promise<void> {
  const providers = parseProviderArgs(process.argv.slice(2));
  logger.info("Starting job-board ETL", { providers: providers ?? "all" });

  const outcome = await runAllPipelines({ providers });

  if (!outcome.ok) {
    logger.warn("ETL aborted before any provider ran", { error: outcome.error });
    return;
  }

  for (const result of outcome.results) {
    logger.info("Provider result", { ...result });
  }
}

main().catch((error: unknown) => {
  logger.error("Fatal error", {
    error: logger.describeError(error),
    stack: error instanceof Error ? error.stack : undefined,
  });
  process.exitCode = 1;
});
