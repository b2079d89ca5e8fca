/**
 * Run several provider pipelines in sequence with one settings load
 */

import type {
  PipelineRunResult,
  RunAllPipelinesInput,
  RunAllPipelinesResult,
  Settings,
} from "@/types";
import { ConfigError, loadSettings } from "@/config";
import { ALL_PROVIDERS, LISTING_SOURCES } from "./sources";
import { runListingPipeline } from "./pipelines";
import * as logger from "@/logger";

/**
 * Load settings once, then run each provider's pipeline in order
 *
 * A settings failure aborts before any provider runs. A provider failure
 * is recorded in its result and the next provider still runs.
 */
export async function runAllPipelines(
  input: RunAllPipelinesInput = {},
): Promise<RunAllPipelinesResult> {
  const providers = input.providers ?? [...ALL_PROVIDERS];
  if (providers.length === 0) {
    logger.warn("No providers selected, nothing to run", {
      validProviders: [...ALL_PROVIDERS],
    });
    return { ok: true, results: [] };
  }

  let settings: Settings;
  try {
    settings = input.settings ?? loadSettings(input.configPath);
  } catch (err) {
    if (err instanceof ConfigError) {
      logger.error("Configuration error, no provider was run", { error: err.message });
      return { ok: false, results: [], error: err.message };
    }
    throw err;
  }

  const results: PipelineRunResult[] = [];
  for (const provider of providers) {
    const result = await runListingPipeline(LISTING_SOURCES[provider], {
      settings,
      httpRequest: input.httpRequest,
      connect: input.connect,
    });
    results.push(result);
  }

  logger.info("All pipelines finished", {
    results: results.map((r) => ({
      provider: r.provider,
      status: r.status,
      stage: r.stage,
      upserted: r.upserted,
    })),
  });

  return { ok: true, results };
}
