/**
 * Adzuna ingestion pipeline entrypoint
 */

import type { PipelineRunResult, RunPipelineInput } from "@/types";
import { ADZUNA_SOURCE } from "@/ingestion/sources";
import { runListingPipeline } from "./listingPipeline";

/**
 * Fetch Adzuna listings and upsert them into AdzunaJobs
 */
export function runAdzunaPipeline(input?: RunPipelineInput): Promise<PipelineRunResult> {
  return runListingPipeline(ADZUNA_SOURCE, input);
}
