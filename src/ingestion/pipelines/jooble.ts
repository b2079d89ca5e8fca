/**
 * Jooble ingestion pipeline entrypoint
 */

import type { PipelineRunResult, RunPipelineInput } from "@/types";
import { JOOBLE_SOURCE } from "@/ingestion/sources";
import { runListingPipeline } from "./listingPipeline";

export function runJooblePipeline(input?: RunPipelineInput): Promise<PipelineRunResult> {
  return runListingPipeline(JOOBLE_SOURCE, input);
}
