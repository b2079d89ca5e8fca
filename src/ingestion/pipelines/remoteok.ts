/**
 * RemoteOK ingestion pipeline entrypoint
 */

import type { PipelineRunResult, RunPipelineInput } from "@/types";
import { REMOTEOK_SOURCE } from "@/ingestion/sources";
import { runListingPipeline } from "./listingPipeline";

export function runRemoteOkPipeline(input?: RunPipelineInput): Promise<PipelineRunResult> {
  return runListingPipeline(REMOTEOK_SOURCE, input);
}
