/**
 * Pipeline type definitions
 */

import type { Settings } from "@/types/config";
import type { DbConnector } from "@/types/db";
import type { HttpRequestFn } from "@/types/clients/http";
import type { ListingTableSchema, Provider } from "@/types/listings";
import type { JobBoardClient } from "@/interfaces";

/**
 * Stages of one pipeline run, in execution order
 */
export type PipelineStage =
  | "load_config"
  | "connect_db"
  | "fetch"
  | "normalize"
  | "assign_keys"
  | "upsert";

/**
 * - success: rows were upserted
 * - skipped: the provider returned nothing, no database write happened
 * - failed: a config, connection or load error stopped the run
 */
export type PipelineStatus = "success" | "skipped" | "failed";

/**
 * Per-provider adapter consumed by the generic pipeline
 */
export interface ListingSource {
  provider: Provider;
  table: ListingTableSchema;
  createClient(settings: Settings, httpRequest?: HttpRequestFn): JobBoardClient;
}

export interface RunPipelineInput {
  /** Pre-loaded settings; when absent they are read from configPath */
  settings?: Settings;
  configPath?: string;
  /** Injected client (skips createClient) */
  client?: JobBoardClient;
  /** Injected HTTP layer passed to createClient */
  httpRequest?: HttpRequestFn;
  /** Injected connection factory (defaults to openDb) */
  connect?: DbConnector;
}

export interface PipelineRunResult {
  provider: Provider;
  status: PipelineStatus;
  /** Last stage reached (the failing stage when status is "failed") */
  stage: PipelineStage;
  fetched: number;
  upserted: number;
  error?: string;
}

export interface RunAllPipelinesInput extends Omit<RunPipelineInput, "client"> {
  providers?: Provider[];
}

export interface RunAllPipelinesResult {
  /** False when the settings could not be loaded and nothing ran */
  ok: boolean;
  results: PipelineRunResult[];
  error?: string;
}
