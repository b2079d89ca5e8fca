/**
 * Generic listing pipeline
 *
 * load settings → connect → fetch/normalize → assign keys → upsert → close.
 * Expected failures end the run with a result; they are never thrown.
 * The connection, once opened, is always closed.
 */

import type Database from "better-sqlite3";
import type {
  ListingSource,
  PipelineRunResult,
  PipelineStage,
  PipelineStatus,
  RunPipelineInput,
  Settings,
} from "@/types";
import type { JobBoardClient } from "@/interfaces";
import { ConfigError, loadSettings } from "@/config";
import {
  closeDb,
  DbConnectionError,
  ListingLoadError,
  openDb,
  upsertListings,
} from "@/db";
import { assignListingKeys } from "@/utils";
import * as logger from "@/logger";

/**
 * Run one provider's pipeline end to end
 *
 * @param source - Provider adapter (table + client factory)
 * @param input - Injected settings/client/connection; all optional
 * @returns Outcome with the stage reached and row counts
 * @throws Only for unexpected errors, never for config, network or database failures
 */
export async function runListingPipeline(
  source: ListingSource,
  input: RunPipelineInput = {},
): Promise<PipelineRunResult> {
  const log = logger.withContext({ provider: source.provider });
  let stage: PipelineStage = "load_config";
  let fetched = 0;
  let upserted = 0;

  const finish = (status: PipelineStatus, error?: string): PipelineRunResult => ({
    provider: source.provider,
    status,
    stage,
    fetched,
    upserted,
    ...(error !== undefined && { error }),
  });

  log.info("Starting ETL process", { table: source.table.name });

  let settings: Settings;
  let client: JobBoardClient;
  try {
    settings = input.settings ?? loadSettings(input.configPath);
    client = input.client ?? source.createClient(settings, input.httpRequest);
  } catch (err) {
    if (err instanceof ConfigError) {
      log.error("Configuration error, aborting", { error: err.message });
      return finish("failed", err.message);
    }
    throw err;
  }

  stage = "connect_db";
  const connect = input.connect ?? openDb;
  let db: Database.Database;
  try {
    db = connect(settings.database);
  } catch (err) {
    if (err instanceof DbConnectionError) {
      log.error("Database connection error, aborting", {
        kind: err.kind,
        error: err.message,
      });
      return finish("failed", err.message);
    }
    throw err;
  }

  try {
    stage = "fetch";
    const records = await client.fetchListings();
    stage = "normalize";
    fetched = records.length;

    if (records.length === 0) {
      log.warn("No listings to load, skipping database write");
      return finish("skipped");
    }

    stage = "assign_keys";
    const keyed = assignListingKeys(records);

    stage = "upsert";
    try {
      upserted = upsertListings(db, source.table, keyed);
    } catch (err) {
      if (err instanceof ListingLoadError) {
        log.error("SQL error, batch rolled back", { error: err.message });
        return finish("failed", err.message);
      }
      throw err;
    }

    log.info("Rows merged", { table: source.table.name, rows: upserted });
    return finish("success");
  } finally {
    closeDb(db);
    log.info("ETL process finished", { stage });
  }
}
