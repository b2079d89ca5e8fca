/**
 * Database error classes
 */

import type { DbConnectionErrorKind } from "@/types";

const CONNECTION_HINTS: Record<DbConnectionErrorKind, string> = {
  cannot_open: "Could not open the database. Check the [database] path and its directory permissions.",
  access_denied: "Access to the database was denied. Check file permissions and that it is not read-only.",
  unknown: "An error occurred while connecting to the database.",
};

/**
 * Opening or initializing a connection failed
 */
export class DbConnectionError extends Error {
  public readonly kind: DbConnectionErrorKind;
  public readonly database: string;

  constructor(kind: DbConnectionErrorKind, database: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`${CONNECTION_HINTS[kind]} Details: ${detail}`, { cause });
    this.name = "DbConnectionError";
    this.kind = kind;
    this.database = database;
  }
}

/**
 * Creating a listings table or upserting a batch failed; the batch was rolled back
 */
export class ListingLoadError extends Error {
  public readonly table: string;
  public readonly rows: number;

  constructor(table: string, rows: number, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to load ${rows} row(s) into ${table}: ${detail}`, { cause });
    this.name = "ListingLoadError";
    this.table = table;
    this.rows = rows;
  }
}
