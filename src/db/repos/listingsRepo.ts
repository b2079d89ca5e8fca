/**
 * Listings repository
 *
 * Table management and set-based upsert for the provider listing tables.
 * Table and column names come from the schemas in @/constants/tables,
 * never from provider data.
 */

import type Database from "better-sqlite3";
import type {
  KeyedListing,
  ListingColumn,
  ListingRow,
  ListingTableSchema,
} from "@/types";
import { LISTING_KEY_COLUMN, UPSERT_CHUNK_SIZE } from "@/constants";
import { ListingLoadError } from "@/db/errors";
import * as logger from "@/logger";

type SqlValue = string | number | null;

function quoteIdent(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

/**
 * CREATE TABLE IF NOT EXISTS statement for a schema
 */
export function buildCreateTableSql(table: ListingTableSchema): string {
  const columns = table.columns.map((column) => {
    const primary = column.name === LISTING_KEY_COLUMN.name ? " PRIMARY KEY" : "";
    return `  ${quoteIdent(column.name)} ${column.type}${primary}`;
  });
  return `CREATE TABLE IF NOT EXISTS ${quoteIdent(table.name)} (\n${columns.join(",\n")}\n)`;
}

/**
 * Multi-row upsert statement: one VALUES tuple per row, conflicts on the
 * surrogate key overwrite every other column
 */
export function buildUpsertSql(table: ListingTableSchema, rowCount: number): string {
  const names = table.columns.map((column) => quoteIdent(column.name));
  const tuple = `(${table.columns.map(() => "?").join(", ")})`;
  const updates = table.columns
    .filter((column) => column.name !== LISTING_KEY_COLUMN.name)
    .map((column) => `${quoteIdent(column.name)} = excluded.${quoteIdent(column.name)}`);

  return (
    `INSERT INTO ${quoteIdent(table.name)} (${names.join(", ")})\n` +
    `VALUES ${Array.from({ length: rowCount }, () => tuple).join(",\n       ")}\n` +
    `ON CONFLICT(${quoteIdent(LISTING_KEY_COLUMN.name)}) DO UPDATE SET\n  ` +
    updates.join(",\n  ")
  );
}

/**
 * Storage value for one field: undefined and NaN become NULL
 */
export function toSqlValue(value: string | number | null | undefined): SqlValue {
  if (value === undefined) {
    return null;
  }
  if (typeof value === "number" && Number.isNaN(value)) {
    return null;
  }
  return value;
}

function rowParams(columns: readonly ListingColumn[], listing: KeyedListing): SqlValue[] {
  return columns.map((column) => toSqlValue(listing[column.field]));
}

/**
 * Ensure the destination table exists (no-op if present)
 */
export function ensureListingsTable(db: Database.Database, table: ListingTableSchema): void {
  db.exec(buildCreateTableSql(table));
}

/**
 * Create the table if needed and upsert all rows as one atomic batch
 *
 * Rows are written with multi-row INSERT ... ON CONFLICT statements of at
 * most UPSERT_CHUNK_SIZE rows, all inside a single transaction: either every
 * row lands or none does (table creation included).
 *
 * @returns Number of rows written
 * @throws {ListingLoadError} After rolling back the batch
 */
export function upsertListings(
  db: Database.Database,
  table: ListingTableSchema,
  listings: readonly KeyedListing[],
): number {
  if (listings.length === 0) {
    return 0;
  }

  try {
    const load = db.transaction((rows: readonly KeyedListing[]) => {
      ensureListingsTable(db, table);

      for (let start = 0; start < rows.length; start += UPSERT_CHUNK_SIZE) {
        const chunk = rows.slice(start, start + UPSERT_CHUNK_SIZE);
        const params = chunk.flatMap((listing) => rowParams(table.columns, listing));
        db.prepare(buildUpsertSql(table, chunk.length)).run(params);
      }
    });
    load(listings);
  } catch (err) {
    // better-sqlite3 has already rolled the transaction back
    logger.error("Listing batch rolled back", {
      table: table.name,
      rows: listings.length,
      error: logger.describeError(err),
    });
    throw new ListingLoadError(table.name, listings.length, err);
  }

  logger.debug("Listing batch committed", { table: table.name, rows: listings.length });
  return listings.length;
}

/**
 * Check whether a table exists
 */
export function tableExists(db: Database.Database, name: string): boolean {
  const row = db
    .prepare("SELECT 1 AS present FROM sqlite_master WHERE type = 'table' AND name = ?")
    .get(name);
  return row !== undefined;
}

/**
 * Count rows in a listings table (0 when the table does not exist)
 */
export function countListings(db: Database.Database, table: ListingTableSchema): number {
  if (!tableExists(db, table.name)) {
    return 0;
  }
  const row: unknown = db.prepare(`SELECT COUNT(*) AS total FROM ${quoteIdent(table.name)}`).get();
  if (typeof row === "object" && row !== null && "total" in row && typeof row.total === "number") {
    return row.total;
  }
  return 0;
}

/**
 * Get one stored row by surrogate key
 */
export function getListingByKey(
  db: Database.Database,
  table: ListingTableSchema,
  uniqueJobId: string,
): ListingRow | undefined {
  if (!tableExists(db, table.name)) {
    return undefined;
  }
  return db
    .prepare(
      `SELECT * FROM ${quoteIdent(table.name)} WHERE ${quoteIdent(LISTING_KEY_COLUMN.name)} = ?`,
    )
    .get(uniqueJobId) as ListingRow | undefined;
}

/**
 * All rows of a listings table, ordered by surrogate key
 */
export function listListings(db: Database.Database, table: ListingTableSchema): ListingRow[] {
  if (!tableExists(db, table.name)) {
    return [];
  }
  return db
    .prepare(
      `SELECT * FROM ${quoteIdent(table.name)} ORDER BY ${quoteIdent(LISTING_KEY_COLUMN.name)}`,
    )
    .all() as ListingRow[];
}
