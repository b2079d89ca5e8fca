/**
 * Destination table schemas, one per provider
 */

import type { ListingColumn, ListingTableSchema } from "@/types";

export const LISTING_KEY_COLUMN: ListingColumn = {
  name: "unique_job_id",
  field: "uniqueJobId",
  type: "TEXT",
};

/**
 * Columns common to every provider table, in table order after the provider id
 */
const SHARED_HEAD: readonly ListingColumn[] = [
  { name: "date_posted", field: "datePosted", type: "TEXT" },
  { name: "company", field: "company", type: "TEXT" },
  { name: "position", field: "position", type: "TEXT" },
  { name: "location", field: "location", type: "TEXT" },
];

const SALARY_COLUMNS: readonly ListingColumn[] = [
  { name: "salary_min", field: "salaryMin", type: "INTEGER" },
  { name: "salary_max", field: "salaryMax", type: "INTEGER" },
];

export const ADZUNA_TABLE: ListingTableSchema = {
  name: "AdzunaJobs",
  columns: [
    LISTING_KEY_COLUMN,
    { name: "api_id", field: "providerId", type: "TEXT" },
    ...SHARED_HEAD,
    { name: "category", field: "category", type: "TEXT" },
    ...SALARY_COLUMNS,
    { name: "redirect_url", field: "url", type: "TEXT" },
  ],
};

export const JOOBLE_TABLE: ListingTableSchema = {
  name: "JoobleJobs",
  columns: [
    LISTING_KEY_COLUMN,
    { name: "api_id", field: "providerId", type: "TEXT" },
    ...SHARED_HEAD,
    { name: "tags", field: "tags", type: "TEXT" },
    ...SALARY_COLUMNS,
    { name: "url", field: "url", type: "TEXT" },
  ],
};

export const REMOTEOK_TABLE: ListingTableSchema = {
  name: "RemoteOKJobs",
  columns: [
    LISTING_KEY_COLUMN,
    { name: "id", field: "providerId", type: "TEXT" },
    ...SHARED_HEAD,
    { name: "tags", field: "tags", type: "TEXT" },
    ...SALARY_COLUMNS,
    { name: "url", field: "url", type: "TEXT" },
  ],
};

/**
 * Rows per INSERT statement
 *
 * Keeps bound parameters (rows × columns) under SQLite's
 * SQLITE_MAX_VARIABLE_NUMBER on older builds (999).
 */
export const UPSERT_CHUNK_SIZE = 90;
