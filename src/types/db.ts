/**
 * Database type definitions
 */

import type Database from "better-sqlite3";
import type { DatabaseSettings } from "@/types/config";

export type DbConnectionErrorKind = "cannot_open" | "access_denied" | "unknown";

/**
 * Connection factory used by the pipeline driver
 *
 * Defaults to openDb; tests inject their own.
 */
export type DbConnector = (settings: DatabaseSettings) => Database.Database;

/**
 * Row shape as stored in a listings table (column name → value)
 */
export type ListingRow = Record<string, string | number | null>;
