/**
 * Database error utilities
 *
 * Helpers for identifying and classifying database errors.
 */

import type { DbConnectionErrorKind } from "@/types";

/**
 * SQLite result codes grouped by how a connection failure is reported
 */
const CANNOT_OPEN_CODES = new Set(["SQLITE_CANTOPEN", "SQLITE_IOERR"]);
const ACCESS_DENIED_CODES = new Set([
  "SQLITE_AUTH",
  "SQLITE_PERM",
  "SQLITE_READONLY",
]);

/**
 * Read the `code` property better-sqlite3 puts on SqliteError
 */
export function sqliteErrorCode(err: unknown): string | undefined {
  if (typeof err !== "object" || err === null || !("code" in err)) {
    return undefined;
  }
  const code = err.code;
  return typeof code === "string" ? code : undefined;
}

/**
 * Classify an error raised while opening a connection
 *
 * Extended codes (SQLITE_CANTOPEN_ISDIR, SQLITE_READONLY_DIRECTORY...) fall
 * into their primary code's group.
 */
export function classifyConnectionError(err: unknown): DbConnectionErrorKind {
  const code = sqliteErrorCode(err);
  if (!code) {
    return "unknown";
  }
  const primary = code.split("_").slice(0, 2).join("_");
  if (CANNOT_OPEN_CODES.has(primary)) {
    return "cannot_open";
  }
  if (ACCESS_DENIED_CODES.has(primary)) {
    return "access_denied";
  }
  return "unknown";
}
