/**
 * SQLite database connection
 *
 * One connection per pipeline run: opened by the driver, closed in its
 * finally block. No pooling, no reuse across runs.
 */

import Database from "better-sqlite3";
import { mkdirSync } from "fs";
import { dirname, resolve } from "path";
import type { DatabaseSettings } from "@/types";
import { classifyConnectionError } from "@/utils";
import { DbConnectionError } from "./errors";
import * as logger from "@/logger";

const IN_MEMORY = ":memory:";

/**
 * Resolve the database file path, creating its parent directory
 */
function prepareDbPath(settings: DatabaseSettings): string {
  if (settings.database === IN_MEMORY) {
    return IN_MEMORY;
  }
  const dbPath = resolve(process.cwd(), settings.database);
  mkdirSync(dirname(dbPath), { recursive: true });
  return dbPath;
}

/**
 * Open a database connection with required pragmas
 *
 * The journal pragma touches the file, so an unreadable or foreign file
 * fails here rather than at the first write.
 *
 * @throws {DbConnectionError} With a classified kind
 */
export function openDb(settings: DatabaseSettings): Database.Database {
  let db: Database.Database | null = null;
  try {
    const dbPath = prepareDbPath(settings);
    db = new Database(dbPath);
    db.pragma("journal_mode = WAL");
    logger.info("Connected to database", { database: settings.database });
    return db;
  } catch (err) {
    if (db) {
      db.close();
    }
    throw new DbConnectionError(classifyConnectionError(err), settings.database, err);
  }
}

/**
 * Close a database connection; a no-op for one already closed
 */
export function closeDb(db: Database.Database): void {
  if (db.open) {
    db.close();
    logger.info("Database connection closed", { database: db.name });
  }
}
