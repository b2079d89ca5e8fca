/**
 * Integration tests for opening and closing connections
 */

import { describe, it, expect, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { join } from "path";
import { tmpdir } from "os";
import { closeDb, DbConnectionError, openDb } from "@/db";

describe("openDb", () => {
  const dirs: string[] = [];

  function tempDir(): string {
    const dir = mkdtempSync(join(tmpdir(), "jobboard-etl-conn-"));
    dirs.push(dir);
    return dir;
  }

  afterEach(() => {
    for (const dir of dirs) {
      rmSync(dir, { recursive: true, force: true });
    }
    dirs.length = 0;
  });

  it("should open an in-memory database", () => {
    const db = openDb({ database: ":memory:" });

    expect(db.open).toBe(true);
    expect(db.memory).toBe(true);
    closeDb(db);
  });

  it("should create missing parent directories", () => {
    const dbPath = join(tempDir(), "nested", "deeper", "jobs.db");
    const db = openDb({ database: dbPath });

    expect(db.name).toBe(dbPath);
    expect(db.pragma("journal_mode", { simple: true })).toBe("wal");
    closeDb(db);
  });

  it("should raise DbConnectionError for a file that is not a database", () => {
    const dbPath = join(tempDir(), "notes.db");
    writeFileSync(dbPath, "This is a plain text file, not an SQLite database. ".repeat(10));

    expect(() => openDb({ database: dbPath })).toThrow(DbConnectionError);
  });

  it("should raise DbConnectionError for a directory", () => {
    const dir = tempDir();

    let caught: unknown;
    try {
      openDb({ database: dir });
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(DbConnectionError);
    if (!(caught instanceof DbConnectionError)) return;
    expect(caught.database).toBe(dir);
  });
});

describe("closeDb", () => {
  it("should close an open connection and ignore a closed one", () => {
    const db = openDb({ database: ":memory:" });

    closeDb(db);
    expect(db.open).toBe(false);
    expect(() => closeDb(db)).not.toThrow();
  });
});
