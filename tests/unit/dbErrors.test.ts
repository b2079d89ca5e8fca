/**
 * Unit tests for database error classification
 */

import { describe, it, expect } from "vitest";
import { classifyConnectionError, sqliteErrorCode } from "@/utils";
import { DbConnectionError, ListingLoadError } from "@/db";

function sqliteError(code: string): Error {
  return Object.assign(new Error(`${code} raised`), { code });
}

describe("sqliteErrorCode", () => {
  it("should read a string code", () => {
    expect(sqliteErrorCode(sqliteError("SQLITE_BUSY"))).toBe("SQLITE_BUSY");
  });

  it("should ignore values without a string code", () => {
    expect(sqliteErrorCode(new Error("plain"))).toBeUndefined();
    expect(sqliteErrorCode({ code: 14 })).toBeUndefined();
    expect(sqliteErrorCode("SQLITE_BUSY")).toBeUndefined();
    expect(sqliteErrorCode(null)).toBeUndefined();
  });
});

describe("classifyConnectionError", () => {
  it("should classify open failures", () => {
    expect(classifyConnectionError(sqliteError("SQLITE_CANTOPEN"))).toBe("cannot_open");
    expect(classifyConnectionError(sqliteError("SQLITE_CANTOPEN_ISDIR"))).toBe("cannot_open");
    expect(classifyConnectionError(sqliteError("SQLITE_IOERR_READ"))).toBe("cannot_open");
  });

  it("should classify permission failures", () => {
    expect(classifyConnectionError(sqliteError("SQLITE_PERM"))).toBe("access_denied");
    expect(classifyConnectionError(sqliteError("SQLITE_AUTH"))).toBe("access_denied");
    expect(classifyConnectionError(sqliteError("SQLITE_READONLY_DIRECTORY"))).toBe(
      "access_denied",
    );
  });

  it("should report everything else as unknown", () => {
    expect(classifyConnectionError(sqliteError("SQLITE_NOTADB"))).toBe("unknown");
    expect(classifyConnectionError(sqliteError("SQLITE_CORRUPT"))).toBe("unknown");
    expect(classifyConnectionError(new Error("EACCES: permission denied"))).toBe("unknown");
  });
});

describe("database errors", () => {
  it("should prefix DbConnectionError with a hint for its kind", () => {
    const error = new DbConnectionError("access_denied", "jobs.db", sqliteError("SQLITE_PERM"));

    expect(error.kind).toBe("access_denied");
    expect(error.database).toBe("jobs.db");
    expect(error.message).toBe(
      "Access to the database was denied. Check file permissions and that it is not read-only. Details: SQLITE_PERM raised",
    );
  });

  it("should keep the cause of a ListingLoadError", () => {
    const cause = new Error("CHECK constraint failed");
    const error = new ListingLoadError("RemoteOKJobs", 3, cause);

    expect(error.message).toBe("Failed to load 3 row(s) into RemoteOKJobs: CHECK constraint failed");
    expect(error.cause).toBe(cause);
    expect(error.rows).toBe(3);
  });
});
