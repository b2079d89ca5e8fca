/**
 * Unit tests for settings loading
 *
 * Writes throwaway INI files under the OS temp directory.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { join, resolve } from "path";
import { tmpdir } from "os";
import {
  ConfigError,
  loadSettings,
  parseSettings,
  requireAdzunaCredentials,
  requireJoobleCredentials,
  resolveConfigPath,
} from "@/config";
import type { Settings } from "@/types";

const FULL_CONFIG = [
  "[database]",
  "database = data/jobs.db",
  "",
  "[adzuna]",
  "app_id = test-app-id",
  "app_key = test-secret",
  "",
  "[api]",
  "jooble_api_key = test-jooble-key",
  "",
].join("\n");

describe("loadSettings", () => {
  let dir: string;
  const savedConfigPath = process.env.CONFIG_PATH;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "jobboard-etl-config-"));
    delete process.env.CONFIG_PATH;
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
    if (savedConfigPath === undefined) {
      delete process.env.CONFIG_PATH;
    } else {
      process.env.CONFIG_PATH = savedConfigPath;
    }
  });

  function writeConfig(content: string): string {
    const path = join(dir, "config.ini");
    writeFileSync(path, content, "utf-8");
    return path;
  }

  it("should load every section of a complete file", () => {
    const path = writeConfig(FULL_CONFIG);

    expect(loadSettings(path)).toEqual({
      source: path,
      database: { database: "data/jobs.db" },
      adzuna: { appId: "test-app-id", appKey: "test-secret" },
      jooble: { apiKey: "test-jooble-key" },
    });
  });

  it("should leave absent provider sections undefined", () => {
    const path = writeConfig("[database]\ndatabase = :memory:\n");
    const settings = loadSettings(path);

    expect(settings.database.database).toBe(":memory:");
    expect(settings.adzuna).toBeUndefined();
    expect(settings.jooble).toBeUndefined();
  });

  it("should read the file named by CONFIG_PATH", () => {
    const path = writeConfig(FULL_CONFIG);
    process.env.CONFIG_PATH = path;

    expect(loadSettings().source).toBe(path);
  });

  it("should fail when the file does not exist", () => {
    const missing = join(dir, "absent.ini");

    expect(() => loadSettings(missing)).toThrow(ConfigError);
    expect(() => loadSettings(missing)).toThrow(
      `Config error: Could not read the config file at: ${missing}`,
    );
  });

  it("should fail without a [database] section", () => {
    const path = writeConfig("[adzuna]\napp_id = a\napp_key = b\n");

    expect(() => loadSettings(path)).toThrow(
      `Config error: [database] section is missing in ${path}`,
    );
  });

  it("should fail when [database] has no database key", () => {
    const path = writeConfig("[database]\nserver = localhost\n");

    expect(() => loadSettings(path)).toThrow(
      "Config error: [database] database is missing or empty",
    );
  });

  it("should fail on an incomplete provider section", () => {
    const path = writeConfig("[database]\ndatabase = jobs.db\n[adzuna]\napp_id = test-app-id\n");

    expect(() => loadSettings(path)).toThrow(
      "Config error: [adzuna] app_key is missing or empty",
    );
  });

  it("should fail on an empty value", () => {
    const path = writeConfig("[database]\ndatabase = jobs.db\n[api]\njooble_api_key =\n");

    expect(() => loadSettings(path)).toThrow(
      "Config error: [api] jooble_api_key is missing or empty",
    );
  });
});

describe("resolveConfigPath", () => {
  const savedConfigPath = process.env.CONFIG_PATH;

  afterEach(() => {
    if (savedConfigPath === undefined) {
      delete process.env.CONFIG_PATH;
    } else {
      process.env.CONFIG_PATH = savedConfigPath;
    }
  });

  it("should default to config.ini in the working directory", () => {
    delete process.env.CONFIG_PATH;
    expect(resolveConfigPath()).toBe(resolve(process.cwd(), "config.ini"));
  });

  it("should prefer an explicit path over CONFIG_PATH", () => {
    process.env.CONFIG_PATH = "from-env.ini";
    expect(resolveConfigPath("explicit.ini")).toBe(resolve(process.cwd(), "explicit.ini"));
    expect(resolveConfigPath()).toBe(resolve(process.cwd(), "from-env.ini"));
  });
});

describe("parseSettings", () => {
  it("should reject content that is not sectioned", () => {
    expect(() => parseSettings("database", "inline")).toThrow(
      "Config error: inline did not parse into sections",
    );
  });

  it("should trim values", () => {
    const settings = parseSettings({ database: { database: "  jobs.db  " } }, "inline");
    expect(settings.database.database).toBe("jobs.db");
  });
});

describe("provider credentials", () => {
  const bare: Settings = { source: "test", database: { database: ":memory:" } };

  it("should require the [adzuna] section", () => {
    expect(() => requireAdzunaCredentials(bare)).toThrow(
      "Config error: [adzuna] app_id and app_key are required (test)",
    );
  });

  it("should require the [api] section", () => {
    expect(() => requireJoobleCredentials(bare)).toThrow(
      "Config error: [api] jooble_api_key is required (test)",
    );
  });

  it("should return credentials that are present", () => {
    const settings: Settings = { ...bare, jooble: { apiKey: "test-jooble-key" } };
    expect(requireJoobleCredentials(settings)).toEqual({ apiKey: "test-jooble-key" });
  });
});
