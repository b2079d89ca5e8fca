/**
 * Settings loading and validation
 *
 * Reads the INI settings file, validates the sections this project
 * understands, and returns a typed Settings object.
 */

import { readFileSync } from "fs";
import { resolve } from "path";
import { parse } from "ini";
import type {
  AdzunaCredentials,
  JoobleCredentials,
  Settings,
} from "@/types";
import {
  ADZUNA_APP_ID_KEY,
  ADZUNA_APP_KEY_KEY,
  ADZUNA_SECTION,
  CONFIG_PATH_ENV,
  DATABASE_NAME_KEY,
  DATABASE_SECTION,
  DEFAULT_CONFIG_FILE,
  JOOBLE_API_KEY_KEY,
  JOOBLE_SECTION,
} from "@/constants";
import { describeError } from "@/logger";

/**
 * Error thrown when the settings file is missing, unreadable or invalid.
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(`Config error: ${message}`);
    this.name = "ConfigError";
  }
}

type IniSection = Record<string, unknown>;

function isSection(value: unknown): value is IniSection {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Read a required, non-empty string key from a section
 */
function requireKey(section: IniSection, sectionName: string, key: string): string {
  const value = section[key];
  if (typeof value !== "string" || value.trim().length === 0) {
    throw new ConfigError(`[${sectionName}] ${key} is missing or empty`);
  }
  return value.trim();
}

/**
 * Resolve which file to read: explicit path, then CONFIG_PATH, then ./config.ini
 */
export function resolveConfigPath(configPath?: string): string {
  const chosen = configPath ?? process.env[CONFIG_PATH_ENV] ?? DEFAULT_CONFIG_FILE;
  return resolve(process.cwd(), chosen);
}

/**
 * Validate parsed INI content into Settings.
 *
 * A provider section is optional, but when present it must be complete.
 *
 * @throws {ConfigError} On a missing [database] section or an incomplete section
 */
export function parseSettings(raw: unknown, source: string): Settings {
  if (!isSection(raw)) {
    throw new ConfigError(`${source} did not parse into sections`);
  }

  const databaseSection = raw[DATABASE_SECTION];
  if (!isSection(databaseSection)) {
    throw new ConfigError(`[${DATABASE_SECTION}] section is missing in ${source}`);
  }

  const settings: Settings = {
    source,
    database: {
      database: requireKey(databaseSection, DATABASE_SECTION, DATABASE_NAME_KEY),
    },
  };

  const adzunaSection = raw[ADZUNA_SECTION];
  if (isSection(adzunaSection)) {
    const adzuna: AdzunaCredentials = {
      appId: requireKey(adzunaSection, ADZUNA_SECTION, ADZUNA_APP_ID_KEY),
      appKey: requireKey(adzunaSection, ADZUNA_SECTION, ADZUNA_APP_KEY_KEY),
    };
    settings.adzuna = adzuna;
  }

  const joobleSection = raw[JOOBLE_SECTION];
  if (isSection(joobleSection)) {
    const jooble: JoobleCredentials = {
      apiKey: requireKey(joobleSection, JOOBLE_SECTION, JOOBLE_API_KEY_KEY),
    };
    settings.jooble = jooble;
  }

  return settings;
}

/**
 * Load settings from disk.
 *
 * @param configPath - Optional path; see resolveConfigPath
 * @throws {ConfigError} If the file cannot be read or is invalid
 */
export function loadSettings(configPath?: string): Settings {
  const path = resolveConfigPath(configPath);

  let text: string;
  try {
    text = readFileSync(path, "utf-8");
  } catch (err) {
    throw new ConfigError(
      `Could not read the config file at: ${path} (${describeError(err)})`,
    );
  }

  let parsed: unknown;
  try {
    parsed = parse(text);
  } catch (err) {
    throw new ConfigError(`Failed to parse ${path}: ${describeError(err)}`);
  }

  return parseSettings(parsed, path);
}

/**
 * @throws {ConfigError} When the [adzuna] section is absent
 */
export function requireAdzunaCredentials(settings: Settings): AdzunaCredentials {
  if (!settings.adzuna) {
    throw new ConfigError(
      `[${ADZUNA_SECTION}] ${ADZUNA_APP_ID_KEY} and ${ADZUNA_APP_KEY_KEY} are required (${settings.source})`,
    );
  }
  return settings.adzuna;
}

/**
 * @throws {ConfigError} When the [api] section is absent
 */
export function requireJoobleCredentials(settings: Settings): JoobleCredentials {
  if (!settings.jooble) {
    throw new ConfigError(
      `[${JOOBLE_SECTION}] ${JOOBLE_API_KEY_KEY} is required (${settings.source})`,
    );
  }
  return settings.jooble;
}
