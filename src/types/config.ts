/**
 * Configuration type definitions
 *
 * Shapes produced by the config loader from the INI settings file.
 */

/**
 * [database] section
 */
export interface DatabaseSettings {
  /** SQLite file path (relative to cwd) or ":memory:" */
  database: string;
}

/**
 * [adzuna] section
 */
export interface AdzunaCredentials {
  appId: string;
  appKey: string;
}

/**
 * [api] section
 */
export interface JoobleCredentials {
  apiKey: string;
}

/**
 * Validated settings for one ETL invocation
 *
 * Provider credentials are optional at load time; each provider client
 * checks its own section when it is built.
 */
export interface Settings {
  /** Path the settings were read from (for log messages) */
  source: string;
  database: DatabaseSettings;
  adzuna?: AdzunaCredentials;
  jooble?: JoobleCredentials;
}
