/**
 * Configuration constants — settings file location and section/key names
 */

/**
 * Settings file used when neither an explicit path nor CONFIG_PATH is given
 */
export const DEFAULT_CONFIG_FILE = "config.ini";

export const CONFIG_PATH_ENV = "CONFIG_PATH";

export const DATABASE_SECTION = "database";
export const ADZUNA_SECTION = "adzuna";
export const JOOBLE_SECTION = "api";

export const DATABASE_NAME_KEY = "database";
export const ADZUNA_APP_ID_KEY = "app_id";
export const ADZUNA_APP_KEY_KEY = "app_key";
export const JOOBLE_API_KEY_KEY = "jooble_api_key";
