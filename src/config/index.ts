export {
  ConfigError,
  loadSettings,
  parseSettings,
  resolveConfigPath,
  requireAdzunaCredentials,
  requireJoobleCredentials,
} from "./loader";
