export {
  loadConfig,
  applyEnvOverrides,
  requireStartupCredentials,
  configExists,
  getDefaultConfigPath,
  expandPath,
  ConfigError,
  type StartupCredentials,
} from "./loader.js";
export { ConfigSchema, type Config } from "./schema.js";
