export {
  applyConfigDefaults,
  loadConfig,
  parseConfigText,
  resolveConfigPath,
  validateConfig,
  type ConfigLoadResult,
} from "./loader";
export { findUnresolvedEnvVars, replaceEnvVars } from "./env";
export { CmdtreeConfigSchema, type CmdtreeConfig, type CommandsConfig } from "./schema";
export { resolveCommandsSettings, type CommandsSettings } from "./settings";
