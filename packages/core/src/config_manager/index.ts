export { ConfigManager, validateAppConfig, resolveConfig, defaultConfigTemplate, expandHome, DEFAULT_CONFIG, DEFAULT_DATA_DIR } from "./config_manager";
export type { ConfigManagerOptions } from "./config_manager";
export * from "./config_manager.errors";
export { AppConfigInputSchema } from "./config_manager.schemas";
export type * from "./config_manager.types";
