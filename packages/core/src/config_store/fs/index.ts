export { FsConfigStore, createConfigManager, CONFIG_ENV_VAR, DEFAULT_CONFIG_FILE } from "./fs_config_store";
