/**
 * Filesystem-dependent implementations
 *
 * Use @gradewatch/core/memory for in-memory alternatives.
 */

// Store
export { FsStore, validateId, writeFileAtomic } from "./store/fs";

// ConfigStore + ConfigManager factory
export {
  FsConfigStore,
  createConfigManager,
  CONFIG_ENV_VAR,
  DEFAULT_CONFIG_FILE,
} from "./config_store/fs";

// PluginRegistry
export { FsPluginRegistry, BUNDLE_FILE, INDEX_CACHE_ID, MANIFEST_ID } from "./plugin_registry/fs";
export type { FsPluginRegistryOptions } from "./plugin_registry/plugin_registry.types";

// StateStore
export { createFsStateStore } from "./state_store/fs";
