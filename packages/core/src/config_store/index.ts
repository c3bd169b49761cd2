/**
 * ConfigStore - Configuration persistence abstraction
 *
 * This module only exports the interface. Implementations live in:
 * - @gradewatch/core/fs for FsConfigStore and createConfigManager
 * - @gradewatch/core/memory for MemoryConfigStore
 */

export type { ConfigStore } from "./config_store";
