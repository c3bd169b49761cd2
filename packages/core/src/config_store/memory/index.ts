export { MemoryConfigStore } from "./memory_config_store";
