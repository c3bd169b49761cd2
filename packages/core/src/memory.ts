/**
 * In-memory implementations (no filesystem required)
 *
 * Suitable for tests and embedding.
 */

// Store
export { MemoryStore } from "./store/memory/memory_store";

// ConfigStore
export { MemoryConfigStore } from "./config_store/memory";
