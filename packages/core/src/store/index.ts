export type { Store, Serializer, FsStoreOptions } from "./store";
export { MemoryStore } from "./memory/memory_store";
