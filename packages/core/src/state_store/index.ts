export { StateStore, encodeStateId, decodeStateId } from "./state_store";
export type { StateKey, StateStoreOptions } from "./state_store";
export { StateStoreError, SnapshotCorruptError, isStateStoreError } from "./state_store.errors";
