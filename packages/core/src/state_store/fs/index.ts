export { createFsStateStore } from "./fs_state_store";
