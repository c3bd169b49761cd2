export { FsStore, validateId, writeFileAtomic } from "./fs_store";
