import { FsStore } from "../../store/fs/fs_store";
import { isSnapshot } from "../../records/records.validation";
import type { Snapshot } from "../../records/records.types";
import { silentLogger } from "../../logger";
import type { Logger } from "../../logger";
import { errorMessage } from "../../utils/error_message";
import { SnapshotCorruptError } from "../state_store.errors";
import { StateStore } from "../state_store";

/**
 * StateStore persisting one JSON file per (account, kind) under `stateDir`.
 * Files are replaced atomically; corrupt files are logged and read as absent.
 */
export function createFsStateStore(stateDir: string, logger: Logger = silentLogger): StateStore {
  const store = new FsStore<Snapshot>({
    basePath: stateDir,
    guard: isSnapshot,
    onInvalid: (id, cause) => {
      const reason = cause instanceof SyntaxError
        ? `invalid JSON (${cause.message})`
        : errorMessage(cause);
      logger.warn(new SnapshotCorruptError(id, reason).message);
    },
  });
  return new StateStore({ store, logger });
}
