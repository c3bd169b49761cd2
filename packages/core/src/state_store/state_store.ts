import type { Store } from "../store/store";
import type { RecordKind, Snapshot, SnapshotOf } from "../records/records.types";
import { isRecordKind } from "../records/records.types";
import { silentLogger } from "../logger";
import type { Logger } from "../logger";
import { StateStoreError } from "./state_store.errors";

export type StateKey = {
  accountKey: string;
  kind: RecordKind;
};

export type StateStoreOptions = {
  store: Store<Snapshot>;
  logger?: Logger;
};

/**
 * Encodes an account key into a file-system safe id. Every character that
 * could act as a path separator, a relative segment or a reserved name on
 * common file systems is percent-encoded, so distinct keys never collide.
 */
export function encodeStateId(accountKey: string, kind: RecordKind): string {
  const encoded = encodeURIComponent(accountKey).replace(
    /[!'()*.~]/g,
    (c) => `%${c.charCodeAt(0).toString(16).toUpperCase()}`
  );
  return `${encoded}.${kind}`;
}

export function decodeStateId(id: string): StateKey | null {
  const dot = id.lastIndexOf(".");
  if (dot <= 0) {
    return null;
  }
  const kind = id.slice(dot + 1);
  if (!isRecordKind(kind)) {
    return null;
  }
  try {
    return { accountKey: decodeURIComponent(id.slice(0, dot)), kind };
  } catch {
    // Not one of ours: malformed percent-encoding
    return null;
  }
}

/**
 * Holds the current snapshot per (account, kind).
 *
 * Unreadable or mismatched snapshots load as null so the next cycle sets
 * a fresh baseline instead of reporting every record as removed.
 */
export class StateStore {
  private readonly store: Store<Snapshot>;
  private readonly logger: Logger;

  constructor(options: StateStoreOptions) {
    this.store = options.store;
    this.logger = options.logger ?? silentLogger;
  }

  async load<K extends RecordKind>(accountKey: string, kind: K): Promise<SnapshotOf<K> | null>;
  async load(accountKey: string, kind: RecordKind): Promise<Snapshot | null> {
    const id = encodeStateId(accountKey, kind);
    const snapshot = await this.store.get(id);
    if (!snapshot) {
      return null;
    }
    if (snapshot.kind !== kind || snapshot.accountKey !== accountKey) {
      this.logger.warn(`Ignoring snapshot ${id}: stored for ${snapshot.accountKey}/${snapshot.kind}`);
      return null;
    }
    return snapshot;
  }

  /**
   * Replaces the current snapshot. Callers save only after the diff against
   * the previous snapshot has been dispatched.
   */
  async save(accountKey: string, kind: RecordKind, snapshot: Snapshot): Promise<void> {
    if (snapshot.accountKey !== accountKey || snapshot.kind !== kind) {
      throw new StateStoreError(
        `Snapshot for ${snapshot.accountKey}/${snapshot.kind} cannot be saved as ${accountKey}/${kind}`
      );
    }
    await this.store.put(encodeStateId(accountKey, kind), snapshot);
  }

  async delete(accountKey: string, kind: RecordKind): Promise<void> {
    await this.store.delete(encodeStateId(accountKey, kind));
  }

  async list(): Promise<StateKey[]> {
    const keys: StateKey[] = [];
    for (const id of await this.store.list()) {
      const key = decodeStateId(id);
      if (key) {
        keys.push(key);
      } else {
        this.logger.debug(`Skipping unrecognized state file ${id}`);
      }
    }
    return keys.sort((a, b) =>
      a.accountKey === b.accountKey ? (a.kind < b.kind ? -1 : 1) : a.accountKey < b.accountKey ? -1 : 1
    );
  }
}
