import { StateStore, decodeStateId, encodeStateId } from "./state_store";
import { StateStoreError } from "./state_store.errors";
import { MemoryStore } from "../store/memory/memory_store";
import type { GradesSnapshot, ScheduleSnapshot, Snapshot } from "../records/records.types";

function gradesSnapshot(accountKey: string, score = "90"): GradesSnapshot {
  return {
    kind: "grades",
    accountKey,
    capturedAt: "2026-03-01T08:00:00.000Z",
    records: [{ term: "2024-1", courseName: "Math", score, credit: "4", courseCategory: "Required" }],
  };
}

describe("StateStore", () => {
  let backing: MemoryStore<Snapshot>;
  let stateStore: StateStore;

  beforeEach(() => {
    backing = new MemoryStore<Snapshot>();
    stateStore = new StateStore({ store: backing });
  });

  describe("state ids", () => {
    it("should encode separators and dots so ids stay safe file names", () => {
      expect(encodeStateId("12345:s1", "grades")).toBe("12345%3As1.grades");
      expect(encodeStateId("12345:../x", "schedule")).toBe("12345%3A%2E%2E%2Fx.schedule");
    });

    it("should round-trip account keys with unusual characters", () => {
      const accountKey = "12345:first.last*~(x)";

      expect(decodeStateId(encodeStateId(accountKey, "grades"))).toEqual({ accountKey, kind: "grades" });
    });

    it("should reject ids that are not state ids", () => {
      expect(decodeStateId("plugins_index")).toBeNull();
      expect(decodeStateId("abc.unknown")).toBeNull();
      expect(decodeStateId("%E0%A4%A.grades")).toBeNull();
    });
  });

  it("should return null before anything is saved", async () => {
    expect(await stateStore.load("12345:s1", "grades")).toBeNull();
  });

  it("should save and replace the current snapshot per account and kind", async () => {
    await stateStore.save("12345:s1", "grades", gradesSnapshot("12345:s1", "90"));
    await stateStore.save("12345:s1", "grades", gradesSnapshot("12345:s1", "95"));

    const loaded = await stateStore.load("12345:s1", "grades");

    expect(loaded?.records[0]?.score).toBe("95");
    expect(backing.size()).toBe(1);
  });

  it("should keep accounts and kinds apart", async () => {
    const schedule: ScheduleSnapshot = {
      kind: "schedule",
      accountKey: "12345:s1",
      capturedAt: "2026-03-01T08:00:00.000Z",
      records: [],
    };
    await stateStore.save("12345:s1", "grades", gradesSnapshot("12345:s1"));
    await stateStore.save("12345:s2", "grades", gradesSnapshot("12345:s2", "70"));
    await stateStore.save("12345:s1", "schedule", schedule);

    expect((await stateStore.load("12345:s2", "grades"))?.records[0]?.score).toBe("70");
    expect(await stateStore.load("12345:s1", "schedule")).toEqual(schedule);
    expect(await stateStore.list()).toEqual([
      { accountKey: "12345:s1", kind: "grades" },
      { accountKey: "12345:s1", kind: "schedule" },
      { accountKey: "12345:s2", kind: "grades" },
    ]);
  });

  it("should refuse to save a snapshot under another key", async () => {
    await expect(stateStore.save("12345:s2", "grades", gradesSnapshot("12345:s1"))).rejects.toThrow(StateStoreError);
  });

  it("should ignore a stored snapshot that belongs to another key", async () => {
    await backing.put(encodeStateId("12345:s1", "grades"), gradesSnapshot("12345:other"));

    expect(await stateStore.load("12345:s1", "grades")).toBeNull();
  });

  it("should delete snapshots", async () => {
    await stateStore.save("12345:s1", "grades", gradesSnapshot("12345:s1"));

    await stateStore.delete("12345:s1", "grades");

    expect(await stateStore.load("12345:s1", "grades")).toBeNull();
    expect(await stateStore.list()).toEqual([]);
  });
});
