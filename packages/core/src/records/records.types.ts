/**
 * Record and snapshot types shared by every gradewatch module.
 */

export type RecordKind = "grades" | "schedule";

export const RECORD_KINDS: readonly RecordKind[] = ["grades", "schedule"];

export function isRecordKind(value: unknown): value is RecordKind {
  return value === "grades" || value === "schedule";
}

/**
 * One course result as reported by the institution.
 * Scores and credits stay strings: institutions report letter grades,
 * pass/fail marks and decimal credits interchangeably.
 */
export type GradeRecord = {
  term: string;
  courseName: string;
  score: string;
  credit: string;
  courseCategory: string;
  courseCode?: string;
};

/** Sentinel week list meaning the course runs every teaching week */
export const ALL_WEEKS = "all";

export type WeekList = number[] | typeof ALL_WEEKS;

export type ScheduleEntry = {
  /** 1 = Monday ... 7 = Sunday */
  weekday: number;
  startPeriod: number;
  endPeriod: number;
  courseName: string;
  room: string;
  teacher: string;
  weekList: WeekList;
};

export type AnyRecord = GradeRecord | ScheduleEntry;

export type RecordOf<K extends RecordKind> = K extends "grades" ? GradeRecord : ScheduleEntry;

export type GradesSnapshot = {
  kind: "grades";
  /** `<institutionCode>:<username>` */
  accountKey: string;
  records: GradeRecord[];
  /** ISO 8601 */
  capturedAt: string;
};

export type ScheduleSnapshot = {
  kind: "schedule";
  accountKey: string;
  records: ScheduleEntry[];
  capturedAt: string;
};

export type Snapshot = GradesSnapshot | ScheduleSnapshot;

export type SnapshotOf<K extends RecordKind> = Extract<Snapshot, { kind: K }>;

export type ChangeKind = "added" | "removed" | "modified";

export type AddedChange<R extends AnyRecord = AnyRecord> = {
  kind: "added";
  identity: string;
  after: R;
};

export type RemovedChange<R extends AnyRecord = AnyRecord> = {
  kind: "removed";
  identity: string;
  before: R;
};

export type ModifiedChange<R extends AnyRecord = AnyRecord> = {
  kind: "modified";
  identity: string;
  before: R;
  after: R;
  /** Field names that differ after normalization, sorted */
  changedFields: string[];
};

/**
 * One detected difference between two snapshots.
 * The union guarantees at least one of `before` / `after` is present.
 */
export type ChangeEvent<R extends AnyRecord = AnyRecord> =
  | AddedChange<R>
  | RemovedChange<R>
  | ModifiedChange<R>;

export function accountKeyOf(institutionCode: string, username: string): string {
  return `${institutionCode}:${username}`;
}

/**
 * Splits an account key at its first `:`.
 * Usernames may contain `:`, institution codes may not.
 */
export function parseAccountKey(accountKey: string): { institutionCode: string; username: string } | null {
  const index = accountKey.indexOf(":");
  if (index <= 0 || index === accountKey.length - 1) {
    return null;
  }
  return {
    institutionCode: accountKey.slice(0, index),
    username: accountKey.slice(index + 1),
  };
}
