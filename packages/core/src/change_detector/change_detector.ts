import { silentLogger } from "../logger";
import type { Logger } from "../logger";
import { ALL_WEEKS } from "../records/records.types";
import type {
  AnyRecord,
  ChangeEvent,
  GradeRecord,
  GradesSnapshot,
  ModifiedChange,
  ScheduleEntry,
  ScheduleSnapshot,
  Snapshot,
  WeekList,
} from "../records/records.types";
import { ChangeDetectorError } from "./change_detector.errors";

type IdentityPart = string | number;

export function isGradeRecord(record: AnyRecord): record is GradeRecord {
  return "term" in record;
}

/** Trims and collapses internal whitespace runs */
export function normalizeText(value: string | undefined): string {
  return (value ?? "").trim().replace(/\s+/g, " ");
}

function normalizeWeekList(weekList: WeekList): string {
  if (weekList === ALL_WEEKS) {
    return ALL_WEEKS;
  }
  return Array.from(new Set(weekList)).sort((a, b) => a - b).join(",");
}

/**
 * Identity tuple of a record:
 * - grades: (term, courseName, courseCode or courseName)
 * - schedule: (weekday, startPeriod, courseName)
 */
export function identityTupleOf(record: AnyRecord): IdentityPart[] {
  if (isGradeRecord(record)) {
    const courseName = normalizeText(record.courseName);
    const courseCode = normalizeText(record.courseCode);
    return [normalizeText(record.term), courseName, courseCode || courseName];
  }
  return [record.weekday, record.startPeriod, normalizeText(record.courseName)];
}

export function identityOf(record: AnyRecord): string {
  return identityTupleOf(record).join("|");
}

function compareIdentity(a: IdentityPart[], b: IdentityPart[]): number {
  const length = Math.max(a.length, b.length);
  for (let i = 0; i < length; i++) {
    const left = a[i];
    const right = b[i];
    if (left === right) continue;
    if (left === undefined) return -1;
    if (right === undefined) return 1;
    if (typeof left === "number" && typeof right === "number") {
      return left - right;
    }
    return String(left) < String(right) ? -1 : 1;
  }
  return 0;
}

/** Field values after normalization; what the diff compares */
function comparableFields(record: AnyRecord): Record<string, string> {
  if (isGradeRecord(record)) {
    return {
      term: normalizeText(record.term),
      courseName: normalizeText(record.courseName),
      score: normalizeText(record.score),
      credit: normalizeText(record.credit),
      courseCategory: normalizeText(record.courseCategory),
      courseCode: normalizeText(record.courseCode),
    };
  }
  return {
    weekday: String(record.weekday),
    startPeriod: String(record.startPeriod),
    endPeriod: String(record.endPeriod),
    courseName: normalizeText(record.courseName),
    room: normalizeText(record.room),
    teacher: normalizeText(record.teacher),
    weekList: normalizeWeekList(record.weekList),
  };
}

export function changedFieldsOf(before: AnyRecord, after: AnyRecord): string[] {
  const left = comparableFields(before);
  const right = comparableFields(after);
  const keys = new Set([...Object.keys(left), ...Object.keys(right)]);
  return Array.from(keys).filter((key) => left[key] !== right[key]).sort();
}

type Keyed<R> = { tuple: IdentityPart[]; identity: string; record: R };

function indexRecords<R extends AnyRecord>(records: R[], label: string, logger: Logger): Map<string, Keyed<R>> {
  const index = new Map<string, Keyed<R>>();
  for (const record of records) {
    const tuple = identityTupleOf(record);
    const key = JSON.stringify(tuple);
    if (index.has(key)) {
      logger.warn(`Duplicate record ${tuple.join("|")} in ${label}; keeping the last occurrence`);
    }
    index.set(key, { tuple, identity: tuple.join("|"), record });
  }
  return index;
}

function sortedByIdentity<R>(entries: Keyed<R>[]): Keyed<R>[] {
  return entries.sort((a, b) => compareIdentity(a.tuple, b.tuple));
}

/**
 * Structural diff of two record sets keyed by identity.
 * Output order: added, removed, modified; each group by identity.
 */
export function diffRecords<R extends AnyRecord>(
  before: R[],
  after: R[],
  options: { logger?: Logger; label?: string } = {}
): ChangeEvent<R>[] {
  const logger = options.logger ?? silentLogger;
  const label = options.label ?? "snapshot";
  const previous = indexRecords(before, `previous ${label}`, logger);
  const current = indexRecords(after, `current ${label}`, logger);

  const added: Keyed<R>[] = [];
  const modified: Array<Keyed<R> & { before: R; changedFields: string[] }> = [];
  for (const [key, entry] of current) {
    const old = previous.get(key);
    if (!old) {
      added.push(entry);
      continue;
    }
    const changedFields = changedFieldsOf(old.record, entry.record);
    if (changedFields.length > 0) {
      modified.push({ ...entry, before: old.record, changedFields });
    }
  }
  const removed = Array.from(previous.entries())
    .filter(([key]) => !current.has(key))
    .map(([, entry]) => entry);

  const modifiedEvents: ModifiedChange<R>[] = modified
    .sort((a, b) => compareIdentity(a.tuple, b.tuple))
    .map((entry) => ({
      kind: "modified",
      identity: entry.identity,
      before: entry.before,
      after: entry.record,
      changedFields: entry.changedFields,
    }));

  return [
    ...sortedByIdentity(added).map((entry): ChangeEvent<R> => ({ kind: "added", identity: entry.identity, after: entry.record })),
    ...sortedByIdentity(removed).map((entry): ChangeEvent<R> => ({ kind: "removed", identity: entry.identity, before: entry.record })),
    ...modifiedEvents,
  ];
}

/**
 * Changes between two snapshots of the same account and kind.
 * A missing previous snapshot yields no changes: the first observation
 * only sets the baseline.
 */
export function diffSnapshots(previous: GradesSnapshot | null, current: GradesSnapshot, logger?: Logger): ChangeEvent<GradeRecord>[];
export function diffSnapshots(previous: ScheduleSnapshot | null, current: ScheduleSnapshot, logger?: Logger): ChangeEvent<ScheduleEntry>[];
export function diffSnapshots(previous: Snapshot | null, current: Snapshot, logger?: Logger): ChangeEvent[];
export function diffSnapshots(previous: Snapshot | null, current: Snapshot, logger: Logger = silentLogger): ChangeEvent[] {
  if (previous === null) {
    return [];
  }
  if (previous.kind !== current.kind) {
    throw new ChangeDetectorError(`Cannot diff a ${previous.kind} snapshot against a ${current.kind} snapshot`);
  }
  const label = `${current.kind} of ${current.accountKey}`;
  if (previous.kind === "grades" && current.kind === "grades") {
    return diffRecords(previous.records, current.records, { logger, label });
  }
  if (previous.kind === "schedule" && current.kind === "schedule") {
    return diffRecords(previous.records, current.records, { logger, label });
  }
  return [];
}

/** One record per identity; a repeated identity keeps its last occurrence */
export function dedupeRecords<R extends AnyRecord>(
  records: R[],
  options: { logger?: Logger; label?: string } = {}
): R[] {
  const index = indexRecords(records, options.label ?? "snapshot", options.logger ?? silentLogger);
  if (index.size === records.length) {
    return records;
  }
  return Array.from(index.values(), (entry) => entry.record);
}

export function dedupeSnapshot(snapshot: Snapshot, logger: Logger = silentLogger): Snapshot {
  const label = `fetched ${snapshot.kind} of ${snapshot.accountKey}`;
  if (snapshot.kind === "grades") {
    return { ...snapshot, records: dedupeRecords(snapshot.records, { logger, label }) };
  }
  return { ...snapshot, records: dedupeRecords(snapshot.records, { logger, label }) };
}

/**
 * Applies change events to a baseline record set. Re-diffing the result
 * against the snapshot the events came from yields no changes.
 */
export function applyChanges<R extends AnyRecord>(baseline: R[], events: ChangeEvent<R>[]): R[] {
  const byIdentity = new Map<string, R>();
  for (const record of baseline) {
    byIdentity.set(JSON.stringify(identityTupleOf(record)), record);
  }
  for (const event of events) {
    if (event.kind === "removed") {
      byIdentity.delete(JSON.stringify(identityTupleOf(event.before)));
    } else {
      byIdentity.set(JSON.stringify(identityTupleOf(event.after)), event.after);
    }
  }
  return Array.from(byIdentity.values());
}

export type ChangeDetectorOptions = {
  logger?: Logger;
};

/**
 * Stateless diff service handed to the orchestrator; logs duplicate
 * identities through its logger.
 */
export class ChangeDetector {
  private readonly logger: Logger;

  constructor(options: ChangeDetectorOptions = {}) {
    this.logger = options.logger ?? silentLogger;
  }

  diff(previous: Snapshot | null, current: Snapshot): ChangeEvent[] {
    return diffSnapshots(previous, current, this.logger);
  }

  dedupe(snapshot: Snapshot): Snapshot {
    return dedupeSnapshot(snapshot, this.logger);
  }

  identityOf(record: AnyRecord): string {
    return identityOf(record);
  }

  countByKind(events: ChangeEvent[]): Record<ChangeEvent["kind"], number> {
    const counts = { added: 0, removed: 0, modified: 0 };
    for (const event of events) {
      counts[event.kind] += 1;
    }
    return counts;
  }
}
