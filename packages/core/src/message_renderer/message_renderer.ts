import { ALL_WEEKS } from "../records/records.types";
import type {
  AnyRecord,
  ChangeEvent,
  GradeRecord,
  ModifiedChange,
  RecordKind,
  ScheduleEntry,
  Snapshot,
  WeekList,
} from "../records/records.types";
import { isGradeRecord, normalizeText } from "../change_detector/change_detector";

export type RenderedMessage = {
  subject: string;
  content: string;
};

export type RenderOptions = {
  /** Prepended as an `Account:` header line */
  accountKey?: string;
  /** Full record table appended after the change list */
  fullReport?: Snapshot;
};

const WEEKDAY_NAMES = ["Mon", "Tue", "Wed", "Thu", "Fri", "Sat", "Sun"] as const;

const SUBJECT_PREFIX: Record<RecordKind, string> = {
  grades: "Grade update",
  schedule: "Schedule update",
};

export function weekdayName(weekday: number): string {
  return WEEKDAY_NAMES[weekday - 1] ?? `Day ${weekday}`;
}

/** Collapses sorted week numbers into ranges: [1,2,3,5] -> "1-3,5" */
export function formatWeekList(weekList: WeekList): string {
  if (weekList === ALL_WEEKS) {
    return ALL_WEEKS;
  }
  const weeks = Array.from(new Set(weekList)).sort((a, b) => a - b);
  const ranges: string[] = [];
  let start = weeks[0];
  let end = start;
  for (const week of weeks.slice(1)) {
    if (end !== undefined && week === end + 1) {
      end = week;
      continue;
    }
    if (start !== undefined && end !== undefined) {
      ranges.push(start === end ? `${start}` : `${start}-${end}`);
    }
    start = week;
    end = week;
  }
  if (start !== undefined && end !== undefined) {
    ranges.push(start === end ? `${start}` : `${start}-${end}`);
  }
  return ranges.join(",");
}

function describeGrade(record: GradeRecord): string {
  const details = [`credit ${normalizeText(record.credit)}`];
  const category = normalizeText(record.courseCategory);
  if (category) {
    details.push(category);
  }
  return `${normalizeText(record.term)} ${normalizeText(record.courseName)}: ${normalizeText(record.score)} (${details.join(", ")})`;
}

function describeEntry(entry: ScheduleEntry): string {
  const where = [normalizeText(entry.room), normalizeText(entry.teacher)].filter(Boolean).join(", ");
  const periods = entry.startPeriod === entry.endPeriod
    ? `period ${entry.startPeriod}`
    : `periods ${entry.startPeriod}-${entry.endPeriod}`;
  const base = `${weekdayName(entry.weekday)} ${periods} ${normalizeText(entry.courseName)}`;
  return `${base}${where ? ` @ ${where}` : ""}, weeks ${formatWeekList(entry.weekList)}`;
}

export function describeRecord(record: AnyRecord): string {
  return isGradeRecord(record) ? describeGrade(record) : describeEntry(record);
}

function fieldValue(record: AnyRecord, field: string): string {
  if (!isGradeRecord(record) && field === "weekList") {
    return formatWeekList(record.weekList);
  }
  const value: unknown = Reflect.get(record, field);
  if (typeof value === "number") {
    return String(value);
  }
  const text = typeof value === "string" ? normalizeText(value) : "";
  return text === "" ? "(empty)" : text;
}

function renderModified(event: ModifiedChange): string[] {
  const lines = [`* ${describeRecord(event.before)}`];
  for (const field of event.changedFields) {
    lines.push(`    ${field}: ${fieldValue(event.before, field)} -> ${fieldValue(event.after, field)}`);
  }
  return lines;
}

export function changeSubject(kind: RecordKind, count: number): string {
  return `${SUBJECT_PREFIX[kind]}: ${count} change(s)`;
}

/**
 * Renders change events as a plain-text message.
 * Output depends only on the arguments.
 */
export function renderChanges(kind: RecordKind, events: ChangeEvent[], options: RenderOptions = {}): RenderedMessage {
  const added: string[] = [];
  const removed: string[] = [];
  const modified: string[] = [];
  for (const event of events) {
    switch (event.kind) {
      case "added":
        added.push(`+ ${describeRecord(event.after)}`);
        break;
      case "removed":
        removed.push(`- ${describeRecord(event.before)}`);
        break;
      case "modified":
        modified.push(...renderModified(event));
        break;
    }
  }

  const sections: string[] = [];
  if (options.accountKey) {
    sections.push(`Account: ${options.accountKey}`);
  }
  const addedCount = events.filter((event) => event.kind === "added").length;
  const removedCount = events.filter((event) => event.kind === "removed").length;
  const modifiedCount = events.length - addedCount - removedCount;
  if (addedCount > 0) sections.push([`Added (${addedCount}):`, ...added].join("\n"));
  if (removedCount > 0) sections.push([`Removed (${removedCount}):`, ...removed].join("\n"));
  if (modifiedCount > 0) sections.push([`Modified (${modifiedCount}):`, ...modified].join("\n"));
  if (events.length === 0) sections.push("No changes.");
  if (options.fullReport) {
    sections.push(renderSnapshot(options.fullReport).content);
  }

  return { subject: changeSubject(kind, events.length), content: sections.join("\n\n") };
}

function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function renderGradeTable(records: GradeRecord[]): string[] {
  const byTerm = new Map<string, GradeRecord[]>();
  for (const record of records) {
    const term = normalizeText(record.term);
    const list = byTerm.get(term) ?? [];
    list.push(record);
    byTerm.set(term, list);
  }
  const lines: string[] = [];
  for (const term of Array.from(byTerm.keys()).sort(compareText)) {
    lines.push(`${term}:`);
    const rows = (byTerm.get(term) ?? [])
      .slice()
      .sort((a, b) => compareText(normalizeText(a.courseName), normalizeText(b.courseName)));
    for (const record of rows) {
      lines.push(`  ${normalizeText(record.courseName)}: ${normalizeText(record.score)} (credit ${normalizeText(record.credit)})`);
    }
  }
  return lines;
}

function renderScheduleTable(entries: ScheduleEntry[]): string[] {
  return entries
    .slice()
    .sort((a, b) =>
      a.weekday - b.weekday ||
      a.startPeriod - b.startPeriod ||
      compareText(normalizeText(a.courseName), normalizeText(b.courseName)))
    .map((entry) => `  ${describeEntry(entry)}`);
}

/** Renders every record of a snapshot; used for full reports */
export function renderSnapshot(snapshot: Snapshot): RenderedMessage {
  const title = snapshot.kind === "grades" ? "Grades" : "Schedule";
  const header = `${title} for ${snapshot.accountKey} (${snapshot.records.length} record(s), captured ${snapshot.capturedAt})`;
  const body = snapshot.records.length === 0
    ? ["  (no records)"]
    : snapshot.kind === "grades"
      ? renderGradeTable(snapshot.records)
      : renderScheduleTable(snapshot.records);
  return {
    subject: `${title} for ${snapshot.accountKey}`,
    content: [header, ...body].join("\n"),
  };
}
