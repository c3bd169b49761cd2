import { SchemaValidationCache, formatSchemaErrors } from "../schemas/schema_cache";
import { GradeRecordSchema, ScheduleEntrySchema, SnapshotSchema } from "./records.schemas";
import type { GradeRecord, RecordKind, RecordOf, ScheduleEntry, Snapshot } from "./records.types";

export type RecordsValidationResult<K extends RecordKind> =
  | { valid: true; records: RecordOf<K>[] }
  | { valid: false; errors: string[] };

function projectGrade(record: GradeRecord): GradeRecord {
  const projected: GradeRecord = {
    term: record.term,
    courseName: record.courseName,
    score: record.score,
    credit: record.credit,
    courseCategory: record.courseCategory,
  };
  if (record.courseCode !== undefined) {
    projected.courseCode = record.courseCode;
  }
  return projected;
}

function projectScheduleEntry(entry: ScheduleEntry): ScheduleEntry {
  return {
    weekday: entry.weekday,
    startPeriod: entry.startPeriod,
    endPeriod: entry.endPeriod,
    courseName: entry.courseName,
    room: entry.room,
    teacher: entry.teacher,
    weekList: Array.isArray(entry.weekList) ? [...entry.weekList] : entry.weekList,
  };
}

/**
 * Validates records produced by an adapter and copies them into plain
 * objects carrying only the known fields. Adapter bundles run in their own
 * VM context, so their objects must not leak into snapshots as-is.
 */
export function validateRecords<K extends RecordKind>(kind: K, value: unknown): RecordsValidationResult<K>;
export function validateRecords(kind: RecordKind, value: unknown): RecordsValidationResult<RecordKind> {
  if (!Array.isArray(value)) {
    return { valid: false, errors: ["/: must be array"] };
  }

  const errors: string[] = [];

  if (kind === "grades") {
    const validate = SchemaValidationCache.getValidatorFromSchema<GradeRecord>(GradeRecordSchema);
    const records: GradeRecord[] = [];
    value.forEach((item: unknown, index) => {
      if (validate(item)) {
        records.push(projectGrade(item));
      } else {
        errors.push(...formatSchemaErrors(validate.errors).map((e) => `[${index}] ${e}`));
      }
    });
    return errors.length > 0 ? { valid: false, errors } : { valid: true, records };
  }

  const validate = SchemaValidationCache.getValidatorFromSchema<ScheduleEntry>(ScheduleEntrySchema);
  const entries: ScheduleEntry[] = [];
  value.forEach((item: unknown, index) => {
    if (validate(item)) {
      entries.push(projectScheduleEntry(item));
    } else {
      errors.push(...formatSchemaErrors(validate.errors).map((e) => `[${index}] ${e}`));
    }
  });
  return errors.length > 0 ? { valid: false, errors } : { valid: true, records: entries };
}

/** Type guard for snapshots read back from storage */
export function isSnapshot(value: unknown): value is Snapshot {
  const validate = SchemaValidationCache.getValidatorFromSchema<Snapshot>(SnapshotSchema);
  return validate(value);
}

export function snapshotErrors(value: unknown): string[] {
  const validate = SchemaValidationCache.getValidatorFromSchema<Snapshot>(SnapshotSchema);
  return validate(value) ? [] : formatSchemaErrors(validate.errors);
}
