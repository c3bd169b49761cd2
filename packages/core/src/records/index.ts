export * from "./records.types";
export { GradeRecordSchema, ScheduleEntrySchema, SnapshotSchema } from "./records.schemas";
export { validateRecords, isSnapshot, snapshotErrors } from "./records.validation";
export type { RecordsValidationResult } from "./records.validation";
