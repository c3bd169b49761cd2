/**
 * JSON schemas for records and snapshots.
 * Used to check adapter output and snapshot files read back from disk.
 */

export const GradeRecordSchema = {
  type: "object",
  required: ["term", "courseName", "score", "credit", "courseCategory"],
  properties: {
    term: { type: "string" },
    courseName: { type: "string", minLength: 1 },
    score: { type: "string" },
    credit: { type: "string" },
    courseCategory: { type: "string" },
    courseCode: { type: "string" },
  },
  additionalProperties: true,
} as const;

export const ScheduleEntrySchema = {
  type: "object",
  required: ["weekday", "startPeriod", "endPeriod", "courseName", "room", "teacher", "weekList"],
  properties: {
    weekday: { type: "integer", minimum: 1, maximum: 7 },
    startPeriod: { type: "integer", minimum: 1 },
    endPeriod: { type: "integer", minimum: 1 },
    courseName: { type: "string", minLength: 1 },
    room: { type: "string" },
    teacher: { type: "string" },
    weekList: {
      anyOf: [
        { type: "array", items: { type: "integer", minimum: 1 } },
        { type: "string", const: "all" },
      ],
    },
  },
  additionalProperties: true,
} as const;

export const SnapshotSchema = {
  type: "object",
  required: ["kind", "accountKey", "records", "capturedAt"],
  properties: {
    kind: { type: "string", enum: ["grades", "schedule"] },
    accountKey: { type: "string", minLength: 1 },
    capturedAt: { type: "string", format: "date-time" },
    records: { type: "array" },
  },
  if: { type: "object", properties: { kind: { type: "string", const: "grades" } } },
  then: { type: "object", properties: { records: { type: "array", items: GradeRecordSchema } } },
  else: { type: "object", properties: { records: { type: "array", items: ScheduleEntrySchema } } },
} as const;
