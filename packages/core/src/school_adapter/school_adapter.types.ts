import type { Logger } from "../logger";
import type { GradeRecord, RecordKind, RecordOf, ScheduleEntry } from "../records/records.types";

/**
 * Marker an adapter returns when the institution confirms there is nothing
 * to report. A bare empty array is read as "no data yet" instead.
 */
export type ConfirmedEmpty = { readonly confirmedEmpty: true };

export type AdapterResult<R> = R[] | ConfirmedEmpty | null | undefined;

/**
 * Capability set every school adapter exposes. Methods may be sync or async;
 * `null` signals a failed fetch, never "nothing to report".
 */
export interface SchoolAdapter {
  fetchGrades(
    username: string,
    password: string,
    forceUpdate: boolean
  ): AdapterResult<GradeRecord> | Promise<AdapterResult<GradeRecord>>;

  fetchCourseSchedule(
    username: string,
    password: string,
    forceUpdate: boolean
  ): AdapterResult<ScheduleEntry> | Promise<AdapterResult<ScheduleEntry>>;
}

/** Optional metadata a bundle exports as SCHOOL_NAME / PLUGIN_VERSION */
export type AdapterMetadata = {
  schoolName?: string;
  pluginVersion?: string;
};

export type ValidatedAdapter = {
  adapter: SchoolAdapter;
  metadata: AdapterMetadata;
};

/**
 * Globals a bundle sees inside its VM context. Nothing else from the host
 * process is reachable.
 */
export type AdapterContext = {
  fetch: typeof fetch;
  logger: Logger;
  setTimeout: typeof setTimeout;
  clearTimeout: typeof clearTimeout;
};

export type AdapterCredentials = {
  username: string;
  password: string;
};

export type AdapterFetchResult<K extends RecordKind> =
  | { status: "records"; records: RecordOf<K>[]; confirmedEmpty: boolean }
  | { status: "no_data" };
