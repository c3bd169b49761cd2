import { validateRecords } from "../records/records.validation";
import type { RecordKind, RecordOf } from "../records/records.types";
import { errorMessage } from "../utils/error_message";
import { AdapterOutputError, FetchFailedError, LoadError } from "./school_adapter.errors";
import type {
  AdapterCredentials,
  AdapterFetchResult,
  AdapterMetadata,
  ConfirmedEmpty,
  SchoolAdapter,
  ValidatedAdapter,
} from "./school_adapter.types";

export const REQUIRED_ADAPTER_FUNCTIONS = ["fetchGrades", "fetchCourseSchedule"] as const;

const CONFIRMED_EMPTY: ConfirmedEmpty = Object.freeze({ confirmedEmpty: true });

/** Returned by an adapter when the institution confirms an empty record set */
export function confirmedEmpty(): ConfirmedEmpty {
  return CONFIRMED_EMPTY;
}

export function isConfirmedEmpty(value: unknown): value is ConfirmedEmpty {
  return typeof value === "object" && value !== null && !Array.isArray(value) &&
    "confirmedEmpty" in value && value.confirmedEmpty === true;
}

function isObjectLike(value: unknown): value is object {
  return (typeof value === "object" || typeof value === "function") && value !== null;
}

function optionalString(holder: object, key: string): string | undefined {
  const value: unknown = Reflect.get(holder, key);
  return typeof value === "string" && value.trim() !== "" ? value.trim() : undefined;
}

/**
 * Classifies and validates whatever an adapter method returned.
 * Arrays are checked record by record and copied into plain objects.
 */
export function toAdapterResult<K extends RecordKind>(kind: K, raw: unknown): RecordOf<K>[] | ConfirmedEmpty | null {
  if (raw === null || raw === undefined) {
    return null;
  }
  if (isConfirmedEmpty(raw)) {
    return CONFIRMED_EMPTY;
  }
  const validation = validateRecords(kind, raw);
  if (!validation.valid) {
    throw new AdapterOutputError(kind, validation.errors);
  }
  return validation.records;
}

/**
 * Checks that `candidate` exposes the adapter capability set and returns a
 * typed adapter bound to it. Transpiled modules that put everything under
 * `default` are unwrapped.
 *
 * @throws LoadError listing the missing functions
 */
export function validateAdapter(candidate: unknown, source: string): ValidatedAdapter {
  if (!isObjectLike(candidate)) {
    throw new LoadError(source, [...REQUIRED_ADAPTER_FUNCTIONS], "module does not export an object");
  }

  let target: object = candidate;
  const fallback: unknown = Reflect.get(candidate, "default");
  if (typeof Reflect.get(candidate, "fetchGrades") !== "function" && isObjectLike(fallback)) {
    target = fallback;
  }

  const fetchGrades: unknown = Reflect.get(target, "fetchGrades");
  const fetchCourseSchedule: unknown = Reflect.get(target, "fetchCourseSchedule");
  if (typeof fetchGrades !== "function" || typeof fetchCourseSchedule !== "function") {
    const missing = REQUIRED_ADAPTER_FUNCTIONS.filter((name) => typeof Reflect.get(target, name) !== "function");
    throw new LoadError(source, missing);
  }

  const adapter: SchoolAdapter = {
    fetchGrades: async (username, password, forceUpdate) =>
      toAdapterResult("grades", await fetchGrades.call(target, username, password, forceUpdate)),
    fetchCourseSchedule: async (username, password, forceUpdate) =>
      toAdapterResult("schedule", await fetchCourseSchedule.call(target, username, password, forceUpdate)),
  };

  const metadata: AdapterMetadata = {};
  const schoolName = optionalString(target, "SCHOOL_NAME") ?? optionalString(candidate, "SCHOOL_NAME");
  const pluginVersion = optionalString(target, "PLUGIN_VERSION") ?? optionalString(candidate, "PLUGIN_VERSION");
  if (schoolName !== undefined) metadata.schoolName = schoolName;
  if (pluginVersion !== undefined) metadata.pluginVersion = pluginVersion;

  return { adapter, metadata };
}

/**
 * Calls the adapter method for `kind` and classifies the answer:
 * - non-empty records: `records`
 * - confirmed-empty marker: `records` with an empty list
 * - bare empty array: `no_data`
 *
 * @throws FetchFailedError when the adapter returns null, throws or returns invalid output
 */
export async function fetchFromAdapter<K extends RecordKind>(
  adapter: SchoolAdapter,
  kind: K,
  credentials: AdapterCredentials,
  options: { forceUpdate?: boolean; target?: string } = {}
): Promise<AdapterFetchResult<K>> {
  const target = options.target ?? kind;
  const forceUpdate = options.forceUpdate ?? false;

  let result: RecordOf<K>[] | ConfirmedEmpty | null;
  try {
    const raw: unknown = kind === "grades"
      ? await adapter.fetchGrades(credentials.username, credentials.password, forceUpdate)
      : await adapter.fetchCourseSchedule(credentials.username, credentials.password, forceUpdate);
    result = toAdapterResult(kind, raw);
  } catch (error) {
    throw new FetchFailedError(target, errorMessage(error), { cause: error });
  }

  if (result === null) {
    throw new FetchFailedError(target, "adapter returned no result");
  }
  if (isConfirmedEmpty(result)) {
    return { status: "records", records: [], confirmedEmpty: true };
  }
  if (result.length === 0) {
    return { status: "no_data" };
  }
  return { status: "records", records: result, confirmedEmpty: false };
}
