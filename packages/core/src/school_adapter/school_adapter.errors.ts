import type { RecordKind } from "../records/records.types";

/**
 * Base error class for adapter loading and invocation
 */
export class SchoolAdapterError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SchoolAdapterError";
    Object.setPrototypeOf(this, SchoolAdapterError.prototype);
  }
}

/**
 * Thrown when a module does not expose the adapter capability set, or its
 * bundle fails to evaluate.
 */
export class LoadError extends SchoolAdapterError {
  public readonly source: string;
  public readonly missing: string[];

  constructor(source: string, missing: string[], detail?: string) {
    const reason = detail ?? `missing required function(s): ${missing.join(", ")}`;
    super(`LoadError: ${source}: ${reason}`);
    this.name = "LoadError";
    this.source = source;
    this.missing = missing;
    Object.setPrototypeOf(this, LoadError.prototype);
  }
}

/**
 * Thrown when an adapter returns something other than a record list,
 * the confirmed-empty marker or null.
 */
export class AdapterOutputError extends SchoolAdapterError {
  public readonly kind: RecordKind;
  public readonly errors: string[];

  constructor(kind: RecordKind, errors: string[]) {
    super(`AdapterOutputError: invalid ${kind} output: ${errors.slice(0, 5).join("; ")}`);
    this.name = "AdapterOutputError";
    this.kind = kind;
    this.errors = errors;
    Object.setPrototypeOf(this, AdapterOutputError.prototype);
  }
}

/**
 * A fetch that failed: the adapter returned null, threw, timed out or
 * produced invalid output. After retries the scheduler reports it as a
 * cycle result rather than throwing it further.
 */
export class FetchFailedError extends SchoolAdapterError {
  public readonly target: string;
  public readonly reason: string;
  public readonly attempts: number;
  public override readonly cause: unknown;

  constructor(target: string, reason: string, options: { attempts?: number; cause?: unknown } = {}) {
    super(`FetchFailed: ${target}: ${reason}`);
    this.name = "FetchFailedError";
    this.target = target;
    this.reason = reason;
    this.attempts = options.attempts ?? 1;
    this.cause = options.cause;
    Object.setPrototypeOf(this, FetchFailedError.prototype);
  }
}

export function isLoadError(error: unknown): error is LoadError {
  return error instanceof LoadError;
}

export function isFetchFailedError(error: unknown): error is FetchFailedError {
  return error instanceof FetchFailedError;
}
