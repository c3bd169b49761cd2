import type { CycleStatus, IEventStream } from "../event_bus";
import type { Logger } from "../logger";
import type { FetchFailedError } from "../school_adapter/school_adapter.errors";

/**
 * Per-target state machine:
 * idle → fetching → diffing → dispatching → idle, with `backoff` between
 * fetch retries and `cancelled` terminal after stop.
 */
export type SchedulerState = "idle" | "fetching" | "diffing" | "dispatching" | "backoff" | "cancelled";

export type CyclePhase = "fetch" | "diff" | "dispatch" | "commit";

/** What a fetch produced; `no_data` ends the cycle without touching the baseline */
export type FetchOutcome<F> =
  | { status: "fetched"; data: F }
  | { status: "no_data" };

export type DiffOutcome<D> = {
  changeCount: number;
  detail: D;
};

/**
 * The work of one cycle, supplied by the caller. The scheduler owns phase
 * ordering, retries and timeouts.
 *
 * - `fetch` throws on failure; it is retried with backoff
 * - `dispatch` runs only when the diff has changes
 * - `commit` runs after dispatch, or straight after diff when nothing changed
 */
export interface CycleRunner<F = unknown, D = unknown> {
  fetch(): Promise<FetchOutcome<F>>;
  diff(data: F): Promise<DiffOutcome<D>>;
  dispatch(data: F, diff: DiffOutcome<D>): Promise<Record<string, boolean>>;
  commit(data: F, diff: DiffOutcome<D>): Promise<void>;
}

export type CycleResult = {
  target: string;
  status: CycleStatus;
  forced: boolean;
  /** Fetch attempts made, retries included */
  attempts: number;
  changeCount: number;
  durationMs: number;
  /** Per-channel delivery, when a dispatch ran */
  dispatch?: Record<string, boolean>;
  /** Set for `fetch_failed` and `error` */
  error?: Error | FetchFailedError;
};

export type TargetOptions = {
  intervalMs: number;
  /** Each wait is `intervalMs ± jitterMs`; default 0 */
  jitterMs?: number;
  /** Register without a loop; cycles run only through forceCycle */
  manual?: boolean;
};

export type PollingSchedulerOptions = {
  logger?: Logger;
  eventBus?: IEventStream;
  /** Fetch retries after the first attempt; default 3 */
  maxRetries?: number;
  /** Default 5000 */
  baseBackoffMs?: number;
  /** Default 300000 */
  maxBackoffMs?: number;
  /** Upper bound on any single phase; default 120000 */
  maxPhaseTimeoutMs?: number;
  /** Random source in [0, 1) for jitter */
  random?: () => number;
  now?: () => number;
};
