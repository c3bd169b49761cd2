/**
 * PollingScheduler - per-target polling loops
 *
 * Each target runs its own loop: a cycle, then a jittered wait measured
 * from the end of that cycle. Cycles of one target never overlap; a forced
 * cycle during an in-flight one receives the in-flight result.
 *
 * @module polling_scheduler
 */

import { silentLogger } from "../logger";
import type { Logger } from "../logger";
import type { CycleStatus, IEventStream } from "../event_bus";
import { FetchFailedError, isFetchFailedError } from "../school_adapter/school_adapter.errors";
import { errorMessage } from "../utils/error_message";
import { PhaseTimeoutError, SchedulerError, UnknownTargetError } from "./polling_scheduler.errors";
import type {
  CyclePhase,
  CycleResult,
  CycleRunner,
  FetchOutcome,
  PollingSchedulerOptions,
  SchedulerState,
  TargetOptions,
} from "./polling_scheduler.types";

export const DEFAULT_MAX_RETRIES = 3;
export const DEFAULT_BASE_BACKOFF_MS = 5_000;
export const DEFAULT_MAX_BACKOFF_MS = 300_000;
export const DEFAULT_MAX_PHASE_TIMEOUT_MS = 120_000;

/** `min(base * 2^(attempt-1), max)` for attempt >= 1 */
export function backoffDelay(attempt: number, baseMs: number, maxMs: number): number {
  return Math.min(baseMs * 2 ** (attempt - 1), maxMs);
}

export function jitteredInterval(intervalMs: number, jitterMs: number, random: () => number): number {
  const delta = (random() * 2 - 1) * jitterMs;
  return Math.max(0, Math.round(intervalMs + delta));
}

type TrackedTarget = {
  id: string;
  runner: CycleRunner;
  intervalMs: number;
  jitterMs: number;
  manual: boolean;
  state: SchedulerState;
  inFlight: Promise<CycleResult> | null;
  /** Cuts the current wait (interval or backoff) short */
  wake: (() => void) | null;
  cancelled: boolean;
  loop: Promise<void> | null;
};

type FetchAttempt =
  | { kind: "fetched"; outcome: FetchOutcome<unknown>; attempts: number }
  | { kind: "failed"; error: FetchFailedError; attempts: number }
  | { kind: "cancelled"; attempts: number };

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(errorMessage(error));
}

export class PollingScheduler {
  private readonly targets = new Map<string, TrackedTarget>();
  private readonly logger: Logger;
  private readonly eventBus: IEventStream | undefined;
  private readonly maxRetries: number;
  private readonly baseBackoffMs: number;
  private readonly maxBackoffMs: number;
  private readonly maxPhaseTimeoutMs: number;
  private readonly random: () => number;
  private readonly now: () => number;

  constructor(options: PollingSchedulerOptions = {}) {
    this.logger = options.logger ?? silentLogger;
    this.eventBus = options.eventBus;
    this.maxRetries = options.maxRetries ?? DEFAULT_MAX_RETRIES;
    this.baseBackoffMs = options.baseBackoffMs ?? DEFAULT_BASE_BACKOFF_MS;
    this.maxBackoffMs = options.maxBackoffMs ?? DEFAULT_MAX_BACKOFF_MS;
    this.maxPhaseTimeoutMs = options.maxPhaseTimeoutMs ?? DEFAULT_MAX_PHASE_TIMEOUT_MS;
    this.random = options.random ?? Math.random;
    this.now = options.now ?? Date.now;
  }

  /**
   * Starts polling `target`. The first cycle runs immediately unless the
   * target is manual. Starting a scheduled target is a no-op.
   */
  start<F, D>(target: string, runner: CycleRunner<F, D>, options: TargetOptions): void {
    if (this.targets.has(target)) {
      this.logger.debug(`${target} is already scheduled`);
      return;
    }
    if (!(options.intervalMs > 0)) {
      throw new SchedulerError(`${target}: intervalMs must be positive, got ${options.intervalMs}`);
    }

    const tracked: TrackedTarget = {
      id: target,
      runner,
      intervalMs: options.intervalMs,
      jitterMs: Math.max(0, options.jitterMs ?? 0),
      manual: options.manual ?? false,
      state: "idle",
      inFlight: null,
      wake: null,
      cancelled: false,
      loop: null,
    };
    this.targets.set(target, tracked);

    if (!tracked.manual) {
      this.logger.info(`Scheduled ${target} every ${tracked.intervalMs}ms (jitter ${tracked.jitterMs}ms)`);
      tracked.loop = this.runLoop(tracked).catch((error: unknown) => {
        this.logger.error(`${target}: polling loop failed: ${errorMessage(error)}`);
      });
    }
  }

  /**
   * Cancels future cycles of `target`. Resolves once the in-flight cycle,
   * if any, has finished its current phase.
   */
  async stop(target: string): Promise<void> {
    const tracked = this.targets.get(target);
    if (!tracked) {
      return;
    }
    tracked.cancelled = true;
    tracked.wake?.();
    await tracked.inFlight;
    await tracked.loop;
    tracked.state = "cancelled";
    if (this.targets.get(target) === tracked) {
      this.targets.delete(target);
    }
    this.logger.debug(`${target} stopped`);
  }

  async stopAll(): Promise<void> {
    await Promise.all(Array.from(this.targets.keys()).map((target) => this.stop(target)));
  }

  /**
   * Runs a cycle now. Coalesces with an in-flight cycle; otherwise the
   * pending wait is cut short and the interval restarts after this cycle.
   */
  async forceCycle(target: string): Promise<CycleResult> {
    const tracked = this.targets.get(target);
    if (!tracked || tracked.cancelled) {
      throw new UnknownTargetError(target);
    }
    if (tracked.inFlight) {
      this.logger.debug(`${target}: cycle in flight, coalescing forced cycle`);
      return tracked.inFlight;
    }
    const run = this.execute(tracked, true);
    tracked.wake?.();
    return run;
  }

  getState(target: string): SchedulerState | undefined {
    return this.targets.get(target)?.state;
  }

  getTargets(): string[] {
    return Array.from(this.targets.keys()).sort();
  }

  private async runLoop(tracked: TrackedTarget): Promise<void> {
    let wait = false;
    while (!tracked.cancelled) {
      if (wait) {
        const delay = jitteredInterval(tracked.intervalMs, tracked.jitterMs, this.random);
        this.logger.debug(`${tracked.id}: next cycle in ${delay}ms`);
        await this.sleep(tracked, delay);
        if (tracked.cancelled) {
          break;
        }
      }
      wait = true;
      await this.execute(tracked, false);
    }
  }

  private execute(tracked: TrackedTarget, forced: boolean): Promise<CycleResult> {
    if (tracked.inFlight) {
      return tracked.inFlight;
    }
    const run = this.runCycle(tracked, forced).finally(() => {
      tracked.inFlight = null;
    });
    tracked.inFlight = run;
    return run;
  }

  private async runCycle(tracked: TrackedTarget, forced: boolean): Promise<CycleResult> {
    const startedAt = this.now();
    let phase: CyclePhase = "fetch";
    let attempts = 0;
    let changeCount = 0;
    let dispatch: Record<string, boolean> | undefined;

    this.eventBus?.publish({
      type: "cycle.started",
      timestamp: startedAt,
      source: "polling_scheduler",
      payload: { target: tracked.id, forced },
    });

    const finish = (status: CycleStatus, error?: Error): CycleResult => {
      tracked.state = tracked.cancelled ? "cancelled" : "idle";
      const durationMs = this.now() - startedAt;
      const result: CycleResult = { target: tracked.id, status, forced, attempts, changeCount, durationMs };
      if (dispatch) result.dispatch = dispatch;
      if (error) result.error = error;
      this.eventBus?.publish({
        type: "cycle.completed",
        timestamp: this.now(),
        source: "polling_scheduler",
        payload: { target: tracked.id, status, changeCount, durationMs },
      });
      return result;
    };

    try {
      const fetched = await this.fetchWithRetry(tracked);
      attempts = fetched.attempts;
      if (fetched.kind === "cancelled") {
        return finish("cancelled");
      }
      if (fetched.kind === "failed") {
        this.logger.error(`${fetched.error.message} (after ${attempts} attempt(s)); keeping the previous baseline`);
        this.eventBus?.publish({
          type: "cycle.fetch_failed",
          timestamp: this.now(),
          source: "polling_scheduler",
          payload: { target: tracked.id, attempts, error: fetched.error.message },
        });
        return finish("fetch_failed", fetched.error);
      }
      if (fetched.outcome.status === "no_data") {
        this.logger.info(`${tracked.id}: no data returned; keeping the previous baseline`);
        return finish("no_data");
      }
      if (tracked.cancelled) {
        return finish("cancelled");
      }

      const data = fetched.outcome.data;
      phase = "diff";
      tracked.state = "diffing";
      const diff = await this.withPhaseTimeout(tracked.id, phase, () => tracked.runner.diff(data));
      changeCount = diff.changeCount;
      if (tracked.cancelled) {
        return finish("cancelled");
      }

      if (diff.changeCount > 0) {
        phase = "dispatch";
        tracked.state = "dispatching";
        dispatch = await this.withPhaseTimeout(tracked.id, phase, () => tracked.runner.dispatch(data, diff));
      }

      // Once dispatched, commit runs even if stop was requested meanwhile.
      phase = "commit";
      await this.withPhaseTimeout(tracked.id, phase, () => tracked.runner.commit(data, diff));
      return finish("ok");
    } catch (error) {
      const message = errorMessage(error);
      this.logger.error(`${tracked.id}: cycle failed during ${phase}: ${message}`);
      this.eventBus?.publish({
        type: "cycle.error",
        timestamp: this.now(),
        source: "polling_scheduler",
        payload: { target: tracked.id, phase, error: message },
      });
      return finish("error", toError(error));
    }
  }

  private async fetchWithRetry(tracked: TrackedTarget): Promise<FetchAttempt> {
    const maxAttempts = this.maxRetries + 1;
    let lastError: unknown;
    let attempt = 0;

    while (attempt < maxAttempts) {
      attempt++;
      tracked.state = "fetching";
      try {
        const outcome = await this.withPhaseTimeout(tracked.id, "fetch", () => tracked.runner.fetch());
        return { kind: "fetched", outcome, attempts: attempt };
      } catch (error) {
        lastError = error;
        if (tracked.cancelled) {
          return { kind: "cancelled", attempts: attempt };
        }
        if (attempt >= maxAttempts) {
          break;
        }
        const delay = backoffDelay(attempt, this.baseBackoffMs, this.maxBackoffMs);
        this.logger.warn(`${tracked.id}: fetch attempt ${attempt}/${maxAttempts} failed (${errorMessage(error)}); retrying in ${delay}ms`);
        tracked.state = "backoff";
        await this.sleep(tracked, delay);
        if (tracked.cancelled) {
          return { kind: "cancelled", attempts: attempt };
        }
      }
    }

    const reason = isFetchFailedError(lastError) ? lastError.reason : errorMessage(lastError);
    const cause = isFetchFailedError(lastError) ? lastError.cause : lastError;
    return {
      kind: "failed",
      error: new FetchFailedError(tracked.id, reason, { attempts: attempt, cause }),
      attempts: attempt,
    };
  }

  private async withPhaseTimeout<T>(target: string, phase: CyclePhase, work: () => Promise<T>): Promise<T> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => reject(new PhaseTimeoutError(target, phase, this.maxPhaseTimeoutMs)), this.maxPhaseTimeoutMs);
    });
    try {
      return await Promise.race([Promise.resolve().then(work), timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  private sleep(tracked: TrackedTarget, ms: number): Promise<void> {
    return new Promise((resolve) => {
      const finish = (): void => {
        clearTimeout(timer);
        if (tracked.wake === finish) {
          tracked.wake = null;
        }
        resolve();
      };
      const timer = setTimeout(finish, ms);
      tracked.wake = finish;
    });
  }
}
