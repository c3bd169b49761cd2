import type { CyclePhase } from "./polling_scheduler.types";

export class SchedulerError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SchedulerError";
    Object.setPrototypeOf(this, SchedulerError.prototype);
  }
}

export class PhaseTimeoutError extends SchedulerError {
  constructor(
    public readonly target: string,
    public readonly phase: CyclePhase,
    public readonly timeoutMs: number
  ) {
    super(`PhaseTimeout: ${target}: ${phase} exceeded ${timeoutMs}ms`);
    this.name = "PhaseTimeoutError";
    Object.setPrototypeOf(this, PhaseTimeoutError.prototype);
  }
}

export class UnknownTargetError extends SchedulerError {
  constructor(public readonly target: string) {
    super(`UnknownTarget: ${target}: target is not scheduled`);
    this.name = "UnknownTargetError";
    Object.setPrototypeOf(this, UnknownTargetError.prototype);
  }
}

export function isSchedulerError(error: unknown): error is SchedulerError {
  return error instanceof SchedulerError;
}
