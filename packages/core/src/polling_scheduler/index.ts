export * from "./polling_scheduler";
export * from "./polling_scheduler.errors";
export type * from "./polling_scheduler.types";
