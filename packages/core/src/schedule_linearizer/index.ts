export * from "./schedule_linearizer";
