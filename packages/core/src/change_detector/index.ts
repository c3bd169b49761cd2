export * from "./change_detector";
export * from "./change_detector.errors";
