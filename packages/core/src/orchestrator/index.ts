export { Orchestrator, targetIdOf, parseTargetId, accountKeyOfConfig } from "./orchestrator";
export { OrchestratorError, UnknownAccountError, isOrchestratorError } from "./orchestrator.errors";
export type * from "./orchestrator.types";
