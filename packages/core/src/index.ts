/**
 * @gradewatch/core
 *
 * Environment-neutral modules. Filesystem implementations live in
 * `@gradewatch/core/fs`, in-memory ones in `@gradewatch/core/memory`.
 */

export * as Logger from "./logger";
export * as Records from "./records";
export * as Schemas from "./schemas";
export * as Crypto from "./crypto";
export * as Store from "./store";
export * as EventBus from "./event_bus";
export * as Config from "./config_manager";
export * as ConfigStore from "./config_store";

// Engine
export * as SchoolAdapter from "./school_adapter";
export * as PluginRegistry from "./plugin_registry";
export * as StateStore from "./state_store";
export * as ChangeDetector from "./change_detector";
export * as MessageRenderer from "./message_renderer";
export * as NotificationDispatcher from "./notification_dispatcher";
export * as PollingScheduler from "./polling_scheduler";
export * as ScheduleLinearizer from "./schedule_linearizer";
export * as Orchestrator from "./orchestrator";
