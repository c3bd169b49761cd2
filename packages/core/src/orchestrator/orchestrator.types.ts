import type { AppConfig } from "../config_manager/config_manager.types";
import type { IEventStream } from "../event_bus";
import type { Logger } from "../logger";
import type { NotificationDispatcher } from "../notification_dispatcher/notification_dispatcher";
import type { PluginRegistry } from "../plugin_registry/plugin_registry.types";
import type { PollingScheduler } from "../polling_scheduler/polling_scheduler";
import type { CycleResult } from "../polling_scheduler/polling_scheduler.types";
import type { ChangeDetector } from "../change_detector/change_detector";
import type { StateStore } from "../state_store/state_store";
import type { RecordKind } from "../records/records.types";

/**
 * Everything the orchestrator works with, passed in explicitly.
 */
export type AppContext = {
  config: AppConfig;
  logger: Logger;
  eventBus?: IEventStream;
  registry: PluginRegistry;
  stateStore: StateStore;
  dispatcher: NotificationDispatcher;
  scheduler: PollingScheduler;
  changeDetector?: ChangeDetector;
  /** Clock for snapshot `capturedAt` */
  now?: () => Date;
};

export type TargetKey = {
  accountKey: string;
  kind: RecordKind;
};

export type StartSummary = {
  /** Target ids now polling, sorted */
  started: string[];
  /** Account keys whose adapter could not be resolved */
  skipped: string[];
};

export type RunOnceResult = CycleResult & TargetKey;

export type PluginUpdateSummary = {
  updated: string[];
  unchanged: string[];
  failed: string[];
};
