/**
 * Event Bus types for gradewatch lifecycle events
 */

import type { RecordKind } from '../records/records.types';

/**
 * Base event structure
 */
export type BaseEvent = {
  /** Event type identifier */
  type: string;
  /** Event timestamp (ms since epoch) */
  timestamp: number;
  /** Event payload */
  payload: unknown;
  /** Component that emitted the event */
  source: string;
};

/**
 * Polling cycle events
 */
export type CycleStatus = 'ok' | 'no_data' | 'fetch_failed' | 'error' | 'cancelled';

export type CycleStartedEvent = BaseEvent & {
  type: 'cycle.started';
  payload: {
    target: string;
    forced: boolean;
  };
};

export type CycleCompletedEvent = BaseEvent & {
  type: 'cycle.completed';
  payload: {
    target: string;
    status: CycleStatus;
    changeCount: number;
    durationMs: number;
  };
};

export type CycleFetchFailedEvent = BaseEvent & {
  type: 'cycle.fetch_failed';
  payload: {
    target: string;
    attempts: number;
    error: string;
  };
};

export type CycleErrorEvent = BaseEvent & {
  type: 'cycle.error';
  payload: {
    target: string;
    phase: string;
    error: string;
  };
};

/**
 * Change detection and delivery events
 */
export type ChangesDetectedEvent = BaseEvent & {
  type: 'changes.detected';
  payload: {
    accountKey: string;
    kind: RecordKind;
    added: number;
    removed: number;
    modified: number;
  };
};

export type DispatchCompletedEvent = BaseEvent & {
  type: 'dispatch.completed';
  payload: {
    subject: string;
    /** Channel name → delivered */
    results: Record<string, boolean>;
  };
};

/**
 * Plugin lifecycle events
 */
export type PluginInstalledEvent = BaseEvent & {
  type: 'plugin.installed';
  payload: {
    institutionCode: string;
    version: string;
  };
};

export type PluginUpdatedEvent = BaseEvent & {
  type: 'plugin.updated';
  payload: {
    institutionCode: string;
    previousVersion: string;
    version: string;
  };
};

export type PluginInstallFailureReason = 'not_found' | 'download' | 'integrity' | 'load' | 'io';

export type PluginInstallFailedEvent = BaseEvent & {
  type: 'plugin.install_failed';
  payload: {
    institutionCode: string;
    reason: PluginInstallFailureReason;
    error: string;
  };
};

/**
 * Union type of all possible events
 */
export type GradewatchEvent =
  | CycleStartedEvent
  | CycleCompletedEvent
  | CycleFetchFailedEvent
  | CycleErrorEvent
  | ChangesDetectedEvent
  | DispatchCompletedEvent
  | PluginInstalledEvent
  | PluginUpdatedEvent
  | PluginInstallFailedEvent;

export type GradewatchEventType = GradewatchEvent['type'];

export type EventOf<K extends GradewatchEventType> = Extract<GradewatchEvent, { type: K }>;

/**
 * Event handler function type
 */
export type EventHandler<T extends BaseEvent = GradewatchEvent> = (event: T) => void | Promise<void>;

/**
 * Event subscription
 */
export type EventSubscription = {
  /** Unique subscription ID */
  id: string;
  /** Event type being subscribed to, `*` for all */
  eventType: GradewatchEventType | '*';
  /** Listener registered on the emitter */
  listener: (event: GradewatchEvent) => void;
  metadata: {
    createdAt: number;
  };
};
