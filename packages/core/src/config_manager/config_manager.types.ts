/**
 * ConfigManager Types
 */

import type { LogLevel } from "../logger";
import type { ChannelConfig } from "../notification_dispatcher/notification_dispatcher.types";

export type TargetConfig = {
  enabled: boolean;
  intervalSeconds: number;
};

export type AccountConfig = {
  institutionCode: string;
  username: string;
  /** Stored as given */
  password: string;
  enabled: boolean;
  grades: TargetConfig;
  schedule: TargetConfig;
};

export type PluginsConfig = {
  /** Empty when no remote index is configured */
  indexUrl: string;
  mirrorPrefix: string;
  autoUpdate: boolean;
  requestTimeoutMs: number;
};

export type SchedulerConfig = {
  maxRetries: number;
  baseBackoffMs: number;
  maxBackoffMs: number;
  maxPhaseTimeoutMs: number;
  jitterMs: number;
};

export type DispatchConfig = {
  timeoutMs: number;
  sendFullReport: boolean;
};

export type SemesterConfig = {
  /** Monday of teaching week 1, YYYY-MM-DD */
  firstMonday?: string;
  totalWeeks: number;
};

/**
 * Validated configuration with every default applied.
 */
export type AppConfig = {
  logging: { level: LogLevel };
  /** Absolute; `~` expanded */
  dataDir: string;
  plugins: PluginsConfig;
  scheduler: SchedulerConfig;
  dispatch: DispatchConfig;
  semester: SemesterConfig;
  accounts: AccountConfig[];
  channels: ChannelConfig[];
};

export type AccountConfigInput = {
  institutionCode: string;
  username: string;
  password: string;
  enabled?: boolean;
  grades?: Partial<TargetConfig>;
  schedule?: Partial<TargetConfig>;
};

export type ChannelConfigInput = {
  name: string;
  type: string;
  enabled?: boolean;
  parameters?: Record<string, string>;
};

/**
 * Configuration document as written in config.yaml / config.json.
 * Everything except account and channel identity is optional.
 */
export type AppConfigInput = {
  logging?: { level?: LogLevel };
  dataDir?: string;
  plugins?: Partial<PluginsConfig>;
  scheduler?: Partial<SchedulerConfig>;
  dispatch?: Partial<DispatchConfig>;
  semester?: Partial<SemesterConfig>;
  accounts?: AccountConfigInput[];
  channels?: ChannelConfigInput[];
};

export interface IConfigManager {
  loadConfig(): Promise<AppConfig>;
  validateConfig(raw: unknown): AppConfig;
  initConfig(options?: { force?: boolean }): Promise<string>;
  describeSource(): string;
}
