import type { Logger } from "../logger";
import type { IEventStream } from "../event_bus";

/**
 * A delivery target. `true` means delivered; `false` or a throw
 * marks the channel as failed for that dispatch.
 */
export interface NotificationChannel {
  send(subject: string, content: string): boolean | Promise<boolean>;
}

/** Configured channel instance */
export type ChannelConfig = {
  name: string;
  type: string;
  enabled: boolean;
  parameters: Record<string, string>;
};

/** Channel name → delivered */
export type DispatchResult = Record<string, boolean>;

export type ChannelInfo = {
  name: string;
  enabled: boolean;
};

export type ChannelFactoryDependencies = {
  logger: Logger;
  fetch: typeof fetch;
};

export type ChannelFactory = (config: ChannelConfig, deps: ChannelFactoryDependencies) => NotificationChannel;

export type NotificationDispatcherOptions = {
  logger?: Logger;
  eventBus?: IEventStream;
  /** Per-channel send timeout; default 10000 ms */
  timeoutMs?: number;
};
