import { silentLogger } from "../logger";
import type { Logger } from "../logger";
import type { IEventStream } from "../event_bus";
import { errorMessage } from "../utils/error_message";
import { ChannelRegistrationError } from "./notification_dispatcher.errors";
import type {
  ChannelInfo,
  DispatchResult,
  NotificationChannel,
  NotificationDispatcherOptions,
} from "./notification_dispatcher.types";

export const DEFAULT_DISPATCH_TIMEOUT_MS = 10_000;

type RegisteredChannel = {
  channel: NotificationChannel;
  enabled: boolean;
};

const TIMED_OUT = Symbol("timed-out");

/**
 * Fans a message out to every enabled channel.
 *
 * Channels run concurrently and fail independently: a throw, a `false`
 * return or a timeout only marks that channel `false` in the result.
 */
export class NotificationDispatcher {
  private readonly registered = new Map<string, RegisteredChannel>();
  private readonly logger: Logger;
  private readonly eventBus: IEventStream | undefined;
  private readonly timeoutMs: number;

  constructor(options: NotificationDispatcherOptions = {}) {
    this.logger = options.logger ?? silentLogger;
    this.eventBus = options.eventBus;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_DISPATCH_TIMEOUT_MS;
  }

  /** Registers or replaces a channel under `name` */
  register(name: string, channel: unknown, enabled: boolean = true): void {
    if (!name.trim()) {
      throw new ChannelRegistrationError(name, "channel name must not be empty");
    }
    if (!isNotificationChannel(channel)) {
      throw new ChannelRegistrationError(name, "channel must provide a send(subject, content) function");
    }
    if (this.registered.has(name)) {
      this.logger.debug(`Replacing channel ${name}`);
    }
    this.registered.set(name, { channel, enabled });
  }

  unregister(name: string): boolean {
    return this.registered.delete(name);
  }

  setEnabled(name: string, enabled: boolean): void {
    const entry = this.registered.get(name);
    if (!entry) {
      throw new ChannelRegistrationError(name, "no channel registered under this name");
    }
    entry.enabled = enabled;
  }

  channels(): ChannelInfo[] {
    return Array.from(this.registered.entries()).map(([name, entry]) => ({ name, enabled: entry.enabled }));
  }

  /**
   * Sends to every enabled channel and waits for all of them to settle or
   * time out. Never throws.
   */
  async dispatch(subject: string, content: string): Promise<DispatchResult> {
    const targets = Array.from(this.registered.entries()).filter(([, entry]) => entry.enabled);
    if (targets.length === 0) {
      this.logger.warn(`No enabled channels; "${subject}" was not delivered`);
    }

    const outcomes = await Promise.all(
      targets.map(async ([name, entry]) => [name, await this.sendToChannel(name, entry.channel, subject, content)] as const)
    );
    const results: DispatchResult = {};
    for (const [name, delivered] of outcomes) {
      results[name] = delivered;
    }

    this.eventBus?.publish({
      type: "dispatch.completed",
      timestamp: Date.now(),
      source: "notification_dispatcher",
      payload: { subject, results },
    });
    return results;
  }

  private async sendToChannel(
    name: string,
    channel: NotificationChannel,
    subject: string,
    content: string
  ): Promise<boolean> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<typeof TIMED_OUT>((resolve) => {
      timer = setTimeout(() => resolve(TIMED_OUT), this.timeoutMs);
    });

    try {
      const outcome = await Promise.race([
        Promise.resolve().then(() => channel.send(subject, content)),
        timeout,
      ]);
      if (outcome === TIMED_OUT) {
        this.logger.warn(`DispatchFailed: ${name}: timed out after ${this.timeoutMs}ms`);
        return false;
      }
      if (outcome !== true) {
        this.logger.warn(`DispatchFailed: ${name}: channel reported failure`);
        return false;
      }
      return true;
    } catch (error) {
      this.logger.warn(`DispatchFailed: ${name}: ${errorMessage(error)}`);
      return false;
    } finally {
      clearTimeout(timer);
    }
  }
}

export function isNotificationChannel(value: unknown): value is NotificationChannel {
  return typeof value === "object" && value !== null && "send" in value && typeof value.send === "function";
}
