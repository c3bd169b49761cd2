import { silentLogger } from "../logger";
import type { Logger } from "../logger";
import { ChannelConfigError } from "./notification_dispatcher.errors";
import type { ChannelConfig, ChannelFactory, NotificationChannel } from "./notification_dispatcher.types";
import type { NotificationDispatcher } from "./notification_dispatcher";
import { createWebhookChannel } from "./channels/webhook_channel";
import { createConsoleChannel } from "./channels/console_channel";

export type ChannelFactoryRegistryOptions = {
  logger?: Logger;
  fetch?: typeof fetch;
};

/**
 * Maps channel `type` names to factories. `webhook` and `console` are
 * registered by default.
 */
export class ChannelFactoryRegistry {
  private readonly factories = new Map<string, ChannelFactory>();
  private readonly logger: Logger;
  private readonly fetchImpl: typeof fetch;

  constructor(options: ChannelFactoryRegistryOptions = {}) {
    this.logger = options.logger ?? silentLogger;
    this.fetchImpl = options.fetch ?? globalThis.fetch;
    this.registerType("webhook", createWebhookChannel);
    this.registerType("console", createConsoleChannel);
  }

  registerType(type: string, factory: ChannelFactory): void {
    this.factories.set(type, factory);
  }

  types(): string[] {
    return Array.from(this.factories.keys()).sort();
  }

  create(config: ChannelConfig): NotificationChannel {
    const factory = this.factories.get(config.type);
    if (!factory) {
      throw new ChannelConfigError(config.name, `unknown channel type "${config.type}" (known: ${this.types().join(", ")})`);
    }
    return factory(config, { logger: this.logger.child(`[${config.name}] `), fetch: this.fetchImpl });
  }

  /**
   * Creates every configured channel and registers it on the dispatcher.
   * Fails on the first invalid config before registering anything.
   */
  populate(dispatcher: NotificationDispatcher, configs: ChannelConfig[]): void {
    const names = new Set<string>();
    for (const config of configs) {
      if (names.has(config.name)) {
        throw new ChannelConfigError(config.name, "duplicate channel name");
      }
      names.add(config.name);
    }
    const channels = configs.map((config) => ({ config, channel: this.create(config) }));
    for (const { config, channel } of channels) {
      dispatcher.register(config.name, channel, config.enabled);
    }
  }
}
