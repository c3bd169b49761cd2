import type { ChannelConfig, ChannelFactoryDependencies, NotificationChannel } from "../notification_dispatcher.types";

/** Writes messages to the logger at info level. Always succeeds. */
export function createConsoleChannel(_config: ChannelConfig, deps: ChannelFactoryDependencies): NotificationChannel {
  return {
    send(subject: string, content: string): boolean {
      deps.logger.info(`${subject}\n\n${content}`);
      return true;
    },
  };
}
