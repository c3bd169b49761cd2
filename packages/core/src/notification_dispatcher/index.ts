export * from "./notification_dispatcher";
export * from "./notification_dispatcher.errors";
export type * from "./notification_dispatcher.types";
export * from "./channel_factory_registry";
export { createWebhookChannel, buildWebhookPayload } from "./channels/webhook_channel";
export type { WebhookPayload } from "./channels/webhook_channel";
export { createConsoleChannel } from "./channels/console_channel";
