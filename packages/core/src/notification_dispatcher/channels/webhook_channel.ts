import { ChannelConfigError } from "../notification_dispatcher.errors";
import type { ChannelConfig, ChannelFactoryDependencies, NotificationChannel } from "../notification_dispatcher.types";

export type WebhookPayload = {
  msg_type: "text";
  content: { text: string };
};

export function buildWebhookPayload(subject: string, content: string): WebhookPayload {
  return { msg_type: "text", content: { text: `${subject}\n\n${content}` } };
}

/** Body `code` of 0 or no code at all counts as accepted */
function acceptedByBody(body: unknown): { ok: boolean; detail?: string } {
  if (typeof body !== "object" || body === null || !("code" in body)) {
    return { ok: true };
  }
  if (body.code === 0) {
    return { ok: true };
  }
  const detail = "msg" in body && typeof body.msg === "string" ? body.msg : `code ${String(body.code)}`;
  return { ok: false, detail };
}

/**
 * Chat-bot webhook channel. Parameters: `url` (required).
 * POSTs a text message; delivered when the response is 2xx and the JSON
 * body's `code` is 0 or absent.
 */
export function createWebhookChannel(config: ChannelConfig, deps: ChannelFactoryDependencies): NotificationChannel {
  const url = config.parameters["url"];
  if (!url) {
    throw new ChannelConfigError(config.name, "webhook channel requires a url parameter");
  }

  return {
    async send(subject: string, content: string): Promise<boolean> {
      deps.logger.info(`Sending "${subject}"`);
      const response = await deps.fetch(url, {
        method: "POST",
        headers: { "Content-Type": "application/json; charset=utf-8" },
        body: JSON.stringify(buildWebhookPayload(subject, content)),
      });
      if (!response.ok) {
        deps.logger.error(`Webhook responded with HTTP ${response.status}`);
        return false;
      }
      const text = await response.text();
      let body: unknown = null;
      if (text.trim()) {
        try {
          body = JSON.parse(text);
        } catch {
          body = null;
        }
      }
      const verdict = acceptedByBody(body);
      if (!verdict.ok) {
        deps.logger.error(`Webhook rejected the message: ${verdict.detail ?? "unknown reason"}`);
      }
      return verdict.ok;
    },
  };
}
