/**
 * Notifier factory: returns implementation based on config.
 */

import type { AppConfig } from "../../config";
import type { ContactDirectory } from "../../directory/contacts";
import { logger } from "../../logging";
import type { INotifier } from "./types";
import { LogNotifier } from "./log";
import { WebhookNotifier } from "./webhook";

export type { INotifier, NotifyResult } from "./types";
export { LogNotifier } from "./log";
export { WebhookNotifier } from "./webhook";

export function createNotifier(config: AppConfig, contacts: ContactDirectory): INotifier {
  if (config.notify.provider === "webhook") {
    if (config.notify.webhookUrl) {
      return new WebhookNotifier({ url: config.notify.webhookUrl }, contacts);
    }
    logger.warn({ event: "NOTIFY_CONFIG" }, "NOTIFY_PROVIDER=webhook without NOTIFY_WEBHOOK_URL; using log notifier");
  }
  return new LogNotifier(contacts);
}
