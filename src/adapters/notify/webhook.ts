/**
 * Webhook notifier: POSTs {to, name, subject, body} as JSON to a relay that owns delivery (mail, chat).
 */

import type { ContactDirectory } from "../../directory/contacts";
import { errorMessage } from "../../errors";
import type { INotifier, NotifyResult } from "./types";

export interface WebhookNotifierConfig {
  url: string;
  /** Request timeout (ms). */
  timeoutMs?: number;
}

export class WebhookNotifier implements INotifier {
  private readonly timeoutMs: number;

  constructor(
    private readonly cfg: WebhookNotifierConfig,
    private readonly contacts: ContactDirectory
  ) {
    this.timeoutMs = cfg.timeoutMs ?? 5000;
  }

  async send(contactName: string, subject: string, body: string): Promise<NotifyResult> {
    const email = this.contacts.emailFor(contactName);
    if (!email) {
      return { success: false, message: `No address on file for ${contactName}` };
    }
    try {
      const res = await fetch(this.cfg.url, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({ to: email, name: contactName, subject, body }),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      if (!res.ok) {
        return { success: false, message: `Webhook responded ${res.status}` };
      }
      return { success: true, message: `Webhook accepted (${res.status})` };
    } catch (err) {
      return { success: false, message: errorMessage(err) };
    }
  }
}
