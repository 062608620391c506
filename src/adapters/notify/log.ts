/**
 * Log-only notifier: records the notification in the structured log and reports success.
 * Default transport for development and deployments without a mail relay.
 */

import type pino from "pino";
import type { ContactDirectory } from "../../directory/contacts";
import { logger as rootLogger } from "../../logging";
import type { INotifier, NotifyResult } from "./types";

export class LogNotifier implements INotifier {
  constructor(
    private readonly contacts: ContactDirectory,
    private readonly log: pino.Logger = rootLogger
  ) {}

  async send(contactName: string, subject: string, body: string): Promise<NotifyResult> {
    const email = this.contacts.emailFor(contactName);
    if (!email) {
      return { success: false, message: `No address on file for ${contactName}` };
    }
    this.log.info({ event: "NOTIFY_SENT", to: email, subject, bodyLength: body.length }, "Notification logged");
    return { success: true, message: `logged for ${email}` };
  }
}
