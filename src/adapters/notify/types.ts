/**
 * Notification transport types.
 */

export interface NotifyResult {
  success: boolean;
  /** Transport detail (delivery id, HTTP status, failure reason). Never shown to visitors. */
  message: string;
}

export interface INotifier {
  /**
   * Deliver a message to an internal contact. Must resolve (not reject) on delivery failure.
   * @param contactName - Canonical directory name of the recipient.
   */
  send(contactName: string, subject: string, body: string): Promise<NotifyResult>;
}
