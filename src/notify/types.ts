/**
 * Notification types shared by the dispatcher and its sinks.
 */

/** email is the primary channel; sms and chat are secondary. */
export type Channel = "email" | "sms" | "chat";

export interface Attachment {
  fileName: string;
  contentType: string;
  data: Buffer;
}

export interface OutboundMessage {
  /** Addresses or phone numbers; a chat sink delivers to its configured chat */
  to: string[];
  cc?: string[];
  subject?: string;
  text: string;
  html?: string;
}

/**
 * One delivery capability. send() resolves when the message was accepted
 * and throws DeliveryError otherwise.
 */
export interface NotificationSink {
  readonly name: string;
  send(channel: Channel, message: OutboundMessage, attachments?: Attachment[]): Promise<void>;
}

export interface NotificationResult {
  channel: Channel;
  status: "sent" | "failed";
  error?: string;
}

export interface DispatchOutcome {
  results: NotificationResult[];
  /** True when the primary channel failed and the operator was alerted */
  escalated: boolean;
}
