/**
 * Recording NotificationSink for tests. Channels listed in `failing`
 * throw DeliveryError.
 */

import { DeliveryError } from "../errors.ts";
import type { Attachment, Channel, NotificationSink, OutboundMessage } from "../notify/types.ts";

export interface SentMessage {
  channel: Channel;
  message: OutboundMessage;
  attachments: Attachment[];
}

export class FakeSink implements NotificationSink {
  readonly name = "fake";
  sent: SentMessage[] = [];
  failing = new Set<Channel>();

  async send(channel: Channel, message: OutboundMessage, attachments: Attachment[] = []): Promise<void> {
    if (this.failing.has(channel)) {
      throw new DeliveryError(`${channel} is down`);
    }
    this.sent.push({ channel, message, attachments });
  }

  on(channel: Channel): SentMessage[] {
    return this.sent.filter((s) => s.channel === channel);
  }
}
