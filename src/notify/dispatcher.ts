/**
 * Notification dispatcher fans a parsed report out to every configured
 * channel and reports the outcome to the operator.
 *
 * Channels are attempted one after another and independently: a failure on
 * one never stops the next. Email is the primary channel; if it fails the
 * operator is escalated to exactly once for the dispatch.
 */

import { describeError } from "../errors.ts";
import type { RawReport, ReportRecord } from "../reports/types.ts";
import { trace } from "../utils/tracer.ts";
import {
  ESCALATION_SUBJECT,
  countSections,
  formatChatSummary,
  formatDeliveryStatus,
  formatEmail,
  formatEscalation,
  formatSms,
} from "./formatReport.ts";
import type {
  Attachment,
  Channel,
  DispatchOutcome,
  NotificationResult,
  NotificationSink,
  OutboundMessage,
} from "./types.ts";

export const PRIMARY_CHANNEL: Channel = "email";

export interface DispatcherRecipients {
  emailTo: string[];
  emailCc: string[];
  /** Report sender to get an SMS summary; null disables the sms channel */
  smsSenderNotify: string | null;
  /** Operator phone for escalations */
  escalationPhone: string | null;
  /** Operator chat; null disables the chat channel */
  chatEnabled: boolean;
}

export interface DispatcherOptions {
  sinks: Record<Channel, NotificationSink>;
  recipients: DispatcherRecipients;
}

interface PlannedSend {
  channel: Channel;
  message: OutboundMessage;
  attachments?: Attachment[];
}

function pdfAttachments(raw: RawReport): Attachment[] {
  return raw.files
    .filter((f) => f.format === "pdf")
    .map((f) => ({ fileName: f.fileName, contentType: "application/pdf", data: f.data }));
}

export class NotificationDispatcher {
  constructor(private readonly options: DispatcherOptions) {}

  /** Channels a report dispatch will attempt, primary first. */
  get channels(): Channel[] {
    const { recipients } = this.options;
    const channels: Channel[] = ["email"];
    if (recipients.smsSenderNotify) channels.push("sms");
    if (recipients.chatEnabled) channels.push("chat");
    return channels;
  }

  async dispatch(records: readonly ReportRecord[], raw: RawReport): Promise<DispatchOutcome> {
    const { request } = raw;
    const { recipients } = this.options;
    const email = formatEmail(records, request);

    const plan: PlannedSend[] = this.channels.map((channel) => {
      switch (channel) {
        case "email":
          return {
            channel,
            message: {
              to: recipients.emailTo,
              cc: recipients.emailCc,
              subject: email.subject,
              text: email.text,
              html: email.html,
            },
            attachments: pdfAttachments(raw),
          };
        case "sms":
          return {
            channel,
            message: { to: recipients.smsSenderNotify ? [recipients.smsSenderNotify] : [], text: formatSms(records, request) },
          };
        case "chat":
          return { channel, message: { to: [], text: formatChatSummary(records, request) } };
      }
    });

    const results: NotificationResult[] = [];
    for (const item of plan) {
      results.push(await this.attempt(item));
    }

    console.log(
      `[dispatch] ${request.reportType} ${request.range.label}: ` +
        results.map((r) => `${r.channel}=${r.status}`).join(", ")
    );
    trace({
      event: "dispatch",
      kind: request.reportType,
      records: records.length,
      results: results.map((r) => ({ channel: r.channel, status: r.status })),
    });

    await this.reportDeliveryStatus(formatDeliveryStatus(request, countSections(records), results));

    const primary = results.find((r) => r.channel === PRIMARY_CHANNEL);
    let escalated = false;
    if (primary?.status === "failed") {
      await this.escalate(`Email delivery FAILED for ${request.range.label}: ${primary.error ?? "unknown error"}`);
      escalated = true;
    }

    return { results, escalated };
  }

  /**
   * Alert the operator over SMS and chat. Each route is tried independently;
   * never throws. Returns true if at least one route accepted the alert.
   */
  async escalate(reason: string): Promise<boolean> {
    const { recipients, sinks } = this.options;
    const text = formatEscalation(reason);
    let delivered = false;

    console.warn(`[dispatch] ESCALATION: ${reason}`);
    trace({ event: "escalation", reason });

    if (recipients.escalationPhone) {
      try {
        await sinks.sms.send("sms", { to: [recipients.escalationPhone], subject: ESCALATION_SUBJECT, text });
        delivered = true;
      } catch (error) {
        console.error(`[dispatch] Escalation SMS failed: ${describeError(error)}`);
      }
    }

    if (recipients.chatEnabled) {
      try {
        await sinks.chat.send("chat", { to: [], subject: ESCALATION_SUBJECT, text });
        delivered = true;
      } catch (error) {
        console.error(`[dispatch] Escalation chat message failed: ${describeError(error)}`);
      }
    }

    if (!delivered) {
      console.error("[dispatch] Escalation could not be delivered on any route");
    }
    return delivered;
  }

  private async attempt(item: PlannedSend): Promise<NotificationResult> {
    const sink = this.options.sinks[item.channel];
    try {
      await sink.send(item.channel, item.message, item.attachments);
      return { channel: item.channel, status: "sent" };
    } catch (error) {
      const detail = describeError(error);
      console.error(`[dispatch] ${item.channel} via ${sink.name} failed: ${detail}`);
      return { channel: item.channel, status: "failed", error: detail };
    }
  }

  private async reportDeliveryStatus(text: string): Promise<void> {
    if (!this.options.recipients.chatEnabled) {
      console.log(`[dispatch] ${text.replace(/\n+/g, " | ")}`);
      return;
    }
    try {
      await this.options.sinks.chat.send("chat", { to: [], text });
    } catch (error) {
      console.error(`[dispatch] Delivery status report failed: ${describeError(error)}`);
    }
  }
}
