/**
 * Comms Centre integration API sink (email, SMS, and chat via its
 * Telegram channel).
 *
 * POST <COMMS_API_URL> with the x-integration-key header. Accepted means
 * HTTP 200 with `{ "success": true }`. 429 and 5xx responses and network
 * failures are retried with backoff; any other response fails at once.
 */

import { z } from "zod";
import { DeliveryError, describeError } from "../errors.ts";
import { withRetry } from "../utils/retry.ts";
import type { Attachment, Channel, NotificationSink, OutboundMessage } from "./types.ts";

const CHANNEL_NAME: Record<Channel, string> = {
  email: "email",
  sms: "sms",
  chat: "telegram",
};

const RETRY_STATUSES = new Set([429, 500, 502, 503, 504]);

const responseSchema = z.object({ success: z.boolean() }).passthrough();

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export interface CommsCentreOptions {
  apiUrl: string;
  apiKey: string;
  maxAttempts?: number;
  backoffMs?: number;
  timeoutMs?: number;
  fetch?: FetchLike;
  sleep?: (ms: number) => Promise<void>;
}

export interface CommsCentrePayload {
  channels: string[];
  to?: string[];
  cc?: string[];
  subject?: string;
  body: string;
  html?: string;
  attachments?: { filename: string; content: string; contentType: string }[];
}

class RetryableStatusError extends Error {
  constructor(readonly status: number, readonly body: string) {
    super(`HTTP ${status}: ${body.slice(0, 200)}`);
  }
}

export function buildPayload(channel: Channel, message: OutboundMessage, attachments: Attachment[] = []): CommsCentrePayload {
  const payload: CommsCentrePayload = {
    channels: [CHANNEL_NAME[channel]],
    body: message.text,
  };
  if (message.to.length > 0) payload.to = message.to;
  if (message.cc && message.cc.length > 0) payload.cc = message.cc;
  if (message.subject) payload.subject = message.subject;
  if (message.html) payload.html = message.html;
  if (attachments.length > 0) {
    payload.attachments = attachments.map((a) => ({
      filename: a.fileName,
      content: a.data.toString("base64"),
      contentType: a.contentType,
    }));
  }
  return payload;
}

export class CommsCentreSink implements NotificationSink {
  readonly name = "comms-centre";
  private readonly fetchImpl: FetchLike;

  constructor(private readonly options: CommsCentreOptions) {
    this.fetchImpl = options.fetch ?? fetch;
  }

  async send(channel: Channel, message: OutboundMessage, attachments: Attachment[] = []): Promise<void> {
    const payload = buildPayload(channel, message, attachments);
    console.log(
      `[comms] POST ${CHANNEL_NAME[channel]} to ${message.to.length} recipient(s)` +
        (attachments.length > 0 ? ` with ${attachments.length} attachment(s)` : "")
    );

    let response: Response;
    try {
      response = await withRetry(() => this.post(payload), {
        attempts: this.options.maxAttempts ?? 3,
        backoffMs: this.options.backoffMs ?? 1000,
        shouldRetry: () => true,
        onRetry: (error, attempt, delayMs) => {
          console.warn(`[comms] ${channel} attempt ${attempt} failed: ${describeError(error)}; retrying in ${delayMs}ms`);
        },
        sleep: this.options.sleep,
      });
    } catch (error) {
      throw new DeliveryError(`Comms Centre ${channel} request failed: ${describeError(error)}`, { cause: error });
    }

    if (response.status === 405) {
      throw new DeliveryError(`Comms Centre ${channel} rejected the method (405); is COMMS_API_URL correct?`);
    }
    if (response.status !== 200) {
      const text = await response.text();
      throw new DeliveryError(`Comms Centre ${channel} error: HTTP ${response.status} ${text.slice(0, 200)}`);
    }

    const parsed = responseSchema.safeParse(await response.json().catch(() => null));
    if (!parsed.success || !parsed.data.success) {
      const detail = parsed.success ? JSON.stringify(parsed.data) : "unreadable response body";
      throw new DeliveryError(`Comms Centre ${channel} not accepted: ${detail}`);
    }

    console.log(`[comms] ${channel} accepted`);
  }

  private async post(payload: CommsCentrePayload): Promise<Response> {
    const response = await this.fetchImpl(this.options.apiUrl, {
      method: "POST",
      headers: {
        "x-integration-key": this.options.apiKey,
        "Content-Type": "application/json",
      },
      body: JSON.stringify(payload),
      signal: AbortSignal.timeout(this.options.timeoutMs ?? 60_000),
    });
    if (RETRY_STATUSES.has(response.status)) {
      throw new RetryableStatusError(response.status, await response.text());
    }
    return response;
  }
}
