/**
 * Chat sink over the Telegram Bot API (grammy).
 *
 * Text longer than Telegram's 4096 character limit is split into several
 * messages; attachments follow as documents.
 */

import { Api, InputFile } from "grammy";
import { DeliveryError, describeError } from "../errors.ts";
import type { Attachment, Channel, NotificationSink, OutboundMessage } from "./types.ts";

const TELEGRAM_MAX_LENGTH = 4096;

/** The slice of grammy's Api this sink calls. */
export interface TelegramApi {
  sendMessage(chatId: string, text: string): Promise<unknown>;
  sendDocument(chatId: string, document: InputFile): Promise<unknown>;
}

/**
 * Split a message into chunks that respect Telegram's 4096 character limit.
 * Tries to split on paragraph boundaries (double newline) first,
 * then line boundaries, then at the character limit as a last resort.
 */
export function chunkMessage(message: string, maxLength: number = TELEGRAM_MAX_LENGTH): string[] {
  if (message.length <= maxLength) {
    return [message];
  }

  const chunks: string[] = [];
  let pos = 0;

  while (pos < message.length) {
    const remaining = message.substring(pos);

    if (remaining.length <= maxLength) {
      chunks.push(remaining);
      break;
    }

    const window = remaining.substring(0, maxLength);

    const lastParaBreak = window.lastIndexOf("\n\n");
    if (lastParaBreak > 0) {
      chunks.push(remaining.substring(0, lastParaBreak + 2));
      pos += lastParaBreak + 2;
      continue;
    }

    const lastLineBreak = window.lastIndexOf("\n");
    if (lastLineBreak > 0) {
      chunks.push(remaining.substring(0, lastLineBreak + 1));
      pos += lastLineBreak + 1;
      continue;
    }

    chunks.push(window);
    pos += maxLength;
  }

  return chunks.filter((c) => c.length > 0);
}

export class TelegramSink implements NotificationSink {
  readonly name = "telegram";

  constructor(
    private readonly api: TelegramApi,
    private readonly chatId: string
  ) {}

  static fromToken(botToken: string, chatId: string): TelegramSink {
    return new TelegramSink(new Api(botToken), chatId);
  }

  async send(channel: Channel, message: OutboundMessage, attachments: Attachment[] = []): Promise<void> {
    if (channel !== "chat") {
      throw new DeliveryError(`Telegram sink cannot deliver on the ${channel} channel`);
    }

    const text = message.subject ? `${message.subject}\n\n${message.text}` : message.text;
    const chunks = chunkMessage(text);

    try {
      for (const chunk of chunks) {
        await this.api.sendMessage(this.chatId, chunk);
      }
      for (const attachment of attachments) {
        await this.api.sendDocument(this.chatId, new InputFile(attachment.data, attachment.fileName));
      }
    } catch (error) {
      throw new DeliveryError(`Telegram delivery to chat ${this.chatId} failed: ${describeError(error)}`, {
        cause: error,
      });
    }

    const chunkInfo = chunks.length > 1 ? ` [${chunks.length} chunks]` : "";
    console.log(`[telegram] Sent to chat ${this.chatId}${chunkInfo}`);
  }
}
