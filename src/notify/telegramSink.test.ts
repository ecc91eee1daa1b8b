import { describe, test, expect, beforeEach, vi } from "vitest";
import { InputFile } from "grammy";
import { TelegramSink, chunkMessage, type TelegramApi } from "./telegramSink.ts";
import { DeliveryError } from "../errors.ts";

// ============================================================
// Fake Bot API
// ============================================================

let sent: { chatId: string; text?: string; document?: InputFile }[];
let api: TelegramApi;

beforeEach(() => {
  sent = [];
  api = {
    sendMessage: vi.fn(async (chatId: string, text: string) => {
      sent.push({ chatId, text });
      return { message_id: sent.length };
    }),
    sendDocument: vi.fn(async (chatId: string, document: InputFile) => {
      sent.push({ chatId, document });
      return { message_id: sent.length };
    }),
  };
  vi.spyOn(console, "log").mockImplementation(() => undefined);
});

describe("TelegramSink", () => {
  test("sends subject and text as one message", async () => {
    await new TelegramSink(api, "-100123").send("chat", { to: [], subject: "Alert", text: "Body" });
    expect(sent).toEqual([{ chatId: "-100123", text: "Alert\n\nBody" }]);
  });

  test("long messages are chunked", async () => {
    const para1 = "A".repeat(2000) + "\n\n";
    const para2 = "B".repeat(2500);
    await new TelegramSink(api, "42").send("chat", { to: [], text: para1 + para2 });

    expect(sent.map((s) => s.text)).toEqual([para1, para2]);
  });

  test("attachments follow as documents", async () => {
    await new TelegramSink(api, "42").send("chat", { to: [], text: "report" }, [
      { fileName: "arrivals_20261020.pdf", contentType: "application/pdf", data: Buffer.from("pdf") },
    ]);

    expect(sent).toHaveLength(2);
    expect(sent[1]?.document).toBeInstanceOf(InputFile);
    expect(sent[1]?.document?.filename).toBe("arrivals_20261020.pdf");
  });

  test("refuses other channels", async () => {
    await expect(new TelegramSink(api, "42").send("email", { to: [], text: "x" })).rejects.toBeInstanceOf(DeliveryError);
    expect(sent).toEqual([]);
  });

  test("API failures become DeliveryError", async () => {
    api.sendMessage = () => Promise.reject(new Error("Forbidden: bot was blocked by the user"));
    await expect(new TelegramSink(api, "42").send("chat", { to: [], text: "x" })).rejects.toThrow(
      "Telegram delivery to chat 42 failed: Forbidden: bot was blocked by the user"
    );
  });
});

// ============================================================
// chunkMessage
// ============================================================

describe("chunkMessage", () => {
  test("returns single chunk when message is under limit", () => {
    const msg = "x".repeat(1000);
    expect(chunkMessage(msg)).toEqual([msg]);
  });

  test("returns single chunk when message is exactly at limit", () => {
    const msg = "x".repeat(4096);
    expect(chunkMessage(msg, 4096)).toEqual([msg]);
  });

  test("splits on paragraph boundary (\\n\\n) when over limit", () => {
    const para1 = "A".repeat(2000) + "\n\n";
    const para2 = "B".repeat(2500);
    expect(chunkMessage(para1 + para2)).toEqual([para1, para2]);
  });

  test("splits on line boundary (\\n) when no paragraph break available", () => {
    const line1 = "X".repeat(2100) + "\n";
    const line2 = "Y".repeat(2100);
    expect(chunkMessage(line1 + line2)).toEqual([line1, line2]);
  });

  test("hard-splits at limit when no natural boundary exists", () => {
    const chunks = chunkMessage("Z".repeat(5000), 4096);
    expect(chunks).toEqual(["Z".repeat(4096), "Z".repeat(904)]);
  });

  test("preserves full message content across all chunks", () => {
    const paras = Array(5).fill("P".repeat(900) + "\n\n").join("");
    const chunks = chunkMessage(paras);
    for (const c of chunks) {
      expect(c.length).toBeLessThanOrEqual(4096);
    }
    expect(chunks.join("")).toBe(paras);
  });

  test("respects custom maxLength parameter", () => {
    const chunks = chunkMessage("x".repeat(300), 100);
    expect(chunks).toHaveLength(3);
  });
});
