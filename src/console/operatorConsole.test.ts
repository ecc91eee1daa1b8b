import { describe, test, expect, beforeEach, afterEach, vi } from "vitest";
import { PassThrough } from "stream";
import { OperatorConsole, type ConsoleHandlers } from "./operatorConsole.ts";
import type { OrchestratorStatus } from "../scheduler/orchestrator.ts";

const STATUS: OrchestratorStatus = {
  jobs: [],
  session: { alive: true, lastCheckedAt: null, savedAt: null, awaitingInteractiveLogin: false, hasCredentials: true },
  lane: { timestamp: "2026-10-19T03:00:00.000Z", depth: 0, processing: false, current: null, consecutiveFailures: 0 },
  coalesced: 0,
  heartbeatQueued: false,
};

let input: PassThrough;
let output: PassThrough;
let printed: string;
let operatorConsole: OperatorConsole;
let handlers: ConsoleHandlers;

beforeEach(() => {
  input = new PassThrough();
  output = new PassThrough();
  printed = "";
  output.on("data", (chunk: Buffer) => {
    printed += chunk.toString("utf-8");
  });
  operatorConsole = new OperatorConsole({ input, output, timeZone: "UTC" });
  handlers = {
    runNow: vi.fn(async () => null),
    triggerHeartbeat: vi.fn(async () => "alive"),
    login: vi.fn(async () => true),
    status: vi.fn(() => STATUS),
    quit: vi.fn(async () => undefined),
  };
});

afterEach(() => {
  operatorConsole.close();
});

describe("OperatorConsole", () => {
  test("routes commands to the handlers", async () => {
    operatorConsole.open();
    operatorConsole.attach(handlers);

    input.write("run weekly now\n");
    input.write("\n");
    input.write("heartbeat\n");
    input.write("login\n");
    input.write("quit\n");

    await vi.waitFor(() => expect(handlers.quit).toHaveBeenCalledTimes(1));
    expect(handlers.runNow).toHaveBeenNthCalledWith(1, "weekly");
    expect(handlers.runNow).toHaveBeenNthCalledWith(2, "daily");
    expect(handlers.triggerHeartbeat).toHaveBeenCalledTimes(1);
    expect(handlers.login).toHaveBeenCalledTimes(1);
  });

  test("status and unknown commands print", async () => {
    operatorConsole.open();
    operatorConsole.attach(handlers);

    input.write("status\n");
    input.write("frobnicate\n");

    await vi.waitFor(() => expect(printed).toContain('Unknown command "frobnicate"'));
    expect(printed).toContain("Session: alive; last checked never; credentials configured");
  });

  test("a pending confirmation takes the next line instead of a command", async () => {
    operatorConsole.open();
    operatorConsole.attach(handlers);

    const confirmed = operatorConsole.waitForConfirmation("Log in, then press ENTER.");
    input.write("daily\n");
    await confirmed;

    expect(printed).toContain(">>> Log in, then press ENTER.");
    expect(handlers.runNow).not.toHaveBeenCalled();

    input.write("daily\n");
    await vi.waitFor(() => expect(handlers.runNow).toHaveBeenCalledWith("daily"));
  });

  test("confirmations work before handlers are attached", async () => {
    const confirmed = operatorConsole.waitForConfirmation("Press ENTER.");
    input.write("\n");
    await expect(confirmed).resolves.toBeUndefined();
  });

  test("a failing handler is reported, not thrown", async () => {
    handlers.runNow = vi.fn(async () => {
      throw new Error("lane closed");
    });
    operatorConsole.open();
    operatorConsole.attach(handlers);

    input.write("daily\n");
    await vi.waitFor(() => expect(printed).toContain("Command failed: lane closed"));
  });
});
