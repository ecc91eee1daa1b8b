/**
 * Operator console on stdin.
 *
 * Lines are read as they arrive and never wait for a running job: commands
 * are handed to the orchestrator, which queues them on the session lane.
 * While the portal waits for an operator confirmation (interactive login),
 * the next line answers that prompt instead of being parsed as a command.
 */

import { createInterface, type Interface } from "readline";
import { describeError } from "../errors.ts";
import type { OperatorPrompt } from "../portal/types.ts";
import type { JobKind, OrchestratorStatus } from "../scheduler/orchestrator.ts";
import { HELP_TEXT, formatStatus, parseCommand, type ConsoleCommand } from "./commands.ts";

export interface ConsoleHandlers {
  runNow(kind: JobKind): Promise<unknown>;
  triggerHeartbeat(): Promise<unknown>;
  login(): Promise<unknown>;
  status(): OrchestratorStatus;
  quit(): Promise<void>;
}

export interface OperatorConsoleOptions {
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
  timeZone: string;
}

export class OperatorConsole implements OperatorPrompt {
  private rl: Interface | null = null;
  private handlers: ConsoleHandlers | null = null;
  private confirmations: Array<() => void> = [];

  constructor(private readonly options: OperatorConsoleOptions) {}

  /** Begin reading lines. Before handlers are attached only confirmations are answered. */
  open(): void {
    if (this.rl) return;
    this.rl = createInterface({ input: this.options.input, terminal: false });
    this.rl.on("line", (line) => this.onLine(line));
  }

  attach(handlers: ConsoleHandlers): void {
    this.handlers = handlers;
    this.print('Console ready. Type "help" for commands.');
  }

  waitForConfirmation(message: string): Promise<void> {
    this.open();
    this.print(`\n>>> ${message}`);
    return new Promise<void>((resolve) => {
      this.confirmations.push(resolve);
    });
  }

  close(): void {
    this.rl?.close();
    this.rl = null;
  }

  print(text: string): void {
    this.options.output.write(text + "\n");
  }

  private onLine(line: string): void {
    const confirm = this.confirmations.shift();
    if (confirm) {
      confirm();
      return;
    }
    if (!this.handlers) return;
    this.dispatch(parseCommand(line), this.handlers).catch((error: unknown) => {
      this.print(`Command failed: ${describeError(error)}`);
    });
  }

  private async dispatch(command: ConsoleCommand, handlers: ConsoleHandlers): Promise<void> {
    switch (command.type) {
      case "run":
        this.print(`Queued ${command.kind} report.`);
        await handlers.runNow(command.kind);
        return;
      case "heartbeat":
        this.print("Queued heartbeat.");
        await handlers.triggerHeartbeat();
        return;
      case "login":
        this.print("Queued login.");
        await handlers.login();
        return;
      case "status":
        this.print(formatStatus(handlers.status(), this.options.timeZone));
        return;
      case "help":
        this.print(HELP_TEXT);
        return;
      case "quit":
        this.print("Shutting down...");
        await handlers.quit();
        return;
      case "unknown":
        this.print(`Unknown command "${command.input}". Type "help" for commands.`);
        return;
    }
  }
}
