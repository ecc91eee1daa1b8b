/**
 * FIFO lane for sequential work against the portal session.
 *
 * The browser session is not safe for concurrent use, so every operation that
 * touches it (report jobs, heartbeats, logins) is submitted here and runs one
 * at a time in submission order. Callers get a promise for their own task's
 * result; a failing task never stops the lane.
 */

import type { LaneTask, LaneStats } from "./types.ts";

export class SessionLane {
  private queue: LaneTask[] = [];
  private processing = false;
  private current: string | null = null;
  private consecutiveFailures = 0;

  /**
   * Queue a task and resolve/reject with its outcome once it has run.
   */
  run<T>(label: string, task: () => Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      this.queue.push({
        label,
        run: async () => {
          try {
            resolve(await task());
          } catch (error) {
            reject(error);
            throw error;
          }
        },
      });
      console.log(`[lane] +${label} (depth: ${this.queue.length})`);
      if (!this.processing) {
        void this.processQueue();
      }
    });
  }

  private async processQueue(): Promise<void> {
    this.processing = true;
    let task: LaneTask | undefined;
    while ((task = this.queue.shift()) !== undefined) {
      const start = Date.now();
      this.current = task.label;
      try {
        console.log(`[lane] processing: ${task.label} (remaining: ${this.queue.length})`);
        await task.run();
        this.consecutiveFailures = 0;
      } catch {
        // The submitter already received the rejection; the lane only counts it.
        this.consecutiveFailures++;
      } finally {
        console.log(`[lane] done: ${task.label} (${Date.now() - start}ms)`);
        this.current = null;
      }
    }
    this.processing = false;
  }

  getStats(): LaneStats {
    return {
      timestamp: new Date().toISOString(),
      depth: this.queue.length,
      processing: this.processing,
      current: this.current,
      consecutiveFailures: this.consecutiveFailures,
    };
  }

  /**
   * Wait for queued and running work to finish, up to timeoutMs.
   * Returns true when the lane drained in time.
   */
  async drain(timeoutMs: number = 30000): Promise<boolean> {
    const start = Date.now();
    while (this.queue.length > 0 || this.processing) {
      if (Date.now() - start >= timeoutMs) {
        console.warn(
          `[lane] Drain timeout after ${timeoutMs}ms (depth: ${this.queue.length}, running: ${this.current ?? "none"})`
        );
        return false;
      }
      await new Promise((resolve) => setTimeout(resolve, 50));
    }
    return true;
  }
}
