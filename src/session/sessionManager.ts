/**
 * Session Manager: owns the one authenticated portal session.
 *
 * The persisted state on disk and the live browser context are replaced
 * together: on login both are rewritten, on expiry both are dropped. Callers
 * (the orchestrator) run every method on the session lane; nothing here is
 * safe to call concurrently.
 */

import { AuthError, describeError } from "../errors.ts";
import type { LoginMode, PortalSession } from "../portal/types.ts";
import { trace } from "../utils/tracer.ts";
import {
  discardSessionState,
  readSessionState,
  writeSessionState,
  type PersistedSessionState,
  type RestoreResult,
} from "./sessionState.ts";

export type HeartbeatResult = "alive" | "expired";

export interface SessionSnapshot {
  alive: boolean;
  lastCheckedAt: Date | null;
  savedAt: string | null;
  awaitingInteractiveLogin: boolean;
  hasCredentials: boolean;
}

export interface SessionManagerOptions {
  portal: PortalSession;
  sessionFile: string;
  hasCredentials: boolean;
  /** Operator alert; must not throw */
  escalate: (reason: string) => Promise<void>;
  now?: () => Date;
}

export class SessionManager {
  private state: PersistedSessionState | null = null;
  private alive = false;
  private lastCheckedAt: Date | null = null;
  private awaitingInteractiveLogin = false;
  // Set once an expiry has been reported; cleared by the next successful login
  private expiryEscalated = false;

  constructor(private readonly options: SessionManagerOptions) {}

  private now(): Date {
    return this.options.now?.() ?? new Date();
  }

  /** Load the persisted session and seed the browser context with it. */
  async restore(): Promise<RestoreResult> {
    const result = await readSessionState(this.options.sessionFile);

    switch (result.status) {
      case "valid":
        await this.options.portal.open(result.state.storageState);
        this.state = result.state;
        console.log(`[session] Restored session saved at ${result.state.savedAt}`);
        break;
      case "missing":
        console.log("[session] No saved session");
        break;
      case "corrupt":
        console.warn(`[session] Ignoring corrupt session file: ${result.reason}`);
        break;
    }

    trace({ event: "session_restore", status: result.status });
    return result;
  }

  /**
   * Startup: restore the saved session, or log in when there is none. A
   * failed login raises the one expiry alert, so the first heartbeat or job
   * does not repeat it.
   */
  async establish(): Promise<RestoreResult> {
    const restored = await this.restore();
    if (restored.status === "valid") return restored;

    try {
      await this.login();
    } catch (error) {
      console.error(`[session] Initial login failed: ${describeError(error)}`);
      if (!this.options.hasCredentials) this.awaitingInteractiveLogin = true;
      await this.escalateOnce(
        `Initial portal login failed: ${describeError(error)}. Reports are paused until a login succeeds (type \`login\` on the relay console).`
      );
    }
    return restored;
  }

  /**
   * Establish a new session and persist it. Defaults to credential login
   * when credentials are configured.
   */
  async login(mode: LoginMode = this.options.hasCredentials ? "credentials" : "interactive"): Promise<void> {
    console.log(`[session] Logging in (${mode})...`);
    try {
      await this.options.portal.login(mode);
    } catch (error) {
      this.alive = false;
      trace({ event: "session_login", mode, ok: false, error: describeError(error) });
      if (error instanceof AuthError) throw error;
      throw new AuthError(`Login failed: ${describeError(error)}`, { cause: error });
    }

    const storage = await this.options.portal.exportState();
    this.state = await writeSessionState(this.options.sessionFile, storage, this.now());
    this.alive = true;
    this.lastCheckedAt = this.now();
    this.awaitingInteractiveLogin = false;
    this.expiryEscalated = false;

    console.log(`[session] Logged in; session saved to ${this.options.sessionFile}`);
    trace({ event: "session_login", mode, ok: true });
  }

  /**
   * Load the dashboard and check where it lands. Network failures propagate
   * as TransientFetchError and leave the session untouched.
   */
  async heartbeat(): Promise<HeartbeatResult> {
    if (!this.state) {
      await this.handleExpired("no active session");
      return "expired";
    }

    const alive = await this.options.portal.isAlive();
    this.lastCheckedAt = this.now();
    trace({ event: "session_heartbeat", alive });

    if (alive) {
      this.alive = true;
      console.log("[session] Heartbeat: alive");
      return "alive";
    }

    console.warn("[session] Heartbeat: session expired");
    await this.handleExpired("heartbeat found the session expired");
    return "expired";
  }

  /**
   * Called by jobs before they touch the portal. Fails fast while an
   * interactive login is pending; the operator hears about that once, from
   * here, not from every job that runs into it.
   */
  async ensureReady(): Promise<void> {
    if (this.awaitingInteractiveLogin) {
      throw new AuthError("Portal session expired; waiting for an interactive login (type `login` on the console)");
    }
    if (this.state) return;
    if (this.options.hasCredentials) {
      await this.login("credentials");
      return;
    }
    this.awaitingInteractiveLogin = true;
    await this.escalateOnce(
      "No portal session and no credentials configured. Reports are paused until someone logs in: type `login` on the relay console."
    );
    throw new AuthError("No portal session; an interactive login is required (type `login` on the console)");
  }

  /**
   * Drop the session after a job hit an AuthError. The job's own failure
   * escalation covers the alert, so none is sent here.
   */
  async invalidate(reason: string): Promise<void> {
    console.warn(`[session] Invalidating session: ${reason}`);
    await this.dropSession();
    if (!this.options.hasCredentials) {
      this.awaitingInteractiveLogin = true;
      this.expiryEscalated = true;
    }
  }

  snapshot(): SessionSnapshot {
    return {
      alive: this.alive,
      lastCheckedAt: this.lastCheckedAt,
      savedAt: this.state?.savedAt ?? null,
      awaitingInteractiveLogin: this.awaitingInteractiveLogin,
      hasCredentials: this.options.hasCredentials,
    };
  }

  // ──────────────────────────────────────────────
  // internals
  // ──────────────────────────────────────────────

  private async dropSession(): Promise<void> {
    this.alive = false;
    this.state = null;
    await discardSessionState(this.options.sessionFile);
  }

  private async handleExpired(reason: string): Promise<void> {
    await this.dropSession();

    if (this.options.hasCredentials) {
      try {
        await this.login("credentials");
        console.log("[session] Re-login after expiry succeeded");
        return;
      } catch (error) {
        await this.escalateOnce(`Portal session expired (${reason}) and automatic re-login failed: ${describeError(error)}`);
        return;
      }
    }

    this.awaitingInteractiveLogin = true;
    await this.escalateOnce(
      `Portal session expired (${reason}). Reports are paused until someone logs in: type \`login\` on the relay console.`
    );
  }

  private async escalateOnce(reason: string): Promise<void> {
    if (this.expiryEscalated) {
      console.log("[session] Expiry already escalated; not repeating");
      return;
    }
    this.expiryEscalated = true;
    await this.options.escalate(reason);
  }
}
