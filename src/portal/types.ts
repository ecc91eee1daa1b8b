import type { DateRange, ReportFormat, ReportSection } from "../reports/types.ts";
import type { StorageState } from "../session/sessionState.ts";

export type LoginMode = "credentials" | "interactive";

/**
 * The authenticated portal capability. Every call is unreliable I/O: it may
 * throw TransientFetchError (navigation/timeouts) or AuthError (signed out).
 * Implementations are not safe for concurrent use; callers serialize through
 * the session lane.
 */
export interface PortalSession {
  /** Replace the browser context wholesale, seeded with state when given. */
  open(state: StorageState | null): Promise<void>;
  login(mode: LoginMode): Promise<void>;
  /** Cheap authenticated page load; true when still signed in. */
  isAlive(): Promise<boolean>;
  navigateAndDownload(section: ReportSection, format: ReportFormat, range: DateRange): Promise<Buffer>;
  exportState(): Promise<StorageState>;
  /** Best-effort screenshot of the current page for diagnosis. */
  screenshot(path: string): Promise<void>;
  /** Report every top-level URL the operator visits; returns an unsubscribe. */
  recordNavigation(listener: (url: string) => void): Promise<() => void>;
  close(): Promise<void>;
}

/** Lets the portal wait for the operator (interactive login). */
export interface OperatorPrompt {
  waitForConfirmation(message: string): Promise<void>;
}
