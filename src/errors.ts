/**
 * Error taxonomy for the report relay.
 *
 * Job-level errors (Auth, TransientFetch, Format, Delivery) are caught at the
 * job boundary by the orchestrator. ConfigError is only thrown at startup and
 * terminates the process.
 */

export type RelayErrorCode =
  | "AUTH"
  | "TRANSIENT_FETCH"
  | "FORMAT"
  | "DELIVERY"
  | "CONFIG";

export abstract class RelayError extends Error {
  abstract readonly code: RelayErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Login failed or the portal session is no longer valid. Never retried by the fetcher. */
export class AuthError extends RelayError {
  readonly code = "AUTH";
}

/** Network / navigation hiccup or step timeout. Retried with backoff by the fetcher. */
export class TransientFetchError extends RelayError {
  readonly code = "TRANSIENT_FETCH";
}

/** The downloaded report does not match the expected export layout. */
export class FormatError extends RelayError {
  readonly code = "FORMAT";
}

export class DeliveryError extends RelayError {
  readonly code = "DELIVERY";
  /** True when the dispatcher already sent the escalation for this failure. */
  readonly escalated: boolean;

  constructor(
    message: string,
    options?: { cause?: unknown; escalated?: boolean }
  ) {
    super(message, options);
    this.escalated = options?.escalated ?? false;
  }
}

export class ConfigError extends RelayError {
  readonly code = "CONFIG";

  constructor(readonly issues: string[]) {
    super(`Invalid configuration:\n  - ${issues.join("\n  - ")}`);
  }
}

/** One-line description of any thrown value, for logs and escalation messages. */
export function describeError(error: unknown): string {
  if (error instanceof RelayError) return `${error.name}: ${error.message}`;
  if (error instanceof Error) return error.message || error.name;
  return String(error);
}
