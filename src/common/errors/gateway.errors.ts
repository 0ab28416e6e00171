/**
 * Domain errors raised inside the gateway. Each carries a machine-readable
 * `reason` and, where one exists, the error that caused it.
 */

export type SessionErrorReason = "challenge_timeout" | "extraction_failed" | "crashed";
export type CacheErrorReason = "solve_failed";
export type PoolErrorReason = "no_eligible_account";
export type GatewayErrorReason = "challenge_unavailable" | "no_account_available" | "all_accounts_exhausted";

export class SessionError extends Error {
  override readonly name = "SessionError";

  constructor(
    public readonly reason: SessionErrorReason,
    message: string,
    cause?: unknown
  ) {
    super(message, { cause });
  }
}

export class CacheError extends Error {
  override readonly name = "CacheError";
  readonly reason: CacheErrorReason = "solve_failed";

  constructor(
    public readonly site: string,
    cause: unknown
  ) {
    super(`Challenge solve failed for ${site}: ${describeError(cause)}`, { cause });
  }
}

export class PoolError extends Error {
  override readonly name = "PoolError";
  readonly reason: PoolErrorReason = "no_eligible_account";

  constructor(public readonly excluded: readonly string[]) {
    super(
      excluded.length > 0
        ? `No eligible account left (excluded: ${excluded.join(", ")})`
        : "No eligible account in the pool"
    );
  }
}

/**
 * Every backup was tried since the gateway left the primary site
 */
export class SiteExhaustedError extends Error {
  override readonly name = "SiteExhaustedError";

  constructor(
    public readonly lastSite: string,
    cause?: unknown
  ) {
    super(`All configured sites have failed (last: ${lastSite})`, { cause });
  }
}

export class GatewayError extends Error {
  override readonly name = "GatewayError";

  constructor(
    public readonly reason: GatewayErrorReason,
    message: string,
    cause?: unknown
  ) {
    super(message, { cause });
  }

  /**
   * Message of the last underlying cause, for diagnostics in the error payload
   */
  get causeMessage(): string | undefined {
    return this.cause === undefined ? undefined : describeError(this.cause);
  }
}

/**
 * A single upstream attempt that did not produce a pass-through response
 */
export class UpstreamAttemptError extends Error {
  override readonly name = "UpstreamAttemptError";

  constructor(
    public readonly site: string,
    public readonly account: string,
    public readonly scope: "account" | "site",
    public readonly failure: string,
    detail: string,
    cause?: unknown
  ) {
    super(`[${site}] ${scope}-level failure for account ${account} (${failure}): ${detail}`, { cause });
  }
}

export class ConfigurationError extends Error {
  override readonly name = "ConfigurationError";

  constructor(
    message: string,
    public readonly violations: readonly string[] = []
  ) {
    super(violations.length > 0 ? `${message}:\n  - ${violations.join("\n  - ")}` : message);
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === "string") return error;
  return String(error);
}

export function asError(error: unknown): Error {
  return error instanceof Error ? error : new Error(describeError(error));
}
