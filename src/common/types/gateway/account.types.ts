import type { CookieMap } from "./cookie.types";

/**
 * Account as configured by the operator
 */
export interface AccountDefinition {
  readonly name: string;
  readonly provider: string;
  readonly apiUser?: string;
  readonly apiKey?: string;
  readonly cookies: CookieMap;
  readonly enabled: boolean;
}

/**
 * Kinds of account-scoped upstream failure
 */
export type AccountFailureKind = "auth_rejected" | "quota_exhausted" | "upstream_error";

/**
 * Failure kinds that take an account out of rotation on the first occurrence
 */
export const HARD_FAILURE_KINDS: ReadonlySet<AccountFailureKind> = new Set<AccountFailureKind>([
  "auth_rejected",
  "quota_exhausted",
]);

/**
 * Runtime health tracked by the pool, keyed by account name
 */
export interface AccountHealth {
  healthy: boolean;
  consecutiveFailures: number;
  lastFailureAt?: number;
  lastFailureKind?: AccountFailureKind;
  lastSuccessAt?: number;
}

export interface AccountStatus {
  name: string;
  provider: string;
  enabled: boolean;
  hasApiKey: boolean;
  healthy: boolean;
  eligible: boolean;
  consecutiveFailures: number;
  lastFailureAt?: number;
  lastFailureKind?: AccountFailureKind;
  cooldownRemainingMs: number;
}
