import type { ProxySettings } from "@/common/types/gateway";

export interface SessionSettings {
  restartIntervalMs: number;
  solveTimeoutMs: number;
  /** Time given to the challenge script after the page has loaded */
  settleMs: number;
  proxy?: ProxySettings;
  executablePath?: string;
  headless: boolean;
}

export interface ChallengeCacheSettings {
  ttlMs: number;
  preRefreshMs: number;
  solveRetries: number;
}

export interface FailoverSettings {
  siteFailureThreshold: number;
  recoveryThreshold: number;
}

export interface HealthProbeSettings {
  timeoutMs: number;
  path: string;
  userAgent: string;
  proxy?: ProxySettings;
}

export type AccountSelectionPolicy = "random" | "round_robin";

export interface AccountPoolSettings {
  failureThreshold: number;
  cooldownMs: number;
  selectionPolicy: AccountSelectionPolicy;
}

export interface UpstreamSettings {
  timeoutMs: number;
  streamTimeoutMs: number;
  userAgent: string;
  proxy?: ProxySettings;
}

export interface ClassifierSettings {
  blockSignatures: readonly string[];
  capacitySignatures: readonly string[];
}

export interface RouterSettings {
  maxAccountRetries: number;
}

export interface SchedulerSettings {
  challengeRetryIntervalMs: number;
  /** Shortest delay between two challenge keeper runs */
  challengeMinIntervalMs: number;
  sessionRestartCheckIntervalMs: number;
  primaryCheckEnabled: boolean;
  primaryCheckIntervalMs: number;
  checkinEnabled: boolean;
  checkinCron: string;
  checkinTimezone?: string;
}

export interface CheckinSettings {
  path: string;
  timeoutMs: number;
  /** Pause between two accounts within one run */
  accountDelayMs: number;
  userAgent: string;
  proxy?: ProxySettings;
}

export interface ApiKeyValidationSettings {
  enabled: boolean;
  url?: string;
  ttlMs: number;
  timeoutMs: number;
  maxEntries: number;
}

export interface GatewaySettings {
  apiPrefix: string;
  session: SessionSettings;
  cache: ChallengeCacheSettings;
  failover: FailoverSettings;
  probe: HealthProbeSettings;
  pool: AccountPoolSettings;
  upstream: UpstreamSettings;
  classifier: ClassifierSettings;
  router: RouterSettings;
  scheduler: SchedulerSettings;
  checkin: CheckinSettings;
  apiKeyValidation: ApiKeyValidationSettings;
}
