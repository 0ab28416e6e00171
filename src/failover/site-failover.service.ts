import { Inject, Injectable } from "@nestjs/common";
import { BaseEventService } from "@/common/base/base-event.service";
import { SiteExhaustedError } from "@/common/errors/gateway.errors";
import type { SiteDefinition } from "@/common/types/gateway";
import { ConfigService } from "@/config/config.service";
import type { FailoverSettings } from "@/config/gateway-settings.types";
import { ChallengeCacheService } from "@/challenge-cache/challenge-cache.service";
import { SITE_HEALTH_PROBE, type ProbeResult, type SiteHealthProbe } from "./site-health.probe";

export const FAILOVER_SETTINGS = "FAILOVER_SETTINGS";

export type FailoverMode = "ON_PRIMARY" | "ON_BACKUP";

/**
 * Immutable view of the failover state. A new object replaces the old one on every change.
 */
export interface FailoverSnapshot {
  readonly mode: FailoverMode;
  readonly activeSite: SiteDefinition;
  /** Index into the ordered backups while ON_BACKUP */
  readonly backupIndex: number | null;
  readonly lastSwitchTime?: number;
  readonly lastSwitchReason?: string;
  readonly lastPrimaryProbeTime?: number;
  readonly lastProbeResult?: ProbeResult;
  readonly consecutivePrimaryProbeSuccesses: number;
  readonly consecutivePrimaryProbeFailures: number;
  /** Backups that failed since the gateway last left the primary */
  readonly failedBackups: readonly string[];
  readonly switchCount: number;
  readonly probeCount: number;
  readonly recoveryCount: number;
}

export interface SiteSwitchEvent {
  from: string;
  to: string;
  reason: string;
  at: number;
}

export interface FailoverEvents extends Record<string, unknown[]> {
  siteSwitched: [SiteSwitchEvent];
  primaryProbed: [ProbeResult];
}

export interface FailoverStatus extends FailoverSnapshot {
  primarySite: string;
  backupSites: string[];
  siteFailureCounts: Record<string, number>;
}

/**
 * Primary/backup state machine.
 *
 * Site failures move forward through the backups in priority order and never
 * wrap. Only the primary recovery probe (after `recoveryThreshold` consecutive
 * successes) or an operator switch returns traffic to the primary.
 */
@Injectable()
export class SiteFailoverService extends BaseEventService<FailoverEvents> {
  private readonly primary: SiteDefinition;
  private readonly backups: readonly SiteDefinition[];
  private readonly siteFailureCounts = new Map<string, number>();
  private snapshot: FailoverSnapshot;

  constructor(
    config: ConfigService,
    private readonly cache: ChallengeCacheService,
    @Inject(SITE_HEALTH_PROBE) private readonly probe: SiteHealthProbe,
    @Inject(FAILOVER_SETTINGS) private readonly settings: FailoverSettings
  ) {
    super({ useEnhancedLogging: true });
    this.primary = config.getPrimarySite();
    this.backups = config.getBackupSites();
    const initial: FailoverSnapshot = {
      mode: "ON_PRIMARY",
      activeSite: this.primary,
      backupIndex: null,
      consecutivePrimaryProbeSuccesses: 0,
      consecutivePrimaryProbeFailures: 0,
      failedBackups: [],
      switchCount: 0,
      probeCount: 0,
      recoveryCount: 0,
    };
    this.snapshot = Object.freeze(initial);
  }

  active(): SiteDefinition {
    return this.snapshot.activeSite;
  }

  getSnapshot(): FailoverSnapshot {
    return this.snapshot;
  }

  isOnPrimary(): boolean {
    return this.snapshot.mode === "ON_PRIMARY";
  }

  /**
   * Count a site-level failure. Reports about a site that is no longer active
   * are ignored, so concurrent failures collapse into one transition.
   *
   * @returns the active site after the report
   * @throws SiteExhaustedError when no backup is left to move to
   */
  reportSiteFailure(site: SiteDefinition, reason: string): SiteDefinition {
    if (site.name !== this.snapshot.activeSite.name) {
      return this.snapshot.activeSite;
    }

    const failures = (this.siteFailureCounts.get(site.name) ?? 0) + 1;
    this.siteFailureCounts.set(site.name, failures);
    if (failures < this.settings.siteFailureThreshold) {
      this.logWarning(`Site failure ${failures}/${this.settings.siteFailureThreshold}: ${reason}`, site.name);
      return site;
    }

    return this.advance(reason);
  }

  reportSiteSuccess(site: SiteDefinition): void {
    if (this.siteFailureCounts.has(site.name)) {
      this.siteFailureCounts.delete(site.name);
    }
  }

  /**
   * Operator request to leave the current site regardless of failure counts
   */
  switchToNext(reason = "manual switch"): SiteDefinition {
    return this.advance(reason);
  }

  /**
   * Probe the primary once and count the result toward recovery.
   * Does nothing while traffic is already on the primary.
   */
  async probePrimary(): Promise<ProbeResult | undefined> {
    if (this.isOnPrimary()) {
      return undefined;
    }

    const result = await this.probe.check(this.primary, this.cache.peekCookies(this.primary));
    this.recordProbe(result);

    const snapshot = this.snapshot;
    if (
      snapshot.mode === "ON_BACKUP" &&
      result.healthy &&
      snapshot.consecutivePrimaryProbeSuccesses >= this.settings.recoveryThreshold
    ) {
      this.transitionToPrimary(`primary recovered after ${snapshot.consecutivePrimaryProbeSuccesses} healthy probes`);
    }
    return result;
  }

  /**
   * Switch back to the primary if a single probe finds it healthy
   *
   * @returns whether the primary is active afterwards
   */
  async switchToPrimary(): Promise<{ switched: boolean; probe?: ProbeResult }> {
    if (this.isOnPrimary()) {
      return { switched: false };
    }

    const result = await this.probe.check(this.primary, this.cache.peekCookies(this.primary));
    this.recordProbe(result);
    if (!result.healthy) {
      this.logWarning(`Primary still unhealthy (${result.outcome}), staying on ${this.snapshot.activeSite.name}`);
      return { switched: false, probe: result };
    }

    if (!this.isOnPrimary()) {
      this.transitionToPrimary("manual switch after healthy probe");
    }
    return { switched: true, probe: result };
  }

  forceSwitchToPrimary(reason = "forced by operator"): boolean {
    if (this.isOnPrimary()) {
      return false;
    }
    this.transitionToPrimary(reason);
    return true;
  }

  getStatus(): FailoverStatus {
    return {
      ...this.snapshot,
      primarySite: this.primary.name,
      backupSites: this.backups.map(site => site.name),
      siteFailureCounts: Object.fromEntries(this.siteFailureCounts),
    };
  }

  private advance(reason: string): SiteDefinition {
    const current = this.snapshot;
    const nextIndex = current.backupIndex === null ? 0 : current.backupIndex + 1;
    const next = this.backups[nextIndex];

    if (!next) {
      this.logCriticalOperation("site_failover", { from: current.activeSite.name, reason, exhausted: true }, false);
      throw new SiteExhaustedError(current.activeSite.name, reason);
    }

    const failedBackups =
      current.mode === "ON_BACKUP" ? [...current.failedBackups, current.activeSite.name] : current.failedBackups;

    this.commit(
      {
        ...current,
        mode: "ON_BACKUP",
        activeSite: next,
        backupIndex: nextIndex,
        failedBackups,
        consecutivePrimaryProbeSuccesses: 0,
        consecutivePrimaryProbeFailures: 0,
      },
      reason
    );
    return next;
  }

  private transitionToPrimary(reason: string): void {
    this.commit(
      {
        ...this.snapshot,
        mode: "ON_PRIMARY",
        activeSite: this.primary,
        backupIndex: null,
        failedBackups: [],
        consecutivePrimaryProbeSuccesses: 0,
        consecutivePrimaryProbeFailures: 0,
        recoveryCount: this.snapshot.recoveryCount + 1,
      },
      reason
    );
  }

  private commit(next: FailoverSnapshot, reason: string): void {
    const from = this.snapshot.activeSite.name;
    const at = Date.now();
    this.siteFailureCounts.delete(next.activeSite.name);
    this.snapshot = Object.freeze({
      ...next,
      lastSwitchTime: at,
      lastSwitchReason: reason,
      switchCount: this.snapshot.switchCount + 1,
    });

    this.logCriticalOperation("site_failover", { from, to: next.activeSite.name, reason });
    this.emitWithLogging("siteSwitched", { from, to: next.activeSite.name, reason, at });
  }

  private recordProbe(result: ProbeResult): void {
    const current = this.snapshot;
    this.snapshot = Object.freeze({
      ...current,
      lastPrimaryProbeTime: result.checkedAt,
      lastProbeResult: result,
      probeCount: current.probeCount + 1,
      consecutivePrimaryProbeSuccesses: result.healthy ? current.consecutivePrimaryProbeSuccesses + 1 : 0,
      consecutivePrimaryProbeFailures: result.healthy ? 0 : current.consecutivePrimaryProbeFailures + 1,
    });
    this.emitWithLogging("primaryProbed", result);
  }
}
