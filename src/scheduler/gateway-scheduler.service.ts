import { Inject, Injectable } from "@nestjs/common";
import { Cron } from "croner";
import { StandardService } from "@/common/base/composed.service";
import { ConfigurationError, describeError } from "@/common/errors/gateway.errors";
import type { SchedulerSettings } from "@/config/gateway-settings.types";
import { ChallengeCacheService } from "@/challenge-cache/challenge-cache.service";
import { CheckinService } from "@/checkin/checkin.service";
import { SiteFailoverService, type SiteSwitchEvent } from "@/failover/site-failover.service";
import { ChallengeSessionService } from "@/session/challenge-session.service";

export const SCHEDULER_SETTINGS = "SCHEDULER_SETTINGS";

export type ScheduledTaskName = "challengeKeeper" | "sessionRestart" | "primaryProbe" | "checkin";

export interface ScheduledTaskStatus {
  running: boolean;
  runs: number;
  failures: number;
  lastRunAt?: number;
  lastSuccessAt?: number;
  lastError?: string;
}

export interface SchedulerStatus {
  active: boolean;
  tasks: Record<ScheduledTaskName, ScheduledTaskStatus>;
  challengeKeeperNextRunAt?: number;
  checkin: {
    enabled: boolean;
    cron: string;
    nextRunAt?: string;
  };
}

/**
 * Background tasks of the gateway. Each task talks to the other components
 * through their public methods only and never overlaps with itself.
 *
 * Shutdown is cooperative: once destroy starts no task is started, timers
 * and the cron job are stopped, and running tasks are awaited.
 */
@Injectable()
export class GatewaySchedulerService extends StandardService {
  private readonly tasks: Record<ScheduledTaskName, ScheduledTaskStatus> = {
    challengeKeeper: { running: false, runs: 0, failures: 0 },
    sessionRestart: { running: false, runs: 0, failures: 0 },
    primaryProbe: { running: false, runs: 0, failures: 0 },
    checkin: { running: false, runs: 0, failures: 0 },
  };
  private challengeTimer?: NodeJS.Timeout;
  private challengeNextRunAt?: number;
  private checkinJob?: Cron;

  constructor(
    private readonly failover: SiteFailoverService,
    private readonly cache: ChallengeCacheService,
    private readonly session: ChallengeSessionService,
    private readonly checkin: CheckinService,
    @Inject(SCHEDULER_SETTINGS) private readonly settings: SchedulerSettings
  ) {
    super();
  }

  override async initialize(): Promise<void> {
    this.failover.on("siteSwitched", this.onSiteSwitched);

    // Warm-up: solve the active site's challenge before the first request needs it
    this.scheduleChallengeKeeper(0);

    this.createInterval(
      () => void this.runTask("sessionRestart", () => this.checkSessionRestart()),
      this.settings.sessionRestartCheckIntervalMs
    );

    if (this.settings.primaryCheckEnabled) {
      this.createInterval(
        () => void this.runTask("primaryProbe", () => this.probePrimary()),
        this.settings.primaryCheckIntervalMs
      );
    }

    if (this.settings.checkinEnabled) {
      try {
        this.checkinJob = new Cron(
          this.settings.checkinCron,
          { timezone: this.settings.checkinTimezone, protect: true },
          () => void this.runTask("checkin", () => this.runCheckin())
        );
      } catch (error) {
        throw new ConfigurationError(`Invalid CHECKIN_CRON "${this.settings.checkinCron}": ${describeError(error)}`);
      }
      this.logger.log(`Check-in scheduled (${this.settings.checkinCron}), next run ${this.checkinJob.nextRun()?.toISOString() ?? "never"}`);
    }
  }

  override async cleanup(): Promise<void> {
    this.checkinJob?.stop();
    this.checkinJob = undefined;
    this.failover.off("siteSwitched", this.onSiteSwitched);
  }

  getStatus(): SchedulerStatus {
    return {
      active: this.isServiceInitialized() && !this.isServiceDestroyed(),
      tasks: {
        challengeKeeper: { ...this.tasks.challengeKeeper },
        sessionRestart: { ...this.tasks.sessionRestart },
        primaryProbe: { ...this.tasks.primaryProbe },
        checkin: { ...this.tasks.checkin },
      },
      challengeKeeperNextRunAt: this.challengeNextRunAt,
      checkin: {
        enabled: this.settings.checkinEnabled,
        cron: this.settings.checkinCron,
        nextRunAt: this.checkinJob?.nextRun()?.toISOString(),
      },
    };
  }

  private readonly onSiteSwitched = (event: SiteSwitchEvent): void => {
    this.logger.log(`Active site changed ${event.from} -> ${event.to}, rescheduling challenge keeper`);
    this.scheduleChallengeKeeper(0);
  };

  private scheduleChallengeKeeper(delayMs: number): void {
    if (this.isServiceDestroyed()) return;

    if (this.challengeTimer) {
      this.clearTimer(this.challengeTimer);
    }
    this.challengeNextRunAt = Date.now() + delayMs;
    this.challengeTimer = this.createTimeout(() => {
      this.challengeTimer = undefined;
      void this.runTask("challengeKeeper", () => this.keepChallengeFresh());
    }, delayMs);
  }

  /**
   * Start `task` unless it is already running or the service is shutting down.
   * Failures are recorded and logged; they never escape to the timer.
   */
  private runTask(name: ScheduledTaskName, task: () => Promise<void>): Promise<void> {
    const status = this.tasks[name];
    if (this.isServiceDestroyed() || status.running) {
      return Promise.resolve();
    }

    status.running = true;
    status.runs++;
    status.lastRunAt = Date.now();

    const run = task().then(
      () => {
        status.lastSuccessAt = Date.now();
        status.lastError = undefined;
      },
      (error: unknown) => {
        status.failures++;
        status.lastError = describeError(error);
        this.logWarning(`Scheduled task ${name} failed: ${status.lastError}`);
      }
    );

    return this.trackTask(
      run.finally(() => {
        status.running = false;
      })
    );
  }

  private async keepChallengeFresh(): Promise<void> {
    const site = this.failover.active();
    if (!site.requiresChallengeSolution) {
      this.logDebug(`${site.name} needs no challenge solution, keeper idle until the next site switch`);
      this.challengeNextRunAt = undefined;
      return;
    }

    let delayMs = this.settings.challengeRetryIntervalMs;
    try {
      await this.cache.getCookies(site);
      const entry = this.cache.getEntry(site);
      const untilRefresh = entry ? entry.refreshDeadline - Date.now() : 0;
      delayMs = Math.max(this.settings.challengeMinIntervalMs, untilRefresh);
    } finally {
      // A switch during the run means the new site has not been looked at yet
      this.scheduleChallengeKeeper(this.failover.active().name === site.name ? delayMs : 0);
    }
  }

  private async checkSessionRestart(): Promise<void> {
    if (this.session.shouldRestart()) {
      this.logger.log("Automation session reached its maximum age, restarting");
      await this.session.restart();
    }
  }

  private async probePrimary(): Promise<void> {
    if (this.failover.isOnPrimary()) return;
    await this.failover.probePrimary();
  }

  private async runCheckin(): Promise<void> {
    const result = await this.checkin.runForAllAccounts();
    this.logger.log(result.message);
  }
}
