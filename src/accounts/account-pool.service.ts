import { Injectable } from "@nestjs/common";
import { BaseService } from "@/common/base/base.service";
import { PoolError } from "@/common/errors/gateway.errors";
import {
  HARD_FAILURE_KINDS,
  type AccountDefinition,
  type AccountFailureKind,
  type AccountHealth,
  type AccountStatus,
} from "@/common/types/gateway";
import type { AccountPoolSettings } from "@/config/gateway-settings.types";
import { AccountStoreService, type ReloadSummary } from "./account-store.service";

/**
 * Picks an account per upstream attempt and tracks runtime health.
 *
 * `enabled` always comes from the store at selection time. Health lives here:
 * an account turns unhealthy after `failureThreshold` consecutive failures or
 * one hard failure, and is re-admitted lazily once `cooldownMs` has passed.
 */
@Injectable()
export class AccountPoolService extends BaseService {
  private readonly health = new Map<string, AccountHealth>();
  private cursor = 0;

  constructor(
    private readonly store: AccountStoreService,
    private readonly settings: AccountPoolSettings,
    private readonly random: () => number = Math.random
  ) {
    super();
  }

  selectAccount(excluding: ReadonlySet<string> = new Set()): AccountDefinition {
    const now = Date.now();
    const accounts = this.store.list();
    const eligible: number[] = [];

    accounts.forEach((account, index) => {
      if (!excluding.has(account.name) && this.isEligible(account, now)) {
        eligible.push(index);
      }
    });

    if (eligible.length === 0) {
      throw new PoolError([...excluding]);
    }

    const index =
      this.settings.selectionPolicy === "round_robin"
        ? (eligible.find(candidate => candidate >= this.cursor) ?? eligible[0])
        : eligible[Math.min(eligible.length - 1, Math.floor(this.random() * eligible.length))];

    this.cursor = index + 1;
    return accounts[index];
  }

  reportSuccess(name: string): void {
    const health = this.healthFor(name);
    health.consecutiveFailures = 0;
    health.healthy = true;
    health.lastSuccessAt = Date.now();
  }

  reportFailure(name: string, kind: AccountFailureKind): void {
    const health = this.healthFor(name);
    health.consecutiveFailures++;
    health.lastFailureAt = Date.now();
    health.lastFailureKind = kind;

    if (!health.healthy) return;

    if (HARD_FAILURE_KINDS.has(kind) || health.consecutiveFailures >= this.settings.failureThreshold) {
      health.healthy = false;
      this.logWarning(
        `Account marked unhealthy after ${health.consecutiveFailures} consecutive failure(s) (last: ${kind}); ` +
          `cooling down for ${this.settings.cooldownMs}ms`,
        name
      );
    }
  }

  /**
   * Explicit reset of one account, or of all accounts when no name is given
   */
  resetHealth(name?: string): void {
    if (name === undefined) {
      this.health.clear();
    } else {
      this.health.delete(name);
    }
  }

  /**
   * Re-read account definitions. Health of accounts that survive the reload is kept.
   */
  reloadAccounts(): ReloadSummary {
    const summary = this.store.reload();
    for (const name of summary.removed) {
      this.health.delete(name);
    }
    return summary;
  }

  getAccountHealth(name: string): Readonly<AccountHealth> {
    return { ...this.healthFor(name) };
  }

  getHealthSnapshot(): AccountStatus[] {
    const now = Date.now();
    return this.store.list().map(account => {
      const health = this.health.get(account.name);
      const cooldownRemainingMs =
        health && !health.healthy && health.lastFailureAt !== undefined
          ? Math.max(0, health.lastFailureAt + this.settings.cooldownMs - now)
          : 0;

      return {
        name: account.name,
        provider: account.provider,
        enabled: account.enabled,
        hasApiKey: Boolean(account.apiKey),
        healthy: health?.healthy ?? true,
        eligible: account.enabled && Boolean(account.apiKey) && (health?.healthy ?? true),
        consecutiveFailures: health?.consecutiveFailures ?? 0,
        lastFailureAt: health?.lastFailureAt,
        lastFailureKind: health?.lastFailureKind,
        cooldownRemainingMs,
      };
    });
  }

  private isEligible(account: AccountDefinition, now: number): boolean {
    if (!account.enabled || !account.apiKey) return false;

    const health = this.health.get(account.name);
    if (!health || health.healthy) return true;

    if (health.lastFailureAt !== undefined && now - health.lastFailureAt > this.settings.cooldownMs) {
      health.healthy = true;
      health.consecutiveFailures = 0;
      this.logger.log(`Account ${account.name} re-admitted after cooldown`);
      return true;
    }
    return false;
  }

  private healthFor(name: string): AccountHealth {
    let health = this.health.get(name);
    if (!health) {
      health = { healthy: true, consecutiveFailures: 0 };
      this.health.set(name, health);
    }
    return health;
  }
}
