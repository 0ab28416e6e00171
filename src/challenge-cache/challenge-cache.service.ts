import { Inject, Injectable } from "@nestjs/common";
import { StandardService } from "@/common/base/composed.service";
import { CacheError, SessionError, describeError } from "@/common/errors/gateway.errors";
import type { ChallengeCacheEntry, ChallengeEntryState, CookieMap, SiteDefinition } from "@/common/types/gateway";
import type { ChallengeCacheSettings } from "@/config/gateway-settings.types";
import { ChallengeSessionService } from "@/session/challenge-session.service";

export const CHALLENGE_CACHE_SETTINGS = "CHALLENGE_CACHE_SETTINGS";

const NO_COOKIES: CookieMap = Object.freeze({});

export interface SiteCacheStats {
  hits: number;
  misses: number;
  refreshes: number;
  successfulRefreshes: number;
  failedRefreshes: number;
  /** Re-solves after a session failure, inside a single refresh */
  solveRetries: number;
  /** Background refreshes that failed while the current entry kept being served */
  staleFallbacks: number;
  lastRefreshAt?: number;
  lastRefreshDurationMs?: number;
  lastError?: string;
}

export interface SiteCacheStatus extends SiteCacheStats {
  state: ChallengeEntryState;
  solvedAt?: number;
  expiresAt?: number;
  ttlRemainingMs: number;
}

interface SiteSlot {
  entry?: ChallengeCacheEntry;
  inFlight?: Promise<ChallengeCacheEntry>;
  /** Bumped by invalidate(); a solve started under an older generation does not store its result */
  generation: number;
  stats: SiteCacheStats;
}

/**
 * Per-site cache of solved challenge cookies.
 *
 * Concurrent misses for a site share one solve. Inside the pre-refresh window
 * the current entry is served while a single background solve replaces it.
 */
@Injectable()
export class ChallengeCacheService extends StandardService {
  private readonly slots = new Map<string, SiteSlot>();

  constructor(
    private readonly session: ChallengeSessionService,
    @Inject(CHALLENGE_CACHE_SETTINGS) private readonly settings: ChallengeCacheSettings
  ) {
    super();
  }

  async getCookies(site: SiteDefinition): Promise<CookieMap> {
    if (!site.requiresChallengeSolution) {
      return NO_COOKIES;
    }

    const slot = this.slotFor(site.name);
    const entry = slot.entry;
    const now = Date.now();

    if (entry && now < entry.expiresAt) {
      slot.stats.hits++;
      if (now >= entry.refreshDeadline && !slot.inFlight) {
        this.startBackgroundRefresh(site, slot);
      }
      return entry.cookies;
    }

    slot.stats.misses++;
    const fresh = await (slot.inFlight ?? this.startSolve(site, slot));
    return fresh.cookies;
  }

  /**
   * Drop the entry for `site`. The next getCookies performs a fresh solve.
   */
  invalidate(site: SiteDefinition): void {
    const slot = this.slots.get(site.name);
    if (!slot) return;

    slot.entry = undefined;
    slot.inFlight = undefined;
    slot.generation++;
    this.logDebug(`Invalidated challenge cookies for ${site.name}`);
  }

  /**
   * Invalidate and solve again right away
   */
  async forceRefresh(site: SiteDefinition): Promise<CookieMap> {
    this.invalidate(site);
    return this.getCookies(site);
  }

  /**
   * Cookies of a still-valid entry, without ever starting a solve
   */
  peekCookies(site: SiteDefinition): CookieMap | undefined {
    if (!site.requiresChallengeSolution) return NO_COOKIES;
    const entry = this.slots.get(site.name)?.entry;
    return entry && Date.now() < entry.expiresAt ? entry.cookies : undefined;
  }

  getEntry(site: SiteDefinition): ChallengeCacheEntry | undefined {
    return this.slots.get(site.name)?.entry;
  }

  getEntryState(site: SiteDefinition): ChallengeEntryState {
    const slot = this.slots.get(site.name);
    return slot ? this.stateOf(slot, Date.now()) : "empty";
  }

  getStats(): Record<string, SiteCacheStatus> {
    const now = Date.now();
    const result: Record<string, SiteCacheStatus> = {};

    for (const [name, slot] of this.slots) {
      const entry = slot.entry;
      result[name] = {
        ...slot.stats,
        state: this.stateOf(slot, now),
        solvedAt: entry?.solvedAt,
        expiresAt: entry?.expiresAt,
        ttlRemainingMs: entry ? Math.max(0, entry.expiresAt - now) : 0,
      };
    }
    return result;
  }

  private stateOf(slot: SiteSlot, now: number): ChallengeEntryState {
    if (slot.inFlight) return "refreshing";
    if (!slot.entry) return "empty";
    if (now >= slot.entry.expiresAt) return "expired";
    if (now >= slot.entry.refreshDeadline) return "expiring";
    return "valid";
  }

  private slotFor(siteName: string): SiteSlot {
    let slot = this.slots.get(siteName);
    if (!slot) {
      slot = {
        generation: 0,
        stats: {
          hits: 0,
          misses: 0,
          refreshes: 0,
          successfulRefreshes: 0,
          failedRefreshes: 0,
          solveRetries: 0,
          staleFallbacks: 0,
        },
      };
      this.slots.set(siteName, slot);
    }
    return slot;
  }

  private startBackgroundRefresh(site: SiteDefinition, slot: SiteSlot): void {
    this.logDebug(`Entry for ${site.name} is inside the pre-refresh window, refreshing in background`);
    void this.trackTask(this.startSolve(site, slot)).catch((error: unknown) => {
      slot.stats.staleFallbacks++;
      this.logWarning(`Background refresh failed, serving current cookies until expiry: ${describeError(error)}`, site.name);
    });
  }

  private startSolve(site: SiteDefinition, slot: SiteSlot): Promise<ChallengeCacheEntry> {
    const generation = slot.generation;
    const startedAt = Date.now();
    slot.stats.refreshes++;

    const solve: Promise<ChallengeCacheEntry> = this.solveWithRetries(site, slot)
      .then(
        cookies => {
          const solvedAt = Date.now();
          const entry: ChallengeCacheEntry = Object.freeze({
            site: site.name,
            cookies: Object.freeze({ ...cookies }),
            solvedAt,
            expiresAt: solvedAt + this.settings.ttlMs,
            refreshDeadline: solvedAt + this.settings.ttlMs - this.settings.preRefreshMs,
          });

          slot.stats.successfulRefreshes++;
          slot.stats.lastRefreshAt = solvedAt;
          slot.stats.lastRefreshDurationMs = solvedAt - startedAt;
          if (slot.generation === generation) {
            slot.entry = entry;
          }
          return entry;
        },
        (error: unknown) => {
          slot.stats.failedRefreshes++;
          slot.stats.lastError = describeError(error);
          throw new CacheError(site.name, error);
        }
      )
      .finally(() => {
        if (slot.inFlight === solve) {
          slot.inFlight = undefined;
        }
      });

    slot.inFlight = solve;
    return solve;
  }

  /**
   * A failed session recreates itself on the next call, so a SessionError is
   * re-solved up to `solveRetries` times before the refresh counts as failed.
   */
  private async solveWithRetries(site: SiteDefinition, slot: SiteSlot): Promise<CookieMap> {
    const retries = this.settings.solveRetries;
    let lastError: unknown;

    for (let attempt = 0; attempt <= retries; attempt++) {
      try {
        return await this.session.solve(site);
      } catch (error) {
        if (!(error instanceof SessionError)) throw error;
        lastError = error;
        if (attempt < retries) {
          slot.stats.solveRetries++;
          this.logWarning(`Solve failed (${error.reason}): ${error.message}, retrying ${attempt + 1}/${retries}`, site.name);
        }
      }
    }
    throw lastError;
  }
}
