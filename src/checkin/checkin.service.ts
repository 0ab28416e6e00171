import { Inject, Injectable } from "@nestjs/common";
import axios from "axios";
import { BaseService } from "@/common/base/base.service";
import { describeError } from "@/common/errors/gateway.errors";
import type { AccountDefinition, CookieMap, SiteDefinition } from "@/common/types/gateway";
import { serializeCookies } from "@/common/utils/cookie.utils";
import { sleep } from "@/common/utils/async.utils";
import { ConfigService } from "@/config/config.service";
import type { CheckinSettings } from "@/config/gateway-settings.types";
import { AccountStoreService } from "@/accounts/account-store.service";
import { ChallengeCacheService } from "@/challenge-cache/challenge-cache.service";
import { SiteFailoverService } from "@/failover/site-failover.service";

export const CHECKIN_SETTINGS = "CHECKIN_SETTINGS";

const SESSION_COOKIE = "session";
const ALREADY_CHECKED_IN = ["已签到", "already"];

export interface CheckinAccountResult {
  account: string;
  success: boolean;
  message: string;
  site?: string;
  timestamp: string;
}

export interface CheckinRunResult {
  success: boolean;
  message: string;
  startedAt: string;
  finishedAt: string;
  durationMs: number;
  totalAccounts: number;
  successCount: number;
  failedCount: number;
  results: CheckinAccountResult[];
}

export interface CheckinStatus {
  running: boolean;
  lastRun?: string;
  results: CheckinAccountResult[];
  totalSuccess: number;
  totalFailed: number;
}

type SiteAttempt = { done: true; success: boolean; message: string } | { done: false; message: string };

/**
 * Daily check-in for every enabled account.
 *
 * Each account signs in with its `session` cookie and `new-api-user` id. The
 * active site is tried first, then the remaining sites in configured order;
 * HTML pages, non-200 statuses and connection errors move on to the next site.
 */
@Injectable()
export class CheckinService extends BaseService {
  private inFlight?: Promise<CheckinRunResult>;
  private status: CheckinStatus = { running: false, results: [], totalSuccess: 0, totalFailed: 0 };

  constructor(
    private readonly config: ConfigService,
    private readonly store: AccountStoreService,
    private readonly failover: SiteFailoverService,
    private readonly cache: ChallengeCacheService,
    @Inject(CHECKIN_SETTINGS) private readonly settings: CheckinSettings
  ) {
    super();
  }

  /**
   * Concurrent calls share the run already in progress
   */
  runForAllAccounts(): Promise<CheckinRunResult> {
    if (!this.inFlight) {
      this.inFlight = this.run().finally(() => {
        this.inFlight = undefined;
      });
    }
    return this.inFlight;
  }

  getStatus(): CheckinStatus {
    return { ...this.status, running: this.inFlight !== undefined, results: [...this.status.results] };
  }

  private async run(): Promise<CheckinRunResult> {
    const started = Date.now();
    const accounts = this.store.list().filter(account => account.enabled);
    this.logger.log(`Starting check-in for ${accounts.length} accounts`);

    const sites = this.orderedSites();
    const cookieCache = new Map<string, CookieMap | null>();
    const results: CheckinAccountResult[] = [];

    for (const [index, account] of accounts.entries()) {
      if (index > 0 && this.settings.accountDelayMs > 0) {
        await sleep(this.settings.accountDelayMs);
      }
      results.push(await this.checkinAccount(account, sites, cookieCache));
    }

    const successCount = results.filter(result => result.success).length;
    const failedCount = results.length - successCount;
    const finished = Date.now();

    this.status = {
      running: false,
      lastRun: new Date(started).toISOString(),
      results,
      totalSuccess: successCount,
      totalFailed: failedCount,
    };

    const summary: CheckinRunResult = {
      success: accounts.length > 0 && failedCount === 0,
      message:
        accounts.length === 0
          ? "No enabled accounts"
          : `Check-in completed: ${successCount}/${accounts.length} successful`,
      startedAt: new Date(started).toISOString(),
      finishedAt: new Date(finished).toISOString(),
      durationMs: finished - started,
      totalAccounts: accounts.length,
      successCount,
      failedCount,
      results,
    };

    this.logCriticalOperation("checkin_run", { successCount, failedCount, durationMs: summary.durationMs }, failedCount === 0);
    return summary;
  }

  private async checkinAccount(
    account: AccountDefinition,
    sites: readonly SiteDefinition[],
    cookieCache: Map<string, CookieMap | null>
  ): Promise<CheckinAccountResult> {
    const result = (success: boolean, message: string, site?: string): CheckinAccountResult => ({
      account: account.name,
      success,
      message,
      site,
      timestamp: new Date().toISOString(),
    });

    const session = account.cookies[SESSION_COOKIE];
    if (!session) return result(false, "Missing session cookie");
    if (!account.apiUser) return result(false, "Missing api user");

    let lastMessage = "All sites failed";
    for (const site of sites) {
      const challengeCookies = await this.challengeCookiesFor(site, cookieCache);
      if (challengeCookies === null) {
        lastMessage = `[${site.name}] Challenge cookies unavailable`;
        continue;
      }

      const attempt = await this.attemptSite(site, account.apiUser, { ...challengeCookies, [SESSION_COOKIE]: session });
      if (attempt.done) {
        this.logger.log(`[${account.name}] [${site.name}] ${attempt.message}`);
        return result(attempt.success, attempt.message, site.name);
      }
      lastMessage = `[${site.name}] ${attempt.message}`;
      this.logWarning(lastMessage, account.name);
    }

    return result(false, lastMessage);
  }

  private async attemptSite(site: SiteDefinition, apiUser: string, cookies: CookieMap): Promise<SiteAttempt> {
    try {
      const response = await axios.post<unknown>(`${site.url}${this.settings.path}`, undefined, {
        headers: {
          "User-Agent": this.settings.userAgent,
          Accept: "application/json, text/plain, */*",
          "Content-Type": "application/json",
          "X-Requested-With": "XMLHttpRequest",
          Referer: site.url,
          Origin: site.url,
          Cookie: serializeCookies(cookies),
          "new-api-user": apiUser,
        },
        timeout: this.settings.timeoutMs,
        proxy: site.requiresProxy && this.settings.proxy ? { ...this.settings.proxy } : false,
        validateStatus: () => true,
      });

      const contentType = String(response.headers["content-type"] ?? "");
      if (contentType.includes("text/html")) {
        return { done: false, message: "Challenge or error page returned" };
      }
      if (response.status !== 200) {
        return { done: false, message: `HTTP ${response.status}` };
      }
      return interpretCheckinBody(response.data);
    } catch (error) {
      return { done: false, message: `Connection error: ${describeError(error)}` };
    }
  }

  /**
   * Challenge cookies are fetched once per site per run; `null` marks a site whose solve failed
   */
  private async challengeCookiesFor(site: SiteDefinition, cookieCache: Map<string, CookieMap | null>): Promise<CookieMap | null> {
    const known = cookieCache.get(site.name);
    if (known !== undefined) return known;

    let cookies: CookieMap | null;
    try {
      cookies = await this.cache.getCookies(site);
    } catch (error) {
      this.logWarning(`Challenge cookies for check-in unavailable: ${describeError(error)}`, site.name);
      cookies = null;
    }
    cookieCache.set(site.name, cookies);
    return cookies;
  }

  private orderedSites(): SiteDefinition[] {
    const active = this.failover.active();
    return [active, ...this.config.getSites().filter(site => site.name !== active.name)];
  }
}

/**
 * Success when `ret === 1`, `code === 0` or `success` is truthy; an
 * "already checked in" message also counts as success.
 */
export function interpretCheckinBody(body: unknown): SiteAttempt {
  if (typeof body === "string") {
    return body.toLowerCase().includes("success")
      ? { done: true, success: true, message: "Check-in successful (non-JSON response)" }
      : { done: true, success: false, message: `Invalid response format: ${body.slice(0, 100)}` };
  }
  if (typeof body !== "object" || body === null) {
    return { done: true, success: false, message: "Empty check-in response" };
  }

  const ret = "ret" in body ? body.ret : undefined;
  const code = "code" in body ? body.code : undefined;
  const success = "success" in body ? Boolean(body.success) : false;
  const rawMessage = "msg" in body ? body.msg : "message" in body ? body.message : undefined;
  const message = typeof rawMessage === "string" && rawMessage ? rawMessage : undefined;

  if (ret === 1 || code === 0 || success) {
    return { done: true, success: true, message: message ?? "Check-in successful" };
  }

  const failure = message ?? "Check-in failed";
  const already = ALREADY_CHECKED_IN.some(marker => failure.toLowerCase().includes(marker));
  return { done: true, success: already, message: failure };
}
