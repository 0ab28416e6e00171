import { Inject, Injectable } from "@nestjs/common";
import { StandardService } from "@/common/base/composed.service";
import { SessionError, describeError } from "@/common/errors/gateway.errors";
import type { CookieMap, SiteDefinition } from "@/common/types/gateway";
import { Mutex, TimeoutError, withTimeout } from "@/common/utils/async.utils";
import type { SessionSettings } from "@/config/gateway-settings.types";
import {
  BROWSER_LAUNCHER,
  ChallengePageError,
  type AutomationBrowser,
  type BrowserLauncher,
} from "./browser-launcher";

export const SESSION_SETTINGS = "SESSION_SETTINGS";

export interface SessionStats {
  alive: boolean;
  createdAt?: number;
  uptimeMs: number;
  restartCount: number;
  errorCount: number;
  solveCount: number;
  lastError?: string;
}

/**
 * Owns the single automation browser used to solve anti-bot challenges.
 *
 * The browser is created lazily and recreated before use when it has crashed,
 * disconnected, or outlived `restartIntervalMs`. Creation and teardown run under
 * one lock, so concurrent callers share a creation instead of launching twice.
 */
@Injectable()
export class ChallengeSessionService extends StandardService {
  private browser?: AutomationBrowser;
  private createdAt?: number;
  private crashed = false;
  private readonly creationLock = new Mutex();

  private restartCount = 0;
  private errorCount = 0;
  private solveCount = 0;
  private lastError?: string;

  constructor(
    @Inject(BROWSER_LAUNCHER) private readonly launcher: BrowserLauncher,
    @Inject(SESSION_SETTINGS) private readonly settings: SessionSettings
  ) {
    super({ useEnhancedLogging: true });
  }

  /**
   * Load the site's challenge page and return the cookies it leaves behind
   */
  async solve(site: SiteDefinition): Promise<CookieMap> {
    const browser = await this.ensureSession();
    const url = `${site.url}${site.challengePath}`;
    const operationId = `solve-${site.name}-${Date.now()}`;

    this.startPerformanceTimer(operationId, "challenge solve", { site: site.name });
    let cookies: CookieMap;
    try {
      cookies = await withTimeout(
        browser.collectCookies(url, { timeoutMs: this.settings.solveTimeoutMs, settleMs: this.settings.settleMs }),
        this.settings.solveTimeoutMs + this.settings.settleMs,
        `Challenge solve for ${site.name}`
      );
    } catch (error) {
      this.endPerformanceTimer(operationId, false);
      this.crashed = true;
      throw this.recordFailure(
        error instanceof TimeoutError || error instanceof ChallengePageError
          ? new SessionError("challenge_timeout", `Challenge on ${site.name} did not resolve: ${describeError(error)}`, error)
          : new SessionError("crashed", `Automation session failed while solving ${site.name}: ${describeError(error)}`, error)
      );
    }
    this.endPerformanceTimer(operationId, true);

    const missing = site.requiredCookies.filter(name => !(name in cookies));
    if (Object.keys(cookies).length === 0 || missing.length > 0) {
      throw this.recordFailure(
        new SessionError(
          "extraction_failed",
          missing.length > 0
            ? `Challenge on ${site.name} did not yield cookies: ${missing.join(", ")}`
            : `Challenge on ${site.name} yielded no cookies`
        )
      );
    }

    this.solveCount++;
    this.logger.log(`Solved challenge for ${site.name} (${Object.keys(cookies).length} cookies)`);
    return cookies;
  }

  /**
   * Tear down the current browser and start a new one
   */
  async restart(): Promise<void> {
    await this.creationLock.runExclusive(() => this.recreate("restart requested"));
  }

  isAlive(): boolean {
    return this.browser !== undefined && !this.crashed && this.browser.isConnected();
  }

  /**
   * True once the running browser has outlived the restart interval
   */
  shouldRestart(): boolean {
    return this.createdAt !== undefined && Date.now() - this.createdAt > this.settings.restartIntervalMs;
  }

  getStats(): SessionStats {
    return {
      alive: this.isAlive(),
      createdAt: this.createdAt,
      uptimeMs: this.createdAt !== undefined && this.isAlive() ? Date.now() - this.createdAt : 0,
      restartCount: this.restartCount,
      errorCount: this.errorCount,
      solveCount: this.solveCount,
      lastError: this.lastError,
    };
  }

  /**
   * Close the browser for good. Same path as module shutdown.
   */
  async stop(): Promise<void> {
    await this.onModuleDestroy();
  }

  override async cleanup(): Promise<void> {
    await this.creationLock.runExclusive(() => this.teardown());
  }

  private async ensureSession(): Promise<AutomationBrowser> {
    const current = this.usableBrowser();
    if (current) return current;

    return this.creationLock.runExclusive(async () => {
      // Another caller may have finished a creation while this one waited for the lock
      const created = this.usableBrowser();
      if (created) return created;
      return this.recreate(this.describeUnusable());
    });
  }

  private usableBrowser(): AutomationBrowser | undefined {
    return this.isAlive() && !this.shouldRestart() ? this.browser : undefined;
  }

  private describeUnusable(): string {
    if (!this.browser) return "no session";
    if (this.crashed) return "previous session crashed";
    if (!this.browser.isConnected()) return "previous session disconnected";
    return "session exceeded restart interval";
  }

  private async recreate(reason: string): Promise<AutomationBrowser> {
    const hadSession = this.browser !== undefined;
    await this.teardown();

    let browser: AutomationBrowser;
    try {
      browser = await this.launcher.launch({
        headless: this.settings.headless,
        executablePath: this.settings.executablePath,
        proxy: this.settings.proxy,
      });
    } catch (error) {
      this.crashed = true;
      throw this.recordFailure(
        new SessionError("crashed", `Failed to start automation session: ${describeError(error)}`, error)
      );
    }

    browser.onDisconnected(() => {
      if (this.browser === browser && !this.crashed) {
        this.crashed = true;
        this.logWarning("Automation browser disconnected; it will be recreated on next use");
      }
    });

    this.browser = browser;
    this.createdAt = Date.now();
    this.crashed = false;
    if (hadSession) this.restartCount++;

    this.logCriticalOperation("session_created", { reason, restartCount: this.restartCount });
    return browser;
  }

  private async teardown(): Promise<void> {
    const browser = this.browser;
    if (!browser) return;

    this.browser = undefined;
    this.createdAt = undefined;
    try {
      await browser.close();
    } catch (error) {
      this.logWarning(`Failed to close automation browser: ${describeError(error)}`);
    }
  }

  private recordFailure(error: SessionError): SessionError {
    this.errorCount++;
    this.lastError = `${error.reason}: ${error.message}`;
    this.logWarning(error.message, "solve");
    return error;
  }
}
