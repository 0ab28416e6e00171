import { Injectable, Logger } from "@nestjs/common";
import { chromium, errors, type Browser } from "playwright-core";
import type { CookieMap } from "@/common/types/gateway";
import { describeError } from "@/common/errors/gateway.errors";
import {
  ChallengePageError,
  type AutomationBrowser,
  type BrowserLauncher,
  type CollectCookiesOptions,
  type LaunchOptions,
} from "./browser-launcher";

const CHROMIUM_ARGS = [
  "--no-sandbox",
  "--disable-setuid-sandbox",
  "--disable-dev-shm-usage",
  "--disable-gpu",
  "--disable-blink-features=AutomationControlled",
];

class PlaywrightAutomationBrowser implements AutomationBrowser {
  constructor(
    private readonly browser: Browser,
    private readonly userAgent: string | undefined,
    private readonly logger: Logger
  ) {}

  isConnected(): boolean {
    return this.browser.isConnected();
  }

  onDisconnected(listener: () => void): void {
    this.browser.on("disconnected", () => listener());
  }

  async collectCookies(url: string, options: CollectCookiesOptions): Promise<CookieMap> {
    const context = await this.browser.newContext({ userAgent: this.userAgent, ignoreHTTPSErrors: true });
    try {
      const page = await context.newPage();
      try {
        await page.goto(url, { waitUntil: "domcontentloaded", timeout: options.timeoutMs });
      } catch (error) {
        if (error instanceof errors.TimeoutError) {
          throw new ChallengePageError(`Timed out loading ${url}`, error);
        }
        throw error;
      }

      if (options.settleMs > 0) {
        await page.waitForTimeout(options.settleMs);
      }

      const cookies = await context.cookies();
      return Object.freeze(Object.fromEntries(cookies.map(cookie => [cookie.name, cookie.value])));
    } finally {
      await context.close().catch((error: unknown) => {
        this.logger.debug(`Failed to close browser context: ${describeError(error)}`);
      });
    }
  }

  close(): Promise<void> {
    return this.browser.close();
  }
}

/**
 * Launches Chromium through playwright-core. The browser binary is not bundled:
 * point SESSION_EXECUTABLE_PATH at an installed Chromium or Chrome.
 */
@Injectable()
export class PlaywrightBrowserLauncher implements BrowserLauncher {
  private readonly logger = new Logger(PlaywrightBrowserLauncher.name);

  constructor(private readonly userAgent?: string) {}

  async launch(options: LaunchOptions): Promise<AutomationBrowser> {
    const proxy = options.proxy
      ? { server: `${options.proxy.protocol}://${options.proxy.host}:${options.proxy.port}` }
      : undefined;

    this.logger.log(`Launching Chromium (headless: ${options.headless}, proxy: ${proxy?.server ?? "none"})`);
    const browser = await chromium.launch({
      headless: options.headless,
      executablePath: options.executablePath,
      proxy,
      args: CHROMIUM_ARGS,
    });

    return new PlaywrightAutomationBrowser(browser, this.userAgent, this.logger);
  }
}
