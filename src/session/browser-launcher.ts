import type { CookieMap, ProxySettings } from "@/common/types/gateway";

export const BROWSER_LAUNCHER = "BROWSER_LAUNCHER";

export interface LaunchOptions {
  headless: boolean;
  executablePath?: string;
  proxy?: ProxySettings;
}

export interface CollectCookiesOptions {
  /** Navigation timeout */
  timeoutMs: number;
  /** Wait after the page loaded so the challenge script can set its cookies */
  settleMs: number;
}

/**
 * A running automation browser, narrowed to what the challenge session needs
 */
export interface AutomationBrowser {
  isConnected(): boolean;
  onDisconnected(listener: () => void): void;
  /**
   * Open `url` in a fresh, isolated context and return that context's cookies.
   * Throws ChallengePageError when the page never reaches a usable state.
   */
  collectCookies(url: string, options: CollectCookiesOptions): Promise<CookieMap>;
  close(): Promise<void>;
}

export interface BrowserLauncher {
  launch(options: LaunchOptions): Promise<AutomationBrowser>;
}

/**
 * The challenge page loaded in an unexpected state or not at all
 */
export class ChallengePageError extends Error {
  override readonly name = "ChallengePageError";

  constructor(message: string, cause?: unknown) {
    super(message, { cause });
  }
}
