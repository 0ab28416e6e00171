/**
 * Config Service
 * Holds the validated site definitions and the per-component settings derived from ENV.
 */

import * as path from "path";
import { Injectable } from "@nestjs/common";
import { BaseService } from "@/common/base/base.service";
import { ConfigurationError } from "@/common/errors/gateway.errors";
import type { ProxySettings, SiteDefinition } from "@/common/types/gateway";
import { ENV } from "./environment.constants";
import { loadSiteDefinitions, parseProxyUrl, readJsonFile } from "./gateway-config.loader";
import type { GatewaySettings } from "./gateway-settings.types";

export function buildGatewaySettings(proxy?: ProxySettings): GatewaySettings {
  return {
    apiPrefix: ENV.APPLICATION.API_PREFIX,
    session: {
      restartIntervalMs: ENV.SESSION.RESTART_INTERVAL_MS,
      solveTimeoutMs: ENV.CHALLENGE.SOLVE_TIMEOUT_MS,
      settleMs: ENV.CHALLENGE.SETTLE_MS,
      proxy,
      executablePath: ENV.SESSION.EXECUTABLE_PATH,
      headless: ENV.SESSION.HEADLESS,
    },
    cache: {
      ttlMs: ENV.CHALLENGE.COOKIE_TTL_MS,
      preRefreshMs: ENV.CHALLENGE.PRE_REFRESH_MS,
      solveRetries: ENV.CHALLENGE.SOLVE_RETRIES,
    },
    failover: {
      siteFailureThreshold: ENV.FAILOVER.SITE_FAILURE_THRESHOLD,
      recoveryThreshold: ENV.FAILOVER.RECOVERY_THRESHOLD,
    },
    probe: {
      timeoutMs: ENV.FAILOVER.PROBE_TIMEOUT_MS,
      path: ENV.FAILOVER.PROBE_PATH,
      userAgent: ENV.UPSTREAM.USER_AGENT,
      proxy,
    },
    pool: {
      failureThreshold: ENV.ACCOUNTS.FAILURE_THRESHOLD,
      cooldownMs: ENV.ACCOUNTS.COOLDOWN_MS,
      selectionPolicy: ENV.ACCOUNTS.SELECTION_POLICY,
    },
    upstream: {
      timeoutMs: ENV.UPSTREAM.TIMEOUT_MS,
      streamTimeoutMs: ENV.UPSTREAM.STREAM_TIMEOUT_MS,
      userAgent: ENV.UPSTREAM.USER_AGENT,
      proxy,
    },
    classifier: {
      blockSignatures: ENV.UPSTREAM.BLOCK_SIGNATURES,
      capacitySignatures: ENV.UPSTREAM.CAPACITY_SIGNATURES,
    },
    router: {
      maxAccountRetries: ENV.ACCOUNTS.MAX_ACCOUNT_RETRIES,
    },
    scheduler: {
      challengeRetryIntervalMs: ENV.CHALLENGE.RETRY_INTERVAL_MS,
      challengeMinIntervalMs: 60_000,
      sessionRestartCheckIntervalMs: ENV.SESSION.RESTART_CHECK_INTERVAL_MS,
      primaryCheckEnabled: ENV.FAILOVER.PRIMARY_CHECK_ENABLED,
      primaryCheckIntervalMs: ENV.FAILOVER.PRIMARY_CHECK_INTERVAL_MS,
      checkinEnabled: ENV.CHECKIN.ENABLED,
      checkinCron: ENV.CHECKIN.CRON,
      checkinTimezone: ENV.CHECKIN.TIMEZONE,
    },
    checkin: {
      path: ENV.CHECKIN.PATH,
      timeoutMs: ENV.CHECKIN.TIMEOUT_MS,
      accountDelayMs: 1000,
      userAgent: ENV.UPSTREAM.USER_AGENT,
      proxy,
    },
    apiKeyValidation: {
      enabled: ENV.API_KEY_VALIDATION.ENABLED,
      url: ENV.API_KEY_VALIDATION.URL,
      ttlMs: ENV.API_KEY_VALIDATION.TTL_MS,
      timeoutMs: ENV.API_KEY_VALIDATION.TIMEOUT_MS,
      maxEntries: ENV.API_KEY_VALIDATION.MAX_ENTRIES,
    },
  };
}

@Injectable()
export class ConfigService extends BaseService {
  private readonly sitesByName: ReadonlyMap<string, SiteDefinition>;

  constructor(
    private readonly sites: readonly SiteDefinition[],
    private readonly settings: GatewaySettings,
    private readonly accountsFile: string
  ) {
    super();
    this.sitesByName = new Map(sites.map(site => [site.name, site]));
    this.logger.log(
      `Loaded ${sites.length} sites (primary: ${this.getPrimarySite().name}, backups: ${this.getBackupSites().length})`
    );
  }

  /**
   * Read GATEWAY_PROXY_URL and the sites file. Throws ConfigurationError on any invalid input.
   */
  static fromEnvironment(): ConfigService {
    const proxy = ENV.PROXY.URL ? parseProxyUrl(ENV.PROXY.URL) : undefined;
    const sitesFile = path.resolve(process.cwd(), ENV.FILES.SITES_FILE);
    const sites = loadSiteDefinitions(readJsonFile(sitesFile), proxy);
    return new ConfigService(sites, buildGatewaySettings(proxy), path.resolve(process.cwd(), ENV.FILES.ACCOUNTS_FILE));
  }

  getSites(): readonly SiteDefinition[] {
    return this.sites;
  }

  getPrimarySite(): SiteDefinition {
    const primary = this.sites.find(site => site.role === "primary");
    if (!primary) {
      throw new ConfigurationError("No primary site configured");
    }
    return primary;
  }

  /**
   * Backups in failover order
   */
  getBackupSites(): readonly SiteDefinition[] {
    return this.sites.filter(site => site.role === "backup");
  }

  getSite(name: string): SiteDefinition | undefined {
    return this.sitesByName.get(name);
  }

  getSettings(): GatewaySettings {
    return this.settings;
  }

  getAccountsFile(): string {
    return this.accountsFile;
  }
}
