import { Injectable, Logger } from "@nestjs/common";
import axios from "axios";
import { describeError } from "@/common/errors/gateway.errors";
import type { CookieMap, SiteDefinition } from "@/common/types/gateway";
import { serializeCookies } from "@/common/utils/cookie.utils";
import type { HealthProbeSettings } from "@/config/gateway-settings.types";

export const SITE_HEALTH_PROBE = "SITE_HEALTH_PROBE";

export type ProbeOutcome = "ok" | "server_error" | "challenge_block" | "network_error";

export interface ProbeResult {
  healthy: boolean;
  outcome: ProbeOutcome;
  status?: number;
  latencyMs: number;
  checkedAt: number;
  error?: string;
}

export interface SiteHealthProbe {
  check(site: SiteDefinition, cookies?: CookieMap): Promise<ProbeResult>;
}

/**
 * HEAD request against a cheap API path. Healthy means a non-5xx answer that is
 * not an HTML challenge page; auth errors still prove the site is serving.
 */
@Injectable()
export class HttpSiteHealthProbe implements SiteHealthProbe {
  private readonly logger = new Logger(HttpSiteHealthProbe.name);

  constructor(private readonly settings: HealthProbeSettings) {}

  async check(site: SiteDefinition, cookies?: CookieMap): Promise<ProbeResult> {
    const startedAt = Date.now();
    const headers: Record<string, string> = { "User-Agent": this.settings.userAgent };
    if (cookies && Object.keys(cookies).length > 0) {
      headers.Cookie = serializeCookies(cookies);
    }

    try {
      const response = await axios.head(`${site.url}${this.settings.path}`, {
        headers,
        timeout: this.settings.timeoutMs,
        proxy: site.requiresProxy && this.settings.proxy ? this.settings.proxy : false,
        maxRedirects: 0,
        validateStatus: () => true,
      });

      const contentType = String(response.headers["content-type"] ?? "");
      const result: ProbeResult = {
        healthy: false,
        outcome: "ok",
        status: response.status,
        latencyMs: Date.now() - startedAt,
        checkedAt: Date.now(),
      };

      if (contentType.includes("text/html")) {
        result.outcome = "challenge_block";
      } else if (response.status >= 500) {
        result.outcome = "server_error";
      } else {
        result.healthy = true;
      }

      this.logger.debug(`Probe ${site.name}: ${result.outcome} (${response.status}, ${result.latencyMs}ms)`);
      return result;
    } catch (error) {
      return {
        healthy: false,
        outcome: "network_error",
        latencyMs: Date.now() - startedAt,
        checkedAt: Date.now(),
        error: describeError(error),
      };
    }
  }
}
