import type { Readable } from "stream";
import { Inject, Injectable } from "@nestjs/common";
import { BaseService } from "@/common/base/base.service";
import {
  GatewayError,
  PoolError,
  SiteExhaustedError,
  UpstreamAttemptError,
  describeError,
  type GatewayErrorReason,
} from "@/common/errors/gateway.errors";
import type { AccountDefinition, CookieMap, SiteDefinition } from "@/common/types/gateway";
import { maskSecret, mergeCookies, serializeCookies } from "@/common/utils/cookie.utils";
import { readBounded } from "@/common/utils/stream.utils";
import type { RouterSettings, UpstreamSettings } from "@/config/gateway-settings.types";
import { AccountPoolService } from "@/accounts/account-pool.service";
import { ChallengeCacheService } from "@/challenge-cache/challenge-cache.service";
import { SiteFailoverService } from "@/failover/site-failover.service";
import { UpstreamClassifier, type UpstreamFailure } from "./upstream-classifier";
import {
  UPSTREAM_TRANSPORT,
  headerValue,
  type HeaderMap,
  type UpstreamResponse,
  type UpstreamTransport,
} from "./upstream.transport";

export const ROUTER_SETTINGS = "ROUTER_SETTINGS";

export type GatewayRouterSettings = RouterSettings & UpstreamSettings;

export const DEFAULT_ANTHROPIC_VERSION = "2023-06-01";

// Error bodies are read to classify them; anything larger is cut off
const MAX_ERROR_BODY_BYTES = 64 * 1024;

// Hop-by-hop headers and the credentials the gateway injects itself
const EXCLUDED_REQUEST_HEADERS = new Set([
  "host",
  "connection",
  "keep-alive",
  "proxy-authorization",
  "proxy-connection",
  "te",
  "trailer",
  "transfer-encoding",
  "upgrade",
  "content-length",
  "accept-encoding",
  "authorization",
  "x-api-key",
  "cookie",
  "new-api-user",
  "user-agent",
]);

export interface GatewayRequest {
  method: string;
  /** Path including the API prefix, e.g. `/v1/messages` */
  path: string;
  /** Raw query string without the leading `?` */
  query?: string;
  headers: Record<string, string | string[] | undefined>;
  body?: Buffer;
}

export interface GatewayResponse {
  status: number;
  headers: HeaderMap;
  /** Buffered for non-2xx responses, streamed otherwise */
  body: Readable | Buffer;
  site: string;
  account: string;
  attempts: number;
}

export interface RouterStats {
  requests: number;
  succeeded: number;
  failed: Record<GatewayErrorReason, number>;
  accountFailures: number;
  siteFailures: number;
  lastError?: string;
  lastErrorAt?: number;
}

type AttemptResult =
  | { ok: true; response: UpstreamResponse; buffered?: Buffer }
  | { ok: false; outcome: UpstreamFailure; cause?: unknown };

/**
 * Forwards one inbound API request, retrying across accounts and sites.
 *
 * Account-level failures exclude the account for the rest of the request and
 * count against its health. Site-level failures leave the account alone,
 * invalidate the site's challenge cookies and report to failover; the next
 * iteration then runs against whatever site is active. Every iteration
 * consumes one unit of `maxAccountRetries`.
 */
@Injectable()
export class GatewayRouterService extends BaseService {
  private readonly stats: RouterStats = {
    requests: 0,
    succeeded: 0,
    failed: { challenge_unavailable: 0, no_account_available: 0, all_accounts_exhausted: 0 },
    accountFailures: 0,
    siteFailures: 0,
  };

  constructor(
    private readonly failover: SiteFailoverService,
    private readonly cache: ChallengeCacheService,
    private readonly pool: AccountPoolService,
    private readonly classifier: UpstreamClassifier,
    @Inject(UPSTREAM_TRANSPORT) private readonly transport: UpstreamTransport,
    @Inject(ROUTER_SETTINGS) private readonly settings: GatewayRouterSettings
  ) {
    super();
  }

  async forward(request: GatewayRequest): Promise<GatewayResponse> {
    this.stats.requests++;
    try {
      const response = await this.route(request);
      this.stats.succeeded++;
      return response;
    } catch (error) {
      if (error instanceof GatewayError) {
        this.stats.failed[error.reason]++;
        this.stats.lastError = error.causeMessage ?? error.message;
        this.stats.lastErrorAt = Date.now();
      }
      throw error;
    }
  }

  getStats(): RouterStats {
    return { ...this.stats, failed: { ...this.stats.failed } };
  }

  private async route(request: GatewayRequest): Promise<GatewayResponse> {
    const tried = new Set<string>();
    const budget = this.settings.maxAccountRetries;
    let lastCause: unknown;

    for (let attempt = 1; attempt <= budget; attempt++) {
      const site = this.failover.active();

      let siteCookies: CookieMap;
      try {
        siteCookies = await this.cache.getCookies(site);
      } catch (error) {
        lastCause = error;
        this.stats.siteFailures++;
        const next = this.reportSiteFailure(site, `challenge unavailable: ${describeError(error)}`);
        if (next && next.name !== site.name) {
          this.logger.warn(`Challenge unavailable on ${site.name}, retrying on ${next.name}`);
          continue;
        }
        throw new GatewayError("challenge_unavailable", `No challenge solution available for ${site.name}`, error);
      }

      let account: AccountDefinition;
      try {
        account = this.pool.selectAccount(tried);
      } catch (error) {
        if (!(error instanceof PoolError)) throw error;
        if (tried.size === 0) {
          throw new GatewayError("no_account_available", "No eligible account available", lastCause ?? error);
        }
        throw new GatewayError("all_accounts_exhausted", `All ${tried.size} eligible accounts failed`, lastCause ?? error);
      }

      if (attempt > 1) {
        this.logger.log(`Attempt ${attempt}/${budget}: ${site.name} with account ${account.name}`);
      }

      const result = await this.attempt(site, account, siteCookies, request);

      if (result.ok) {
        this.pool.reportSuccess(account.name);
        this.failover.reportSiteSuccess(site);
        return {
          status: result.response.status,
          headers: result.response.headers,
          body: result.buffered ?? result.response.body,
          site: site.name,
          account: account.name,
          attempts: attempt,
        };
      }

      const { outcome } = result;
      const failure = new UpstreamAttemptError(
        site.name,
        account.name,
        outcome.kind,
        outcome.failure,
        outcome.detail,
        result.cause
      );
      lastCause = failure;

      if (outcome.kind === "account") {
        this.stats.accountFailures++;
        this.logWarning(failure.message);
        this.pool.reportFailure(account.name, outcome.failure);
        tried.add(account.name);
        continue;
      }

      this.stats.siteFailures++;
      this.logWarning(failure.message);
      this.cache.invalidate(site);
      if (!this.reportSiteFailure(site, outcome.detail)) {
        throw new GatewayError("all_accounts_exhausted", `All sites failed, last: ${site.name}`, failure);
      }
    }

    throw new GatewayError("all_accounts_exhausted", `Gave up after ${budget} attempts`, lastCause);
  }

  /**
   * @returns the active site after the report, or undefined when every site is exhausted
   */
  private reportSiteFailure(site: SiteDefinition, reason: string): SiteDefinition | undefined {
    try {
      return this.failover.reportSiteFailure(site, reason);
    } catch (error) {
      if (error instanceof SiteExhaustedError) {
        this.logError(error, "failover");
        return undefined;
      }
      throw error;
    }
  }

  private async attempt(
    site: SiteDefinition,
    account: AccountDefinition,
    siteCookies: CookieMap,
    request: GatewayRequest
  ): Promise<AttemptResult> {
    this.logger.debug(`Forwarding ${request.method} ${request.path} to ${site.name} as ${account.name} (key ${maskSecret(account.apiKey)})`);

    let response: UpstreamResponse;
    try {
      response = await this.transport.send({
        method: request.method,
        url: `${site.url}${request.path}${request.query ? `?${request.query}` : ""}`,
        headers: this.buildHeaders(request, account, siteCookies),
        body: request.body,
        proxy: site.requiresProxy ? this.settings.proxy : undefined,
        timeoutMs: isStreamingRequest(request.body) ? this.settings.streamTimeoutMs : this.settings.timeoutMs,
      });
    } catch (error) {
      return { ok: false, outcome: this.classifier.classifyTransportError(error), cause: error };
    }

    const contentType = headerValue(response.headers, "content-type");
    if (response.status >= 200 && response.status < 300) {
      const outcome = this.classifier.classifyResponse(site, { status: response.status, contentType });
      if (outcome.kind !== "success") {
        response.body.destroy();
        return { ok: false, outcome };
      }
      return { ok: true, response };
    }

    let buffered: Buffer;
    try {
      buffered = (await readBounded(response.body, MAX_ERROR_BODY_BYTES)).buffer;
    } catch (error) {
      return { ok: false, outcome: this.classifier.classifyTransportError(error), cause: error };
    }

    const outcome = this.classifier.classifyResponse(site, {
      status: response.status,
      contentType,
      body: buffered.toString("utf-8"),
    });
    if (outcome.kind !== "success") {
      return { ok: false, outcome };
    }
    return { ok: true, response, buffered };
  }

  private buildHeaders(request: GatewayRequest, account: AccountDefinition, siteCookies: CookieMap): Record<string, string> {
    const headers: Record<string, string> = {};
    for (const [name, value] of Object.entries(request.headers)) {
      const key = name.toLowerCase();
      if (value === undefined || EXCLUDED_REQUEST_HEADERS.has(key)) continue;
      headers[key] = Array.isArray(value) ? value.join(", ") : value;
    }

    if (request.body && request.body.length > 0 && !headers["content-type"]) {
      headers["content-type"] = "application/json";
    }
    headers["anthropic-version"] ??= DEFAULT_ANTHROPIC_VERSION;
    headers["user-agent"] = this.settings.userAgent;

    if (account.apiKey) {
      headers["authorization"] = `Bearer ${account.apiKey}`;
      headers["x-api-key"] = account.apiKey;
    }
    if (account.apiUser) {
      headers["new-api-user"] = account.apiUser;
    }

    const cookie = serializeCookies(mergeCookies(account.cookies, siteCookies));
    if (cookie) {
      headers["cookie"] = cookie;
    }
    return headers;
  }
}

/**
 * True for JSON bodies that ask for a streamed (SSE) response
 */
export function isStreamingRequest(body: Buffer | undefined): boolean {
  if (!body || body.length === 0) return false;
  try {
    const parsed: unknown = JSON.parse(body.toString("utf-8"));
    return typeof parsed === "object" && parsed !== null && "stream" in parsed && parsed.stream === true;
  } catch {
    return false;
  }
}
