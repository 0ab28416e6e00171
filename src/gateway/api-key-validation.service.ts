import { Inject, Injectable } from "@nestjs/common";
import axios from "axios";
import { BaseService } from "@/common/base/base.service";
import { ConfigurationError, describeError } from "@/common/errors/gateway.errors";
import { maskSecret } from "@/common/utils/cookie.utils";
import type { ApiKeyValidationSettings } from "@/config/gateway-settings.types";

export const API_KEY_VALIDATION_SETTINGS = "API_KEY_VALIDATION_SETTINGS";

const USER_INFO_PATH = "/api/user/self";

export interface ApiKeyValidationResult {
  valid: boolean;
  message?: string;
  cached: boolean;
}

export interface ApiKeyValidationStats {
  enabled: boolean;
  cacheSize: number;
  validKeysCached: number;
  invalidKeysCached: number;
  expiredEntries: number;
  cacheTtlMs: number;
  cacheMaxEntries: number;
}

interface CachedValidation {
  valid: boolean;
  expiresAt: number;
}

/**
 * Checks client API keys against the account backend's user endpoint.
 * Verdicts are cached for `ttlMs`; an unreachable backend is never cached.
 * The cache holds at most `maxEntries` keys: expired verdicts go first, then the oldest.
 */
@Injectable()
export class ApiKeyValidationService extends BaseService {
  private readonly cache = new Map<string, CachedValidation>();

  constructor(@Inject(API_KEY_VALIDATION_SETTINGS) private readonly settings: ApiKeyValidationSettings) {
    super();
    if (settings.enabled && !settings.url) {
      throw new ConfigurationError("API_KEY_VALIDATION_URL is required when API key validation is enabled");
    }
  }

  isEnabled(): boolean {
    return this.settings.enabled;
  }

  /**
   * Key from `x-api-key`, or from `Authorization: Bearer <key>`
   */
  static extractApiKey(headers: Record<string, string | string[] | undefined>): string | undefined {
    const direct = firstHeader(headers["x-api-key"]);
    if (direct) return direct;

    const authorization = firstHeader(headers["authorization"]);
    if (authorization && authorization.toLowerCase().startsWith("bearer ")) {
      const token = authorization.slice(7).trim();
      return token || undefined;
    }
    return undefined;
  }

  async validate(apiKey: string): Promise<ApiKeyValidationResult> {
    if (!apiKey) {
      return { valid: false, message: "API key is required", cached: false };
    }

    const cached = this.cache.get(apiKey);
    if (cached && Date.now() < cached.expiresAt) {
      return { valid: cached.valid, message: cached.valid ? undefined : "Invalid API key (cached)", cached: true };
    }

    let valid: boolean;
    try {
      const response = await axios.get<unknown>(`${this.settings.url}${USER_INFO_PATH}`, {
        headers: { Authorization: `Bearer ${apiKey}` },
        timeout: this.settings.timeoutMs,
        proxy: false,
        validateStatus: () => true,
      });
      valid = response.status === 200 && isSuccessfulUserInfo(response.data);
      if (!valid) {
        this.logWarning(`API key ${maskSecret(apiKey)} rejected (status ${response.status})`);
      }
    } catch (error) {
      this.logWarning(`API key validation backend unavailable: ${describeError(error)}`);
      return { valid: false, message: "Authentication service unavailable", cached: false };
    }

    this.remember(apiKey, valid);
    return { valid, message: valid ? undefined : "Invalid API key", cached: false };
  }

  /**
   * @returns number of entries removed
   */
  clear(): number {
    const size = this.cache.size;
    this.cache.clear();
    this.logger.log(`API key validation cache cleared (${size} entries)`);
    return size;
  }

  getStats(): ApiKeyValidationStats {
    const now = Date.now();
    let validKeysCached = 0;
    let invalidKeysCached = 0;
    let expiredEntries = 0;

    for (const entry of this.cache.values()) {
      if (entry.expiresAt <= now) expiredEntries++;
      else if (entry.valid) validKeysCached++;
      else invalidKeysCached++;
    }

    return {
      enabled: this.settings.enabled,
      cacheSize: this.cache.size,
      validKeysCached,
      invalidKeysCached,
      expiredEntries,
      cacheTtlMs: this.settings.ttlMs,
      cacheMaxEntries: this.settings.maxEntries,
    };
  }

  private remember(apiKey: string, valid: boolean): void {
    const now = Date.now();
    this.cache.delete(apiKey);

    if (this.cache.size >= this.settings.maxEntries) {
      for (const [key, entry] of this.cache) {
        if (entry.expiresAt <= now) this.cache.delete(key);
      }
    }
    // Map iteration follows insertion order, so the first key is the oldest verdict
    for (const key of this.cache.keys()) {
      if (this.cache.size < this.settings.maxEntries) break;
      this.cache.delete(key);
    }

    this.cache.set(apiKey, { valid, expiresAt: now + this.settings.ttlMs });
  }
}

function firstHeader(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

function isSuccessfulUserInfo(body: unknown): boolean {
  return (
    typeof body === "object" &&
    body !== null &&
    "success" in body &&
    Boolean(body.success) &&
    "data" in body &&
    Boolean(body.data)
  );
}
