/**
 * Environment Constants - Centralized Environment Variable Management
 */

import { EnvironmentUtils } from "@/common/utils/environment.utils";
import type { LogLevel } from "@/common/types/logging";

const LOG_LEVELS: readonly LogLevel[] = ["fatal", "error", "warn", "log", "debug", "verbose"];

const MINUTE_MS = 60_000;
const HOUR_MS = 60 * MINUTE_MS;

// Environment Helpers
export const ENV_HELPERS = {
  isTest: (): boolean => ENV.APPLICATION.NODE_ENV === "test",
  isDevelopment: (): boolean => ENV.APPLICATION.NODE_ENV === "development",
  isProduction: (): boolean => ENV.APPLICATION.NODE_ENV === "production",
};

export const ENV = {
  APPLICATION: {
    NODE_ENV: EnvironmentUtils.parseString("NODE_ENV", "production"),
    PORT: EnvironmentUtils.parseInt("APP_PORT", 18081, { min: 1, max: 65535 }),
    BASE_PATH: EnvironmentUtils.parseString("APP_BASE_PATH", ""),
    API_PREFIX: EnvironmentUtils.parseString("API_PREFIX", "v1", { pattern: /^[A-Za-z0-9_-]+$/ }),
  },

  LOGGING: {
    LOG_LEVEL: EnvironmentUtils.parseEnum("LOG_LEVEL", "log", LOG_LEVELS),
    LOG_DIRECTORY: EnvironmentUtils.parseString("LOG_DIRECTORY", "logs"),
    ENABLE_FILE_LOGGING: EnvironmentUtils.parseBoolean("ENABLE_FILE_LOGGING", false),
    ENABLE_PERFORMANCE_LOGGING: EnvironmentUtils.parseBoolean("ENABLE_PERFORMANCE_LOGGING", false),
  },

  FILES: {
    SITES_FILE: EnvironmentUtils.parseString("SITES_FILE", "config/sites.json"),
    ACCOUNTS_FILE: EnvironmentUtils.parseString("ACCOUNTS_FILE", "data/accounts.json"),
  },

  // Outbound proxy used by sites with requiresProxy and by the automation session
  PROXY: {
    URL: EnvironmentUtils.parseOptional("GATEWAY_PROXY_URL"),
  },

  CHALLENGE: {
    COOKIE_TTL_MS: EnvironmentUtils.parseInt("CHALLENGE_COOKIE_TTL_MS", 45 * MINUTE_MS, {
      min: MINUTE_MS,
      max: 24 * HOUR_MS,
    }),
    PRE_REFRESH_MS: EnvironmentUtils.parseInt("CHALLENGE_PRE_REFRESH_MS", 10 * MINUTE_MS, {
      min: 0,
      max: 12 * HOUR_MS,
    }),
    RETRY_INTERVAL_MS: EnvironmentUtils.parseInt("CHALLENGE_RETRY_INTERVAL_MS", 30_000, { min: 1000, max: HOUR_MS }),
    SOLVE_TIMEOUT_MS: EnvironmentUtils.parseInt("CHALLENGE_SOLVE_TIMEOUT_MS", 60_000, { min: 1000, max: 10 * MINUTE_MS }),
    SETTLE_MS: EnvironmentUtils.parseInt("CHALLENGE_SETTLE_MS", 3000, { min: 0, max: MINUTE_MS }),
    // Re-solves after a session failure before the cache gives up
    SOLVE_RETRIES: EnvironmentUtils.parseInt("CHALLENGE_SOLVE_RETRIES", 2, { min: 0, max: 5 }),
  },

  SESSION: {
    RESTART_INTERVAL_MS: EnvironmentUtils.parseInt("SESSION_RESTART_INTERVAL_MS", 6 * HOUR_MS, {
      min: MINUTE_MS,
      max: 7 * 24 * HOUR_MS,
    }),
    RESTART_CHECK_INTERVAL_MS: EnvironmentUtils.parseInt("SESSION_RESTART_CHECK_INTERVAL_MS", MINUTE_MS, {
      min: 1000,
      max: HOUR_MS,
    }),
    EXECUTABLE_PATH: EnvironmentUtils.parseOptional("SESSION_EXECUTABLE_PATH"),
    HEADLESS: EnvironmentUtils.parseBoolean("SESSION_HEADLESS", true),
  },

  FAILOVER: {
    PRIMARY_CHECK_ENABLED: EnvironmentUtils.parseBoolean("PRIMARY_SITE_CHECK_ENABLED", true),
    PRIMARY_CHECK_INTERVAL_MS: EnvironmentUtils.parseInt("PRIMARY_SITE_CHECK_INTERVAL_MS", 5 * MINUTE_MS, {
      min: 1000,
      max: 24 * HOUR_MS,
    }),
    RECOVERY_THRESHOLD: EnvironmentUtils.parseInt("PRIMARY_RECOVERY_THRESHOLD", 3, { min: 1, max: 100 }),
    SITE_FAILURE_THRESHOLD: EnvironmentUtils.parseInt("SITE_FAILURE_THRESHOLD", 1, { min: 1, max: 100 }),
    PROBE_TIMEOUT_MS: EnvironmentUtils.parseInt("HEALTH_PROBE_TIMEOUT_MS", 10_000, { min: 500, max: MINUTE_MS }),
    PROBE_PATH: EnvironmentUtils.parseString("HEALTH_PROBE_PATH", "/v1/models", { pattern: /^\// }),
  },

  ACCOUNTS: {
    MAX_ACCOUNT_RETRIES: EnvironmentUtils.parseInt("MAX_ACCOUNT_RETRIES", 3, { min: 1, max: 50 }),
    FAILURE_THRESHOLD: EnvironmentUtils.parseInt("ACCOUNT_FAILURE_THRESHOLD", 3, { min: 1, max: 100 }),
    COOLDOWN_MS: EnvironmentUtils.parseInt("ACCOUNT_COOLDOWN_MS", 5 * MINUTE_MS, { min: 1000, max: 24 * HOUR_MS }),
    SELECTION_POLICY: EnvironmentUtils.parseEnum("ACCOUNT_SELECTION_POLICY", "random", ["random", "round_robin"] as const),
  },

  UPSTREAM: {
    TIMEOUT_MS: EnvironmentUtils.parseInt("UPSTREAM_TIMEOUT_MS", 60_000, { min: 1000, max: 10 * MINUTE_MS }),
    STREAM_TIMEOUT_MS: EnvironmentUtils.parseInt("UPSTREAM_STREAM_TIMEOUT_MS", 5 * MINUTE_MS, {
      min: 1000,
      max: HOUR_MS,
    }),
    USER_AGENT: EnvironmentUtils.parseString(
      "UPSTREAM_USER_AGENT",
      "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/138.0.0.0 Safari/537.36"
    ),
    // Body substrings marking an anti-bot block page
    BLOCK_SIGNATURES: EnvironmentUtils.parseList("SITE_BLOCK_SIGNATURES", ["acw_sc__v2", "aliyun_waf", "<html"]),
    // Body substrings marking an account that is out of capacity
    CAPACITY_SIGNATURES: EnvironmentUtils.parseList("ACCOUNT_CAPACITY_SIGNATURES", ["rate limit", "负载已经达到上限"]),
  },

  CHECKIN: {
    ENABLED: EnvironmentUtils.parseBoolean("CHECKIN_ENABLED", true),
    CRON: EnvironmentUtils.parseString("CHECKIN_CRON", "30 2,8,14,20 * * *"),
    TIMEZONE: EnvironmentUtils.parseOptional("CHECKIN_TIMEZONE"),
    PATH: EnvironmentUtils.parseString("CHECKIN_PATH", "/api/user/sign_in", { pattern: /^\// }),
    TIMEOUT_MS: EnvironmentUtils.parseInt("CHECKIN_TIMEOUT_MS", 30_000, { min: 1000, max: 5 * MINUTE_MS }),
  },

  API_KEY_VALIDATION: {
    ENABLED: EnvironmentUtils.parseBoolean("API_KEY_VALIDATION_ENABLED", false),
    URL: EnvironmentUtils.parseOptional("API_KEY_VALIDATION_URL"),
    TTL_MS: EnvironmentUtils.parseInt("API_KEY_VALIDATION_TTL_MS", 5 * MINUTE_MS, { min: 1000, max: 24 * HOUR_MS }),
    TIMEOUT_MS: EnvironmentUtils.parseInt("API_KEY_VALIDATION_TIMEOUT_MS", 10_000, { min: 500, max: MINUTE_MS }),
    MAX_ENTRIES: EnvironmentUtils.parseInt("API_KEY_VALIDATION_MAX_ENTRIES", 10_000, { min: 1, max: 1_000_000 }),
  },

  TIMEOUTS: {
    GRACEFUL_SHUTDOWN_MS: EnvironmentUtils.parseInt("GRACEFUL_SHUTDOWN_TIMEOUT_MS", 30_000, {
      min: 1000,
      max: 5 * MINUTE_MS,
    }),
  },
};
