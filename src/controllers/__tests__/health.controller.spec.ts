import { Test, type TestingModule } from "@nestjs/testing";
import { ConfigService, buildGatewaySettings } from "@/config/config.service";
import { AccountPoolService } from "@/accounts/account-pool.service";
import { AccountStoreService, type AccountInput } from "@/accounts/account-store.service";
import { ChallengeCacheService } from "@/challenge-cache/challenge-cache.service";
import { CheckinService } from "@/checkin/checkin.service";
import { FAILOVER_SETTINGS, SiteFailoverService } from "@/failover/site-failover.service";
import { SITE_HEALTH_PROBE } from "@/failover/site-health.probe";
import { ApiKeyValidationService } from "@/gateway/api-key-validation.service";
import { GatewayRouterService } from "@/gateway/gateway-router.service";
import { GatewaySchedulerService } from "@/scheduler/gateway-scheduler.service";
import { ChallengeSessionService } from "@/session/challenge-session.service";
import { TestDataBuilder } from "@/__tests__/utils/test.helpers";
import { HealthController } from "../health.controller";

describe("HealthController", () => {
  const primary = TestDataBuilder.createSite();
  const backup = TestDataBuilder.createBackupSite("backup-a", 1);

  let module: TestingModule;
  let controller: HealthController;
  let failover: SiteFailoverService;
  let pool: AccountPoolService;

  async function createController(accounts: AccountInput[]): Promise<void> {
    pool = new AccountPoolService(new AccountStoreService(undefined, accounts), {
      failureThreshold: 3,
      cooldownMs: 60_000,
      selectionPolicy: "round_robin",
    });

    module = await Test.createTestingModule({
      controllers: [HealthController],
      providers: [
        SiteFailoverService,
        { provide: ConfigService, useValue: new ConfigService([primary, backup], buildGatewaySettings(), "") },
        { provide: SITE_HEALTH_PROBE, useValue: { check: jest.fn() } },
        { provide: FAILOVER_SETTINGS, useValue: { siteFailureThreshold: 1, recoveryThreshold: 3 } },
        { provide: AccountPoolService, useValue: pool },
        {
          provide: ChallengeCacheService,
          useValue: { getStats: () => ({ primary: { state: "valid", hits: 4, misses: 1 } }), peekCookies: jest.fn() },
        },
        {
          provide: ChallengeSessionService,
          useValue: { getStats: () => ({ alive: true, uptimeMs: 1000, restartCount: 0, errorCount: 0, solveCount: 1 }) },
        },
        { provide: GatewaySchedulerService, useValue: { getStatus: () => ({ active: true }) } },
        { provide: GatewayRouterService, useValue: { getStats: () => ({ requests: 5, succeeded: 5 }) } },
        { provide: ApiKeyValidationService, useValue: { getStats: () => ({ enabled: false, cacheSize: 0 }) } },
        { provide: CheckinService, useValue: { getStatus: () => ({ running: false, results: [] }) } },
      ],
    }).compile();

    controller = module.get(HealthController);
    failover = module.get(SiteFailoverService);
  }

  function account(name: string, overrides: Partial<AccountInput> = {}): AccountInput {
    return { name, apiKey: `test-key-${name}`, ...overrides };
  }

  afterEach(async () => {
    await module.close();
  });

  it("should report healthy on the primary with an eligible account", async () => {
    await createController([account("a"), account("b", { enabled: false })]);

    const health = await controller.getHealth();

    expect(health.status).toBe("healthy");
    expect(health.activeSite).toEqual({
      name: "primary",
      url: "https://primary.example.com",
      role: "primary",
      requiresChallengeSolution: true,
    });
    expect(health.accounts).toMatchObject({ total: 2, enabled: 1, eligible: 1 });
    expect(health.failover).toMatchObject({ mode: "ON_PRIMARY", primarySite: "primary", backupSites: ["backup-a"] });
    expect(health.failover).not.toHaveProperty("activeSite");
    expect(health.cache).toEqual({ primary: { state: "valid", hits: 4, misses: 1 } });
    expect(health.gateway).toEqual({ requests: 5, succeeded: 5 });
  });

  it("should report degraded while serving from a backup", async () => {
    await createController([account("a")]);
    failover.reportSiteFailure(primary, "challenge block");

    const health = await controller.getHealth();

    expect(health.status).toBe("degraded");
    expect(health.activeSite).toMatchObject({ name: "backup-a", role: "backup", requiresChallengeSolution: false });
  });

  it("should report unhealthy when no account is eligible", async () => {
    await createController([account("a"), account("b", { apiKey: undefined })]);
    pool.reportFailure("a", "auth_rejected");

    const health = await controller.getHealth();

    expect(health.status).toBe("unhealthy");
    expect(health.accounts).toMatchObject({ total: 2, enabled: 2, eligible: 0 });
    expect(health.accounts.details.map(detail => [detail.name, detail.healthy, detail.hasApiKey])).toEqual([
      ["a", false, true],
      ["b", true, false],
    ]);
  });
});
