import { Test, type TestingModule } from "@nestjs/testing";
import { SiteExhaustedError } from "@/common/errors/gateway.errors";
import type { CookieMap, SiteDefinition } from "@/common/types/gateway";
import { ConfigService, buildGatewaySettings } from "@/config/config.service";
import { ChallengeCacheService } from "@/challenge-cache/challenge-cache.service";
import { TestDataBuilder } from "@/__tests__/utils/test.helpers";
import { FAILOVER_SETTINGS, SiteFailoverService, type SiteSwitchEvent } from "../site-failover.service";
import { SITE_HEALTH_PROBE, type ProbeResult } from "../site-health.probe";

function probeResult(healthy: boolean): ProbeResult {
  return {
    healthy,
    outcome: healthy ? "ok" : "server_error",
    status: healthy ? 200 : 502,
    latencyMs: 5,
    checkedAt: 1_000,
  };
}

describe("SiteFailoverService", () => {
  const primary = TestDataBuilder.createSite();
  const backupA = TestDataBuilder.createBackupSite("backup-a", 1);
  const backupB = TestDataBuilder.createBackupSite("backup-b", 2);

  let module: TestingModule;
  let failover: SiteFailoverService;
  let check: jest.Mock<Promise<ProbeResult>, [SiteDefinition, CookieMap | undefined]>;
  let peekCookies: jest.Mock<CookieMap | undefined, [SiteDefinition]>;
  let switches: SiteSwitchEvent[];

  async function createService(siteFailureThreshold = 1, recoveryThreshold = 3): Promise<void> {
    module = await Test.createTestingModule({
      providers: [
        SiteFailoverService,
        { provide: ConfigService, useValue: new ConfigService([primary, backupA, backupB], buildGatewaySettings(), "") },
        { provide: ChallengeCacheService, useValue: { peekCookies } },
        { provide: SITE_HEALTH_PROBE, useValue: { check } },
        { provide: FAILOVER_SETTINGS, useValue: { siteFailureThreshold, recoveryThreshold } },
      ],
    }).compile();

    failover = module.get(SiteFailoverService);
    switches = [];
    failover.on("siteSwitched", event => switches.push(event));
  }

  beforeEach(async () => {
    check = jest.fn<Promise<ProbeResult>, [SiteDefinition, CookieMap | undefined]>();
    peekCookies = jest.fn<CookieMap | undefined, [SiteDefinition]>().mockReturnValue({ acw_sc__v2: "cached" });
    await createService();
  });

  afterEach(async () => {
    await module.close();
  });

  it("should start on the primary site", () => {
    expect(failover.active()).toBe(primary);
    expect(failover.isOnPrimary()).toBe(true);
    expect(failover.getSnapshot()).toMatchObject({ mode: "ON_PRIMARY", backupIndex: null, switchCount: 0 });
  });

  it("should move forward through the backups in order and never wrap", () => {
    expect(failover.reportSiteFailure(primary, "challenge block")).toBe(backupA);
    expect(failover.getSnapshot()).toMatchObject({ mode: "ON_BACKUP", backupIndex: 0, failedBackups: [] });

    expect(failover.reportSiteFailure(backupA, "502 with empty body")).toBe(backupB);
    expect(failover.getSnapshot()).toMatchObject({ backupIndex: 1, failedBackups: ["backup-a"], switchCount: 2 });

    expect(() => failover.reportSiteFailure(backupB, "connection refused")).toThrow(SiteExhaustedError);
    expect(failover.active()).toBe(backupB);
    expect(switches.map(event => `${event.from}->${event.to}`)).toEqual(["primary->backup-a", "backup-a->backup-b"]);
  });

  it("should name the last site in the exhaustion error", () => {
    failover.reportSiteFailure(primary, "block");
    failover.reportSiteFailure(backupA, "block");

    expect(() => failover.reportSiteFailure(backupB, "block")).toThrow(
      "All configured sites have failed (last: backup-b)"
    );
  });

  it("should ignore failures reported for a site that is no longer active", () => {
    failover.reportSiteFailure(primary, "block");

    expect(failover.reportSiteFailure(primary, "late report")).toBe(backupA);
    expect(failover.getSnapshot().switchCount).toBe(1);
  });

  it("should wait for the failure threshold before switching", async () => {
    await module.close();
    await createService(2);

    expect(failover.reportSiteFailure(primary, "block")).toBe(primary);
    expect(failover.getStatus().siteFailureCounts).toEqual({ primary: 1 });

    failover.reportSiteSuccess(primary);
    expect(failover.reportSiteFailure(primary, "block")).toBe(primary);

    expect(failover.reportSiteFailure(primary, "block")).toBe(backupA);
    expect(failover.getStatus().siteFailureCounts).toEqual({ primary: 2 });
  });

  it("should replace the snapshot instead of mutating it", () => {
    const before = failover.getSnapshot();
    failover.reportSiteFailure(primary, "block");

    expect(Object.isFrozen(before)).toBe(true);
    expect(before.activeSite).toBe(primary);
    expect(failover.getSnapshot()).not.toBe(before);
  });

  it("should not probe while on the primary", async () => {
    await expect(failover.probePrimary()).resolves.toBeUndefined();
    expect(check).not.toHaveBeenCalled();
  });

  it("should return to the primary after three consecutive healthy probes", async () => {
    failover.reportSiteFailure(primary, "block");
    check.mockResolvedValue(probeResult(true));

    await failover.probePrimary();
    await failover.probePrimary();
    expect(failover.active()).toBe(backupA);
    expect(failover.getSnapshot().consecutivePrimaryProbeSuccesses).toBe(2);

    await failover.probePrimary();

    expect(failover.active()).toBe(primary);
    expect(failover.getSnapshot()).toMatchObject({
      mode: "ON_PRIMARY",
      recoveryCount: 1,
      consecutivePrimaryProbeSuccesses: 0,
      failedBackups: [],
      probeCount: 3,
    });
    expect(check).toHaveBeenCalledWith(primary, { acw_sc__v2: "cached" });
  });

  it("should restart the recovery count after an unhealthy probe", async () => {
    failover.reportSiteFailure(primary, "block");
    check
      .mockResolvedValueOnce(probeResult(true))
      .mockResolvedValueOnce(probeResult(true))
      .mockResolvedValueOnce(probeResult(false))
      .mockResolvedValue(probeResult(true));

    for (let i = 0; i < 5; i++) {
      await failover.probePrimary();
    }
    expect(failover.active()).toBe(backupA);
    expect(failover.getSnapshot()).toMatchObject({
      consecutivePrimaryProbeSuccesses: 2,
      consecutivePrimaryProbeFailures: 0,
    });

    await failover.probePrimary();
    expect(failover.active()).toBe(primary);
  });

  it("should switch to the primary on request only when one probe is healthy", async () => {
    await expect(failover.switchToPrimary()).resolves.toEqual({ switched: false });

    failover.reportSiteFailure(primary, "block");
    check.mockResolvedValueOnce(probeResult(false));
    const refused = await failover.switchToPrimary();
    expect(refused.switched).toBe(false);
    expect(refused.probe?.outcome).toBe("server_error");
    expect(failover.active()).toBe(backupA);

    check.mockResolvedValueOnce(probeResult(true));
    await expect(failover.switchToPrimary()).resolves.toMatchObject({ switched: true });
    expect(failover.active()).toBe(primary);
  });

  it("should force a switch to the primary without probing", () => {
    expect(failover.forceSwitchToPrimary()).toBe(false);

    failover.reportSiteFailure(primary, "block");
    failover.reportSiteFailure(backupA, "block");

    expect(failover.forceSwitchToPrimary()).toBe(true);
    expect(failover.active()).toBe(primary);
    expect(failover.getSnapshot().lastSwitchReason).toBe("forced by operator");
    expect(check).not.toHaveBeenCalled();

    // A fresh failure sequence starts from the first backup again
    expect(failover.reportSiteFailure(primary, "block")).toBe(backupA);
  });

  it("should switch to the next backup on operator request", () => {
    expect(failover.switchToNext()).toBe(backupA);
    expect(failover.getSnapshot().lastSwitchReason).toBe("manual switch");
  });

  it("should describe the configured topology in its status", () => {
    expect(failover.getStatus()).toMatchObject({
      primarySite: "primary",
      backupSites: ["backup-a", "backup-b"],
      siteFailureCounts: {},
    });
  });
});
