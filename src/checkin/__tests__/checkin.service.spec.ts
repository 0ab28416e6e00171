import { Test, type TestingModule } from "@nestjs/testing";
import axios, { type AxiosResponse } from "axios";
import { CacheError } from "@/common/errors/gateway.errors";
import type { CookieMap, SiteDefinition } from "@/common/types/gateway";
import { ConfigService, buildGatewaySettings } from "@/config/config.service";
import { AccountStoreService, type AccountInput } from "@/accounts/account-store.service";
import { ChallengeCacheService } from "@/challenge-cache/challenge-cache.service";
import { SiteFailoverService } from "@/failover/site-failover.service";
import { TestDataBuilder, TestHelpers } from "@/__tests__/utils/test.helpers";
import { CHECKIN_SETTINGS, CheckinService, interpretCheckinBody } from "../checkin.service";

jest.mock("axios");
const mockedAxios = axios as jest.Mocked<typeof axios>;

describe("CheckinService", () => {
  const primary = TestDataBuilder.createSite({ requiresProxy: true });
  const backup = TestDataBuilder.createBackupSite("backup-a", 1);
  const proxy = { protocol: "http" as const, host: "127.0.0.1", port: 7890 };

  let module: TestingModule;
  let service: CheckinService;
  let active: jest.Mock<SiteDefinition, []>;
  let getCookies: jest.Mock<Promise<CookieMap>, [SiteDefinition]>;

  async function createService(accounts: AccountInput[]): Promise<void> {
    module = await Test.createTestingModule({
      providers: [
        CheckinService,
        { provide: ConfigService, useValue: new ConfigService([primary, backup], buildGatewaySettings(proxy), "") },
        { provide: AccountStoreService, useValue: new AccountStoreService(undefined, accounts) },
        { provide: SiteFailoverService, useValue: { active } },
        { provide: ChallengeCacheService, useValue: { getCookies } },
        {
          provide: CHECKIN_SETTINGS,
          useValue: { path: "/api/user/checkin", timeoutMs: 5000, accountDelayMs: 0, userAgent: "test-agent", proxy },
        },
      ],
    }).compile();

    service = module.get(CheckinService);
  }

  function account(name: string, overrides: Partial<AccountInput> = {}): AccountInput {
    return { name, apiUser: "1001", apiKey: `test-key-${name}`, cookies: { session: `test-session-${name}` }, ...overrides };
  }

  function postedUrls(): string[] {
    return mockedAxios.post.mock.calls.map(([url]) => url);
  }

  beforeEach(() => {
    active = jest.fn<SiteDefinition, []>().mockReturnValue(primary);
    getCookies = jest.fn<Promise<CookieMap>, [SiteDefinition]>(async (site): Promise<CookieMap> =>
      site.requiresChallengeSolution ? { acw_sc__v2: "solved" } : {}
    );
  });

  afterEach(async () => {
    await module.close();
  });

  it("should check in on the active site with the session cookie and user id", async () => {
    await createService([account("a")]);
    mockedAxios.post.mockResolvedValue(TestHelpers.axiosResponse(200, { success: true, message: "签到成功" }));

    const run = await service.runForAllAccounts();

    expect(run).toMatchObject({
      success: true,
      message: "Check-in completed: 1/1 successful",
      totalAccounts: 1,
      successCount: 1,
      failedCount: 0,
    });
    expect(run.results[0]).toMatchObject({ account: "a", success: true, message: "签到成功", site: "primary" });
    expect(mockedAxios.post).toHaveBeenCalledWith(
      "https://primary.example.com/api/user/checkin",
      undefined,
      expect.objectContaining({
        headers: expect.objectContaining({
          Cookie: "acw_sc__v2=solved; session=test-session-a",
          "new-api-user": "1001",
          "User-Agent": "test-agent",
          Origin: "https://primary.example.com",
        }),
        timeout: 5000,
        proxy,
      })
    );
  });

  it("should start with the active backup and fall back to the other sites in order", async () => {
    active.mockReturnValue(backup);
    await createService([account("a")]);
    mockedAxios.post
      .mockResolvedValueOnce(TestHelpers.axiosResponse(200, "<html></html>", { "content-type": "text/html" }))
      .mockResolvedValueOnce(TestHelpers.axiosResponse(200, { ret: 1, msg: "ok" }));

    const run = await service.runForAllAccounts();

    expect(postedUrls()).toEqual([
      "https://backup-a.example.com/api/user/checkin",
      "https://primary.example.com/api/user/checkin",
    ]);
    expect(mockedAxios.post.mock.calls[0][2]).toMatchObject({ proxy: false });
    expect(run.results[0]).toMatchObject({ success: true, message: "ok", site: "primary" });
  });

  it("should report the last site's failure when every site fails", async () => {
    await createService([account("a")]);
    mockedAxios.post
      .mockRejectedValueOnce(new Error("connect ECONNRESET"))
      .mockResolvedValueOnce(TestHelpers.axiosResponse(500, { message: "boom" }));

    const run = await service.runForAllAccounts();

    expect(run).toMatchObject({ success: false, successCount: 0, failedCount: 1 });
    expect(run.results[0]).toMatchObject({ success: false, message: "[backup-a] HTTP 500", site: undefined });
  });

  it("should fetch challenge cookies once per site per run", async () => {
    await createService([account("a"), account("b")]);
    getCookies.mockRejectedValueOnce(new CacheError("primary", new Error("browser crashed")));
    mockedAxios.post.mockResolvedValue(TestHelpers.axiosResponse(200, { code: 0 }));

    const run = await service.runForAllAccounts();

    expect(getCookies.mock.calls.map(([site]) => site.name)).toEqual(["primary", "backup-a"]);
    expect(postedUrls()).toEqual([
      "https://backup-a.example.com/api/user/checkin",
      "https://backup-a.example.com/api/user/checkin",
    ]);
    expect(run.results.map(result => result.site)).toEqual(["backup-a", "backup-a"]);
  });

  it("should skip disabled accounts and fail accounts without credentials", async () => {
    await createService([
      account("a", { cookies: {} }),
      account("b", { apiUser: undefined }),
      account("c", { enabled: false }),
    ]);

    const run = await service.runForAllAccounts();

    expect(run.totalAccounts).toBe(2);
    expect(run.results.map(result => [result.account, result.message])).toEqual([
      ["a", "Missing session cookie"],
      ["b", "Missing api user"],
    ]);
    expect(mockedAxios.post).not.toHaveBeenCalled();
  });

  it("should report a run without enabled accounts", async () => {
    await createService([account("a", { enabled: false })]);

    await expect(service.runForAllAccounts()).resolves.toMatchObject({
      success: false,
      message: "No enabled accounts",
      totalAccounts: 0,
    });
  });

  it("should share a run in progress and record its results", async () => {
    await createService([account("a")]);
    const pending = TestHelpers.createDeferred<AxiosResponse>();
    mockedAxios.post.mockReturnValueOnce(pending.promise);

    const first = service.runForAllAccounts();
    const second = service.runForAllAccounts();
    expect(second).toBe(first);
    await TestHelpers.flushPromises();
    expect(service.getStatus().running).toBe(true);

    pending.resolve(TestHelpers.axiosResponse(200, { success: false, message: "今天已签到" }));
    await first;

    expect(mockedAxios.post).toHaveBeenCalledTimes(1);
    expect(service.getStatus()).toMatchObject({ running: false, totalSuccess: 1, totalFailed: 0 });
    expect(service.getStatus().results[0]).toMatchObject({ account: "a", success: true, message: "今天已签到" });
  });
});

describe("interpretCheckinBody", () => {
  it("should accept the success markers", () => {
    expect(interpretCheckinBody({ ret: 1 })).toEqual({ done: true, success: true, message: "Check-in successful" });
    expect(interpretCheckinBody({ code: 0, msg: "done" })).toEqual({ done: true, success: true, message: "done" });
    expect(interpretCheckinBody({ success: true, message: "" })).toEqual({
      done: true,
      success: true,
      message: "Check-in successful",
    });
  });

  it("should treat an already-checked-in answer as success", () => {
    expect(interpretCheckinBody({ success: false, message: "Already checked in today" })).toEqual({
      done: true,
      success: true,
      message: "Already checked in today",
    });
  });

  it("should report other answers as failures", () => {
    expect(interpretCheckinBody({ success: false, message: "quota error" })).toEqual({
      done: true,
      success: false,
      message: "quota error",
    });
    expect(interpretCheckinBody({ ret: 0 })).toEqual({ done: true, success: false, message: "Check-in failed" });
    expect(interpretCheckinBody(null)).toEqual({ done: true, success: false, message: "Empty check-in response" });
  });

  it("should read plain text bodies", () => {
    expect(interpretCheckinBody("SUCCESS")).toEqual({
      done: true,
      success: true,
      message: "Check-in successful (non-JSON response)",
    });
    expect(interpretCheckinBody("nope")).toEqual({ done: true, success: false, message: "Invalid response format: nope" });
  });
});
