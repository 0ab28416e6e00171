import { Test, type TestingModule } from "@nestjs/testing";
import { CacheError, SessionError } from "@/common/errors/gateway.errors";
import type { CookieMap, SiteDefinition } from "@/common/types/gateway";
import { ChallengeSessionService } from "@/session/challenge-session.service";
import { TestDataBuilder, TestHelpers } from "@/__tests__/utils/test.helpers";
import { CHALLENGE_CACHE_SETTINGS, ChallengeCacheService } from "../challenge-cache.service";

const T0 = 1_700_000_000_000;
const TTL_MS = 10_000;
const PRE_REFRESH_MS = 2_000;

describe("ChallengeCacheService", () => {
  const site = TestDataBuilder.createSite();
  const openSite = TestDataBuilder.createBackupSite("open", 1);

  let module: TestingModule;
  let cache: ChallengeCacheService;
  let solve: jest.Mock<Promise<CookieMap>, [SiteDefinition]>;
  let nowSpy: jest.SpyInstance<number, []>;

  beforeEach(async () => {
    solve = jest.fn<Promise<CookieMap>, [SiteDefinition]>();
    nowSpy = jest.spyOn(Date, "now").mockReturnValue(T0);

    module = await Test.createTestingModule({
      providers: [
        ChallengeCacheService,
        { provide: ChallengeSessionService, useValue: { solve } },
        { provide: CHALLENGE_CACHE_SETTINGS, useValue: { ttlMs: TTL_MS, preRefreshMs: PRE_REFRESH_MS, solveRetries: 2 } },
      ],
    }).compile();

    cache = module.get(ChallengeCacheService);
  });

  afterEach(async () => {
    await module.close();
  });

  it("should return no cookies for a site without a challenge", async () => {
    await expect(cache.getCookies(openSite)).resolves.toEqual({});
    expect(cache.peekCookies(openSite)).toEqual({});
    expect(solve).not.toHaveBeenCalled();
  });

  it("should share one solve between concurrent misses", async () => {
    const pending = TestHelpers.createDeferred<CookieMap>();
    solve.mockReturnValue(pending.promise);

    const callers = [cache.getCookies(site), cache.getCookies(site), cache.getCookies(site)];
    expect(cache.getEntryState(site)).toBe("refreshing");

    pending.resolve({ acw_sc__v2: "token-1" });
    const results = await Promise.all(callers);

    expect(solve).toHaveBeenCalledTimes(1);
    expect(results).toEqual([{ acw_sc__v2: "token-1" }, { acw_sc__v2: "token-1" }, { acw_sc__v2: "token-1" }]);
    expect(cache.getStats()["primary"]).toMatchObject({ misses: 3, refreshes: 1, successfulRefreshes: 1 });
  });

  it("should store the entry with its expiry and refresh deadline", async () => {
    solve.mockResolvedValue({ acw_sc__v2: "token-1" });

    await cache.getCookies(site);

    expect(cache.getEntry(site)).toEqual({
      site: "primary",
      cookies: { acw_sc__v2: "token-1" },
      solvedAt: T0,
      expiresAt: T0 + TTL_MS,
      refreshDeadline: T0 + TTL_MS - PRE_REFRESH_MS,
    });
    expect(Object.isFrozen(cache.getEntry(site))).toBe(true);
  });

  it("should serve a valid entry without solving again", async () => {
    solve.mockResolvedValue({ acw_sc__v2: "token-1" });
    await cache.getCookies(site);

    nowSpy.mockReturnValue(T0 + TTL_MS - PRE_REFRESH_MS - 1);
    await expect(cache.getCookies(site)).resolves.toEqual({ acw_sc__v2: "token-1" });

    expect(solve).toHaveBeenCalledTimes(1);
    expect(cache.getEntryState(site)).toBe("valid");
    expect(cache.getStats()["primary"]).toMatchObject({ hits: 1, misses: 1 });
  });

  it("should serve the current entry and refresh once in the background inside the pre-refresh window", async () => {
    solve.mockResolvedValueOnce({ acw_sc__v2: "token-1" });
    await cache.getCookies(site);

    const refresh = TestHelpers.createDeferred<CookieMap>();
    solve.mockReturnValueOnce(refresh.promise);
    nowSpy.mockReturnValue(T0 + TTL_MS - PRE_REFRESH_MS);

    await expect(cache.getCookies(site)).resolves.toEqual({ acw_sc__v2: "token-1" });
    await expect(cache.getCookies(site)).resolves.toEqual({ acw_sc__v2: "token-1" });
    expect(solve).toHaveBeenCalledTimes(2);
    expect(cache.getEntryState(site)).toBe("refreshing");

    refresh.resolve({ acw_sc__v2: "token-2" });
    await TestHelpers.flushPromises();

    await expect(cache.getCookies(site)).resolves.toEqual({ acw_sc__v2: "token-2" });
    expect(cache.getEntry(site)?.solvedAt).toBe(T0 + TTL_MS - PRE_REFRESH_MS);
  });

  it("should keep serving cookies until expiry when a background refresh fails", async () => {
    solve.mockResolvedValueOnce({ acw_sc__v2: "token-1" });
    await cache.getCookies(site);

    solve.mockRejectedValue(new Error("challenge page timed out"));
    nowSpy.mockReturnValue(T0 + TTL_MS - 1);

    await expect(cache.getCookies(site)).resolves.toEqual({ acw_sc__v2: "token-1" });
    await TestHelpers.flushPromises();

    expect(cache.getEntryState(site)).toBe("expiring");
    expect(cache.getStats()["primary"]).toMatchObject({
      failedRefreshes: 1,
      staleFallbacks: 1,
      lastError: "challenge page timed out",
    });
    await expect(cache.getCookies(site)).resolves.toEqual({ acw_sc__v2: "token-1" });
  });

  it("should solve again once the entry has expired", async () => {
    solve.mockResolvedValueOnce({ acw_sc__v2: "token-1" });
    await cache.getCookies(site);

    nowSpy.mockReturnValue(T0 + TTL_MS);
    expect(cache.getEntryState(site)).toBe("expired");
    expect(cache.peekCookies(site)).toBeUndefined();

    solve.mockResolvedValueOnce({ acw_sc__v2: "token-2" });
    await expect(cache.getCookies(site)).resolves.toEqual({ acw_sc__v2: "token-2" });
    expect(solve).toHaveBeenCalledTimes(2);
  });

  it("should raise CacheError when the solve fails and retry on the next call", async () => {
    solve.mockRejectedValueOnce(new Error("browser crashed"));

    const error = await cache.getCookies(site).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(CacheError);
    expect(error).toMatchObject({ site: "primary", message: "Challenge solve failed for primary: browser crashed" });
    expect(cache.getEntryState(site)).toBe("empty");

    solve.mockResolvedValueOnce({ acw_sc__v2: "token-1" });
    await expect(cache.getCookies(site)).resolves.toEqual({ acw_sc__v2: "token-1" });
  });

  it("should solve again when the browser crashes mid-solve", async () => {
    solve
      .mockRejectedValueOnce(new SessionError("crashed", "browser died"))
      .mockResolvedValueOnce({ acw_sc__v2: "token-1" });

    const callers = [cache.getCookies(site), cache.getCookies(site)];

    await expect(Promise.all(callers)).resolves.toEqual([{ acw_sc__v2: "token-1" }, { acw_sc__v2: "token-1" }]);
    expect(solve).toHaveBeenCalledTimes(2);
    expect(cache.getStats()["primary"]).toMatchObject({
      refreshes: 1,
      successfulRefreshes: 1,
      failedRefreshes: 0,
      solveRetries: 1,
    });
  });

  it("should raise CacheError once every re-solve has failed", async () => {
    solve
      .mockRejectedValueOnce(new SessionError("crashed", "browser died"))
      .mockRejectedValueOnce(new SessionError("challenge_timeout", "challenge did not settle"))
      .mockRejectedValueOnce(new SessionError("extraction_failed", "no acw_sc__v2 cookie"));

    const error = await cache.getCookies(site).catch((e: unknown) => e);

    expect(solve).toHaveBeenCalledTimes(3);
    expect(error).toBeInstanceOf(CacheError);
    expect(error).toMatchObject({ message: "Challenge solve failed for primary: no acw_sc__v2 cookie" });
    expect(cache.getStats()["primary"]).toMatchObject({ refreshes: 1, failedRefreshes: 1, solveRetries: 2 });
  });

  it("should not re-solve a failure that did not come from the session", async () => {
    solve.mockRejectedValueOnce(new Error("unexpected"));

    await expect(cache.getCookies(site)).rejects.toBeInstanceOf(CacheError);
    expect(solve).toHaveBeenCalledTimes(1);
  });

  it("should not store the result of a solve that started before an invalidation", async () => {
    const stale = TestHelpers.createDeferred<CookieMap>();
    solve.mockReturnValueOnce(stale.promise);
    const staleCaller = cache.getCookies(site);

    cache.invalidate(site);
    solve.mockResolvedValueOnce({ acw_sc__v2: "fresh" });
    await expect(cache.getCookies(site)).resolves.toEqual({ acw_sc__v2: "fresh" });

    stale.resolve({ acw_sc__v2: "stale" });
    await expect(staleCaller).resolves.toEqual({ acw_sc__v2: "stale" });

    expect(cache.getEntry(site)?.cookies).toEqual({ acw_sc__v2: "fresh" });
  });

  it("should solve again on forceRefresh even when the entry is valid", async () => {
    solve.mockResolvedValueOnce({ acw_sc__v2: "token-1" });
    await cache.getCookies(site);

    solve.mockResolvedValueOnce({ acw_sc__v2: "token-2" });
    await expect(cache.forceRefresh(site)).resolves.toEqual({ acw_sc__v2: "token-2" });
    expect(cache.peekCookies(site)).toEqual({ acw_sc__v2: "token-2" });
  });

  it("should report remaining TTL per site", async () => {
    solve.mockResolvedValue({ acw_sc__v2: "token-1" });
    await cache.getCookies(site);

    nowSpy.mockReturnValue(T0 + 4_000);
    expect(cache.getStats()["primary"]).toMatchObject({
      state: "valid",
      solvedAt: T0,
      expiresAt: T0 + TTL_MS,
      ttlRemainingMs: 6_000,
    });
  });
});
