import { TestHelpers } from "@/__tests__/utils/test.helpers";
import { StandardService } from "../composed.service";

class TickingService extends StandardService {
  ticks = 0;
  cleaned = false;
  initError?: Error;

  override async initialize(): Promise<void> {
    if (this.initError) throw this.initError;
    this.createInterval(() => {
      this.ticks++;
    }, 100);
  }

  override async cleanup(): Promise<void> {
    this.cleaned = true;
  }

  schedule(delayMs: number, callback: () => void): NodeJS.Timeout {
    return this.createTimeout(callback, delayMs);
  }

  track<T>(task: Promise<T>): Promise<T> {
    return this.trackTask(task);
  }
}

describe("StandardService", () => {
  let service: TickingService;

  beforeEach(() => {
    jest.useFakeTimers();
    service = new TickingService();
  });

  afterEach(async () => {
    await service.onModuleDestroy();
    jest.useRealTimers();
  });

  it("should initialize once and run managed intervals", async () => {
    await Promise.all([service.onModuleInit(), service.onModuleInit()]);
    jest.advanceTimersByTime(250);

    expect(service.isServiceInitialized()).toBe(true);
    expect(service.ticks).toBe(2);
  });

  it("should surface an initialization failure", async () => {
    service.initError = new Error("bad schedule");

    await expect(service.onModuleInit()).rejects.toThrow("bad schedule");
    expect(service.isServiceInitialized()).toBe(false);
  });

  it("should log through the service logger on startup and shutdown", async () => {
    const log = jest.spyOn(service.logger, "log").mockImplementation(() => undefined);

    await service.onModuleInit();
    await service.onModuleDestroy();

    expect(log.mock.calls.map(call => call[0])).toEqual(["TickingService initialized", "TickingService shutting down"]);
  });

  it("should log an initialization failure with its context", async () => {
    const error = jest.spyOn(service.logger, "error").mockImplementation(() => undefined);
    service.initError = new Error("bad schedule");

    await expect(service.onModuleInit()).rejects.toThrow("bad schedule");

    expect(error).toHaveBeenCalledWith("[Service initialization failed] bad schedule", expect.any(String));
  });

  it("should stop every managed timer on destroy", async () => {
    await service.onModuleInit();
    const fired = jest.fn();
    service.schedule(1000, fired);

    await service.onModuleDestroy();
    jest.advanceTimersByTime(5000);

    expect(fired).not.toHaveBeenCalled();
    expect(service.ticks).toBe(0);
    expect(service.isServiceDestroyed()).toBe(true);
    expect(service.cleaned).toBe(true);
  });

  it("should let a cleared timeout go without firing", () => {
    const fired = jest.fn();
    const timer = service.schedule(1000, fired);

    service.clearTimer(timer);
    jest.advanceTimersByTime(1000);

    expect(fired).not.toHaveBeenCalled();
  });

  it("should wait for tracked tasks before cleanup", async () => {
    const task = TestHelpers.createDeferred<string>();
    const tracked = service.track(task.promise);

    let destroyed = false;
    const shutdown = service.onModuleDestroy().then(() => {
      destroyed = true;
    });
    await TestHelpers.flushPromises();
    expect(destroyed).toBe(false);
    expect(service.cleaned).toBe(false);

    task.resolve("done");
    await shutdown;

    await expect(tracked).resolves.toBe("done");
    expect(service.cleaned).toBe(true);
  });

  it("should not hold shutdown on a failed task", async () => {
    const tracked = service.track(Promise.reject(new Error("solve failed")));

    await expect(tracked).rejects.toThrow("solve failed");
    await expect(service.onModuleDestroy()).resolves.toBeUndefined();
  });
});
