import { OnModuleInit, OnModuleDestroy } from "@nestjs/common";
import type { AbstractConstructor } from "../../types/services";
import type { Loggable } from "./logging.mixin";

/**
 * Lifecycle management capabilities
 */
export interface LifecycleCapabilities {
  isServiceInitialized(): boolean;
  isServiceDestroyed(): boolean;
  createTimeout(callback: () => void, delay: number): NodeJS.Timeout;
  createInterval(callback: () => void, delay: number): NodeJS.Timeout;
  clearTimer(timer: NodeJS.Timeout): void;
  clearInterval(interval: NodeJS.Timeout): void;
  trackTask<T>(task: Promise<T>): Promise<T>;
  initialize?(): Promise<void>;
  cleanup?(): Promise<void>;
}

/**
 * Mixin that adds lifecycle management to a service.
 *
 * Timers created through createTimeout/createInterval are cleared on destroy,
 * and promises registered with trackTask are awaited before cleanup() runs.
 */
export function WithLifecycle<TBase extends AbstractConstructor<Loggable>>(Base: TBase) {
  abstract class LifecycleMixin extends Base implements OnModuleInit, OnModuleDestroy, LifecycleCapabilities {
    public isInitialized = false;
    public isDestroyed = false;
    public initializationPromise?: Promise<void>;
    public cleanupPromise?: Promise<void>;
    public readonly managedTimers = new Set<NodeJS.Timeout>();
    public readonly managedIntervals = new Set<NodeJS.Timeout>();
    public readonly inFlightTasks = new Set<Promise<unknown>>();

    // eslint-disable-next-line @typescript-eslint/no-explicit-any
    constructor(...args: any[]) {
      super(...args);
    }

    async onModuleInit(): Promise<void> {
      if (!this.initializationPromise) {
        this.initializationPromise = this.performInitialization();
      }
      return this.initializationPromise;
    }

    async onModuleDestroy(): Promise<void> {
      if (!this.cleanupPromise) {
        this.cleanupPromise = this.performCleanup();
      }
      return this.cleanupPromise;
    }

    isServiceInitialized(): boolean {
      return this.isInitialized;
    }

    isServiceDestroyed(): boolean {
      return this.isDestroyed;
    }

    createTimeout(callback: () => void, delay: number): NodeJS.Timeout {
      const timer = setTimeout(() => {
        this.managedTimers.delete(timer);
        callback();
      }, delay);
      this.managedTimers.add(timer);
      return timer;
    }

    createInterval(callback: () => void, delay: number): NodeJS.Timeout {
      const interval = setInterval(callback, delay);
      this.managedIntervals.add(interval);
      return interval;
    }

    clearTimer(timer: NodeJS.Timeout): void {
      clearTimeout(timer);
      this.managedTimers.delete(timer);
    }

    clearInterval(interval: NodeJS.Timeout): void {
      clearInterval(interval);
      this.managedIntervals.delete(interval);
    }

    /**
     * Register work that shutdown has to wait for. Rejections still reach the caller.
     */
    trackTask<T>(task: Promise<T>): Promise<T> {
      const settled = task.then(
        () => undefined,
        () => undefined
      );
      this.inFlightTasks.add(settled);
      void settled.then(() => this.inFlightTasks.delete(settled));
      return task;
    }

    initialize?(): Promise<void>;
    cleanup?(): Promise<void>;

    public async performInitialization(): Promise<void> {
      try {
        await this.initialize?.();
        this.isInitialized = true;
        this.logInitialization();
      } catch (error) {
        this.logError(error instanceof Error ? error : new Error(String(error)), "Service initialization failed");
        throw error;
      }
    }

    public async performCleanup(): Promise<void> {
      this.isDestroyed = true;
      this.logShutdown();

      this.managedTimers.forEach(timer => clearTimeout(timer));
      this.managedIntervals.forEach(interval => clearInterval(interval));
      this.managedTimers.clear();
      this.managedIntervals.clear();

      await Promise.all(this.inFlightTasks);

      try {
        await this.cleanup?.();
      } catch (error) {
        this.logError(error instanceof Error ? error : new Error(String(error)), "Service cleanup failed");
        throw error;
      }
    }
  }

  return LifecycleMixin;
}
