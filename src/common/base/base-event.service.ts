import { EventEmitter } from "events";
import { StandardService } from "./composed.service";

type EventMap = Record<string, unknown[]>;

/**
 * StandardService with a typed EventEmitter attached.
 *
 * `TEvents` maps event names to listener argument tuples, e.g.
 * `{ siteSwitched: [SiteSwitchEvent] }`.
 */
export abstract class BaseEventService<TEvents extends EventMap> extends StandardService {
  private readonly eventEmitter = new EventEmitter();

  constructor(options: { useEnhancedLogging?: boolean } = {}) {
    super(options);
    this.eventEmitter.setMaxListeners(20);
    this.eventEmitter.on("error", (error: unknown) => {
      this.logError(error instanceof Error ? error : new Error(String(error)), "EventEmitter");
    });
  }

  on<K extends keyof TEvents & string>(event: K, listener: (...args: TEvents[K]) => void): this {
    this.eventEmitter.on(event, listener);
    return this;
  }

  once<K extends keyof TEvents & string>(event: K, listener: (...args: TEvents[K]) => void): this {
    this.eventEmitter.once(event, listener);
    return this;
  }

  off<K extends keyof TEvents & string>(event: K, listener: (...args: TEvents[K]) => void): this {
    this.eventEmitter.off(event, listener);
    return this;
  }

  listenerCount<K extends keyof TEvents & string>(event: K): number {
    return this.eventEmitter.listenerCount(event);
  }

  removeAllListeners(): this {
    this.eventEmitter.removeAllListeners();
    return this;
  }

  /**
   * Emit an event; a throwing listener is logged and does not reach the emitter's caller.
   */
  protected emitWithLogging<K extends keyof TEvents & string>(event: K, ...args: TEvents[K]): boolean {
    this.logDebug(`Emitting event: ${event}`);
    try {
      return this.eventEmitter.emit(event, ...args);
    } catch (error) {
      this.logError(error instanceof Error ? error : new Error(String(error)), `listener for ${event}`);
      return true;
    }
  }

  override async cleanup(): Promise<void> {
    this.eventEmitter.removeAllListeners();
  }
}
