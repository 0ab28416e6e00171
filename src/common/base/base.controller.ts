import { v4 as uuidv4 } from "uuid";
import { BaseService } from "./base.service";

/**
 * Base controller with request ids, operation timing and uptime
 */
export abstract class BaseController extends BaseService {
  protected readonly startupTime: number = Date.now();

  public generateRequestId(): string {
    return uuidv4();
  }

  /**
   * Run a controller operation with timing. Slow operations are logged as warnings;
   * errors are logged and re-thrown so the exception filter can map them.
   */
  protected async executeOperation<T>(
    operation: () => Promise<T>,
    operationName: string,
    performanceThreshold = 1000
  ): Promise<T> {
    const requestId = this.generateRequestId();
    const startedAt = performance.now();

    try {
      const result = await operation();
      const duration = Math.round(performance.now() - startedAt);
      if (duration > performanceThreshold) {
        this.logger.warn(`${operationName} took ${duration}ms (threshold ${performanceThreshold}ms)`, { requestId });
      } else {
        this.logger.debug(`${operationName} completed in ${duration}ms`, { requestId });
      }
      return result;
    } catch (error) {
      const duration = Math.round(performance.now() - startedAt);
      this.logger.error(`${operationName} failed after ${duration}ms: ${error instanceof Error ? error.message : String(error)}`);
      throw error;
    }
  }

  protected getUptime(): number {
    return Date.now() - this.startupTime;
  }
}
