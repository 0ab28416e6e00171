import * as fs from "fs";
import * as path from "path";
import { Injectable, Logger } from "@nestjs/common";
import type {
  EnhancedLogContext,
  LogLevel,
  PerformanceLogEntry,
  StructuredLogEntry,
} from "../types/logging";
import { shouldLog } from "../types/logging";

import { ENV } from "@/config/environment.constants";

/**
 * Structured logger for operations an operator will want to audit later:
 * challenge solves, site switches, session restarts, account reloads.
 */
@Injectable()
export class EnhancedLoggerService {
  private readonly logger: Logger;
  private readonly logDirectory: string;
  private readonly enableFileLogging: boolean;
  private readonly enablePerformanceLogging: boolean;
  private readonly currentLogLevel: LogLevel;
  private readonly timers = new Map<string, PerformanceLogEntry>();

  constructor(context: string = "EnhancedLogger") {
    this.logger = new Logger(context);
    this.enableFileLogging = ENV.LOGGING.ENABLE_FILE_LOGGING;
    this.enablePerformanceLogging = ENV.LOGGING.ENABLE_PERFORMANCE_LOGGING;
    this.logDirectory = path.join(process.cwd(), ENV.LOGGING.LOG_DIRECTORY);
    this.currentLogLevel = ENV.LOGGING.LOG_LEVEL;

    this.initializeLogDirectory();
  }

  log(message: string, context?: EnhancedLogContext): void {
    if (!shouldLog("log", this.currentLogLevel)) return;
    const entry = this.createLogEntry("log", message, context);
    this.logger.log(entry.message, entry.context);
    this.writeToFile("application.log", entry);
  }

  warn(message: string, context?: EnhancedLogContext): void {
    if (!shouldLog("warn", this.currentLogLevel)) return;
    const entry = this.createLogEntry("warn", message, context);
    this.logger.warn(entry.message, entry.context);
    this.writeToFile("application.log", entry);
  }

  error(message: string | Error, context?: EnhancedLogContext): void {
    if (!shouldLog("error", this.currentLogLevel)) return;
    const text = typeof message === "string" ? message : message.message;
    const stack = typeof message === "string" ? undefined : message.stack;
    const entry = this.createLogEntry("error", text, context);
    this.logger.error(entry.message, stack, entry.context);
    this.writeToFile("error.log", entry);
  }

  logCriticalOperation(operation: string, component: string, details: Record<string, unknown>, success = true): void {
    const context: EnhancedLogContext = {
      component,
      operation,
      severity: success ? "low" : "high",
      metadata: details,
    };

    const message = `Critical Operation: ${operation} ${success ? "completed successfully" : "failed"}`;
    if (success) {
      this.log(message, context);
    } else {
      this.error(message, context);
    }

    this.writeToFile("audit.log", {
      timestamp: new Date().toISOString(),
      operation,
      component,
      success,
      details,
      pid: process.pid,
    });
  }

  startPerformanceTimer(
    operationId: string,
    operation: string,
    component: string,
    metadata?: Record<string, unknown>
  ): void {
    if (!this.enablePerformanceLogging) return;

    this.timers.set(operationId, {
      operation,
      component,
      startTime: performance.now(),
      duration: 0,
      success: false,
      metadata,
    });
  }

  endPerformanceTimer(operationId: string, success = true, additionalMetadata?: Record<string, unknown>): void {
    if (!this.enablePerformanceLogging) return;

    const entry = this.timers.get(operationId);
    if (!entry) {
      this.logger.warn(`Performance timer not found for operation: ${operationId}`);
      return;
    }
    this.timers.delete(operationId);

    const completed: PerformanceLogEntry = {
      ...entry,
      duration: Math.round(performance.now() - entry.startTime),
      success,
      metadata: { ...entry.metadata, ...additionalMetadata },
    };

    this.logger.debug(`${completed.operation} took ${completed.duration}ms`, {
      component: completed.component,
      success,
    });
    this.writeToFile("performance.log", completed);
  }

  private createLogEntry(level: LogLevel, message: string, context?: EnhancedLogContext): StructuredLogEntry {
    return {
      level,
      message,
      timestamp: Date.now(),
      context: { pid: process.pid, ...context },
    };
  }

  private initializeLogDirectory(): void {
    if (!this.enableFileLogging) return;

    try {
      fs.mkdirSync(this.logDirectory, { recursive: true });
    } catch (error) {
      this.logger.error("Failed to create log directory:", error);
    }
  }

  private writeToFile(fileName: string, entry: object): void {
    if (!this.enableFileLogging) return;

    try {
      fs.appendFileSync(path.join(this.logDirectory, fileName), JSON.stringify(entry) + "\n");
    } catch (error) {
      // Logging through this.logger here could recurse into another file write.
      console.error("Failed to write to log file:", error);
    }
  }
}
