import type { LogLevel as NestLogLevel } from "@nestjs/common";

/**
 * Use NestJS LogLevel type for consistency with framework
 * Valid values: "error" | "warn" | "log" | "debug" | "verbose" | "fatal"
 */
export type LogLevel = NestLogLevel;

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  fatal: 0,
  error: 1,
  warn: 2,
  log: 3,
  debug: 4,
  verbose: 5,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVEL_PRIORITY, value);
}

/**
 * Check if a message should be logged based on current log level
 */
export function shouldLog(messageLevel: LogLevel, currentLevel: LogLevel): boolean {
  return LOG_LEVEL_PRIORITY[messageLevel] <= LOG_LEVEL_PRIORITY[currentLevel];
}

/**
 * Defines severity levels for error classification
 */
export type SeverityLevel = "low" | "medium" | "high" | "critical";

export interface IContext {
  component?: string;
  operation?: string;
}

export interface EnhancedLogContext extends IContext {
  severity?: SeverityLevel;
  metadata?: Record<string, unknown>;
}

/**
 * One line of structured output, as written to the log files
 */
export interface StructuredLogEntry {
  level: LogLevel;
  message: string;
  timestamp: number;
  context: EnhancedLogContext & { pid: number };
}

export interface PerformanceLogEntry {
  operation: string;
  component: string;
  startTime: number;
  duration: number;
  success: boolean;
  metadata?: Record<string, unknown>;
}
