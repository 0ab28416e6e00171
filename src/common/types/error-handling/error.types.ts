/**
 * Defines the severity levels for errors, allowing for prioritized handling.
 */
export enum ErrorSeverity {
  LOW = "low",
  MEDIUM = "medium",
  HIGH = "high",
  CRITICAL = "critical",
}

/**
 * Error codes returned in the `error.code` field of every error payload
 */
export enum ErrorCode {
  UNKNOWN_ERROR = "UNKNOWN_ERROR",
  VALIDATION_ERROR = "VALIDATION_ERROR",
  CONFIGURATION_ERROR = "CONFIGURATION_ERROR",
  UNAUTHORIZED = "UNAUTHORIZED",
  NOT_FOUND = "NOT_FOUND",
  HTTP_EXCEPTION = "HTTP_EXCEPTION",

  // Gateway outcomes visible to API clients
  CHALLENGE_UNAVAILABLE = "CHALLENGE_UNAVAILABLE",
  NO_ACCOUNT_AVAILABLE = "NO_ACCOUNT_AVAILABLE",
  ALL_ACCOUNTS_EXHAUSTED = "ALL_ACCOUNTS_EXHAUSTED",
}

export interface IErrorDetails {
  code: ErrorCode;
  message: string;
  severity: ErrorSeverity;
  /**
   * Component the error originated from
   */
  module?: string;
  timestamp: number;
  context?: Record<string, unknown>;
}

/**
 * Standardized error response for APIs.
 */
export interface StandardErrorResponse {
  success: false;
  error: IErrorDetails;
  timestamp: number;
  requestId: string;
}

/**
 * Error response with retry information
 */
export interface EnhancedErrorResponse extends StandardErrorResponse {
  retryable: boolean;
  retryAfter?: number;
}
