import { ArgumentsHost, Catch, ExceptionFilter, HttpException, HttpStatus, Injectable, Logger } from "@nestjs/common";
import type { Request, Response } from "express";
import { v4 as uuidv4 } from "uuid";
import { ConfigurationError, GatewayError, type GatewayErrorReason } from "@/common/errors/gateway.errors";
import { ErrorCode, ErrorSeverity } from "@/common/types/error-handling";
import type { EnhancedErrorResponse, IErrorDetails } from "@/common/types/error-handling";

interface MappedError {
  status: number;
  details: Omit<IErrorDetails, "timestamp">;
  retryable: boolean;
  retryAfter?: number;
}

const GATEWAY_ERRORS: Record<GatewayErrorReason, { status: number; code: ErrorCode; severity: ErrorSeverity; retryAfter: number }> = {
  challenge_unavailable: {
    status: HttpStatus.SERVICE_UNAVAILABLE,
    code: ErrorCode.CHALLENGE_UNAVAILABLE,
    severity: ErrorSeverity.HIGH,
    retryAfter: 30_000,
  },
  no_account_available: {
    status: HttpStatus.TOO_MANY_REQUESTS,
    code: ErrorCode.NO_ACCOUNT_AVAILABLE,
    severity: ErrorSeverity.MEDIUM,
    retryAfter: 60_000,
  },
  all_accounts_exhausted: {
    status: HttpStatus.BAD_GATEWAY,
    code: ErrorCode.ALL_ACCOUNTS_EXHAUSTED,
    severity: ErrorSeverity.HIGH,
    retryAfter: 15_000,
  },
};

const RETRYABLE_STATUSES: ReadonlySet<number> = new Set([
  HttpStatus.REQUEST_TIMEOUT,
  HttpStatus.TOO_MANY_REQUESTS,
  HttpStatus.BAD_GATEWAY,
  HttpStatus.SERVICE_UNAVAILABLE,
  HttpStatus.GATEWAY_TIMEOUT,
]);

const ERROR_CODES: ReadonlySet<string> = new Set(Object.values(ErrorCode));

function isErrorCode(value: unknown): value is ErrorCode {
  return typeof value === "string" && ERROR_CODES.has(value);
}

/**
 * Global exception filter producing the standard error payload.
 *
 * Gateway errors keep their own status per reason so clients can tell
 * "no capacity" (429) from "upstream outage" (502) and "challenge down" (503).
 */
@Catch()
@Injectable()
export class HttpExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(HttpExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();

    if (response.headersSent) {
      // A streamed body was already under way
      this.logger.error(`${request.method} ${request.path} failed after headers were sent`, this.stackOf(exception));
      response.end();
      return;
    }

    const mapped = this.mapException(exception);
    const errorResponse = this.buildResponse(mapped, request);

    response.setHeader("X-Content-Type-Options", "nosniff");
    if (errorResponse.retryAfter) {
      response.setHeader("Retry-After", Math.ceil(errorResponse.retryAfter / 1000));
    }

    this.logError(exception, errorResponse, request, mapped.status);
    response.status(mapped.status).json(errorResponse);
  }

  private mapException(exception: unknown): MappedError {
    if (exception instanceof GatewayError) {
      const mapping = GATEWAY_ERRORS[exception.reason];
      return {
        status: mapping.status,
        details: {
          code: mapping.code,
          message: exception.message,
          severity: mapping.severity,
          module: "gateway",
          context: { reason: exception.reason, cause: exception.causeMessage },
        },
        retryable: true,
        retryAfter: mapping.retryAfter,
      };
    }

    if (exception instanceof ConfigurationError) {
      return {
        status: HttpStatus.INTERNAL_SERVER_ERROR,
        details: {
          code: ErrorCode.CONFIGURATION_ERROR,
          message: exception.message,
          severity: ErrorSeverity.HIGH,
          module: "config",
          context: { violations: [...exception.violations] },
        },
        retryable: false,
      };
    }

    if (exception instanceof HttpException) {
      return this.mapHttpException(exception);
    }

    return {
      status: HttpStatus.INTERNAL_SERVER_ERROR,
      details: {
        code: ErrorCode.UNKNOWN_ERROR,
        message: exception instanceof Error ? exception.message : "Unknown error occurred",
        severity: ErrorSeverity.CRITICAL,
      },
      retryable: false,
    };
  }

  private mapHttpException(exception: HttpException): MappedError {
    const status = exception.getStatus();
    const body = exception.getResponse();
    const retryable = RETRYABLE_STATUSES.has(status);
    let code = this.codeForStatus(status);
    let message = exception.message;

    if (typeof body === "string") {
      message = body;
    } else if (typeof body === "object" && body !== null) {
      if ("code" in body && isErrorCode(body.code)) {
        code = body.code;
      }
      if ("message" in body) {
        if (typeof body.message === "string") message = body.message;
        else if (Array.isArray(body.message)) message = body.message.map(String).join("; ");
      }
    }

    return {
      status,
      details: {
        code,
        message,
        severity: status >= 500 ? ErrorSeverity.CRITICAL : ErrorSeverity.MEDIUM,
      },
      retryable,
      retryAfter: retryable ? 5_000 : undefined,
    };
  }

  private codeForStatus(status: number): ErrorCode {
    switch (status) {
      case HttpStatus.UNAUTHORIZED:
        return ErrorCode.UNAUTHORIZED;
      case HttpStatus.NOT_FOUND:
        return ErrorCode.NOT_FOUND;
      case HttpStatus.BAD_REQUEST:
      case HttpStatus.UNPROCESSABLE_ENTITY:
        return ErrorCode.VALIDATION_ERROR;
      default:
        return ErrorCode.HTTP_EXCEPTION;
    }
  }

  private buildResponse(mapped: MappedError, request: Request): EnhancedErrorResponse {
    const timestamp = Date.now();
    return {
      success: false,
      error: {
        ...mapped.details,
        timestamp,
        context: {
          ...mapped.details.context,
          httpStatus: mapped.status,
          path: request.path,
          method: request.method,
        },
      },
      timestamp,
      requestId: request.get("X-Request-ID") || uuidv4(),
      retryable: mapped.retryable,
      retryAfter: mapped.retryAfter,
    };
  }

  private logError(exception: unknown, errorResponse: EnhancedErrorResponse, request: Request, status: number): void {
    const message = `${request.method} ${request.path} - ${status} - ${errorResponse.error.message}`;
    const context = { requestId: errorResponse.requestId, code: errorResponse.error.code, cause: errorResponse.error.context?.cause };

    if (status >= 500) {
      this.logger.error(message, this.stackOf(exception), context);
    } else if (status >= 400) {
      this.logger.warn(message, context);
    } else {
      this.logger.log(message, context);
    }
  }

  private stackOf(exception: unknown): string | undefined {
    return exception instanceof Error ? exception.stack : undefined;
  }
}
