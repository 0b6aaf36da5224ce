/**
 * Global HTTP Exception Filter
 *
 * Standardizes all error responses across the API.
 * Domain errors keep their own code and status; Nest HTTP exceptions
 * (validation, throttling, routing) are mapped by status; anything else
 * becomes a 500.
 *
 * @module common/filters
 */

import {
  ExceptionFilter,
  Catch,
  ArgumentsHost,
  HttpException,
  HttpStatus,
  Logger,
} from "@nestjs/common";
import type { FastifyReply, FastifyRequest } from "fastify";
import { LedgerError, StorageFailureError } from "../errors";
import { firstHeader, generateCorrelationId } from "../middleware";

/**
 * Standardized API error response
 */
export interface ApiErrorResponse {
  /** HTTP status code */
  statusCode: number;
  /** Error type/code for programmatic handling */
  error: string;
  /** Human-readable error message */
  message: string;
  /** Detailed error messages (validation errors, etc.) */
  details?: string[];
  /** Request path that caused the error */
  path: string;
  /** ISO timestamp of when error occurred */
  timestamp: string;
  /** Correlation ID for request tracing */
  correlationId?: string;
}

/**
 * Error code mapping for consistent error types
 */
const ERROR_CODES: Record<number, string> = {
  400: "BAD_REQUEST",
  401: "UNAUTHORIZED",
  403: "FORBIDDEN",
  404: "NOT_FOUND",
  409: "CONFLICT",
  413: "PAYLOAD_TOO_LARGE",
  422: "UNPROCESSABLE_ENTITY",
  429: "TOO_MANY_REQUESTS",
  500: "INTERNAL_SERVER_ERROR",
  502: "BAD_GATEWAY",
  503: "SERVICE_UNAVAILABLE",
  504: "GATEWAY_TIMEOUT",
};

@Catch()
export class GlobalExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(GlobalExceptionFilter.name);

  constructor(private readonly isProduction = false) {}

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<FastifyReply>();
    const request = ctx.getRequest<FastifyRequest>();

    // Get correlation ID from request headers or generate one
    const correlationId =
      firstHeader(request.headers["x-correlation-id"]) ??
      firstHeader(request.headers["x-request-id"]) ??
      generateCorrelationId();

    // Determine status code and message
    const { statusCode, message, details } = this.extractErrorInfo(exception);
    const errorCode =
      exception instanceof LedgerError
        ? exception.code
        : ERROR_CODES[statusCode] ?? "UNKNOWN_ERROR";

    // Build standardized error response
    const errorResponse: ApiErrorResponse = {
      statusCode,
      error: errorCode,
      message: this.sanitizeMessage(message),
      path: request.url,
      timestamp: new Date().toISOString(),
      correlationId,
    };

    // Add details if available (e.g., validation errors)
    if (details && details.length > 0) {
      errorResponse.details = details;
    }

    // Log the error with appropriate level
    this.logError(exception, errorResponse, request);

    // Send response
    response.status(statusCode).send(errorResponse);
  }

  /**
   * Extract error information from various exception types
   */
  private extractErrorInfo(exception: unknown): {
    statusCode: number;
    message: string;
    details?: string[] | undefined;
  } {
    // Ledger errors carry their own status
    if (exception instanceof LedgerError) {
      return {
        statusCode: exception.statusCode,
        message:
          exception instanceof StorageFailureError && this.isProduction
            ? "Database operation failed"
            : exception.message,
      };
    }

    // Handle NestJS HTTP exceptions
    if (exception instanceof HttpException) {
      const status = exception.getStatus();
      const response = exception.getResponse();

      if (typeof response === "string") {
        return { statusCode: status, message: response };
      }

      const message = readMessage(response) ?? exception.message;
      const details = Array.isArray(message) ? message : undefined;
      const mainMessage = Array.isArray(message) ? "Validation failed" : message;

      return {
        statusCode: status,
        message: mainMessage,
        details,
      };
    }

    // Handle standard Error objects
    if (exception instanceof Error) {
      return {
        statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
        message: this.isProduction
          ? "An unexpected error occurred"
          : exception.message,
      };
    }

    // Unknown error type
    return {
      statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
      message: "An unexpected error occurred",
    };
  }

  /**
   * Sanitize error message for production
   */
  private sanitizeMessage(message: string): string {
    if (this.isProduction) {
      // Remove stack traces and internal details
      return message
        .replace(/at .+:\d+:\d+/g, "")
        .replace(/\n/g, " ")
        .trim()
        .substring(0, 200);
    }
    return message;
  }

  /**
   * Log error with appropriate level and context
   */
  private logError(
    exception: unknown,
    errorResponse: ApiErrorResponse,
    request: FastifyRequest,
  ): void {
    const logContext = {
      correlationId: errorResponse.correlationId,
      path: errorResponse.path,
      method: request.method,
      statusCode: errorResponse.statusCode,
      userAgent: request.headers["user-agent"],
      ip: request.ip,
    };

    if (errorResponse.statusCode >= 500) {
      this.logger.error(
        `[${errorResponse.correlationId}] ${errorResponse.error}: ${errorResponse.message}`,
        exception instanceof Error ? exception.stack : undefined,
        JSON.stringify(logContext),
      );
    } else if (errorResponse.statusCode >= 400) {
      this.logger.warn(
        `[${errorResponse.correlationId}] ${errorResponse.error}: ${errorResponse.message}`,
        JSON.stringify(logContext),
      );
    }
  }
}

function readMessage(response: object): string | string[] | undefined {
  if (!("message" in response)) return undefined;
  const { message } = response;
  if (typeof message === "string") return message;
  if (Array.isArray(message) && message.every((m): m is string => typeof m === "string")) {
    return message;
  }
  return undefined;
}
