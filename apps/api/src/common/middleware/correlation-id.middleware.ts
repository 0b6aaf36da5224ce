/**
 * Correlation ID Middleware
 *
 * Adds unique correlation ID to each request for log correlation.
 * An ID supplied by the caller (x-correlation-id or x-request-id) is kept,
 * and the ID is echoed in the response headers.
 *
 * @module common/middleware
 */

import { Injectable, NestMiddleware, Logger } from "@nestjs/common";
import type { FastifyRequest, FastifyReply } from "fastify";

@Injectable()
export class CorrelationIdMiddleware implements NestMiddleware {
  private readonly logger = new Logger(CorrelationIdMiddleware.name);

  use(req: FastifyRequest["raw"], res: FastifyReply["raw"], next: () => void): void {
    const correlationId =
      firstHeader(req.headers["x-correlation-id"]) ??
      firstHeader(req.headers["x-request-id"]) ??
      generateCorrelationId();

    // Add to request headers for downstream use
    req.headers["x-correlation-id"] = correlationId;

    // Add to response headers for client tracking
    res.setHeader("x-correlation-id", correlationId);

    this.logger.debug(`[${correlationId}] ${req.method} ${req.url}`);

    next();
  }
}

/**
 * Generate a unique correlation ID
 * Format: timestamp-random (e.g., "lq2x5kv-a1b2c3d")
 */
export function generateCorrelationId(): string {
  const timestamp = Date.now().toString(36);
  const random = Math.random().toString(36).substring(2, 9);
  return `${timestamp}-${random}`;
}

/**
 * First non-empty value of a header that may repeat
 */
export function firstHeader(value: string | string[] | undefined): string | undefined {
  const first = Array.isArray(value) ? value[0] : value;
  return first && first.length > 0 ? first : undefined;
}
