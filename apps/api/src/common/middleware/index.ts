/**
 * Middleware Module Exports
 *
 * @module common/middleware
 */

export {
  CorrelationIdMiddleware,
  firstHeader,
  generateCorrelationId,
} from "./correlation-id.middleware";
