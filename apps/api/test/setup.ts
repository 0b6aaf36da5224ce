/**
 * Jest Test Setup
 *
 * Configures the test environment before running tests.
 */

import "reflect-metadata";

// Increase timeout for async operations
jest.setTimeout(30000);

// Environment read by ConfigModule when the full application is built
process.env.NODE_ENV = "test";
process.env.DATABASE_PATH = ":memory:";
process.env.MATCH_CLEANUP_ENABLED = "false";
process.env.THROTTLE_LIMIT = "10000";
