/**
 * Tichu Ledger API - Main Entry Point
 *
 * Features:
 * - Fastify adapter
 * - Graceful shutdown handling
 * - API versioning and validation
 * - Swagger documentation
 */

import "reflect-metadata";
import { NestFactory } from "@nestjs/core";
import {
  FastifyAdapter,
  NestFastifyApplication,
} from "@nestjs/platform-fastify";
import { ValidationPipe, VersioningType, Logger } from "@nestjs/common";
import { DocumentBuilder, SwaggerModule } from "@nestjs/swagger";
import { AppModule } from "./app.module";
import { AppConfig } from "./common/config";
import { GlobalExceptionFilter } from "./common/filters";

const logger = new Logger("Bootstrap");

async function bootstrap() {
  const app = await NestFactory.create<NestFastifyApplication>(
    AppModule,
    new FastifyAdapter({ logger: true }),
  );

  const config = app.get(AppConfig);

  // Enable CORS; "*" reflects any request origin
  const { corsOrigins } = config.server;
  app.enableCors({
    origin: corsOrigins.includes("*") ? true : [...corsOrigins],
    credentials: true,
  });

  // API versioning
  app.enableVersioning({
    type: VersioningType.URI,
    defaultVersion: "1",
  });

  // Global validation pipe
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      transform: true,
      forbidNonWhitelisted: true,
    }),
  );

  // Global exception filter for standardized error responses
  app.useGlobalFilters(new GlobalExceptionFilter(config.isProduction));

  // Swagger documentation
  const swaggerConfig = new DocumentBuilder()
    .setTitle("Tichu Ledger API")
    .setDescription(
      `
## Overview
Score keeping for Tichu matches with player and team statistics.

## Features
- **Matches**: Round-by-round scoring with bonus calls and 1-2 finishes
- **Statistics**: Win rates, recent form, bonus call success rates
- **Leaderboards**: Player and team rankings, overall or per year

## Rate Limiting
Requests are limited per client within a configurable window.
      `,
    )
    .setVersion("1.0.0")
    .addTag("health", "Health check endpoints")
    .addTag("matches", "Match lifecycle and round scoring")
    .addTag("players", "Player registration and profiles")
    .addTag("stats", "Statistics and leaderboards")
    .addTag("admin", "Data maintenance")
    .build();

  const document = SwaggerModule.createDocument(app, swaggerConfig, {
    operationIdFactory: (_controllerKey: string, methodKey: string) =>
      methodKey,
  });

  SwaggerModule.setup("docs", app, document, {
    swaggerOptions: {
      tagsSorter: "alpha",
      operationsSorter: "alpha",
    },
    customSiteTitle: "Tichu Ledger API Documentation",
  });

  // Enable graceful shutdown hooks
  app.enableShutdownHooks();

  // Start server
  const { host, port, shutdownTimeoutMs } = config.server;

  await app.listen(port, host);
  logger.log(`Tichu Ledger API running at http://${host}:${port}`);
  logger.log(`Swagger docs available at http://${host}:${port}/docs`);

  // Graceful shutdown handling
  const gracefulShutdown = async (signal: string) => {
    logger.log(`Received ${signal}, starting graceful shutdown...`);

    // Set a timeout for forced shutdown
    const forceShutdownTimer = setTimeout(() => {
      logger.error("Forced shutdown due to timeout");
      process.exit(1);
    }, shutdownTimeoutMs);

    try {
      await app.close();
      clearTimeout(forceShutdownTimer);
      logger.log("Graceful shutdown completed");
      process.exit(0);
    } catch (error) {
      logger.error(`Error during shutdown: ${error}`);
      clearTimeout(forceShutdownTimer);
      process.exit(1);
    }
  };

  process.on("SIGTERM", () => void gracefulShutdown("SIGTERM"));
  process.on("SIGINT", () => void gracefulShutdown("SIGINT"));
}

bootstrap().catch((error) => {
  logger.error(`Failed to start application: ${error}`);
  process.exit(1);
});
