/**
 * Tichu Ledger API - Root Application Module
 */

import { Module, MiddlewareConsumer, NestModule } from "@nestjs/common";
import { ConfigModule } from "@nestjs/config";
import { ThrottlerModule, ThrottlerGuard } from "@nestjs/throttler";
import { ScheduleModule } from "@nestjs/schedule";
import { APP_GUARD } from "@nestjs/core";

import { AppConfig, AppConfigModule, validateEnv } from "./common/config";
import { DatabaseModule } from "./common/database";
import { CorrelationIdMiddleware } from "./common/middleware";
import { ScoringModule } from "./modules/scoring";
import { StatsModule } from "./modules/stats";
import { PlayerModule } from "./modules/player";
import { MatchModule } from "./modules/match";
import { AdminModule } from "./modules/admin";
import { HealthController } from "./health.controller";

@Module({
  imports: [
    // Configuration, validated once at start-up
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: [".env.local", ".env"],
      validate: validateEnv,
    }),
    AppConfigModule,

    // Rate limiting - protect against abuse
    ThrottlerModule.forRootAsync({
      inject: [AppConfig],
      useFactory: (config: AppConfig) => [
        {
          name: "default",
          ttl: config.throttle.ttlMs,
          limit: config.throttle.limit,
        },
      ],
    }),

    // Cron jobs (stale match cleanup)
    ScheduleModule.forRoot(),

    // Database
    DatabaseModule,

    // Feature modules
    ScoringModule,
    StatsModule,
    PlayerModule,
    MatchModule,
    AdminModule,
  ],
  controllers: [HealthController],
  providers: [
    // Apply rate limiting globally
    {
      provide: APP_GUARD,
      useClass: ThrottlerGuard,
    },
  ],
})
export class AppModule implements NestModule {
  /**
   * Configure global middleware
   */
  configure(consumer: MiddlewareConsumer) {
    consumer.apply(CorrelationIdMiddleware).forRoutes("*");
  }
}
