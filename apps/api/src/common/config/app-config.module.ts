/**
 * App Config Module - Provides the AppConfig value object globally
 */

import { Global, Module } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { AppConfig } from "./app.config";
import type { Env } from "./env.validation";

@Global()
@Module({
  providers: [
    {
      provide: AppConfig,
      useFactory: (config: ConfigService<Env, true>) =>
        AppConfig.fromConfigService(config),
      inject: [ConfigService],
    },
  ],
  exports: [AppConfig],
})
export class AppConfigModule {}
