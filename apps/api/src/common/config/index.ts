export { AppConfig } from "./app.config";
export type {
  ServerSettings,
  DatabaseSettings,
  CleanupSettings,
  ThrottleSettings,
} from "./app.config";
export { AppConfigModule } from "./app-config.module";
export { EnvSchema, validateEnv, type Env } from "./env.validation";
