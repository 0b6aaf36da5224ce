export { DatabaseModule } from "./database.module";
export { DatabaseService } from "./database.service";
export { withStorage } from "./storage";
export * from "./repositories";
