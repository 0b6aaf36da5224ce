export { AdminModule } from "./admin.module";
export { AdminService, type AdminMatchSummary, type ResetSummary } from "./admin.service";
