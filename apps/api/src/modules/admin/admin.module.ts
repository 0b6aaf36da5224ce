/**
 * Admin Module - Data maintenance
 */

import { Module } from "@nestjs/common";
import { MatchModule } from "../match";
import { AdminController } from "./admin.controller";
import { AdminService } from "./admin.service";

@Module({
  imports: [MatchModule],
  controllers: [AdminController],
  providers: [AdminService],
})
export class AdminModule {}
