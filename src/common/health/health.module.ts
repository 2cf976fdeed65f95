import { Module } from "@nestjs/common";
import { DatabaseModule } from "../../database/database.module";
import { MenuModule } from "../../modules/menu/menu.module";
import { HealthController } from "./health.controller";

@Module({
  imports: [DatabaseModule, MenuModule],
  controllers: [HealthController],
})
export class HealthModule {}
