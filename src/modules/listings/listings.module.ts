import { Module } from "@nestjs/common";
import { DatabaseModule } from "../../database/database.module";
import { ContactRoutingController } from "./controllers/contact-routing.controller";
import { ListingsAdminController } from "./controllers/listings-admin.controller";
import { ListingsRepository } from "./listings.repository";
import { ListingsService } from "./listings.service";

@Module({
  imports: [DatabaseModule],
  controllers: [ListingsAdminController, ContactRoutingController],
  providers: [ListingsRepository, ListingsService],
  exports: [ListingsService],
})
export class ListingsModule {}
