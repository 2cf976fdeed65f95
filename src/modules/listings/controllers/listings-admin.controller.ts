import { Controller, Get, Logger, ServiceUnavailableException, UseGuards } from "@nestjs/common";
import { DependencyError } from "../../../common/errors/ussd.errors";
import { AdminTokenGuard } from "../../../common/guards/admin-token.guard";
import { ListingStats } from "../../../database/types";
import { ListingsService } from "../listings.service";

@Controller("admin/listings")
@UseGuards(AdminTokenGuard)
export class ListingsAdminController {
  private readonly logger = new Logger(ListingsAdminController.name);

  constructor(private readonly listingsService: ListingsService) {}

  @Get("stats")
  async getStats(): Promise<ListingStats> {
    try {
      return await this.listingsService.getStats();
    } catch (error) {
      if (error instanceof DependencyError) {
        this.logger.warn(`Listing stats unavailable: ${error.message}`);
        throw new ServiceUnavailableException("Listing statistics are temporarily unavailable");
      }
      throw error;
    }
  }
}
