import {
  Controller,
  Get,
  Logger,
  NotFoundException,
  Param,
  ServiceUnavailableException,
  UseGuards,
} from "@nestjs/common";
import { DependencyError } from "../../../common/errors/ussd.errors";
import { AdminTokenGuard } from "../../../common/guards/admin-token.guard";
import { ListingsService } from "../listings.service";
import { RoutedListing } from "../types/listing.types";

/** Lookup used by the gateway to bridge a buyer to a seller whose number is not public */
@Controller("routing")
@UseGuards(AdminTokenGuard)
export class ContactRoutingController {
  private readonly logger = new Logger(ContactRoutingController.name);

  constructor(private readonly listingsService: ListingsService) {}

  @Get(":token")
  async resolve(@Param("token") token: string): Promise<RoutedListing> {
    let routed: RoutedListing | null;

    try {
      routed = await this.listingsService.resolveRoutingToken(token);
    } catch (error) {
      if (error instanceof DependencyError) {
        this.logger.warn(`Routing lookup unavailable: ${error.message}`);
        throw new ServiceUnavailableException("Routing is temporarily unavailable");
      }
      throw error;
    }

    if (!routed) {
      throw new NotFoundException(`Unknown routing token ${token}`);
    }

    this.logger.log(`Routing token resolved for listing ${routed.listingId}`);
    return routed;
  }
}
