import { Inject, Injectable, Logger } from "@nestjs/common";
import { randomBytes } from "crypto";
import { withTimeout } from "../../common/utils/with-timeout";
import { USSD_CONFIG, UssdConfig } from "../../config/ussd.config";
import { ListingRecord, ListingRecordStore, ListingStats } from "../../database/types";
import { ListingsRepository } from "./listings.repository";
import {
  ContactRoute,
  LISTING_VISIBILITY,
  ListingPage,
  ListingSummary,
  NewListing,
  PublishedListing,
  RoutedListing,
} from "./types/listing.types";

export const generateRoutingToken = (): string =>
  `RT-${randomBytes(4).toString("hex").toUpperCase()}`;

const COUNTRY_CODE = "254";
const SUBSCRIBER_DIGITS = 9;
export const REDACTED_NUMBER = "[hidden]";

/**
 * Blanks the seller's own number out of free text, whether written in local
 * (07..), international (+254 7..) or bare subscriber form, with or without separators.
 */
export function redactContactNumber(text: string, contactNumber: string): string {
  const digits = contactNumber.replace(/\D/g, "");
  if (digits.length === 0) {
    return text;
  }

  const subscriber = digits.slice(-SUBSCRIBER_DIGITS);
  const gap = "[\\s.-]*";
  const pattern = new RegExp(
    `(?:(?:\\+${gap})?${COUNTRY_CODE}${gap}|0${gap})?${subscriber.split("").join(gap)}`,
    "g",
  );
  return text.replace(pattern, REDACTED_NUMBER);
}

/** Contact route a listing exposes to buyers; only PUBLIC listings reveal the number */
export function contactRouteFor(listing: ListingRecord): ContactRoute {
  return listing.visibility === LISTING_VISIBILITY.PUBLIC
    ? { kind: "number", number: listing.contactNumber }
    : { kind: "token", token: listing.routingToken };
}

@Injectable()
export class ListingsService {
  private readonly logger = new Logger(ListingsService.name);

  constructor(
    @Inject(ListingsRepository) private readonly repository: ListingRecordStore,
    @Inject(USSD_CONFIG) private readonly config: UssdConfig,
  ) {}

  /** Creates the listing; repeated calls for one session return the first listing */
  async publish(listing: NewListing): Promise<PublishedListing> {
    const record = await this.bounded("listings.publish", () =>
      this.repository.insert({ ...listing, routingToken: generateRoutingToken() }),
    );

    this.logger.log(`Listing ${record.id} published by ${listing.ownerCallerId}`, {
      village: record.village,
      category: record.category,
      visibility: record.visibility,
    });
    return { listingId: record.id, routingToken: record.routingToken };
  }

  async browse(
    village: string,
    category: string,
    page: number,
    pageSize: number = this.config.listingPageSize,
  ): Promise<ListingPage> {
    const rows = await this.bounded("listings.browse", () =>
      this.repository.findByVillageCategory(village, category, pageSize + 1, page * pageSize),
    );

    return {
      items: rows.slice(0, pageSize).map((row) => this.toSummary(row)),
      page,
      hasMore: rows.length > pageSize,
    };
  }

  async getContactForRouting(listingId: string): Promise<ContactRoute | null> {
    const listing = await this.bounded("listings.contact", () =>
      this.repository.findById(listingId),
    );
    return listing ? contactRouteFor(listing) : null;
  }

  async findListing(listingId: string): Promise<ListingSummary | null> {
    const listing = await this.bounded("listings.find", () => this.repository.findById(listingId));
    return listing ? this.toSummary(listing) : null;
  }

  /** Gateway bridge lookup: the only path by which a non-public number leaves the service */
  async resolveRoutingToken(token: string): Promise<RoutedListing | null> {
    const listing = await this.bounded("listings.route", () =>
      this.repository.findByRoutingToken(token),
    );

    if (!listing) {
      return null;
    }

    return {
      listingId: listing.id,
      village: listing.village,
      category: listing.category,
      description: listing.description,
      contactNumber: listing.contactNumber,
    };
  }

  async getStats(): Promise<ListingStats> {
    return this.bounded("listings.stats", () => this.repository.getStats());
  }

  private toSummary(listing: ListingRecord): ListingSummary {
    return {
      id: listing.id,
      village: listing.village,
      category: listing.category,
      description:
        listing.visibility === LISTING_VISIBILITY.PUBLIC
          ? listing.description
          : redactContactNumber(listing.description, listing.contactNumber),
      visibility: listing.visibility,
      contact:
        listing.visibility === LISTING_VISIBILITY.HIDDEN ? null : contactRouteFor(listing),
    };
  }

  private bounded<T>(dependency: string, operation: () => Promise<T>): Promise<T> {
    return withTimeout(operation(), this.config.dependencyTimeoutMs, dependency);
  }
}
