import { Injectable, Logger } from "@nestjs/common";
import { and, count, countDistinct, desc, eq } from "drizzle-orm";
import { describeError } from "../../common/errors/ussd.errors";
import { DatabaseService } from "../../database/database.service";
import { listings } from "../../database/schema";
import {
  ListingRecord,
  ListingRecordStore,
  ListingStats,
  NewListingRecord,
} from "../../database/types";

@Injectable()
export class ListingsRepository implements ListingRecordStore {
  private readonly logger = new Logger(ListingsRepository.name);

  constructor(private readonly databaseService: DatabaseService) {}

  /** Inserts the listing; a listing already published from the same session is returned instead */
  async insert(listing: NewListingRecord): Promise<ListingRecord> {
    try {
      const [created] = await this.databaseService.db
        .insert(listings)
        .values(listing)
        .onConflictDoNothing({ target: listings.sourceSessionId })
        .returning();

      if (created) {
        this.logger.log(`Created listing ${created.id} in ${created.village}/${created.category}`);
        return created;
      }

      const [existing] = listing.sourceSessionId
        ? await this.databaseService.db
            .select()
            .from(listings)
            .where(eq(listings.sourceSessionId, listing.sourceSessionId))
            .limit(1)
        : [];

      if (!existing) {
        throw new Error("Listing insert was skipped but no existing listing was found");
      }

      this.logger.log(`Listing for session ${listing.sourceSessionId} already exists: ${existing.id}`);
      return existing;
    } catch (error) {
      this.logger.error(`Failed to create listing: ${describeError(error)}`);
      throw error;
    }
  }

  async findById(id: string): Promise<ListingRecord | null> {
    try {
      const [listing] = await this.databaseService.db
        .select()
        .from(listings)
        .where(eq(listings.id, id))
        .limit(1);

      return listing ?? null;
    } catch (error) {
      this.logger.error(`Failed to find listing ${id}: ${describeError(error)}`);
      throw error;
    }
  }

  async findByRoutingToken(token: string): Promise<ListingRecord | null> {
    try {
      const [listing] = await this.databaseService.db
        .select()
        .from(listings)
        .where(eq(listings.routingToken, token))
        .limit(1);

      return listing ?? null;
    } catch (error) {
      this.logger.error(`Failed to resolve routing token: ${describeError(error)}`);
      throw error;
    }
  }

  async findByVillageCategory(
    village: string,
    category: string,
    limit: number,
    offset: number,
  ): Promise<ListingRecord[]> {
    try {
      return await this.databaseService.db
        .select()
        .from(listings)
        .where(and(eq(listings.village, village), eq(listings.category, category)))
        .orderBy(desc(listings.createdAt), desc(listings.id))
        .limit(limit)
        .offset(offset);
    } catch (error) {
      this.logger.error(
        `Failed to browse listings for ${village}/${category}: ${describeError(error)}`,
      );
      throw error;
    }
  }

  async getStats(): Promise<ListingStats> {
    try {
      const db = this.databaseService.db;

      const [totals] = await db
        .select({
          total: count(),
          villages: countDistinct(listings.village),
          categories: countDistinct(listings.category),
        })
        .from(listings);

      const byVillage = await db
        .select({ value: listings.village, count: count() })
        .from(listings)
        .groupBy(listings.village)
        .orderBy(desc(count()), listings.village);

      const byCategory = await db
        .select({ value: listings.category, count: count() })
        .from(listings)
        .groupBy(listings.category)
        .orderBy(desc(count()), listings.category);

      return {
        total: totals?.total ?? 0,
        villages: totals?.villages ?? 0,
        categories: totals?.categories ?? 0,
        byVillage,
        byCategory,
      };
    } catch (error) {
      this.logger.error(`Failed to compute listing stats: ${describeError(error)}`);
      throw error;
    }
  }
}
