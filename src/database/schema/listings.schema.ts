import {
  pgTable,
  uuid,
  varchar,
  timestamp,
  pgEnum,
  index,
} from "drizzle-orm/pg-core";

export const listingVisibilityEnum = pgEnum("listing_visibility", [
  "HIDDEN",
  "GATEWAY_ROUTED",
  "PUBLIC",
]);

export const listings = pgTable(
  "listings",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    village: varchar("village", { length: 100 }).notNull(),
    category: varchar("category", { length: 100 }).notNull(),
    description: varchar("description", { length: 200 }).notNull(),
    contactNumber: varchar("contact_number", { length: 20 }).notNull(),
    visibility: listingVisibilityEnum("visibility").default("HIDDEN").notNull(),
    ownerCallerId: varchar("owner_caller_id", { length: 20 }).notNull(),
    routingToken: varchar("routing_token", { length: 32 }).notNull().unique(),
    // One listing per publishing dialog; guards against redelivered callbacks
    sourceSessionId: varchar("source_session_id", { length: 100 }).unique(),
    createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull(),
    updatedAt: timestamp("updated_at", { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => ({
    villageCategoryIdx: index("listings_village_category_created_idx").on(
      table.village,
      table.category,
      table.createdAt,
    ),
  }),
);
