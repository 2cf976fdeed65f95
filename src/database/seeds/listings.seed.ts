import { DatabaseService } from "../database.service";
import { listings } from "../schema";
import { NewListingRecord } from "../types";

const demoListings: NewListingRecord[] = [
  {
    village: "Bumala",
    category: "Farm Produce",
    description: "Fresh sukuma wiki and tomatoes",
    contactNumber: "0700000001",
    visibility: "PUBLIC",
    ownerCallerId: "254700000001",
    routingToken: "RT-DEMO0001",
  },
  {
    village: "Sega",
    category: "Transport - Riders",
    description: "Boda rider at Sega stage",
    contactNumber: "0700000002",
    visibility: "GATEWAY_ROUTED",
    ownerCallerId: "254700000002",
    routingToken: "RT-DEMO0002",
  },
  {
    village: "Murende",
    category: "Seeds & Inputs",
    description: "Certified maize seed and fertilizer",
    contactNumber: "0700000003",
    visibility: "HIDDEN",
    ownerCallerId: "254700000003",
    routingToken: "RT-DEMO0003",
  },
];

export const seedListings = async (db: DatabaseService): Promise<number> => {
  const inserted = await db.db
    .insert(listings)
    .values(demoListings)
    .onConflictDoNothing({ target: listings.routingToken })
    .returning({ id: listings.id });

  return inserted.length;
};
