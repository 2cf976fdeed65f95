import { Logger } from "@nestjs/common";
import { DatabaseService } from "../database.service";
import { seedListings } from "./listings.seed";

const logger = new Logger("DatabaseSeeds");

export const runSeeds = async (db: DatabaseService): Promise<void> => {
  logger.log("Starting database seeding...");
  const count = await seedListings(db);
  logger.log(`Database seeding completed: ${count} demo listings inserted`);
};
