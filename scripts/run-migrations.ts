import { drizzle } from "drizzle-orm/postgres-js";
import { migrate } from "drizzle-orm/postgres-js/migrator";
import postgres from "postgres";
import * as dotenv from "dotenv";
import { MIGRATIONS_FOLDER } from "../src/database/migration.service";

// Load environment variables
dotenv.config();

async function runMigrations() {
  const connectionString = process.env.DATABASE_URL;

  if (!connectionString) {
    console.error("DATABASE_URL is not configured");
    process.exit(1);
  }

  console.log("Connecting to database...");

  // Create a separate connection for migrations
  const migrationClient = postgres(connectionString, { max: 1 });
  const db = drizzle(migrationClient);

  try {
    console.log("Running database migrations...");
    console.log("Migrations folder:", MIGRATIONS_FOLDER);

    await migrate(db, { migrationsFolder: MIGRATIONS_FOLDER });

    console.log("Database migrations completed successfully");
  } catch (error) {
    console.error("Migration failed:", error);
    process.exitCode = 1;
  } finally {
    await migrationClient.end();
    console.log("Database connection closed");
  }
}

void runMigrations();
