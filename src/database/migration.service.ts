import { Injectable, Logger } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { drizzle } from "drizzle-orm/postgres-js";
import { migrate } from "drizzle-orm/postgres-js/migrator";
import postgres from "postgres";
import * as path from "path";

/** Folder written by `npm run db:generate` (drizzle-kit) */
export const MIGRATIONS_FOLDER = path.resolve(process.cwd(), "drizzle");

@Injectable()
export class MigrationService {
  private readonly logger = new Logger(MigrationService.name);

  constructor(private configService: ConfigService) {}

  async runMigrations(): Promise<void> {
    const connectionString = this.configService.get<string>("DATABASE_URL");

    if (!connectionString) {
      throw new Error("DATABASE_URL is not configured");
    }

    // Create a separate connection for migrations
    const migrationClient = postgres(connectionString, { max: 1 });
    const db = drizzle(migrationClient);

    try {
      this.logger.log(`Running database migrations from ${MIGRATIONS_FOLDER}...`);
      await migrate(db, { migrationsFolder: MIGRATIONS_FOLDER });
      this.logger.log("Database migrations completed successfully");
    } finally {
      await migrationClient.end();
    }
  }
}
