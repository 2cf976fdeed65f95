import { Injectable, OnModuleInit, OnModuleDestroy, Logger } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { drizzle, PostgresJsDatabase } from "drizzle-orm/postgres-js";
import postgres from "postgres";
import { describeError } from "../common/errors/ussd.errors";
import * as schema from "./schema";

export type Database = PostgresJsDatabase<typeof schema>;

export interface DatabaseHealthStatus {
  isHealthy: boolean;
  connectionCount?: number;
  lastChecked: Date;
  error?: string;
}

@Injectable()
export class DatabaseService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(DatabaseService.name);
  private client: postgres.Sql | null = null;
  private database: Database | null = null;
  private isConnected = false;
  private connectionAttempts = 0;
  private readonly maxRetries = 5;
  private readonly retryDelay = 2000; // 2 seconds

  constructor(private configService: ConfigService) {}

  async onModuleInit() {
    await this.connect();
  }

  async onModuleDestroy() {
    await this.disconnect();
  }

  get db(): Database {
    if (!this.database) {
      throw new Error("Database is not connected");
    }
    return this.database;
  }

  private async connect(): Promise<void> {
    const connectionString = this.configService.get<string>("DATABASE_URL");

    if (!connectionString) {
      throw new Error("DATABASE_URL is not configured");
    }

    const isDevelopment = this.configService.get("NODE_ENV") === "development";

    this.client = postgres(connectionString, {
      max: this.configService.get<number>("DB_POOL_SIZE", 10),
      idle_timeout: this.configService.get<number>("DB_IDLE_TIMEOUT", 20),
      connect_timeout: this.configService.get<number>("DB_CONNECT_TIMEOUT", 10),
      prepare: !isDevelopment,
      onnotice: isDevelopment ? (notice) => this.logger.debug(notice.message) : undefined,
    });

    this.database = drizzle(this.client, {
      schema,
      logger: isDevelopment,
    });

    await this.testConnection(this.client);
  }

  private async testConnection(client: postgres.Sql): Promise<void> {
    while (this.connectionAttempts < this.maxRetries) {
      try {
        await client`SELECT 1 as test`;
        this.isConnected = true;
        this.connectionAttempts = 0;
        this.logger.log("Database connected successfully");
        return;
      } catch (error) {
        this.connectionAttempts++;
        this.logger.error(
          `Database connection attempt ${this.connectionAttempts}/${this.maxRetries} failed: ${describeError(error)}`,
        );

        if (this.connectionAttempts >= this.maxRetries) {
          throw new Error(
            `Failed to connect to database after ${this.maxRetries} attempts: ${describeError(error)}`,
          );
        }

        await new Promise((resolve) => setTimeout(resolve, this.retryDelay));
      }
    }
  }

  private async disconnect(): Promise<void> {
    if (this.client && this.isConnected) {
      try {
        await this.client.end();
        this.isConnected = false;
        this.logger.log("Database disconnected successfully");
      } catch (error) {
        this.logger.error(`Error disconnecting from database: ${describeError(error)}`);
      }
    }
  }

  async healthCheck(): Promise<DatabaseHealthStatus> {
    const lastChecked = new Date();
    const client = this.client;

    if (!client || !this.isConnected) {
      return {
        isHealthy: false,
        lastChecked,
        error: "Database not connected",
      };
    }

    let timer: NodeJS.Timeout | undefined;
    try {
      await Promise.race([
        client`SELECT 1 as health_check`,
        new Promise<never>((_, reject) => {
          timer = setTimeout(() => reject(new Error("Health check timeout")), 5000);
        }),
      ]);

      return {
        isHealthy: true,
        lastChecked,
        connectionCount: this.configService.get<number>("DB_POOL_SIZE", 10),
      };
    } catch (error) {
      this.logger.error(`Database health check failed: ${describeError(error)}`);
      return {
        isHealthy: false,
        lastChecked,
        error: describeError(error),
      };
    } finally {
      if (timer) clearTimeout(timer);
    }
  }

  isHealthy(): boolean {
    return this.isConnected;
  }
}
