import {
  Injectable,
  Logger,
  OnModuleInit,
  OnModuleDestroy,
} from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import Redis, { RedisOptions } from "ioredis";
import { describeError } from "../errors/ussd.errors";

// Deletes the key only while it still holds the caller's lock token
const RELEASE_LOCK_SCRIPT = `
if redis.call("get", KEYS[1]) == ARGV[1] then
  return redis.call("del", KEYS[1])
end
return 0
`;

// Pushes the expiry out only while the key still holds the caller's lock token
const EXTEND_LOCK_SCRIPT = `
if redis.call("get", KEYS[1]) == ARGV[1] then
  return redis.call("pexpire", KEYS[1], ARGV[2])
end
return 0
`;

export interface RedisHealth {
  isHealthy: boolean;
  error?: string;
  details?: Record<string, number | boolean>;
}

@Injectable()
export class RedisService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(RedisService.name);
  private client: Redis | null = null;
  private isAvailable = false;
  private reconnectAttempts = 0;
  private readonly maxReconnectAttempts = 10;
  private readonly reconnectDelay = 1000; // Start with 1 second
  private reconnectTimer: NodeJS.Timeout | null = null;

  constructor(private configService: ConfigService) {}

  async onModuleInit() {
    await this.initializeRedisConnection();
  }

  async onModuleDestroy() {
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
    if (this.client) {
      this.logger.log("Closing Redis connection...");
      await this.client.quit();
      this.client = null;
      this.isAvailable = false;
    }
  }

  private async initializeRedisConnection(): Promise<void> {
    const redisHost = this.configService.get<string>("REDIS_HOST");

    if (!redisHost) {
      this.logger.warn(
        "Redis not configured - session cache, distributed locks and sweep queue disabled",
      );
      return;
    }

    const redisOptions: RedisOptions = {
      host: redisHost,
      port: Number(this.configService.get<number>("REDIS_PORT", 6379)),
      password: this.configService.get<string>("REDIS_PASSWORD") || undefined,
      maxRetriesPerRequest: 3,
      lazyConnect: true,
      enableReadyCheck: true,
      connectTimeout: 10000,
      commandTimeout: 2000,
    };

    try {
      this.client = new Redis(redisOptions);
      this.setupEventListeners(this.client);

      await this.client.connect();
      this.isAvailable = true;
      this.reconnectAttempts = 0;
      this.logger.log("Redis connected successfully");
    } catch (error) {
      this.logger.error(`Redis initial connection failed: ${describeError(error)}`);
      this.handleConnectionError(error);
    }
  }

  private setupEventListeners(client: Redis): void {
    client.on("ready", () => {
      this.logger.log("Redis connection ready for commands");
      this.isAvailable = true;
      this.reconnectAttempts = 0;
    });

    client.on("error", (error: Error) => {
      this.logger.error(`Redis connection error: ${error.message}`);
      this.isAvailable = false;
    });

    client.on("close", () => {
      this.logger.warn("Redis connection closed");
      this.isAvailable = false;
    });

    client.on("reconnecting", (delay: number) => {
      this.reconnectAttempts++;
      this.logger.log(
        `Redis reconnecting in ${delay}ms (attempt ${this.reconnectAttempts})`,
      );
    });
  }

  private handleConnectionError(error: unknown): void {
    this.isAvailable = false;

    if (this.reconnectAttempts >= this.maxReconnectAttempts) {
      this.logger.error(
        `Redis connection failed after ${this.maxReconnectAttempts} attempts. Giving up.`,
      );
      this.client = null;
      return;
    }

    const delay = Math.min(
      this.reconnectDelay * Math.pow(2, this.reconnectAttempts),
      30000,
    );
    this.logger.warn(
      `Redis connection failed: ${describeError(error)}. Retrying in ${delay}ms...`,
    );

    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      this.reconnectAttempts++;
      this.initializeRedisConnection().catch((retryError: unknown) =>
        this.logger.error(`Redis reconnect failed: ${describeError(retryError)}`),
      );
    }, delay);
  }

  isRedisAvailable(): boolean {
    return this.isAvailable && this.client !== null;
  }

  async set(key: string, value: string, ttlSeconds?: number): Promise<boolean> {
    return this.executeWithRetry(
      async (client) => {
        if (ttlSeconds) {
          await client.setex(key, ttlSeconds, value);
        } else {
          await client.set(key, value);
        }
        return true;
      },
      "set",
      { key, ttlSeconds },
      false,
    );
  }

  async get(key: string): Promise<string | null> {
    return this.executeWithRetry((client) => client.get(key), "get", { key }, null);
  }

  async del(key: string): Promise<boolean> {
    return this.executeWithRetry(
      async (client) => (await client.del(key)) > 0,
      "del",
      { key },
      false,
    );
  }

  /** SET key value PX ttl NX; true when this caller now owns the key */
  async setIfAbsent(key: string, value: string, ttlMs: number): Promise<boolean> {
    return this.executeWithRetry(
      async (client) => (await client.set(key, value, "PX", ttlMs, "NX")) === "OK",
      "setIfAbsent",
      { key, ttlMs },
      false,
    );
  }

  /** Deletes the key only if it still holds the given value */
  async deleteIfEquals(key: string, value: string): Promise<boolean> {
    return this.executeWithRetry(
      async (client) => (await client.eval(RELEASE_LOCK_SCRIPT, 1, key, value)) === 1,
      "deleteIfEquals",
      { key },
      false,
    );
  }

  /** Resets the key's TTL only if it still holds the given value */
  async extendIfEquals(key: string, value: string, ttlMs: number): Promise<boolean> {
    return this.executeWithRetry(
      async (client) => (await client.eval(EXTEND_LOCK_SCRIPT, 1, key, value, ttlMs)) === 1,
      "extendIfEquals",
      { key, ttlMs },
      false,
    );
  }

  private async executeWithRetry<T>(
    operation: (client: Redis) => Promise<T>,
    operationName: string,
    params: Record<string, string | number | undefined>,
    fallback: T,
    maxRetries: number = 3,
  ): Promise<T> {
    let lastError: unknown;

    for (let attempt = 1; attempt <= maxRetries; attempt++) {
      const client = this.client;
      if (!this.isAvailable || !client) {
        return fallback;
      }

      try {
        const result = await operation(client);

        if (attempt > 1) {
          this.logger.log(`Redis ${operationName} succeeded on attempt ${attempt}`, { params });
        }

        return result;
      } catch (error) {
        lastError = error;

        this.logger.warn(
          `Redis ${operationName} failed on attempt ${attempt}/${maxRetries}: ${describeError(error)}`,
          { params, attempt },
        );

        if (attempt === maxRetries) {
          break;
        }

        // Exponential backoff between attempts
        const delay = Math.min(100 * Math.pow(2, attempt - 1), 1000);
        await new Promise((resolve) => setTimeout(resolve, delay));
      }
    }

    this.logger.error(
      `Redis ${operationName} failed after ${maxRetries} attempts: ${describeError(lastError)}`,
      { params },
    );

    return fallback;
  }

  async healthCheck(): Promise<RedisHealth> {
    if (!this.client) {
      return {
        isHealthy: false,
        error: "Redis not configured",
        details: { configured: false },
      };
    }

    if (!this.isAvailable) {
      return {
        isHealthy: false,
        error: "Redis not available",
        details: {
          configured: true,
          available: false,
          reconnectAttempts: this.reconnectAttempts,
        },
      };
    }

    try {
      const start = Date.now();
      const pong = await this.client.ping();
      const responseTime = Date.now() - start;

      if (pong !== "PONG") {
        return {
          isHealthy: false,
          error: `Unexpected ping response: ${pong}`,
          details: { responseTime },
        };
      }

      return {
        isHealthy: true,
        details: {
          responseTime,
          configured: true,
          available: true,
          reconnectAttempts: this.reconnectAttempts,
        },
      };
    } catch (error) {
      return {
        isHealthy: false,
        error: describeError(error),
        details: {
          configured: true,
          available: false,
          reconnectAttempts: this.reconnectAttempts,
        },
      };
    }
  }
}
