import { Controller, Get, Inject, ServiceUnavailableException } from "@nestjs/common";
import { DatabaseService } from "../../database/database.service";
import { MENU_TREE, MenuTree } from "../../modules/menu/menu-tree";
import { RedisService } from "../redis/redis.service";

@Controller("health")
export class HealthController {
  constructor(
    private readonly databaseService: DatabaseService,
    private readonly redisService: RedisService,
    @Inject(MENU_TREE) private readonly menuTree: MenuTree,
  ) {}

  @Get()
  async getHealth() {
    const dbHealth = await this.databaseService.healthCheck();
    const redisHealth = await this.redisService.healthCheck();

    return {
      status: dbHealth.isHealthy ? "ok" : "error",
      timestamp: new Date().toISOString(),
      service: "village-marketplace-ussd",
      version: process.env.npm_package_version || "1.0.0",
      database: {
        status: dbHealth.isHealthy ? "connected" : "disconnected",
        lastChecked: dbHealth.lastChecked,
        error: dbHealth.error,
      },
      redis: {
        status: redisHealth.isHealthy ? "connected" : "disconnected",
        available: this.redisService.isRedisAvailable(),
        error: redisHealth.error,
      },
      menu: {
        root: this.menuTree.root,
        nodes: this.menuTree.size,
      },
      uptime: process.uptime(),
      memory: process.memoryUsage(),
    };
  }

  @Get("database")
  async getDatabaseHealth() {
    return this.databaseService.healthCheck();
  }

  @Get("ready")
  async getReadiness() {
    const dbHealth = await this.databaseService.healthCheck();

    if (!dbHealth.isHealthy) {
      throw new ServiceUnavailableException("Service not ready: Database is not healthy");
    }

    return {
      status: "ready",
      timestamp: new Date().toISOString(),
    };
  }

  @Get("redis")
  async getRedisHealth() {
    const health = await this.redisService.healthCheck();

    return {
      ...health,
      available: this.redisService.isRedisAvailable(),
    };
  }

  @Get("live")
  getLiveness() {
    return {
      status: "alive",
      timestamp: new Date().toISOString(),
    };
  }
}
