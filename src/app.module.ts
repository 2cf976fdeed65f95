import { Module } from "@nestjs/common";
import { ConfigModule, ConfigService } from "@nestjs/config";
import { BullModule } from "@nestjs/bull";
import { ThrottlerModule } from "@nestjs/throttler";
import { DatabaseModule } from "./database/database.module";
import { HealthModule } from "./common/health/health.module";
import { RedisModule } from "./common/redis/redis.module";
import { QueueModule } from "./common/queue";
import { configValidation } from "./config/config.validation";
import { UssdConfigModule } from "./config/ussd-config.module";
import { MenuModule } from "./modules/menu/menu.module";
import { ListingsModule } from "./modules/listings/listings.module";
import { SessionsModule } from "./modules/sessions/sessions.module";
import { UssdModule } from "./modules/ussd/ussd.module";

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      validationSchema: configValidation,
      envFilePath: [".env.local", ".env"],
    }),
    ThrottlerModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => [
        {
          ttl: Number(configService.get<number>("THROTTLE_TTL_MS", 60000)),
          limit: Number(configService.get<number>("THROTTLE_LIMIT", 30)),
        },
      ],
    }),
    // Conditionally register BullModule only if Redis is configured
    ...(process.env.REDIS_HOST
      ? [
          BullModule.forRoot({
            redis: {
              host: process.env.REDIS_HOST,
              port: parseInt(process.env.REDIS_PORT ?? "", 10) || 6379,
              password: process.env.REDIS_PASSWORD || undefined,
            },
          }),
        ]
      : []),
    DatabaseModule,
    RedisModule,
    UssdConfigModule,
    MenuModule,
    ListingsModule,
    SessionsModule,
    UssdModule,
    // Only import QueueModule if Redis is configured
    ...(process.env.REDIS_HOST ? [QueueModule] : []),
    HealthModule,
  ],
})
export class AppModule {}
