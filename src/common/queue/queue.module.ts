import { Module } from "@nestjs/common";
import { BullModule } from "@nestjs/bull";
import { SessionsModule } from "../../modules/sessions/sessions.module";
import { QUEUE_NAMES } from "./constants/queue-names.constants";
import { SessionSweepProcessor } from "./processors/session-sweep.processor";
import { QueueHealthController } from "./queue-health.controller";
import { QueueHealthService } from "./services/queue-health.service";
import { SessionSweepScheduler } from "./services/session-sweep.scheduler";

@Module({
  imports: [
    BullModule.registerQueue({
      name: QUEUE_NAMES.SESSION_SWEEP,
      defaultJobOptions: {
        attempts: 3,
        backoff: {
          type: "exponential",
          delay: 2000,
        },
        removeOnComplete: 10,
        removeOnFail: 10,
      },
    }),
    SessionsModule,
  ],
  controllers: [QueueHealthController],
  providers: [SessionSweepScheduler, SessionSweepProcessor, QueueHealthService],
  exports: [QueueHealthService],
})
export class QueueModule {}
