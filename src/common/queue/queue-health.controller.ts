import { Controller, Get } from "@nestjs/common";
import { QueueHealthService, QueueHealthStatus } from "./services/queue-health.service";

@Controller("health/queue")
export class QueueHealthController {
  constructor(private readonly queueHealthService: QueueHealthService) {}

  @Get()
  getQueueHealth(): Promise<QueueHealthStatus> {
    return this.queueHealthService.checkSweepQueue();
  }
}
