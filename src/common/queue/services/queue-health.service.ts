import { Injectable, Logger } from "@nestjs/common";
import { InjectQueue } from "@nestjs/bull";
import { Queue } from "bull";
import { describeError } from "../../errors/ussd.errors";
import { QUEUE_NAMES } from "../constants/queue-names.constants";

export interface QueueHealthStatus {
  name: string;
  isHealthy: boolean;
  error?: string;
  details: {
    isPaused: boolean;
    waiting: number;
    active: number;
    failed: number;
    delayed: number;
    repeatable: number;
  };
}

@Injectable()
export class QueueHealthService {
  private readonly logger = new Logger(QueueHealthService.name);

  constructor(
    @InjectQueue(QUEUE_NAMES.SESSION_SWEEP)
    private readonly sweepQueue: Queue,
  ) {}

  async checkSweepQueue(): Promise<QueueHealthStatus> {
    const name = QUEUE_NAMES.SESSION_SWEEP;

    try {
      const [waiting, active, failed, delayed, repeatable, isPaused] = await Promise.all([
        this.sweepQueue.getWaitingCount(),
        this.sweepQueue.getActiveCount(),
        this.sweepQueue.getFailedCount(),
        this.sweepQueue.getDelayedCount(),
        this.sweepQueue.getRepeatableJobs(),
        this.sweepQueue.isPaused(),
      ]);

      let error: string | undefined;
      if (repeatable.length === 0) {
        error = "Sweep job is not scheduled";
      } else if (failed > 10) {
        error = `Too many failed sweeps: ${failed}`;
      } else if (isPaused) {
        error = "Queue is paused";
      }

      return {
        name,
        isHealthy: error === undefined,
        error,
        details: { isPaused, waiting, active, failed, delayed, repeatable: repeatable.length },
      };
    } catch (error) {
      this.logger.error(`Failed to check health for queue ${name}: ${describeError(error)}`);

      return {
        name,
        isHealthy: false,
        error: `Health check failed: ${describeError(error)}`,
        details: { isPaused: true, waiting: 0, active: 0, failed: 0, delayed: 0, repeatable: 0 },
      };
    }
  }
}
