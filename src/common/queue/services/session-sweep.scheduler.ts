import { InjectQueue } from "@nestjs/bull";
import { Inject, Injectable, Logger, OnModuleInit } from "@nestjs/common";
import { Queue } from "bull";
import { describeError } from "../../errors/ussd.errors";
import { USSD_CONFIG, UssdConfig } from "../../../config/ussd.config";
import { JOB_NAMES, QUEUE_NAMES } from "../constants/queue-names.constants";

/** Registers the repeatable sweep job; Bull keeps one schedule per repeat key across instances */
@Injectable()
export class SessionSweepScheduler implements OnModuleInit {
  private readonly logger = new Logger(SessionSweepScheduler.name);

  constructor(
    @InjectQueue(QUEUE_NAMES.SESSION_SWEEP)
    private readonly sweepQueue: Queue,
    @Inject(USSD_CONFIG) private readonly config: UssdConfig,
  ) {}

  async onModuleInit(): Promise<void> {
    const every = this.config.sweepIntervalSeconds * 1000;

    try {
      await this.sweepQueue.add(
        JOB_NAMES.SWEEP_EXPIRED_SESSIONS,
        {},
        {
          repeat: { every },
          jobId: JOB_NAMES.SWEEP_EXPIRED_SESSIONS,
          removeOnComplete: 10,
          removeOnFail: 10,
        },
      );
      this.logger.log(`Session sweep scheduled every ${this.config.sweepIntervalSeconds}s`);
    } catch (error) {
      // Lazy expiry on access still applies without the sweep
      this.logger.error(`Failed to schedule session sweep: ${describeError(error)}`);
    }
  }
}
