import { Process, Processor } from "@nestjs/bull";
import { Logger } from "@nestjs/common";
import { Job } from "bull";
import { describeError } from "../../errors/ussd.errors";
import { SessionStoreService } from "../../../modules/sessions/services/session-store.service";
import { JOB_NAMES, QUEUE_NAMES } from "../constants/queue-names.constants";

export interface SessionSweepResult {
  expired: number;
  sweptAt: string;
}

@Processor(QUEUE_NAMES.SESSION_SWEEP)
export class SessionSweepProcessor {
  private readonly logger = new Logger(SessionSweepProcessor.name);

  constructor(private readonly sessionStore: SessionStoreService) {}

  @Process(JOB_NAMES.SWEEP_EXPIRED_SESSIONS)
  async handleSweep(job: Pick<Job, "id" | "attemptsMade">): Promise<SessionSweepResult> {
    const now = new Date();

    try {
      const expired = await this.sessionStore.sweepExpired(now);

      this.logger.debug(`Session sweep finished`, {
        jobId: job.id,
        expired,
      });
      return { expired, sweptAt: now.toISOString() };
    } catch (error) {
      this.logger.error(`Session sweep failed`, {
        jobId: job.id,
        attempt: job.attemptsMade,
        error: describeError(error),
      });

      // Re-throw so Bull records the failure and retries
      throw error;
    }
  }
}
