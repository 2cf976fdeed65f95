import { Inject, Injectable, Logger } from "@nestjs/common";
import { randomUUID } from "crypto";
import { DependencyError, describeError } from "../../../common/errors/ussd.errors";
import { RedisService } from "../../../common/redis/redis.service";
import { sleep, withTimeout } from "../../../common/utils/with-timeout";
import { USSD_CONFIG, UssdConfig } from "../../../config/ussd.config";

const LOCK_POLL_INTERVAL_MS = 50;

/**
 * Serializes callbacks for one session. Callers queue on an in-process promise
 * chain; when Redis is up a `SET NX PX` lock also excludes other instances and
 * is renewed for as long as the holder runs.
 * Different sessions never wait on each other.
 */
@Injectable()
export class SessionLockService {
  private readonly logger = new Logger(SessionLockService.name);
  private readonly tails = new Map<string, Promise<void>>();

  constructor(
    private readonly redisService: RedisService,
    @Inject(USSD_CONFIG) private readonly config: UssdConfig,
  ) {}

  async runExclusive<T>(sessionId: string, callerId: string, task: () => Promise<T>): Promise<T> {
    const key = `ussd:lock:${sessionId}:${callerId}`;
    const deadline = Date.now() + this.config.lockWaitMs;

    const previous = this.tails.get(key) ?? Promise.resolve();
    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    // The next caller waits for both the previous holder and this one
    const tail = previous.then(() => current);
    this.tails.set(key, tail);
    // Forget the key once everyone queued so far has finished
    void tail.then(() => {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    });

    try {
      await withTimeout(previous, this.config.lockWaitMs, "session-lock");
      const token = await this.acquireDistributed(key, deadline);
      const stopRenewal = token ? this.keepAlive(key, token) : () => undefined;

      try {
        return await task();
      } finally {
        stopRenewal();
        if (token) {
          await this.releaseDistributed(key, token);
        }
      }
    } finally {
      release();
    }
  }

  /** Number of sessions with a holder or waiters in this process */
  get pendingKeys(): number {
    return this.tails.size;
  }

  private async acquireDistributed(key: string, deadline: number): Promise<string | null> {
    const token = randomUUID();

    while (this.redisService.isRedisAvailable()) {
      if (await this.redisService.setIfAbsent(key, token, this.config.lockTtlMs)) {
        return token;
      }
      if (Date.now() >= deadline) {
        throw new DependencyError(
          "session-lock",
          `could not acquire ${key} within ${this.config.lockWaitMs}ms`,
        );
      }
      await sleep(LOCK_POLL_INTERVAL_MS);
    }

    return null;
  }

  /** Renews the lock at half its TTL until the returned stop function runs */
  private keepAlive(key: string, token: string): () => void {
    let stopped = false;
    const timer = setInterval(
      () => void this.renewDistributed(key, token, () => stopped),
      Math.max(1, Math.floor(this.config.lockTtlMs / 2)),
    );

    return () => {
      stopped = true;
      clearInterval(timer);
    };
  }

  private async renewDistributed(
    key: string,
    token: string,
    isStopped: () => boolean,
  ): Promise<void> {
    try {
      const extended = await this.redisService.extendIfEquals(key, token, this.config.lockTtlMs);
      if (!extended && !isStopped()) {
        this.logger.warn(`Lock ${key} expired while its holder was still running`);
      }
    } catch (error) {
      this.logger.error(`Failed to renew lock ${key}: ${describeError(error)}`);
    }
  }

  private async releaseDistributed(key: string, token: string): Promise<void> {
    try {
      const released = await this.redisService.deleteIfEquals(key, token);
      if (!released) {
        this.logger.warn(`Lock ${key} had already expired before release`);
      }
    } catch (error) {
      this.logger.error(`Failed to release lock ${key}: ${describeError(error)}`);
    }
  }
}
