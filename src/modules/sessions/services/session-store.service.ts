import { Inject, Injectable, Logger } from "@nestjs/common";
import * as Joi from "joi";
import { SessionExpiredError, describeError } from "../../../common/errors/ussd.errors";
import { RedisService } from "../../../common/redis/redis.service";
import { withTimeout } from "../../../common/utils/with-timeout";
import { USSD_CONFIG, UssdConfig } from "../../../config/ussd.config";
import {
  NewUssdSessionRecord,
  UssdSessionRecord,
  UssdSessionRecordStore,
} from "../../../database/types";
import { MENU_TREE, MenuTree } from "../../menu/menu-tree";
import { UssdSessionRepository } from "../repositories/ussd-session.repository";
import {
  LoadedSession,
  SESSION_STATUS,
  UssdSession,
  createFreshSession,
  sessionCacheKey,
} from "../types/session.types";

const cachedSessionSchema = Joi.object<UssdSession>({
  sessionId: Joi.string().required(),
  callerId: Joi.string().required(),
  currentNode: Joi.string().required(),
  collectedFields: Joi.object().pattern(Joi.string(), Joi.string().allow("")).required(),
  history: Joi.array()
    .items(Joi.object({ nodeId: Joi.string().required(), field: Joi.string() }))
    .required(),
  retryCount: Joi.number().integer().min(0).required(),
  page: Joi.number().integer().min(0).required(),
  status: Joi.string()
    .valid(...Object.values(SESSION_STATUS))
    .required(),
  lastInput: Joi.string().allow(null, "").required(),
  lastDisplay: Joi.string().allow(null).required(),
  lastContinue: Joi.boolean().required(),
  createdAt: Joi.date().required(),
  lastSeenAt: Joi.date().required(),
});

/**
 * Write-through session storage: Postgres is the source of truth, Redis a TTL'd
 * cache in front of it. Every database call is bounded by the dependency timeout.
 */
@Injectable()
export class SessionStoreService {
  private readonly logger = new Logger(SessionStoreService.name);

  constructor(
    private readonly redisService: RedisService,
    @Inject(UssdSessionRepository)
    private readonly repository: UssdSessionRecordStore,
    @Inject(USSD_CONFIG) private readonly config: UssdConfig,
    @Inject(MENU_TREE) private readonly menuTree: MenuTree,
  ) {}

  /** Returns the stored session, or null if none exists; throws SessionExpiredError once idle */
  async load(sessionId: string, callerId: string, now: Date = new Date()): Promise<UssdSession | null> {
    const session =
      (await this.readCache(sessionId, callerId)) ??
      (await this.readDatabase(sessionId, callerId));

    if (!session) {
      return null;
    }

    const idleSeconds = Math.floor((now.getTime() - session.lastSeenAt.getTime()) / 1000);
    const timedOut =
      session.status === SESSION_STATUS.ACTIVE && idleSeconds > this.config.idleTimeoutSeconds;

    if (session.status === SESSION_STATUS.EXPIRED || timedOut) {
      throw new SessionExpiredError(sessionId, idleSeconds);
    }

    return session;
  }

  async loadOrCreate(
    sessionId: string,
    callerId: string,
    now: Date = new Date(),
  ): Promise<LoadedSession> {
    const fresh = () => createFreshSession(sessionId, callerId, this.menuTree.root, now);

    try {
      const session = await this.load(sessionId, callerId, now);

      if (!session) {
        this.logger.debug(`Starting session ${sessionId} for ${callerId}`);
        return { session: fresh(), expired: false, created: true };
      }

      if (!this.menuTree.has(session.currentNode)) {
        this.logger.warn(
          `Session ${sessionId} points at unknown node ${session.currentNode}, restarting`,
        );
        return { session: fresh(), expired: false, created: true };
      }

      return { session, expired: false, created: false };
    } catch (error) {
      if (!(error instanceof SessionExpiredError)) {
        throw error;
      }

      this.logger.log(`Session ${sessionId} expired after ${error.idleSeconds}s, restarting`);
      return { session: fresh(), expired: true, created: true };
    }
  }

  async save(session: UssdSession): Promise<void> {
    await withTimeout(
      this.repository.upsert(this.toRecord(session)),
      this.config.dependencyTimeoutMs,
      "session-store.save",
    );

    const key = sessionCacheKey(session.sessionId, session.callerId);
    const cached = await this.cacheCall(
      "set",
      () => this.redisService.set(key, JSON.stringify(session), this.config.idleTimeoutSeconds),
      false,
    );

    if (!cached && this.redisService.isRedisAvailable()) {
      // An older snapshot left in the cache would be read ahead of the row just written
      await this.cacheCall("del", () => this.redisService.del(key), false);
      this.logger.warn(
        `Session ${session.sessionId} saved to database but not cached; cache entry dropped`,
      );
    }
  }

  /** Expires ACTIVE sessions idle past the timeout; returns how many were expired */
  async sweepExpired(now: Date = new Date()): Promise<number> {
    const idleBefore = new Date(now.getTime() - this.config.idleTimeoutSeconds * 1000);
    const expired = await withTimeout(
      this.repository.markExpired(idleBefore, now),
      this.config.dependencyTimeoutMs,
      "session-store.sweep",
    );

    for (const key of expired) {
      await this.cacheCall(
        "del",
        () => this.redisService.del(sessionCacheKey(key.sessionId, key.callerId)),
        false,
      );
    }

    if (expired.length > 0) {
      this.logger.log(`Swept ${expired.length} idle sessions`);
    }
    return expired.length;
  }

  private async readCache(sessionId: string, callerId: string): Promise<UssdSession | null> {
    if (!this.redisService.isRedisAvailable()) {
      return null;
    }

    const raw = await this.cacheCall(
      "get",
      () => this.redisService.get(sessionCacheKey(sessionId, callerId)),
      null,
    );
    if (!raw) {
      return null;
    }

    try {
      const { error, value } = cachedSessionSchema.validate(JSON.parse(raw));
      if (error) {
        this.logger.warn(`Discarding malformed cached session ${sessionId}: ${error.message}`);
        return null;
      }
      return value;
    } catch (error) {
      this.logger.warn(`Discarding unreadable cached session ${sessionId}: ${describeError(error)}`);
      return null;
    }
  }

  /** Cache calls share the dependency deadline; a slow or failing cache degrades to the database */
  private async cacheCall<T>(name: string, operation: () => Promise<T>, fallback: T): Promise<T> {
    try {
      return await withTimeout(operation(), this.config.dependencyTimeoutMs, `session-cache.${name}`);
    } catch (error) {
      this.logger.warn(`Session cache ${name} failed: ${describeError(error)}`);
      return fallback;
    }
  }

  private async readDatabase(sessionId: string, callerId: string): Promise<UssdSession | null> {
    const record = await withTimeout(
      this.repository.find(sessionId, callerId),
      this.config.dependencyTimeoutMs,
      "session-store.load",
    );
    return record ? this.fromRecord(record) : null;
  }

  private fromRecord(record: UssdSessionRecord): UssdSession {
    return {
      sessionId: record.sessionId,
      callerId: record.callerId,
      currentNode: record.currentNode,
      collectedFields: { ...record.collectedFields },
      history: [...record.history],
      retryCount: record.retryCount,
      page: record.page,
      status: record.status,
      lastInput: record.lastInput,
      lastDisplay: record.lastDisplay,
      lastContinue: record.lastContinue,
      createdAt: record.createdAt,
      lastSeenAt: record.lastSeenAt,
    };
  }

  private toRecord(session: UssdSession): NewUssdSessionRecord {
    return {
      sessionId: session.sessionId,
      callerId: session.callerId,
      currentNode: session.currentNode,
      collectedFields: session.collectedFields,
      history: session.history,
      retryCount: session.retryCount,
      page: session.page,
      status: session.status,
      lastInput: session.lastInput,
      lastDisplay: session.lastDisplay,
      lastContinue: session.lastContinue,
      createdAt: session.createdAt,
      lastSeenAt: session.lastSeenAt,
    };
  }
}
