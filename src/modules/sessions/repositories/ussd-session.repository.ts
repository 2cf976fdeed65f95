import { Injectable, Logger } from "@nestjs/common";
import { and, eq, lt } from "drizzle-orm";
import { describeError } from "../../../common/errors/ussd.errors";
import { DatabaseService } from "../../../database/database.service";
import { ussdSessions } from "../../../database/schema";
import {
  NewUssdSessionRecord,
  SessionKey,
  UssdSessionRecord,
  UssdSessionRecordStore,
} from "../../../database/types";

@Injectable()
export class UssdSessionRepository implements UssdSessionRecordStore {
  private readonly logger = new Logger(UssdSessionRepository.name);

  constructor(private readonly databaseService: DatabaseService) {}

  async find(sessionId: string, callerId: string): Promise<UssdSessionRecord | null> {
    try {
      const [session] = await this.databaseService.db
        .select()
        .from(ussdSessions)
        .where(and(eq(ussdSessions.sessionId, sessionId), eq(ussdSessions.callerId, callerId)))
        .limit(1);

      return session ?? null;
    } catch (error) {
      this.logger.error(`Failed to find session ${sessionId}: ${describeError(error)}`);
      throw error;
    }
  }

  async upsert(record: NewUssdSessionRecord): Promise<UssdSessionRecord> {
    // createdAt stays in the update: a replaced session reuses the key with a new start time
    const { sessionId, callerId, ...mutable } = record;

    try {
      const [session] = await this.databaseService.db
        .insert(ussdSessions)
        .values(record)
        .onConflictDoUpdate({
          target: [ussdSessions.sessionId, ussdSessions.callerId],
          set: { ...mutable, updatedAt: new Date() },
        })
        .returning();

      this.logger.debug(`Saved session ${sessionId} for ${callerId}`, {
        node: session.currentNode,
        status: session.status,
        createdAt: session.createdAt,
      });
      return session;
    } catch (error) {
      this.logger.error(`Failed to save session ${sessionId}: ${describeError(error)}`);
      throw error;
    }
  }

  /** Flags ACTIVE sessions idle since before `idleBefore` as EXPIRED */
  async markExpired(idleBefore: Date, now: Date): Promise<SessionKey[]> {
    try {
      const expired = await this.databaseService.db
        .update(ussdSessions)
        .set({ status: "EXPIRED", updatedAt: now })
        .where(and(eq(ussdSessions.status, "ACTIVE"), lt(ussdSessions.lastSeenAt, idleBefore)))
        .returning({ sessionId: ussdSessions.sessionId, callerId: ussdSessions.callerId });

      if (expired.length > 0) {
        this.logger.log(`Marked ${expired.length} idle sessions as expired`);
      }
      return expired;
    } catch (error) {
      this.logger.error(`Failed to expire idle sessions: ${describeError(error)}`);
      throw error;
    }
  }
}
