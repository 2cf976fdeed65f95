import { SessionHistoryEntry } from "../../../database/schema";

export type { SessionHistoryEntry };

export const SESSION_STATUS = {
  ACTIVE: "ACTIVE",
  COMPLETED: "COMPLETED",
  ABANDONED: "ABANDONED",
  EXPIRED: "EXPIRED",
} as const;

export type SessionStatus = (typeof SESSION_STATUS)[keyof typeof SESSION_STATUS];

/**
 * One caller's conversation as reconstructed across gateway callbacks.
 * `collectedFields` keeps insertion order, which is the order nodes were visited.
 */
export interface UssdSession {
  sessionId: string;
  callerId: string;
  currentNode: string;
  collectedFields: Record<string, string>;
  history: SessionHistoryEntry[];
  retryCount: number;
  page: number;
  status: SessionStatus;
  /** Tokenized key of the last processed callback text */
  lastInput: string | null;
  lastDisplay: string | null;
  lastContinue: boolean;
  createdAt: Date;
  lastSeenAt: Date;
}

export interface LoadedSession {
  session: UssdSession;
  /** A previous session for this key timed out and was replaced */
  expired: boolean;
  /** No usable session existed; this one starts at the root node */
  created: boolean;
}

export function createFreshSession(
  sessionId: string,
  callerId: string,
  rootNode: string,
  now: Date = new Date(),
): UssdSession {
  return {
    sessionId,
    callerId,
    currentNode: rootNode,
    collectedFields: {},
    history: [],
    retryCount: 0,
    page: 0,
    status: SESSION_STATUS.ACTIVE,
    lastInput: null,
    lastDisplay: null,
    lastContinue: true,
    createdAt: now,
    lastSeenAt: now,
  };
}

export function cloneSession(session: UssdSession): UssdSession {
  return {
    ...session,
    collectedFields: { ...session.collectedFields },
    history: session.history.map((entry) => ({ ...entry })),
    createdAt: new Date(session.createdAt),
    lastSeenAt: new Date(session.lastSeenAt),
  };
}

export const sessionCacheKey = (sessionId: string, callerId: string): string =>
  `ussd:session:${sessionId}:${callerId}`;
