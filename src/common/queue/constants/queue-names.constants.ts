export const QUEUE_NAMES = {
  SESSION_SWEEP: "session-sweep",
} as const;

export type QueueName = (typeof QUEUE_NAMES)[keyof typeof QUEUE_NAMES];

export const JOB_NAMES = {
  SWEEP_EXPIRED_SESSIONS: "sweep-expired-sessions",
} as const;
