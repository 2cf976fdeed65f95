import {
  pgTable,
  varchar,
  timestamp,
  json,
  jsonb,
  integer,
  text,
  boolean,
  pgEnum,
  primaryKey,
  index,
} from "drizzle-orm/pg-core";

export const ussdSessionStatusEnum = pgEnum("ussd_session_status", [
  "ACTIVE",
  "COMPLETED",
  "ABANDONED",
  "EXPIRED",
]);

export interface SessionHistoryEntry {
  nodeId: string;
  field?: string;
}

export const ussdSessions = pgTable(
  "ussd_sessions",
  {
    sessionId: varchar("session_id", { length: 100 }).notNull(),
    callerId: varchar("caller_id", { length: 20 }).notNull(),
    currentNode: varchar("current_node", { length: 64 }).notNull(),
    // json rather than jsonb: key order is visitation order and jsonb reorders keys
    collectedFields: json("collected_fields")
      .$type<Record<string, string>>()
      .default({})
      .notNull(),
    history: jsonb("history").$type<SessionHistoryEntry[]>().default([]).notNull(),
    retryCount: integer("retry_count").default(0).notNull(),
    page: integer("page").default(0).notNull(),
    status: ussdSessionStatusEnum("status").default("ACTIVE").notNull(),
    lastInput: text("last_input"),
    lastDisplay: text("last_display"),
    lastContinue: boolean("last_continue").default(true).notNull(),
    createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull(),
    lastSeenAt: timestamp("last_seen_at", { withTimezone: true }).defaultNow().notNull(),
    updatedAt: timestamp("updated_at", { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => ({
    pk: primaryKey({ columns: [table.sessionId, table.callerId] }),
    statusLastSeenIdx: index("ussd_sessions_status_last_seen_idx").on(
      table.status,
      table.lastSeenAt,
    ),
  }),
);
