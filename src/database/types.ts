import { InferSelectModel, InferInsertModel } from "drizzle-orm";
import { listings, ussdSessions } from "./schema";

// Select types (for reading from database)
export type UssdSessionRecord = InferSelectModel<typeof ussdSessions>;
export type ListingRecord = InferSelectModel<typeof listings>;

// Insert types (for creating new records)
export type NewUssdSessionRecord = InferInsertModel<typeof ussdSessions>;
export type NewListingRecord = InferInsertModel<typeof listings>;

// Enum types
export type UssdSessionStatus = UssdSessionRecord["status"];
export type ListingVisibility = ListingRecord["visibility"];

export interface SessionKey {
  sessionId: string;
  callerId: string;
}

export interface CountByValue {
  value: string;
  count: number;
}

export interface ListingStats {
  total: number;
  villages: number;
  categories: number;
  byVillage: CountByValue[];
  byCategory: CountByValue[];
}

// Repository contracts
export interface UssdSessionRecordStore {
  find(sessionId: string, callerId: string): Promise<UssdSessionRecord | null>;
  upsert(record: NewUssdSessionRecord): Promise<UssdSessionRecord>;
  markExpired(idleBefore: Date, now: Date): Promise<SessionKey[]>;
}

export interface ListingRecordStore {
  insert(listing: NewListingRecord): Promise<ListingRecord>;
  findById(id: string): Promise<ListingRecord | null>;
  findByRoutingToken(token: string): Promise<ListingRecord | null>;
  findByVillageCategory(
    village: string,
    category: string,
    limit: number,
    offset: number,
  ): Promise<ListingRecord[]>;
  getStats(): Promise<ListingStats>;
}
