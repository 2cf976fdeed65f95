// Re-export all schema definitions from the schema directory
export * from "./schema/ussd-sessions.schema";
export * from "./schema/listings.schema";
