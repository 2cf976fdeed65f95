export * from "./queue.module";
export * from "./constants/queue-names.constants";
export * from "./services/queue-health.service";
export * from "./services/session-sweep.scheduler";
export * from "./processors/session-sweep.processor";
