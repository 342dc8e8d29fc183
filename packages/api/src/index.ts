export { buildApp } from "./server.js";
export type { BuildAppOptions } from "./server.js";
export { loadConfig } from "./lib/config.js";
export type { AppConfig } from "./lib/config.js";
export { createLogger } from "./lib/logger.js";
export type { Logger } from "./lib/logger.js";
export { WORKFLOW_STATUS_MAP } from "./lib/errors.js";
export { createDatabase } from "./db/index.js";
export type { Database } from "./db/index.js";
export * from "./repositories/types.js";
export { InMemoryWorkflowRepository } from "./repositories/memory-workflow-repository.js";
export { InMemoryRecordRepository } from "./repositories/memory-record-repository.js";
export { DrizzleWorkflowRepository } from "./repositories/drizzle-workflow-repository.js";
export { DrizzleRecordRepository } from "./repositories/drizzle-record-repository.js";
export * from "./services/index.js";
