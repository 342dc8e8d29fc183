import { pathToFileURL } from "node:url";
import Fastify from "fastify";
import cors from "@fastify/cors";
import { API_VERSION, APP_NAME, systemClock, type Clock } from "@caseflow/shared";
import { createDatabase } from "./db/index.js";
import { loadConfig, type AppConfig } from "./lib/config.js";
import { errorHandlerPlugin } from "./lib/errors.js";
import { loggerOptions } from "./lib/logger.js";
import { authPlugin } from "./middleware/auth.js";
import { DrizzleRecordRepository } from "./repositories/drizzle-record-repository.js";
import { DrizzleWorkflowRepository } from "./repositories/drizzle-workflow-repository.js";
import type { RecordRepository, WorkflowRepository } from "./repositories/types.js";
import { StaticDirectory, type Directory } from "./services/directory.js";
import { createServices } from "./services/index.js";
import { LogNotifier, type Notifier } from "./services/notifier.js";
import recordRoutes from "./routes/records.js";
import revisionRoutes from "./routes/revisions.js";
import workflowRoutes from "./routes/workflows.js";

export interface BuildAppOptions {
  config?: AppConfig;
  /** Both repositories must be given to run without Postgres. */
  workflowRepository?: WorkflowRepository;
  recordRepository?: RecordRepository;
  notifier?: Notifier;
  directory?: Directory;
  clock?: Clock;
}

export async function buildApp(options: BuildAppOptions = {}) {
  const config = options.config ?? loadConfig();
  const clock = options.clock ?? systemClock;

  const app = Fastify({ logger: loggerOptions(config) });

  // Database setup
  let workflowRepository = options.workflowRepository;
  let recordRepository = options.recordRepository;
  let closeDatabase: (() => Promise<void>) | undefined;

  if (!workflowRepository || !recordRepository) {
    const { db, close } = createDatabase(config.databaseUrl);
    workflowRepository ??= new DrizzleWorkflowRepository(db);
    recordRepository ??= new DrizzleRecordRepository(db);
    closeDatabase = close;
  }

  const services = createServices({
    workflowRepository,
    recordRepository,
    notifier: options.notifier ?? new LogNotifier(app.log.child({ component: "notifier" })),
    directory: options.directory ?? new StaticDirectory(),
    clock,
    logger: app.log,
    config,
  });

  await app.register(cors, {
    origin: config.corsOrigins,
    credentials: true,
  });

  // Health check, registered before the auth plugin (unauthenticated)
  app.get("/health", async () => {
    return { status: "ok", service: APP_NAME.toLowerCase(), timestamp: clock.now().toISOString() };
  });

  // Error handler & auth
  await app.register(errorHandlerPlugin);
  await app.register(authPlugin, { secret: config.jwtSecret });

  // API routes under /api/v1
  const adminRoles = [config.workflowAdminRole, config.superAdminRole];

  await app.register(async (api) => {
    await api.register(workflowRoutes, { services, adminRoles });
    await api.register(recordRoutes, { services });
    await api.register(revisionRoutes, {
      services,
      adminRoles,
      retentionDays: config.revisionRetentionDays,
    });
  }, { prefix: `/api/${API_VERSION}` });

  app.addHook("onReady", async () => {
    services.slaMonitor.start();
  });

  app.addHook("onClose", async () => {
    services.slaMonitor.stop();
    if (closeDatabase) await closeDatabase();
  });

  return app;
}

async function start() {
  const config = loadConfig();
  const app = await buildApp({ config });

  // Graceful shutdown
  const shutdown = async () => {
    await app.close();
    process.exit(0);
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);

  try {
    await app.listen({ port: config.port, host: config.host });
  } catch (err) {
    app.log.error(err);
    process.exit(1);
  }
}

// Only start when run directly (not when imported in tests)
const entry = process.argv[1];
const isMainModule = entry !== undefined && import.meta.url === pathToFileURL(entry).href;

if (isMainModule) {
  void start();
}
