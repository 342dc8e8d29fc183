import { drizzle } from "drizzle-orm/postgres-js";
import { migrate } from "drizzle-orm/postgres-js/migrator";
import postgres from "postgres";
import { loadConfig } from "../lib/config.js";
import { createLogger } from "../lib/logger.js";

async function runMigrations() {
  const config = loadConfig();
  const logger = createLogger(config).child({ component: "migrate" });
  const client = postgres(config.databaseUrl, { max: 1 });
  const db = drizzle(client);

  logger.info("Running migrations...");
  await migrate(db, { migrationsFolder: new URL("./migrations", import.meta.url).pathname });
  logger.info("Migrations complete.");

  await client.end();
}

runMigrations().catch((err: unknown) => {
  console.error("Migration failed:", err);
  process.exit(1);
});
