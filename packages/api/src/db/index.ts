import { drizzle, type PostgresJsDatabase } from "drizzle-orm/postgres-js";
import postgres from "postgres";
import * as schema from "./schema.js";
import * as schemaAudit from "./schema-audit.js";
import * as relations from "./relations.js";
import * as relationsAudit from "./relations-audit.js";

export const fullSchema = {
  ...schema,
  ...schemaAudit,
  ...relations,
  ...relationsAudit,
};

export type Database = PostgresJsDatabase<typeof fullSchema>;

export interface DatabaseHandle {
  db: Database;
  close(): Promise<void>;
}

export function createDatabase(connectionString: string): DatabaseHandle {
  const client = postgres(connectionString);
  return {
    db: drizzle(client, { schema: fullSchema }),
    close: () => client.end(),
  };
}
