import { readFileSync } from "fs";
import { PGlite } from "@electric-sql/pglite";
import { drizzle, type PgliteDatabase } from "drizzle-orm/pglite";
import * as schema from "@shared/schema";

export type AppDatabase = PgliteDatabase<typeof schema>;

export interface DatabaseHandle {
  db: AppDatabase;
  close(): Promise<void>;
}

const SCHEMA_SQL = readFileSync(new URL("./schema.sql", import.meta.url), "utf-8");

/**
 * Opens (creating if absent) the embedded Postgres data directory and makes
 * sure every table exists. Without a directory the database lives in memory.
 */
export async function openDatabase(dataDir?: string): Promise<DatabaseHandle> {
  const client = new PGlite(dataDir);
  await client.exec(SCHEMA_SQL);
  return {
    db: drizzle(client, { schema }),
    close: () => client.close(),
  };
}
