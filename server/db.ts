import { drizzle, type NodePgDatabase } from "drizzle-orm/node-postgres";
import pg from "pg";
import * as schema from "@shared/schema";

export type Database = NodePgDatabase<typeof schema>;

export function createDatabase(connectionString: string): { pool: pg.Pool; db: Database } {
  const pool = new pg.Pool({ connectionString });
  pool.on("error", (err) => {
    console.error(`[db] Idle client error: ${err.message}`);
  });
  const db = drizzle(pool, { schema });
  return { pool, db };
}
