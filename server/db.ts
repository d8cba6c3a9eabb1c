import { drizzle, type NodePgDatabase } from "drizzle-orm/node-postgres";
import pg from "pg";
import * as schema from "@shared/schema";

const { Pool } = pg;

export type Database = NodePgDatabase<typeof schema>;

export interface DatabaseConnection {
  pool: pg.Pool;
  db: Database;
}

/**
 * Opens the connection pool.
 * Returns null without a URL: the server then runs on in-process storage.
 */
export function connectDatabase(databaseUrl: string | undefined): DatabaseConnection | null {
  if (!databaseUrl) {
    console.warn(
      "⚠️  DATABASE_URL is not set.",
      "\n   Falling back to in-memory storage seeded from server/config/seed-catalog.json.",
    );
    return null;
  }

  const pool = new Pool({
    connectionString: databaseUrl,
    // Cyrillic place names: force UTF-8 on every connection
    options: "-c client_encoding=UTF8",
  });

  pool.on("error", (error) => {
    console.error("[DB] Idle client error:", error.message);
  });

  const db = drizzle(pool, { schema });
  console.log("✅ Database pool created (UTF-8 encoding)");
  return { pool, db };
}
