import pg from "pg";
import { env } from "@/lib/env";

const { Pool } = pg;

const globalForDb = globalThis as unknown as {
  pgPool?: pg.Pool;
};

/** Shared pool; reused across hot reloads in development. */
export function getPool(): pg.Pool {
  if (globalForDb.pgPool) return globalForDb.pgPool;

  const pool = new Pool({ connectionString: env.DATABASE_URL });
  if (process.env.NODE_ENV !== "production") {
    globalForDb.pgPool = pool;
  }
  return pool;
}
