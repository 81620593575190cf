import { Pool } from "pg";
import { getConfig } from "../config";

// Lazily created so nothing connects until the server actually starts
let pool: Pool | null = null;

/**
 * Initialize database pool (idempotent)
 */
export function initializePool(): Pool {
  if (pool) {
    return pool;
  }

  const { database } = getConfig();
  pool = new Pool({
    user: database.user,
    host: database.host,
    database: database.database,
    password: database.password,
    port: database.port,
    ssl: database.ssl
      ? { rejectUnauthorized: database.sslRejectUnauthorized }
      : false,
    max: database.poolMax,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 10000,
  });

  pool.on("error", (error) => {
    console.error("[Database] Idle client error:", error);
  });

  return pool;
}

export function getPool(): Pool {
  if (!pool) {
    throw new Error("Database pool not initialized");
  }
  return pool;
}

export async function closePool(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
  }
}
