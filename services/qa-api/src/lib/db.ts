import { Pool, type PoolConfig } from "pg";

import { errorMessage, type Logger } from "./logger.js";

export type DbPoolOptions = {
  connectionString: string;
  maxConnections: number;
  connectTimeoutMs: number;
  logger: Logger;
};

// A checkout waits at most connectTimeoutMs for a connection instead of hanging on an unreachable server.
export function poolConfig(options: Omit<DbPoolOptions, "logger">): PoolConfig {
  return {
    connectionString: options.connectionString,
    max: options.maxConnections,
    connectionTimeoutMillis: options.connectTimeoutMs,
    application_name: "qa-api",
  };
}

let pool: Pool | null = null;

// Shared by the memory, feedback and session stores.
export function getDbPool(options: DbPoolOptions): Pool {
  if (!pool) {
    pool = new Pool(poolConfig(options));
    pool.on("error", (error) => {
      options.logger.error({ err: errorMessage(error) }, "idle postgres client failed");
    });
  }
  return pool;
}

export async function closeDbPool(): Promise<void> {
  const current = pool;
  pool = null;
  await current?.end();
}
