/**
 * Database connection pool management.
 */

import pg from "pg"
import { getConfig } from "../config.js"
import { logger } from "../logger.js"

const { Pool } = pg

let pool: pg.Pool | null = null

function createPool(): pg.Pool {
  const newPool = new Pool({
    connectionString: getConfig().DATABASE_URL,
    max: 10,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 10000,
  })

  // Unexpected disconnections of idle clients; the pool replaces them on demand
  newPool.on("error", (err: Error) => {
    logger.error({ err }, "Unexpected database pool error")
  })

  return newPool
}

export function getPool(): pg.Pool {
  if (!pool) {
    pool = createPool()
  }
  return pool
}

/**
 * Close the pool. The next getPool() call creates a fresh one.
 */
export async function resetPool(): Promise<void> {
  if (pool) {
    try {
      await pool.end()
    } catch (err) {
      logger.error({ err }, "Error closing pool")
    }
    pool = null
  }
}

/**
 * Run `work` inside BEGIN/COMMIT on a dedicated client. Any error rolls the
 * transaction back and is rethrown; the client is always released.
 */
export async function withTransaction<T>(work: (client: pg.PoolClient) => Promise<T>): Promise<T> {
  const client = await getPool().connect()
  try {
    await client.query("BEGIN")
    const result = await work(client)
    await client.query("COMMIT")
    return result
  } catch (error) {
    try {
      await client.query("ROLLBACK")
    } catch (rollbackError) {
      logger.error({ err: rollbackError }, "Failed to roll back transaction")
    }
    throw error
  } finally {
    client.release()
  }
}
