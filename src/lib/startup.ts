/**
 * Server startup initialization.
 * Ensures the schema is migrated before the server starts serving requests.
 */
import { existsSync } from "node:fs"
import { dirname, join } from "node:path"
import { fileURLToPath } from "node:url"
import { runner } from "node-pg-migrate"
import { getConfig } from "./config.js"
import { logger } from "./logger.js"

const __dirname = dirname(fileURLToPath(import.meta.url))

/**
 * Find the migrations directory from either src/lib or dist/src/lib.
 */
export function findMigrationsDir(): string {
  const possiblePaths = [join(__dirname, "..", "..", "migrations"), join(__dirname, "..", "..", "..", "migrations")]

  for (const path of possiblePaths) {
    if (existsSync(path)) {
      return path
    }
  }

  // Fall back to the source layout
  return possiblePaths[0] ?? "migrations"
}

async function runMigrations(): Promise<void> {
  const migrationsDir = findMigrationsDir()
  logger.info({ migrationsDir }, "Running database migrations")

  const applied = await runner({
    databaseUrl: getConfig().DATABASE_URL,
    dir: migrationsDir,
    direction: "up",
    migrationsTable: "pgmigrations",
    log: (msg) => logger.debug(msg),
  })

  if (applied.length === 0) {
    logger.info("No pending migrations")
  } else {
    logger.info({ migrations: applied.map((migration) => migration.name) }, "Migrations complete")
  }
}

/**
 * Initialize the database on server startup.
 */
export async function initializeDatabase(): Promise<void> {
  try {
    await runMigrations()
    logger.info("Database initialization complete")
  } catch (err) {
    logger.error({ err }, "Database initialization failed")
    throw err
  }
}
