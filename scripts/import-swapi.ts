#!/usr/bin/env tsx
/**
 * Import SWAPI data into the database, films first so characters can be
 * linked to them.
 *
 * Usage:
 *   npm run import:swapi -- [options]
 *
 * Options:
 *   --only <resources>  Comma-separated subset: films,characters,starships
 *   --migrate           Run pending migrations before importing
 *
 * Examples:
 *   npm run import:swapi
 *   npm run import:swapi -- --only characters,films
 *   npm run import:swapi -- --migrate
 */

import "dotenv/config"
import { Command, InvalidArgumentError } from "commander"
import { getConfig } from "../src/lib/config.js"
import { resetPool } from "../src/lib/db/index.js"
import { FULL_IMPORT_ORDER, runFullImport, type ImportResource, type ImportSummary } from "../src/lib/importers/index.js"
import { logger } from "../src/lib/logger.js"
import { initializeDatabase } from "../src/lib/startup.js"

function isImportResource(value: string): value is ImportResource {
  return FULL_IMPORT_ORDER.some((resource) => resource === value)
}

/**
 * Parse a comma-separated resource list into dependency order.
 *
 * @throws InvalidArgumentError for unknown or empty lists
 */
export function parseResources(value: string): ImportResource[] {
  const requested = value
    .split(",")
    .map((part) => part.trim().toLowerCase())
    .filter((part) => part.length > 0)

  if (requested.length === 0) {
    throw new InvalidArgumentError("Specify at least one resource")
  }

  const unknown = requested.filter((part) => !isImportResource(part))
  if (unknown.length > 0) {
    throw new InvalidArgumentError(`Unknown resource(s): ${unknown.join(", ")}. Use ${FULL_IMPORT_ORDER.join(", ")}`)
  }

  return FULL_IMPORT_ORDER.filter((resource) => requested.includes(resource))
}

export function formatSummary(summary: ImportSummary): string {
  return (
    `${summary.resource}: ${summary.inserted} inserted, ${summary.skipped} skipped, ` +
    `${summary.invalid} invalid, ${summary.notCreated} not created, ${summary.failed} failed`
  )
}

interface ImportOptions {
  only: ImportResource[]
  migrate: boolean
}

export async function runCli(options: ImportOptions): Promise<ImportSummary[]> {
  getConfig()
  if (options.migrate) {
    await initializeDatabase()
  }

  try {
    const summaries = await runFullImport(options.only)
    for (const summary of summaries) {
      logger.info(summary, formatSummary(summary))
    }
    return summaries
  } finally {
    await resetPool()
  }
}

const program = new Command()
  .name("import-swapi")
  .description("Import films, characters and starships from SWAPI")
  .option("-o, --only <resources>", "Comma-separated resources to import", parseResources, [...FULL_IMPORT_ORDER])
  .option("-m, --migrate", "Run pending migrations first", false)
  .action(async (options: ImportOptions) => {
    try {
      await runCli(options)
    } catch (err) {
      logger.fatal({ err }, "SWAPI import failed")
      process.exit(1)
    }
  })

const isMainModule = import.meta.url === `file://${process.argv[1]}`
if (isMainModule) {
  program.parse()
}
