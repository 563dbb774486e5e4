/**
 * Import orchestration entry points used by the API and the CLI.
 */

import { logger } from "../logger.js"
import { recordCustomEvent, startBackgroundTransaction } from "../newrelic.js"
import { importCharacters } from "./characters.js"
import { importFilms } from "./films.js"
import { importStarships } from "./starships.js"
import type { ImportResource, ImportSummary } from "./shared.js"

export { importCharacters } from "./characters.js"
export { importFilms } from "./films.js"
export { importStarships } from "./starships.js"
export { parseResourceId, type ImportResource, type ImportSummary } from "./shared.js"

const IMPORTERS: Record<ImportResource, () => Promise<ImportSummary>> = {
  characters: importCharacters,
  films: importFilms,
  starships: importStarships,
}

/**
 * Dependency order for a full import: characters link to films, so films go first.
 */
export const FULL_IMPORT_ORDER: readonly ImportResource[] = ["films", "characters", "starships"]

/**
 * Run one importer as a background transaction. Errors from the fetch phase
 * (ExternalApiError, DataImportError) propagate to the caller.
 */
export async function runImport(resource: ImportResource): Promise<ImportSummary> {
  const startedAt = Date.now()
  const summary = await startBackgroundTransaction(`swapi-import/${resource}`, "swapi", IMPORTERS[resource])

  recordCustomEvent("SwapiImportCompleted", {
    ...summary,
    durationMs: Date.now() - startedAt,
  })
  return summary
}

/**
 * Import the given resources in dependency order, stopping at the first
 * resource whose import aborts.
 */
export async function runFullImport(resources: readonly ImportResource[] = FULL_IMPORT_ORDER): Promise<ImportSummary[]> {
  const ordered = FULL_IMPORT_ORDER.filter((resource) => resources.includes(resource))
  const summaries: ImportSummary[] = []

  for (const resource of ordered) {
    logger.info({ resource }, `Starting ${resource} import`)
    summaries.push(await runImport(resource))
  }
  return summaries
}
