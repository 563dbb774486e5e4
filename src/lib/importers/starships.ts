import { createStarship, starshipExists } from "../db/index.js"
import { logger, type Logger } from "../logger.js"
import { fetchStarships } from "../swapi.js"
import { emptySummary, fetchPage, swapiStarshipSchema, type ImportSummary } from "./shared.js"

async function importStarship(item: unknown, summary: ImportSummary, log: Logger): Promise<void> {
  try {
    const ship = swapiStarshipSchema.parse(item)
    const name = ship.name.trim()
    if (!name) {
      log.warn({ item }, "Skipping starship with empty name")
      summary.invalid++
      return
    }

    if (await starshipExists(name)) {
      log.debug({ name }, "Starship already exists; skipping")
      summary.skipped++
      return
    }

    // createStarship re-checks the name and returns null when another import got there first
    const created = await createStarship({
      name,
      model: ship.model,
      manufacturer: ship.manufacturer,
      starship_class: ship.starship_class,
    })
    if (!created) {
      log.warn({ name }, "Starship was not created")
      summary.notCreated++
      return
    }
    summary.inserted++
  } catch (err) {
    summary.failed++
    log.error({ err, item }, "Failed to import starship")
  }
}

export async function importStarships(): Promise<ImportSummary> {
  const log = logger.child({ resource: "starships" })
  const summary = emptySummary("starships")

  let page = 1
  for (;;) {
    const envelope = await fetchPage("starships", () => fetchStarships(page), page)
    const results = envelope.results ?? []
    if (results.length === 0) {
      log.info({ page }, "No starships on page; stopping")
      break
    }

    for (const item of results) {
      await importStarship(item, summary, log)
    }

    if (!envelope.next) break
    page++
  }

  log.info(summary, `Starship import completed: ${summary.inserted} inserted, ${summary.skipped} skipped`)
  return summary
}
