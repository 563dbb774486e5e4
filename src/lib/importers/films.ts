import { createFilm, filmExists } from "../db/index.js"
import { parseIsoDate, parseIsoDateTime } from "../date-utils.js"
import { DataImportError } from "../errors.js"
import { logger, type Logger } from "../logger.js"
import { fetchFilms } from "../swapi.js"
import { emptySummary, fetchPage, swapiFilmSchema, type ImportSummary } from "./shared.js"

async function importFilm(item: unknown, summary: ImportSummary, log: Logger): Promise<void> {
  try {
    const film = swapiFilmSchema.parse(item)
    const title = film.title.trim()
    if (!title) {
      log.warn({ item }, "Skipping film with empty title")
      summary.invalid++
      return
    }

    if (await filmExists(title)) {
      log.debug({ title }, "Film already exists; skipping")
      summary.skipped++
      return
    }

    const created = await createFilm({
      title,
      episode_id: film.episode_id,
      opening_crawl: film.opening_crawl,
      director: film.director,
      producer: film.producer,
      release_date: parseIsoDate(film.release_date),
      created: parseIsoDateTime(film.created),
      edited: parseIsoDateTime(film.edited),
      url: film.url,
    })
    if (!created) {
      log.warn({ title }, "Film was not created")
      summary.notCreated++
      return
    }
    summary.inserted++
  } catch (err) {
    summary.failed++
    log.error({ err, item }, "Failed to import film")
  }
}

/**
 * Import all films. The films endpoint is a single page; a payload without a
 * results list is a data-shape failure rather than an empty import.
 */
export async function importFilms(): Promise<ImportSummary> {
  const log = logger.child({ resource: "films" })
  const summary = emptySummary("films")

  const envelope = await fetchPage("films", fetchFilms)
  if (!envelope.results) {
    throw new DataImportError("No results in SWAPI films response", { keys: Object.keys(envelope) })
  }

  for (const item of envelope.results) {
    await importFilm(item, summary, log)
  }

  log.info(summary, `Film import completed: ${summary.inserted} inserted, ${summary.skipped} skipped`)
  return summary
}
