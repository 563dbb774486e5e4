/**
 * Character import: walks the paginated people/ endpoint, creates characters
 * that do not exist yet and links each new one to the films it appears in.
 *
 * Films must be imported first; links to films that are not in the store are
 * logged and skipped.
 */

import { addCharacterFilm, characterExists, createCharacter, findFilmById } from "../db/index.js"
import type { CharacterRecord } from "../db/index.js"
import { logger, type Logger } from "../logger.js"
import { fetchCharacters } from "../swapi.js"
import { emptySummary, fetchPage, parseResourceId, swapiPersonSchema, type ImportSummary } from "./shared.js"

async function linkFilms(character: CharacterRecord, filmUrls: unknown[], log: Logger): Promise<void> {
  for (const url of filmUrls) {
    try {
      const filmId = parseResourceId(url)
      const film = await findFilmById(filmId)
      if (!film) {
        log.warn({ character: character.name, filmId, url }, "Linked film not found; skipping link")
        continue
      }
      await addCharacterFilm(character.id, film.id)
    } catch (err) {
      log.error({ err, character: character.name, url }, "Failed to link character to film")
    }
  }
}

async function importCharacter(item: unknown, summary: ImportSummary, log: Logger): Promise<void> {
  try {
    const person = swapiPersonSchema.parse(item)
    const name = person.name.trim()
    if (!name) {
      log.warn({ item }, "Skipping character with empty name")
      summary.invalid++
      return
    }

    if (await characterExists(name)) {
      log.debug({ name }, "Character already exists; skipping")
      summary.skipped++
      return
    }

    const created = await createCharacter({ name, gender: person.gender, birth_year: person.birth_year })
    if (!created) {
      log.warn({ name }, "Character was not created")
      summary.notCreated++
      return
    }

    await linkFilms(created, person.films, log)
    summary.inserted++
  } catch (err) {
    summary.failed++
    log.error({ err, item }, "Failed to import character")
  }
}

export async function importCharacters(): Promise<ImportSummary> {
  const log = logger.child({ resource: "characters" })
  const summary = emptySummary("characters")

  let page = 1
  for (;;) {
    const envelope = await fetchPage("characters", () => fetchCharacters(page), page)
    const results = envelope.results ?? []
    if (results.length === 0) {
      log.info({ page }, "No characters on page; stopping")
      break
    }

    log.info({ page, count: results.length }, "Importing characters page")
    for (const item of results) {
      await importCharacter(item, summary, log)
    }

    if (!envelope.next) break
    page++
  }

  log.info(summary, `Character import completed: ${summary.inserted} inserted, ${summary.skipped} skipped`)
  return summary
}
