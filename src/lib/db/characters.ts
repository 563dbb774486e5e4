/**
 * Character persistence.
 *
 * Reads return each character with its relations materialized in the same
 * statement (json_agg sub-selects), so a list page is one round trip.
 */

import { getPool, withTransaction } from "./pool.js"
import { containsPattern, translateIntegrityErrors } from "./query-utils.js"
import { characterCreateSchema, type CharacterCreateInput } from "./schemas.js"
import type { CharacterRecord, CharacterWithRelations, ListOptions } from "./types.js"

const CHARACTER_WITH_RELATIONS = `
  SELECT
    c.id,
    c.name,
    c.gender,
    c.birth_year,
    c.homeworld_id,
    (SELECT json_build_object('id', p.id, 'name', p.name)
       FROM planets p WHERE p.id = c.homeworld_id) AS homeworld,
    COALESCE((SELECT json_agg(json_build_object('id', f.id, 'title', f.title) ORDER BY f.id)
       FROM character_films cf JOIN films f ON f.id = cf.film_id
       WHERE cf.character_id = c.id), '[]'::json) AS films,
    COALESCE((SELECT json_agg(json_build_object('id', v.id, 'name', v.name) ORDER BY v.id)
       FROM character_vehicles cv JOIN vehicles v ON v.id = cv.vehicle_id
       WHERE cv.character_id = c.id), '[]'::json) AS vehicles,
    COALESCE((SELECT json_agg(json_build_object('id', s.id, 'name', s.name) ORDER BY s.id)
       FROM character_starships cs JOIN starships s ON s.id = cs.starship_id
       WHERE cs.character_id = c.id), '[]'::json) AS starships,
    COALESCE((SELECT json_agg(json_build_object('id', sp.id, 'name', sp.name) ORDER BY sp.id)
       FROM character_species csp JOIN species sp ON sp.id = csp.species_id
       WHERE csp.character_id = c.id), '[]'::json) AS species
  FROM characters c
`

/**
 * Exact, case-sensitive name match.
 */
export async function characterExists(name: string): Promise<boolean> {
  const db = getPool()
  const result = await db.query<{ exists: boolean }>(
    "SELECT EXISTS(SELECT 1 FROM characters WHERE name = $1) AS exists",
    [name]
  )
  return result.rows[0]?.exists ?? false
}

/**
 * Insert a character. Throws ZodError for invalid input and PersistenceError
 * when the store rejects the row (e.g. duplicate name).
 */
export async function createCharacter(input: CharacterCreateInput): Promise<CharacterRecord | null> {
  const data = characterCreateSchema.parse(input)

  return translateIntegrityErrors("character", data, () =>
    withTransaction(async (client) => {
      const result = await client.query<CharacterRecord>(
        `INSERT INTO characters (name, gender, birth_year, homeworld_id)
         VALUES ($1, $2, $3, $4)
         RETURNING id, name, gender, birth_year, homeworld_id`,
        [data.name, data.gender, data.birth_year, data.homeworld_id]
      )
      return result.rows[0] ?? null
    })
  )
}

export async function getCharacter(id: number): Promise<CharacterWithRelations | null> {
  const db = getPool()
  const result = await db.query<CharacterWithRelations>(`${CHARACTER_WITH_RELATIONS} WHERE c.id = $1`, [id])
  return result.rows[0] ?? null
}

export async function listCharacters({ skip, limit }: ListOptions): Promise<CharacterWithRelations[]> {
  const db = getPool()
  const result = await db.query<CharacterWithRelations>(
    `${CHARACTER_WITH_RELATIONS} ORDER BY c.id LIMIT $1 OFFSET $2`,
    [limit, skip]
  )
  return result.rows
}

/**
 * Case-insensitive substring match on name.
 */
export async function searchCharacters(term: string): Promise<CharacterWithRelations[]> {
  const db = getPool()
  const result = await db.query<CharacterWithRelations>(
    `${CHARACTER_WITH_RELATIONS} WHERE c.name ILIKE $1 ESCAPE '\\' ORDER BY c.id`,
    [containsPattern(term)]
  )
  return result.rows
}

/**
 * Link a character to a film. Linking twice is a no-op.
 */
export async function addCharacterFilm(characterId: number, filmId: number): Promise<void> {
  const db = getPool()
  await db.query(
    `INSERT INTO character_films (character_id, film_id)
     VALUES ($1, $2)
     ON CONFLICT (character_id, film_id) DO NOTHING`,
    [characterId, filmId]
  )
}
