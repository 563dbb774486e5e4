import { getPool, withTransaction } from "./pool.js"
import { containsPattern, translateIntegrityErrors } from "./query-utils.js"
import { starshipCreateSchema, type StarshipCreateInput } from "./schemas.js"
import type { ListOptions, StarshipRecord, StarshipWithRelations } from "./types.js"

const STARSHIP_WITH_RELATIONS = `
  SELECT
    s.id,
    s.name,
    s.model,
    s.manufacturer,
    s.starship_class,
    COALESCE((SELECT json_agg(json_build_object('id', f.id, 'title', f.title) ORDER BY f.id)
       FROM film_starships fs JOIN films f ON f.id = fs.film_id
       WHERE fs.starship_id = s.id), '[]'::json) AS films,
    COALESCE((SELECT json_agg(json_build_object('id', c.id, 'name', c.name) ORDER BY c.id)
       FROM character_starships cs JOIN characters c ON c.id = cs.character_id
       WHERE cs.starship_id = s.id), '[]'::json) AS characters
  FROM starships s
`

export async function starshipExists(name: string): Promise<boolean> {
  const db = getPool()
  const result = await db.query<{ exists: boolean }>(
    "SELECT EXISTS(SELECT 1 FROM starships WHERE name = $1) AS exists",
    [name]
  )
  return result.rows[0]?.exists ?? false
}

/**
 * Insert a starship. Unlike characters and films, an existing name is not an
 * error: the name is re-checked inside the transaction and null is returned.
 */
export async function createStarship(input: StarshipCreateInput): Promise<StarshipRecord | null> {
  const data = starshipCreateSchema.parse(input)

  return translateIntegrityErrors("starship", data, () =>
    withTransaction(async (client) => {
      const existing = await client.query("SELECT 1 FROM starships WHERE name = $1", [data.name])
      if (existing.rows.length > 0) {
        return null
      }

      const result = await client.query<StarshipRecord>(
        `INSERT INTO starships (name, model, manufacturer, starship_class)
         VALUES ($1, $2, $3, $4)
         RETURNING id, name, model, manufacturer, starship_class`,
        [data.name, data.model, data.manufacturer, data.starship_class]
      )
      return result.rows[0] ?? null
    })
  )
}

export async function getStarship(id: number): Promise<StarshipWithRelations | null> {
  const db = getPool()
  const result = await db.query<StarshipWithRelations>(`${STARSHIP_WITH_RELATIONS} WHERE s.id = $1`, [id])
  return result.rows[0] ?? null
}

export async function listStarships({ skip, limit }: ListOptions): Promise<StarshipWithRelations[]> {
  const db = getPool()
  const result = await db.query<StarshipWithRelations>(
    `${STARSHIP_WITH_RELATIONS} ORDER BY s.id LIMIT $1 OFFSET $2`,
    [limit, skip]
  )
  return result.rows
}

export async function searchStarships(term: string): Promise<StarshipWithRelations[]> {
  const db = getPool()
  const result = await db.query<StarshipWithRelations>(
    `${STARSHIP_WITH_RELATIONS} WHERE s.name ILIKE $1 ESCAPE '\\' ORDER BY s.id`,
    [containsPattern(term)]
  )
  return result.rows
}
