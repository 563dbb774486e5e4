import { getPool, withTransaction } from "./pool.js"
import { containsPattern, translateIntegrityErrors } from "./query-utils.js"
import { filmCreateSchema, type FilmCreateInput } from "./schemas.js"
import type { FilmRecord, FilmWithRelations, ListOptions } from "./types.js"

// release_date goes out as text so the pg DATE parser never shifts it into
// the server's local timezone.
const FILM_COLUMNS = `
  f.id, f.episode_id, f.title, f.opening_crawl, f.director, f.producer,
  to_char(f.release_date, 'YYYY-MM-DD') AS release_date,
  f.created, f.edited, f.url
`

const FILM_WITH_RELATIONS = `
  SELECT
    ${FILM_COLUMNS},
    COALESCE((SELECT json_agg(json_build_object('id', c.id, 'name', c.name) ORDER BY c.id)
       FROM character_films cf JOIN characters c ON c.id = cf.character_id
       WHERE cf.film_id = f.id), '[]'::json) AS characters,
    COALESCE((SELECT json_agg(json_build_object('id', p.id, 'name', p.name) ORDER BY p.id)
       FROM film_planets fp JOIN planets p ON p.id = fp.planet_id
       WHERE fp.film_id = f.id), '[]'::json) AS planets,
    COALESCE((SELECT json_agg(json_build_object('id', s.id, 'name', s.name) ORDER BY s.id)
       FROM film_starships fs JOIN starships s ON s.id = fs.starship_id
       WHERE fs.film_id = f.id), '[]'::json) AS starships,
    COALESCE((SELECT json_agg(json_build_object('id', v.id, 'name', v.name) ORDER BY v.id)
       FROM film_vehicles fv JOIN vehicles v ON v.id = fv.vehicle_id
       WHERE fv.film_id = f.id), '[]'::json) AS vehicles,
    COALESCE((SELECT json_agg(json_build_object('id', sp.id, 'name', sp.name) ORDER BY sp.id)
       FROM film_species fsp JOIN species sp ON sp.id = fsp.species_id
       WHERE fsp.film_id = f.id), '[]'::json) AS species
  FROM films f
`

export async function filmExists(title: string): Promise<boolean> {
  const db = getPool()
  const result = await db.query<{ exists: boolean }>(
    "SELECT EXISTS(SELECT 1 FROM films WHERE title = $1) AS exists",
    [title]
  )
  return result.rows[0]?.exists ?? false
}

export async function createFilm(input: FilmCreateInput): Promise<FilmRecord | null> {
  const data = filmCreateSchema.parse(input)

  return translateIntegrityErrors("film", data, () =>
    withTransaction(async (client) => {
      const result = await client.query<FilmRecord>(
        `INSERT INTO films AS f
           (episode_id, title, opening_crawl, director, producer, release_date, created, edited, url)
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)
         RETURNING ${FILM_COLUMNS}`,
        [
          data.episode_id,
          data.title,
          data.opening_crawl,
          data.director,
          data.producer,
          data.release_date,
          data.created,
          data.edited,
          data.url,
        ]
      )
      return result.rows[0] ?? null
    })
  )
}

/**
 * Plain film lookup without relations, used when linking characters.
 */
export async function findFilmById(id: number): Promise<FilmRecord | null> {
  const db = getPool()
  const result = await db.query<FilmRecord>(`SELECT ${FILM_COLUMNS} FROM films f WHERE f.id = $1`, [id])
  return result.rows[0] ?? null
}

export async function getFilm(id: number): Promise<FilmWithRelations | null> {
  const db = getPool()
  const result = await db.query<FilmWithRelations>(`${FILM_WITH_RELATIONS} WHERE f.id = $1`, [id])
  return result.rows[0] ?? null
}

export async function listFilms({ skip, limit }: ListOptions): Promise<FilmWithRelations[]> {
  const db = getPool()
  const result = await db.query<FilmWithRelations>(`${FILM_WITH_RELATIONS} ORDER BY f.id LIMIT $1 OFFSET $2`, [
    limit,
    skip,
  ])
  return result.rows
}

export async function searchFilms(term: string): Promise<FilmWithRelations[]> {
  const db = getPool()
  const result = await db.query<FilmWithRelations>(
    `${FILM_WITH_RELATIONS} WHERE f.title ILIKE $1 ESCAPE '\\' ORDER BY f.id`,
    [containsPattern(term)]
  )
  return result.rows
}
