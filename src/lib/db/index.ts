/**
 * Database module barrel file.
 *
 * Import pattern:
 *   import { getPool, createCharacter } from "./db/index.js"
 *   import * as db from "./db/index.js"
 */

export { getPool, resetPool, withTransaction } from "./pool.js"

export {
  characterExists,
  createCharacter,
  getCharacter,
  listCharacters,
  searchCharacters,
  addCharacterFilm,
} from "./characters.js"

export { filmExists, createFilm, findFilmById, getFilm, listFilms, searchFilms } from "./films.js"

export { starshipExists, createStarship, getStarship, listStarships, searchStarships } from "./starships.js"

export {
  characterCreateSchema,
  filmCreateSchema,
  starshipCreateSchema,
  type CharacterCreateInput,
  type FilmCreateInput,
  type StarshipCreateInput,
} from "./schemas.js"

export type {
  NamedRef,
  FilmRef,
  ListOptions,
  CharacterRecord,
  CharacterWithRelations,
  FilmRecord,
  FilmWithRelations,
  StarshipRecord,
  StarshipWithRelations,
} from "./types.js"
