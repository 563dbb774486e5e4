/**
 * Row types for the persistence layer. Field names mirror the columns.
 */

export interface NamedRef {
  id: number
  name: string
}

export interface FilmRef {
  id: number
  title: string
}

export interface ListOptions {
  skip: number
  limit: number
}

export interface CharacterRecord {
  id: number
  name: string
  gender: string | null
  birth_year: string | null
  homeworld_id: number | null
}

export interface CharacterWithRelations extends CharacterRecord {
  homeworld: NamedRef | null
  films: FilmRef[]
  vehicles: NamedRef[]
  starships: NamedRef[]
  species: NamedRef[]
}

export interface FilmRecord {
  id: number
  episode_id: number | null
  title: string
  opening_crawl: string | null
  director: string | null
  producer: string | null
  // YYYY-MM-DD
  release_date: string | null
  created: Date | null
  edited: Date | null
  url: string | null
}

export interface FilmWithRelations extends FilmRecord {
  characters: NamedRef[]
  planets: NamedRef[]
  starships: NamedRef[]
  vehicles: NamedRef[]
  species: NamedRef[]
}

export interface StarshipRecord {
  id: number
  name: string
  model: string | null
  manufacturer: string | null
  starship_class: string | null
}

export interface StarshipWithRelations extends StarshipRecord {
  films: FilmRef[]
  characters: NamedRef[]
}
