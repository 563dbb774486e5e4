import type { Router } from "express"
import { getFilm, listFilms, searchFilms, type FilmWithRelations, type NamedRef } from "../lib/db/index.js"
import { createResourceRouter } from "./resource-router.js"

export interface FilmResponse {
  id: number
  episodeId: number | null
  title: string
  openingCrawl: string | null
  director: string | null
  producer: string | null
  releaseDate: string | null
  created: string | null
  edited: string | null
  url: string | null
  characters: NamedRef[]
  planets: NamedRef[]
  starships: NamedRef[]
  vehicles: NamedRef[]
  species: NamedRef[]
}

export function toFilmResponse(row: FilmWithRelations): FilmResponse {
  return {
    id: row.id,
    episodeId: row.episode_id,
    title: row.title,
    openingCrawl: row.opening_crawl,
    director: row.director,
    producer: row.producer,
    releaseDate: row.release_date,
    created: row.created ? row.created.toISOString() : null,
    edited: row.edited ? row.edited.toISOString() : null,
    url: row.url,
    characters: row.characters,
    planets: row.planets,
    starships: row.starships,
    vehicles: row.vehicles,
    species: row.species,
  }
}

export function createFilmsRouter(defaultPageSize: number): Router {
  return createResourceRouter({
    defaultPageSize,
    notFoundMessage: "Film not found",
    noMatchesMessage: "No films found matching the query.",
    list: listFilms,
    search: searchFilms,
    get: getFilm,
    toResponse: toFilmResponse,
  })
}
