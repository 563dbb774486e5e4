import type { Router } from "express"
import {
  getStarship,
  listStarships,
  searchStarships,
  type FilmRef,
  type NamedRef,
  type StarshipWithRelations,
} from "../lib/db/index.js"
import { createResourceRouter } from "./resource-router.js"

export interface StarshipResponse {
  id: number
  name: string
  model: string | null
  manufacturer: string | null
  starshipClass: string | null
  films: FilmRef[]
  characters: NamedRef[]
}

export function toStarshipResponse(row: StarshipWithRelations): StarshipResponse {
  return {
    id: row.id,
    name: row.name,
    model: row.model,
    manufacturer: row.manufacturer,
    starshipClass: row.starship_class,
    films: row.films,
    characters: row.characters,
  }
}

export function createStarshipsRouter(defaultPageSize: number): Router {
  return createResourceRouter({
    defaultPageSize,
    notFoundMessage: "Starship not found",
    noMatchesMessage: "No starships found matching the query.",
    list: listStarships,
    search: searchStarships,
    get: getStarship,
    toResponse: toStarshipResponse,
  })
}
