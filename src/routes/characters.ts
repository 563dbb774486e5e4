import type { Router } from "express"
import {
  getCharacter,
  listCharacters,
  searchCharacters,
  type CharacterWithRelations,
  type FilmRef,
  type NamedRef,
} from "../lib/db/index.js"
import { createResourceRouter } from "./resource-router.js"

export interface CharacterResponse {
  id: number
  name: string
  gender: string | null
  birthYear: string | null
  homeworld: NamedRef | null
  films: FilmRef[]
  vehicles: NamedRef[]
  starships: NamedRef[]
  species: NamedRef[]
}

export function toCharacterResponse(row: CharacterWithRelations): CharacterResponse {
  return {
    id: row.id,
    name: row.name,
    gender: row.gender,
    birthYear: row.birth_year,
    homeworld: row.homeworld,
    films: row.films,
    vehicles: row.vehicles,
    starships: row.starships,
    species: row.species,
  }
}

export function createCharactersRouter(defaultPageSize: number): Router {
  return createResourceRouter({
    defaultPageSize,
    notFoundMessage: "Character not found",
    noMatchesMessage: "No characters found matching the query.",
    list: listCharacters,
    search: searchCharacters,
    get: getCharacter,
    toResponse: toCharacterResponse,
  })
}
