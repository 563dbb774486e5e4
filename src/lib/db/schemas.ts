/**
 * Input schemas for rows written by the persistence layer.
 */

import { z } from "zod"

const optionalText = (max: number) => z.string().max(max).nullish().transform((value) => value ?? null)

export const characterCreateSchema = z.object({
  name: z.string().trim().min(1, "Name must not be empty").max(100),
  gender: optionalText(20),
  birth_year: optionalText(20),
  homeworld_id: z.number().int().positive().nullish().transform((value) => value ?? null),
})

export const filmCreateSchema = z.object({
  title: z.string().trim().min(1, "Title must not be empty").max(100),
  episode_id: z.number().int().nullish().transform((value) => value ?? null),
  opening_crawl: z.string().nullish().transform((value) => value ?? null),
  director: optionalText(200),
  producer: optionalText(200),
  release_date: z
    .string()
    .regex(/^\d{4}-\d{2}-\d{2}$/, "Expected YYYY-MM-DD")
    .nullish()
    .transform((value) => value ?? null),
  created: z.date().nullish().transform((value) => value ?? null),
  edited: z.date().nullish().transform((value) => value ?? null),
  url: optionalText(200),
})

export const starshipCreateSchema = z.object({
  name: z.string().trim().min(1, "Name must not be empty").max(100),
  model: optionalText(200),
  manufacturer: optionalText(200),
  starship_class: optionalText(200),
})

export type CharacterCreateInput = z.input<typeof characterCreateSchema>
export type CharacterCreate = z.output<typeof characterCreateSchema>
export type FilmCreateInput = z.input<typeof filmCreateSchema>
export type FilmCreate = z.output<typeof filmCreateSchema>
export type StarshipCreateInput = z.input<typeof starshipCreateSchema>
export type StarshipCreate = z.output<typeof starshipCreateSchema>
