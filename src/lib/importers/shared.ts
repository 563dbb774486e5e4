/**
 * Pieces shared by the SWAPI importers: upstream payload schemas, the page
 * fetch step and the per-run summary.
 */

import { z } from "zod"
import { DataImportError, ExternalApiError } from "../errors.js"
import type { SwapiEnvelope } from "../swapi.js"

export type ImportResource = "characters" | "films" | "starships"

export interface ImportSummary {
  resource: ImportResource
  /** Rows created. */
  inserted: number
  /** Items whose name/title already existed. */
  skipped: number
  /** Items with an empty name/title. */
  invalid: number
  /** Creates that returned no row without raising. */
  notCreated: number
  /** Items that raised during validation or persistence. */
  failed: number
}

export function emptySummary(resource: ImportResource): ImportSummary {
  return { resource, inserted: 0, skipped: 0, invalid: 0, notCreated: 0, failed: 0 }
}

export const swapiEnvelopeSchema = z
  .object({
    results: z.array(z.unknown()).nullish(),
    // Only truthiness matters to the page loops
    next: z.unknown(),
  })
  .passthrough()

export type SwapiPage = z.infer<typeof swapiEnvelopeSchema>

const upstreamText = z.string().nullish()

export const swapiPersonSchema = z
  .object({
    name: z.string().default(""),
    gender: upstreamText,
    birth_year: upstreamText,
    // Film links are checked one by one when linking
    films: z.array(z.unknown()).catch([]),
  })
  .passthrough()

export const swapiFilmSchema = z
  .object({
    title: z.string().default(""),
    episode_id: z.number().int().nullish(),
    opening_crawl: upstreamText,
    director: upstreamText,
    producer: upstreamText,
    release_date: upstreamText,
    created: upstreamText,
    edited: upstreamText,
    url: upstreamText,
  })
  .passthrough()

export const swapiStarshipSchema = z
  .object({
    name: z.string().default(""),
    model: upstreamText,
    manufacturer: upstreamText,
    starship_class: upstreamText,
  })
  .passthrough()

/**
 * Fetch one page and check it is a usable envelope.
 *
 * A thrown error or a null result from the client (retries exhausted,
 * error status) aborts the import with ExternalApiError; a payload whose
 * `results`/`next` have the wrong types aborts it with DataImportError.
 */
export async function fetchPage(
  resource: ImportResource,
  fetcher: () => Promise<SwapiEnvelope | null>,
  page?: number
): Promise<SwapiPage> {
  const where = page === undefined ? "" : ` page ${page}`
  const message = `Failed to fetch ${resource} from SWAPI${where}`

  let payload: SwapiEnvelope | null
  try {
    payload = await fetcher()
  } catch (err) {
    throw new ExternalApiError(message, { resource, page }, { cause: err })
  }
  if (payload === null) {
    throw new ExternalApiError(message, { resource, page })
  }

  const parsed = swapiEnvelopeSchema.safeParse(payload)
  if (!parsed.success) {
    throw new DataImportError("Invalid SWAPI response format", {
      resource,
      page,
      issues: parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    })
  }
  return parsed.data
}

/**
 * Numeric id from the last path segment of a SWAPI resource URL,
 * e.g. "https://swapi.info/api/films/1/" -> 1.
 */
export function parseResourceId(url: unknown): number {
  if (typeof url !== "string") {
    throw new DataImportError(`Cannot parse resource id from URL: ${String(url)}`, { url })
  }
  const segment = url.replace(/\/+$/, "").split("/").pop() ?? ""
  const id = Number(segment)
  if (!/^\d+$/.test(segment) || !Number.isSafeInteger(id) || id < 1) {
    throw new DataImportError(`Cannot parse resource id from URL: ${url}`, { url })
  }
  return id
}
