/**
 * SWAPI client.
 *
 * Each request has a 10s timeout. Transport failures surface as NetworkError
 * and are retried by fetchResource; anything else (error status, non-JSON
 * body, unexpected JSON type) is an ExternalApiError and fails fast.
 */

import { Agent, fetch, type Dispatcher } from "undici"
import { getConfig } from "./config.js"
import { ExternalApiError, NetworkError } from "./errors.js"
import { logger } from "./logger.js"
import { retryWithBackoff } from "./retry.js"

export const SWAPI_TIMEOUT_MS = 10_000

/**
 * Upstream payload normalized to an object. Paginated resources carry
 * `results` and `next`; nothing else is guaranteed at this layer.
 */
export type SwapiEnvelope = Record<string, unknown>

export type QueryParams = Record<string, string | number>

let insecureAgent: Agent | null = null

function getDispatcher(verifySsl: boolean): Dispatcher | undefined {
  if (verifySsl) return undefined
  if (!insecureAgent) {
    insecureAgent = new Agent({ connect: { rejectUnauthorized: false } })
  }
  return insecureAgent
}

export function buildUrl(baseUrl: string, endpoint: string, params: QueryParams = {}): string {
  const url = `${baseUrl.replace(/\/+$/, "")}/${endpoint.replace(/^\/+/, "")}`
  const search = new URLSearchParams()
  for (const [key, value] of Object.entries(params)) {
    search.set(key, String(value))
  }
  const query = search.toString()
  return query ? `${url}?${query}` : url
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value)
}

/**
 * Single GET against the upstream, without retries.
 */
export async function requestResource(endpoint: string, params: QueryParams = {}): Promise<SwapiEnvelope> {
  const config = getConfig()
  const url = buildUrl(config.SWAPI_BASE_URL, endpoint, params)

  let response: Awaited<ReturnType<typeof fetch>>
  let body: string
  try {
    response = await fetch(url, {
      headers: { Accept: "application/json" },
      redirect: "follow",
      signal: AbortSignal.timeout(SWAPI_TIMEOUT_MS),
      dispatcher: getDispatcher(config.VERIFY_SWAPI_SSL),
    })
    body = await response.text()
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err)
    throw new NetworkError(`SWAPI request failed: ${reason}`, { url }, { cause: err })
  }

  if (!response.ok) {
    throw new ExternalApiError(`SWAPI error: ${response.status} ${response.statusText}`, {
      url,
      status: response.status,
      body,
    })
  }

  let payload: unknown
  try {
    payload = JSON.parse(body)
  } catch (err) {
    logger.error({ url, body }, "Failed to parse SWAPI response as JSON")
    throw new ExternalApiError("Invalid JSON response from SWAPI", { url, body }, { cause: err })
  }

  if (Array.isArray(payload)) {
    logger.info({ url, count: payload.length }, "SWAPI returned a list; wrapping in a results envelope")
    return { results: payload, next: null }
  }
  if (isRecord(payload)) {
    return payload
  }
  throw new ExternalApiError(`Unexpected JSON type from SWAPI: ${payload === null ? "null" : typeof payload}`, {
    url,
  })
}

/**
 * GET with retries on network errors. Resolves to null when every attempt
 * failed or a non-network error occurred (already logged).
 */
export const fetchResource = retryWithBackoff(requestResource, {
  name: "fetchResource",
  retries: 5,
  initialDelayMs: 1000,
  maxDelayMs: 10_000,
})

export function fetchCharacters(page = 1): Promise<SwapiEnvelope | null> {
  return fetchResource("people/", { page })
}

export function fetchFilms(): Promise<SwapiEnvelope | null> {
  return fetchResource("films/")
}

export function fetchStarships(page = 1): Promise<SwapiEnvelope | null> {
  return fetchResource("starships/", { page })
}
