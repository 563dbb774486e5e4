import { describe, it, expect, vi, beforeEach, afterEach } from "vitest"
import { Agent } from "undici"
import { resetConfig } from "./config.js"
import { ExternalApiError, NetworkError } from "./errors.js"
import { logger } from "./logger.js"
import {
  buildUrl,
  fetchCharacters,
  fetchFilms,
  fetchResource,
  fetchStarships,
  requestResource,
} from "./swapi.js"

const { mockFetch } = vi.hoisted(() => ({ mockFetch: vi.fn() }))

vi.mock("undici", () => ({
  fetch: mockFetch,
  Agent: vi.fn(),
}))

vi.mock("./logger.js", () => ({
  logger: {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}))

function jsonResponse(payload: unknown, status = 200) {
  return {
    ok: status >= 200 && status < 300,
    status,
    statusText: status === 200 ? "OK" : "Error",
    text: async () => JSON.stringify(payload),
  }
}

function textResponse(body: string, status = 200) {
  return {
    ok: status >= 200 && status < 300,
    status,
    statusText: status === 200 ? "OK" : "Not Found",
    text: async () => body,
  }
}

describe("SWAPI client", () => {
  beforeEach(() => {
    vi.clearAllMocks()
    vi.stubEnv("SWAPI_BASE_URL", "https://swapi.test/api/")
    resetConfig()
  })

  afterEach(() => {
    vi.unstubAllEnvs()
    vi.useRealTimers()
    resetConfig()
  })

  describe("buildUrl", () => {
    it("joins base and endpoint with a single slash", () => {
      expect(buildUrl("https://swapi.test/api/", "/people/")).toBe("https://swapi.test/api/people/")
      expect(buildUrl("https://swapi.test/api", "films/")).toBe("https://swapi.test/api/films/")
    })

    it("appends query parameters", () => {
      expect(buildUrl("https://swapi.test/api/", "people/", { page: 2 })).toBe(
        "https://swapi.test/api/people/?page=2"
      )
    })
  })

  describe("requestResource", () => {
    it("returns JSON objects as-is", async () => {
      const payload = { results: [{ name: "Luke Skywalker" }], next: "https://swapi.test/api/people/?page=2" }
      mockFetch.mockResolvedValueOnce(jsonResponse(payload))

      await expect(requestResource("people/", { page: 1 })).resolves.toEqual(payload)
      expect(mockFetch).toHaveBeenCalledWith(
        "https://swapi.test/api/people/?page=1",
        expect.objectContaining({ redirect: "follow", dispatcher: undefined })
      )
    })

    it("wraps a JSON list in a results envelope", async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse([{ title: "A New Hope" }]))

      await expect(requestResource("films/")).resolves.toEqual({
        results: [{ title: "A New Hope" }],
        next: null,
      })
    })

    it("rejects JSON that is neither an object nor a list", async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse("just a string"))

      await expect(requestResource("films/")).rejects.toThrow("Unexpected JSON type from SWAPI: string")
    })

    it("rejects a body that is not JSON and keeps the raw body", async () => {
      mockFetch.mockResolvedValueOnce(textResponse("<html>maintenance</html>"))

      const error = await requestResource("films/").catch((err: unknown) => err)
      expect(error).toBeInstanceOf(ExternalApiError)
      expect(error).not.toBeInstanceOf(NetworkError)
      expect(error).toMatchObject({ details: { body: "<html>maintenance</html>" } })
      expect(logger.error).toHaveBeenCalledTimes(1)
    })

    it("turns error statuses into ExternalApiError", async () => {
      mockFetch.mockResolvedValueOnce(textResponse("not found", 404))

      const error = await requestResource("people/", { page: 99 }).catch((err: unknown) => err)
      expect(error).toBeInstanceOf(ExternalApiError)
      expect(error).toMatchObject({ message: "SWAPI error: 404 Not Found", details: { status: 404 } })
    })

    it("turns transport failures into NetworkError", async () => {
      mockFetch.mockRejectedValueOnce(new TypeError("fetch failed"))

      await expect(requestResource("people/")).rejects.toBeInstanceOf(NetworkError)
    })

    it("uses an agent without certificate checks when SSL verification is off", async () => {
      vi.stubEnv("VERIFY_SWAPI_SSL", "false")
      resetConfig()
      mockFetch.mockResolvedValueOnce(jsonResponse({ results: [] }))

      await requestResource("starships/")

      expect(Agent).toHaveBeenCalledWith({ connect: { rejectUnauthorized: false } })
      const init = mockFetch.mock.calls[0][1]
      expect(init.dispatcher).toBeInstanceOf(Agent)
    })
  })

  describe("fetchResource", () => {
    it("retries network failures and returns the eventual payload", async () => {
      vi.useFakeTimers()
      mockFetch
        .mockRejectedValueOnce(new TypeError("fetch failed"))
        .mockResolvedValueOnce(jsonResponse({ results: [], next: null }))

      const promise = fetchResource("people/", { page: 1 })
      await vi.runAllTimersAsync()

      await expect(promise).resolves.toEqual({ results: [], next: null })
      expect(mockFetch).toHaveBeenCalledTimes(2)
      expect(logger.warn).toHaveBeenCalledTimes(1)
    })

    it("resolves to null without retrying an error status", async () => {
      mockFetch.mockResolvedValueOnce(textResponse("gone", 410))

      await expect(fetchResource("people/")).resolves.toBeNull()
      expect(mockFetch).toHaveBeenCalledTimes(1)
    })

    it("gives up after five attempts", async () => {
      vi.useFakeTimers()
      mockFetch.mockRejectedValue(new TypeError("fetch failed"))

      const promise = fetchResource("films/")
      await vi.runAllTimersAsync()

      await expect(promise).resolves.toBeNull()
      expect(mockFetch).toHaveBeenCalledTimes(5)
      expect(logger.warn).toHaveBeenCalledTimes(4)
      expect(logger.error).toHaveBeenCalledTimes(1)
    })
  })

  describe("resource helpers", () => {
    it("requests paginated people and starships and unpaginated films", async () => {
      mockFetch.mockResolvedValue(jsonResponse({ results: [] }))

      await fetchCharacters(3)
      await fetchFilms()
      await fetchStarships()

      expect(mockFetch.mock.calls.map((call) => call[0])).toEqual([
        "https://swapi.test/api/people/?page=3",
        "https://swapi.test/api/films/",
        "https://swapi.test/api/starships/?page=1",
      ])
    })
  })
})
