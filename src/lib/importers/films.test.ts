import { describe, it, expect, vi, beforeEach } from "vitest"
import * as db from "../db/index.js"
import { DataImportError, ExternalApiError } from "../errors.js"
import { fetchFilms } from "../swapi.js"
import { importFilms } from "./films.js"

const { mockLog } = vi.hoisted(() => ({
  mockLog: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}))

vi.mock("../logger.js", () => ({
  logger: {
    child: vi.fn(() => mockLog),
    warn: vi.fn(),
  },
}))

vi.mock("../swapi.js", () => ({
  fetchFilms: vi.fn(),
}))

vi.mock("../db/index.js", () => ({
  filmExists: vi.fn(),
  createFilm: vi.fn(),
}))

const NEW_HOPE = {
  title: "A New Hope",
  episode_id: 4,
  opening_crawl: "It is a period of civil war.",
  director: "George Lucas",
  producer: "Gary Kurtz, Rick McCallum",
  release_date: "1977-05-25",
  created: "2014-12-10T14:23:31.880000Z",
  edited: "2014-12-20T19:49:45.256000Z",
  url: "https://swapi.test/api/films/1/",
  characters: ["https://swapi.test/api/people/1/"],
}

function filmRow(id: number, title: string) {
  return {
    id,
    episode_id: null,
    title,
    opening_crawl: null,
    director: null,
    producer: null,
    release_date: null,
    created: null,
    edited: null,
    url: null,
  }
}

describe("importFilms", () => {
  beforeEach(() => {
    vi.clearAllMocks()
    vi.mocked(db.filmExists).mockResolvedValue(false)
  })

  it("normalizes dates before creating the film", async () => {
    vi.mocked(fetchFilms).mockResolvedValueOnce({ results: [NEW_HOPE], next: null })
    vi.mocked(db.createFilm).mockResolvedValueOnce(filmRow(1, "A New Hope"))

    const summary = await importFilms()

    expect(db.createFilm).toHaveBeenCalledWith({
      title: "A New Hope",
      episode_id: 4,
      opening_crawl: "It is a period of civil war.",
      director: "George Lucas",
      producer: "Gary Kurtz, Rick McCallum",
      release_date: "1977-05-25",
      created: new Date("2014-12-10T14:23:31.880Z"),
      edited: new Date("2014-12-20T19:49:45.256Z"),
      url: "https://swapi.test/api/films/1/",
    })
    expect(summary).toEqual({
      resource: "films",
      inserted: 1,
      skipped: 0,
      invalid: 0,
      notCreated: 0,
      failed: 0,
    })
  })

  it("imports a film with a malformed release date as undated", async () => {
    vi.mocked(fetchFilms).mockResolvedValueOnce({
      results: [{ ...NEW_HOPE, release_date: "May 1977" }],
      next: null,
    })
    vi.mocked(db.createFilm).mockResolvedValueOnce(filmRow(1, "A New Hope"))

    const summary = await importFilms()

    expect(vi.mocked(db.createFilm).mock.calls[0][0]).toMatchObject({ release_date: null })
    expect(summary.inserted).toBe(1)
  })

  it("skips films that already exist", async () => {
    vi.mocked(fetchFilms).mockResolvedValueOnce({ results: [NEW_HOPE], next: null })
    vi.mocked(db.filmExists).mockResolvedValueOnce(true)

    const summary = await importFilms()

    expect(db.createFilm).not.toHaveBeenCalled()
    expect(summary.skipped).toBe(1)
  })

  it("counts blank titles as invalid", async () => {
    vi.mocked(fetchFilms).mockResolvedValueOnce({ results: [{ ...NEW_HOPE, title: "  " }], next: null })

    const summary = await importFilms()

    expect(db.filmExists).not.toHaveBeenCalled()
    expect(summary.invalid).toBe(1)
  })

  it("raises DataImportError when the payload has no results key", async () => {
    vi.mocked(fetchFilms).mockResolvedValueOnce({ count: 6 })

    await expect(importFilms()).rejects.toThrow(new DataImportError("No results in SWAPI films response"))
    expect(db.createFilm).not.toHaveBeenCalled()
  })

  it("completes with nothing inserted for an empty list", async () => {
    vi.mocked(fetchFilms).mockResolvedValueOnce({ results: [], next: null })

    const summary = await importFilms()

    expect(summary.inserted).toBe(0)
  })

  it("raises ExternalApiError when the fetch fails", async () => {
    vi.mocked(fetchFilms).mockRejectedValueOnce(new Error("socket closed"))

    await expect(importFilms()).rejects.toThrow(new ExternalApiError("Failed to fetch films from SWAPI"))
  })

  it("records per-item failures and continues", async () => {
    vi.mocked(fetchFilms).mockResolvedValueOnce({
      results: [{ ...NEW_HOPE, episode_id: "four" }, { ...NEW_HOPE, title: "The Empire Strikes Back", episode_id: 5 }],
      next: null,
    })
    vi.mocked(db.createFilm).mockResolvedValueOnce(filmRow(2, "The Empire Strikes Back"))

    const summary = await importFilms()

    expect(summary.failed).toBe(1)
    expect(summary.inserted).toBe(1)
    expect(mockLog.error).toHaveBeenCalledTimes(1)
  })
})
