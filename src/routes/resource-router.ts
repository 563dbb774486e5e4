/**
 * Read-only list/search/get router shared by the character, film and
 * starship endpoints.
 */

import { Router, type NextFunction, type Request, type Response } from "express"
import type { ListOptions } from "../lib/db/index.js"
import { parseLimit, parseSkip } from "../lib/pagination.js"

export interface ResourceRouterOptions<TRow, TResponse> {
  defaultPageSize: number
  notFoundMessage: string
  noMatchesMessage: string
  list: (options: ListOptions) => Promise<TRow[]>
  search: (term: string) => Promise<TRow[]>
  get: (id: number) => Promise<TRow | null>
  toResponse: (row: TRow) => TResponse
}

function parseId(raw: string): number | null {
  if (!/^\d+$/.test(raw)) return null
  const id = Number(raw)
  return Number.isSafeInteger(id) && id > 0 ? id : null
}

export function createResourceRouter<TRow, TResponse>(options: ResourceRouterOptions<TRow, TResponse>): Router {
  const router = Router()

  router.get("/", async (req: Request, res: Response, next: NextFunction) => {
    try {
      const skip = parseSkip(req.query.skip)
      const limit = parseLimit(req.query.limit, options.defaultPageSize)
      const rows = await options.list({ skip, limit })
      res.json(rows.map(options.toResponse))
    } catch (error) {
      next(error)
    }
  })

  router.get("/search", async (req: Request, res: Response, next: NextFunction) => {
    try {
      const term = typeof req.query.q === "string" ? req.query.q : ""
      if (!term.trim()) {
        res.status(400).json({ error: { message: "Query parameter 'q' is required" } })
        return
      }

      const rows = await options.search(term)
      if (rows.length === 0) {
        res.status(404).json({ error: { message: options.noMatchesMessage } })
        return
      }
      res.json(rows.map(options.toResponse))
    } catch (error) {
      next(error)
    }
  })

  router.get("/:id", async (req: Request, res: Response, next: NextFunction) => {
    try {
      const id = parseId(req.params.id ?? "")
      if (id === null) {
        res.status(400).json({ error: { message: "Invalid id" } })
        return
      }

      const row = await options.get(id)
      if (!row) {
        res.status(404).json({ error: { message: options.notFoundMessage } })
        return
      }
      res.json(options.toResponse(row))
    } catch (error) {
      next(error)
    }
  })

  return router
}
