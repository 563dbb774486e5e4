/**
 * Import endpoints. Each request runs one importer to completion and answers
 * 202 with the run summary, or 502 when the import aborted.
 */

import { Router, type Request, type Response } from "express"
import { runImport, type ImportResource } from "../lib/importers/index.js"
import { logger } from "../lib/logger.js"
import { noticeError } from "../lib/newrelic.js"

const LABELS: Record<ImportResource, string> = {
  characters: "Character",
  films: "Film",
  starships: "Starship",
}

function importHandler(resource: ImportResource) {
  return async (_req: Request, res: Response): Promise<void> => {
    try {
      const summary = await runImport(resource)
      res.status(202).json({
        message: `${LABELS[resource]} import completed.`,
        summary,
      })
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error))
      logger.error({ err, resource }, `${LABELS[resource]} import failed`)
      noticeError(err, { resource })
      res.status(502).json({
        error: { message: `Failed to import ${resource} from SWAPI.` },
      })
    }
  }
}

const router = Router()

router.post("/characters", importHandler("characters"))
router.post("/films", importHandler("films"))
router.post("/starships", importHandler("starships"))

export default router
