/**
 * Global error handling middleware.
 */

import type { Request, Response, NextFunction } from "express"
import { createRequestLogger } from "../lib/logger.js"
import { noticeError } from "../lib/newrelic.js"

function clientErrorStatus(err: Error): number | null {
  const status = "status" in err && typeof err.status === "number" ? err.status : null
  return status !== null && status >= 400 && status < 500 ? status : null
}

/**
 * Express error handling middleware.
 * Must be registered after all routes.
 *
 * Client errors raised by body parsing (malformed JSON, payload too large)
 * keep their 4xx status; everything else is logged, reported to New Relic
 * and answered with a generic 500.
 */
export function errorHandler(err: Error, req: Request, res: Response, _next: NextFunction): void {
  const routeLogger = createRequestLogger(req.get("x-request-id") || "unknown", req.path)

  const status = clientErrorStatus(err)
  if (status !== null) {
    routeLogger.warn({ err, status }, err.message)
    res.status(status).json({
      error: { message: status === 400 ? "Malformed request body" : err.message },
    })
    return
  }

  routeLogger.error({ err, method: req.method }, err.message)
  noticeError(err, { path: req.path, method: req.method })

  // Don't leak error details to client
  res.status(500).json({
    error: { message: "Internal server error" },
  })
}

export function notFoundHandler(_req: Request, res: Response): void {
  res.status(404).json({ error: { message: "Not found" } })
}
