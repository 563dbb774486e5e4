import { randomUUID } from "node:crypto"
import type { Request, Response, NextFunction } from "express"
import { logger } from "../lib/logger.js"

/**
 * Log method, path, status and duration once each response finishes.
 * Health checks are skipped to reduce log noise.
 */
export function requestLogging(req: Request, res: Response, next: NextFunction): void {
  const start = Date.now()
  const requestId = req.get("x-request-id") || randomUUID()
  res.setHeader("x-request-id", requestId)

  res.on("finish", () => {
    if (req.path === "/health") return
    const duration = Date.now() - start
    logger.info(
      {
        requestId,
        method: req.method,
        path: req.path,
        statusCode: res.statusCode,
        duration,
        userAgent: req.get("user-agent"),
      },
      `${req.method} ${req.path} ${res.statusCode} ${duration}ms`
    )
  })
  next()
}
