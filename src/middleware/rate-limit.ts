import type { Request } from "express"
import rateLimit, { type RateLimitRequestHandler } from "express-rate-limit"

export interface RateLimitSettings {
  windowMs: number
  limit: number
}

export function rateLimitMessage({ windowMs, limit }: RateLimitSettings): string {
  const minutes = Math.round(windowMs / 60_000)
  return `Too many requests. Rate limit: ${limit} requests per ${minutes} minutes.`
}

export function skipHealthCheck(req: Request): boolean {
  return req.path === "/health"
}

/**
 * Per-IP limiter for every API route except the health check.
 */
export function createApiLimiter(settings: RateLimitSettings): RateLimitRequestHandler {
  return rateLimit({
    windowMs: settings.windowMs,
    limit: settings.limit,
    standardHeaders: true,
    legacyHeaders: false,
    message: { error: { message: rateLimitMessage(settings) } },
    skip: skipHealthCheck,
  })
}
