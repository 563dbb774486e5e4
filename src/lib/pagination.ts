/**
 * Pagination utilities for API route handlers.
 */

import { MAX_PAGE_SIZE } from "./config.js"

function firstValue(value: unknown): string | undefined {
  if (typeof value === "string") return value
  if (Array.isArray(value) && typeof value[0] === "string") return value[0]
  return undefined
}

/**
 * Parse the number of rows to skip. Missing, malformed or negative values
 * become 0.
 */
export function parseSkip(querySkip: unknown): number {
  return Math.max(0, parseInt(firstValue(querySkip) ?? "", 10) || 0)
}

/**
 * Parse page size with bounds: defaults to `defaultSize`, never below 1,
 * never above `maxSize`.
 */
export function parseLimit(queryLimit: unknown, defaultSize = 20, maxSize = MAX_PAGE_SIZE): number {
  const parsed = parseInt(firstValue(queryLimit) ?? "", 10) || defaultSize
  return Math.min(maxSize, Math.max(1, parsed))
}
