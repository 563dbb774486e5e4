/**
 * New Relic APM conditional initialization.
 * Must be called before any other imports in the application entry point.
 */

import { createRequire } from "node:module"
import { logger } from "./logger.js"

type NewRelicAgent = typeof import("newrelic")

const require = createRequire(import.meta.url)

let newrelicAgent: NewRelicAgent | null = null

export function initNewRelic(): void {
  if (!process.env.NEW_RELIC_LICENSE_KEY) {
    logger.info("NEW_RELIC_LICENSE_KEY not set - running without New Relic APM")
    return
  }

  try {
    newrelicAgent = require("newrelic")
    logger.info("New Relic APM initialized")
  } catch (err) {
    logger.error({ err }, "Failed to initialize New Relic")
  }
}

/**
 * Run work outside a web request (imports, scripts) as a background transaction.
 * Without an agent the work simply runs.
 */
export function startBackgroundTransaction<T>(name: string, group: string, work: () => Promise<T>): Promise<T> {
  if (newrelicAgent) {
    return newrelicAgent.startBackgroundTransaction(name, group, work)
  }
  return work()
}

/**
 * Record a custom event in New Relic.
 */
export function recordCustomEvent(eventType: string, attributes: Record<string, string | number | boolean>): void {
  if (newrelicAgent) {
    newrelicAgent.recordCustomEvent(eventType, attributes)
  }
}

export function noticeError(error: Error, attributes?: Record<string, string | number | boolean>): void {
  if (newrelicAgent) {
    newrelicAgent.noticeError(error, attributes)
  }
}
