/**
 * Error taxonomy shared by the upstream client, persistence layer and importers.
 *
 * Upstream and data-shape failures abort an import run. Persistence failures are
 * caught per item by the importers. Data-quality problems (bad dates, blank
 * names) are logged and normalized and never reach this module.
 */

export class AppError extends Error {
  readonly details: Record<string, unknown>

  constructor(message: string, details: Record<string, unknown> = {}, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
    this.details = details
  }
}

/** Upstream unreachable, returned an error status, or sent an unusable payload. */
export class ExternalApiError extends AppError {}

/** Transport-level failure (connection refused/reset, DNS, timeout). Retryable. */
export class NetworkError extends ExternalApiError {}

/** Upstream payload violates the envelope contract an importer relies on. */
export class DataImportError extends AppError {}

/** Store-level integrity violation; the transaction has been rolled back. */
export class PersistenceError extends AppError {}

export class ConfigError extends AppError {}

const NETWORK_ERROR_CODES = new Set([
  "ECONNRESET",
  "ECONNREFUSED",
  "ECONNABORTED",
  "ETIMEDOUT",
  "ENOTFOUND",
  "EAI_AGAIN",
  "EPIPE",
  "ENETUNREACH",
  "EHOSTUNREACH",
  "UND_ERR_SOCKET",
  "UND_ERR_CONNECT_TIMEOUT",
  "UND_ERR_HEADERS_TIMEOUT",
  "UND_ERR_BODY_TIMEOUT",
  "UND_ERR_CLOSED",
])

const NETWORK_ERROR_MESSAGES = [
  "connection terminated",
  "connection refused",
  "connection reset",
  "econnreset",
  "econnrefused",
  "etimedout",
  "socket hang up",
  "network error",
]

function errorCode(err: Error): string | undefined {
  if ("code" in err && typeof err.code === "string") {
    return err.code
  }
  return undefined
}

/**
 * Check if an error is a connection-level failure that is worth retrying.
 * Follows the `cause` chain, since fetch wraps socket errors in a TypeError.
 */
export function isNetworkError(err: unknown, depth = 0): boolean {
  if (!(err instanceof Error) || depth > 5) {
    return false
  }
  if (err instanceof NetworkError) {
    return true
  }
  if (err.name === "TimeoutError") {
    return true
  }

  const code = errorCode(err)
  if (code && NETWORK_ERROR_CODES.has(code)) {
    return true
  }

  const message = err.message.toLowerCase()
  if (NETWORK_ERROR_MESSAGES.some((fragment) => message.includes(fragment))) {
    return true
  }

  return isNetworkError(err.cause, depth + 1)
}

/**
 * PostgreSQL integrity constraint violations live in SQLSTATE class 23
 * (unique_violation 23505, foreign_key_violation 23503, not_null_violation 23502).
 */
export function isIntegrityViolation(err: unknown): boolean {
  if (!(err instanceof Error)) {
    return false
  }
  const code = errorCode(err)
  return code !== undefined && code.startsWith("23")
}
