import pino, { type DestinationStream, type LoggerOptions } from "pino"

const REDACTED = "[REDACTED]"

// Matched after lowercasing and stripping "_" and "-", so DATABASE_URL,
// databaseUrl and database-url all hit the same entry.
const SENSITIVE_KEYS = new Set([
  "databaseurl",
  "swapibaseurl",
  "verifyswapissl",
  "defaultpagesize",
  "appname",
  "appversion",
  "password",
  "secret",
  "token",
  "apikey",
  "authorization",
  "cookie",
  "newreliclicensekey",
])

function normalizeKey(key: string): string {
  return key.toLowerCase().replace(/[_-]/g, "")
}

export function isSensitiveKey(key: string): boolean {
  return SENSITIVE_KEYS.has(normalizeKey(key))
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (value === null || typeof value !== "object") return false
  const proto: unknown = Object.getPrototypeOf(value)
  return proto === Object.prototype || proto === null
}

/**
 * Replace the values of sensitive keys at any depth. Only plain objects and
 * arrays are walked; errors, dates and class instances pass through untouched
 * so pino's serializers still see them.
 */
export function redactSensitive(value: unknown, seen: WeakSet<object> = new WeakSet()): unknown {
  if (Array.isArray(value)) {
    if (seen.has(value)) return value
    seen.add(value)
    return value.map((item) => redactSensitive(item, seen))
  }
  if (isPlainObject(value)) {
    if (seen.has(value)) return value
    seen.add(value)
    const result: Record<string, unknown> = {}
    for (const [key, child] of Object.entries(value)) {
      result[key] = isSensitiveKey(key) ? REDACTED : redactSensitive(child, seen)
    }
    return result
  }
  return value
}

function defaultLevel(): string {
  if (process.env.LOG_LEVEL) return process.env.LOG_LEVEL
  switch (process.env.NODE_ENV) {
    case "production":
      return "info"
    case "test":
      return "silent"
    default:
      return "debug"
  }
}

export function buildLoggerOptions(): LoggerOptions {
  const env = process.env.NODE_ENV || "development"
  return {
    level: defaultLevel(),
    base: {
      service: "swapi-import-service",
      env,
    },
    redact: {
      paths: ["req.headers.authorization", "req.headers.cookie", "password", "apiKey", "token"],
      censor: REDACTED,
    },
    formatters: {
      log(object) {
        const redacted = redactSensitive(object)
        return isPlainObject(redacted) ? redacted : object
      },
    },
  }
}

/**
 * Build a logger. With an explicit destination (tests, scripts piping output)
 * no transport is attached; otherwise development gets pino-pretty.
 */
export function createLogger(destination?: DestinationStream): pino.Logger {
  const options = buildLoggerOptions()
  if (destination) {
    return pino(options, destination)
  }

  const isDevelopment = (process.env.NODE_ENV || "development") === "development"
  return pino({
    ...options,
    transport: isDevelopment
      ? {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "SYS:standard",
            ignore: "pid,hostname",
          },
        }
      : undefined,
  })
}

export const logger = createLogger()

/**
 * Create a child logger with request-specific context.
 */
export function createRequestLogger(requestId: string, path: string) {
  return logger.child({
    requestId,
    path,
  })
}

export type Logger = pino.Logger
