/**
 * Environment configuration, validated once at startup.
 */

import { z } from "zod"
import { ConfigError } from "./errors.js"

export const MAX_PAGE_SIZE = 100

const booleanFlag = z
  .string()
  .optional()
  .transform((value) => {
    if (value === undefined || value.trim() === "") return true
    return ["true", "1", "yes"].includes(value.trim().toLowerCase())
  })

export const configSchema = z.object({
  DATABASE_URL: z.string().min(1, "DATABASE_URL is required"),
  SWAPI_BASE_URL: z.string().url().default("https://swapi.info/api/"),
  VERIFY_SWAPI_SSL: booleanFlag,
  DEFAULT_PAGE_SIZE: z.coerce.number().int().min(1).max(MAX_PAGE_SIZE).default(20),
  PORT: z.coerce.number().int().min(0).max(65535).default(8080),
  RATE_LIMIT_WINDOW_MS: z.coerce.number().int().positive().default(3_600_000),
  RATE_LIMIT_MAX_REQUESTS: z.coerce.number().int().positive().default(1000),
  APP_NAME: z.string().min(1).default("SWAPI Import Service"),
  APP_VERSION: z.string().min(1).default("1.0.0"),
})

export type AppConfig = z.infer<typeof configSchema>

let cachedConfig: AppConfig | null = null

/**
 * Validate an environment map. Blank values count as unset so that an empty
 * line in .env falls back to the default instead of failing validation.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const input: Record<string, string> = {}
  for (const key of Object.keys(configSchema.shape)) {
    const value = env[key]
    if (value !== undefined && value.trim() !== "") {
      input[key] = value
    }
  }

  const result = configSchema.safeParse(input)
  if (!result.success) {
    const issues = result.error.issues.map((issue) => ({
      key: issue.path.join("."),
      message: issue.message,
    }))
    const keys = issues.map((issue) => issue.key).join(", ")
    throw new ConfigError(`Invalid configuration: ${keys}`, { issues })
  }
  return result.data
}

export function getConfig(): AppConfig {
  if (!cachedConfig) {
    cachedConfig = loadConfig()
  }
  return cachedConfig
}

export function resetConfig(): void {
  cachedConfig = null
}
