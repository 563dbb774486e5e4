// Environment must load before the logger and New Relic read it
import "dotenv/config"
import { initNewRelic } from "./lib/newrelic.js"
initNewRelic()

import { createApp } from "./app.js"
import { getConfig } from "./lib/config.js"
import { resetPool } from "./lib/db/index.js"
import { ConfigError } from "./lib/errors.js"
import { logger } from "./lib/logger.js"
import { initializeDatabase } from "./lib/startup.js"

async function main(): Promise<void> {
  const config = getConfig()
  await initializeDatabase()

  const app = createApp(config)
  const server = app.listen(config.PORT, () => {
    logger.info({ port: config.PORT, version: config.APP_VERSION }, `${config.APP_NAME} listening`)
  })

  const shutdown = (signal: string) => {
    logger.info({ signal }, "Shutting down")
    server.close(() => {
      resetPool()
        .then(() => process.exit(0))
        .catch((err: unknown) => {
          logger.error({ err }, "Error during shutdown")
          process.exit(1)
        })
    })
  }
  process.on("SIGTERM", () => shutdown("SIGTERM"))
  process.on("SIGINT", () => shutdown("SIGINT"))
}

main().catch((err: unknown) => {
  if (err instanceof ConfigError) {
    logger.fatal({ issues: err.details.issues }, err.message)
  } else {
    logger.fatal({ err }, "Failed to start server")
  }
  process.exit(1)
})
