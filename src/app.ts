import express, { type Express } from "express"
import cors from "cors"
import type { AppConfig } from "./lib/config.js"
import { errorHandler, notFoundHandler } from "./middleware/error-handler.js"
import { createApiLimiter } from "./middleware/rate-limit.js"
import { requestLogging } from "./middleware/request-logging.js"
import { createCharactersRouter } from "./routes/characters.js"
import { createFilmsRouter } from "./routes/films.js"
import importRouter from "./routes/import.js"
import { createStarshipsRouter } from "./routes/starships.js"

export function createApp(config: AppConfig): Express {
  const app = express()

  // Behind a load balancer; needed for per-IP rate limiting
  app.set("trust proxy", 1)

  app.use(cors())
  app.use(express.json())
  app.use(requestLogging)
  app.use(
    createApiLimiter({
      windowMs: config.RATE_LIMIT_WINDOW_MS,
      limit: config.RATE_LIMIT_MAX_REQUESTS,
    })
  )

  app.get("/health", (_req, res) => {
    res.json({ status: "ok" })
  })

  app.get("/", (_req, res) => {
    res.json({
      name: config.APP_NAME,
      version: config.APP_VERSION,
      status: "running",
    })
  })

  app.use("/import", importRouter)
  app.use("/characters", createCharactersRouter(config.DEFAULT_PAGE_SIZE))
  app.use("/films", createFilmsRouter(config.DEFAULT_PAGE_SIZE))
  app.use("/starships", createStarshipsRouter(config.DEFAULT_PAGE_SIZE))

  app.use(notFoundHandler)
  app.use(errorHandler)

  return app
}
