import { createPinoLogger, type Logger, type PinoLoggerDeps } from "@stratum/logger"
import type { ServiceConfig } from "./config/schema"

/** The service's own logger, at the configured level and format. */
export function createServiceLogger(config: ServiceConfig, deps: PinoLoggerDeps = {}): Logger {
  return createPinoLogger(deps, { level: config.logging.level, prettify: config.logging.pretty }, { module: "main" })
}

export function logStartup(logger: Logger, config: ServiceConfig): void {
  logger.info(`configuration loaded for ${config.app.name} (${config.app.env})`)
  logger.info(`listening on ${config.server.host}:${config.server.port}`)
}
