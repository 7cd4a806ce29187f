import { textual } from "@stratum/config"
import { logLevelNames } from "@stratum/logger"
import { z } from "zod"
import { Duration } from "./duration"

export const logLevelSchema = z.enum(logLevelNames)

export const serviceConfigSchema = z.object({
  app: z.object({
    name: z.string(),
    env: z.string(),
  }),
  server: z.object({
    host: z.string(),
    port: z.uint32(),
    shutdownTimeout: textual(Duration).meta({ key: "shutdown_timeout" }),
  }),
  logging: z.object({
    level: logLevelSchema,
    pretty: z.boolean(),
  }),
  database: z.object({
    url: z.string(),
    poolSize: z.uint32().meta({ key: "pool_size" }),
  }),
})

export type ServiceConfig = z.output<typeof serviceConfigSchema>

export function defaultServiceConfig(): ServiceConfig {
  return {
    app: { name: "service", env: "development" },
    server: { host: "0.0.0.0", port: 8080, shutdownTimeout: new Duration(10_000) },
    logging: { level: "info", pretty: false },
    database: { url: "", poolSize: 10 },
  }
}
