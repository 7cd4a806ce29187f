import { Binder, bindCommanderOptions, bytesToText } from "@stratum/config"
import { isLogLevelName, type Logger, type LogLevelName } from "@stratum/logger"
import { Command } from "commander"
import { defaultServiceConfig, logLevelSchema, type ServiceConfig, serviceConfigSchema } from "./schema"

export const ENV_PREFIX = "SVC"

export type LoadServiceConfigOptions = {
  /** Command-line arguments after the program name */
  argv: readonly string[]
  env: NodeJS.ProcessEnv
  logger?: Logger
}

export type LoadedServiceConfig = {
  config: ServiceConfig
  binder: Binder
  program: Command
}

export function createProgram(): Command {
  return new Command("service")
    .description("Starts the service with configuration from a file, the environment and flags")
    .option("-c, --config <file>", "YAML configuration file")
    .option("--host <host>", "listen host")
    .option("-p, --port <port>", "listen port")
    .option("--log-level <level>", "minimum log level")
    .option("--log-pretty", "human-readable log output")
    .option("--database-url <url>", "database connection URL")
    .option("--print-config", "print the resolved configuration and exit")
}

export function parseLogLevel(data: Uint8Array): LogLevelName {
  const text = bytesToText(data).trim().toLowerCase()
  if (!isLogLevelName(text)) throw new Error(`unknown log level "${text}"`)
  return text
}

/**
 * Resolves the service configuration: defaults, then the file named by
 * `--config`, then `SVC_*` variables, then explicit flags.
 */
export async function loadServiceConfig(options: LoadServiceConfigOptions): Promise<LoadedServiceConfig> {
  const program = createProgram().parse([...options.argv], { from: "user" })

  const binder = new Binder({
    envPrefix: ENV_PREFIX,
    expandEnv: true,
    env: options.env,
    ...(options.logger && { logger: options.logger }),
  })

  binder.registerUnmarshaler(logLevelSchema, parseLogLevel)
  binder.bindEnvAlias("DATABASE_URL", "DB_URL")
  binder.bindEnvAlias("SERVER_PORT", "PORT")

  bindCommanderOptions(binder, program, {
    "server.host": "host",
    "server.port": "port",
    "logging.level": "logLevel",
    "logging.pretty": "logPretty",
    "database.url": "databaseUrl",
  })

  const config = defaultServiceConfig()
  const { config: file } = program.opts<{ config?: string }>()

  await binder.resolve(serviceConfigSchema, config, {
    ...(file !== undefined && { file }),
    env: true,
    flags: true,
  })

  return { config, binder, program }
}
