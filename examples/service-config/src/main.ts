import { serializeError } from "@stratum/errors"
import { createPinoLogger } from "@stratum/logger"
import { loadServiceConfig } from "./config/load-service-config"
import { serviceConfigSchema } from "./config/schema"
import { createServiceLogger, logStartup } from "./service-logger"

async function main(): Promise<void> {
  const bootLogger = createPinoLogger({}, { level: "warn" }, { module: "boot" })
  const argv = process.argv.slice(2)

  const { config, binder, program } = await loadServiceConfig({ argv, env: process.env, logger: bootLogger })

  if (program.opts<{ printConfig?: boolean }>().printConfig) {
    process.stdout.write(binder.dump(serviceConfigSchema, config))
    return
  }

  logStartup(createServiceLogger(config), config)
}

main().catch((err: unknown) => {
  process.stderr.write(`${JSON.stringify(serializeError(err))}\n`)
  process.exitCode = 1
})
