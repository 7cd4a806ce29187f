import { readFile } from "node:fs/promises"
import { createNullLogger, type Logger } from "@stratum/logger"
import type { z } from "zod"
import type { ConfigSchema, IBinder, ResolveSources } from "../ports/binder"
import type { Marshaler, Unmarshaler } from "../ports/codec"
import type { FieldInfo } from "../ports/field"
import type { FlagHandle } from "../ports/flag"
import { dumpDocument, loadDocument } from "./document"
import { bindEnvFields, type EnvMap } from "./env-binder"
import { DocumentError } from "./errors"
import { bindFlagFields } from "./flag-binder"
import { compilePlan, type SchemaPlan } from "./plan"
import { Registry } from "./registry"
import { describeFields } from "./walk"

export type BinderOptions = {
  /** Prefix of environment keys. Default: "" */
  envPrefix?: string
  /** Expand `${VAR}` references in documents. Default: false */
  expandEnv?: boolean
  /** Environment read on every call. Default: the live `process.env` */
  env?: EnvMap
  logger?: Logger
}

export class Binder implements IBinder {
  private envPrefix: string
  private expandEnv: boolean
  private readonly env: EnvMap
  private readonly logger: Logger
  private readonly registry = new Registry()
  private plans = new WeakMap<ConfigSchema, SchemaPlan>()

  constructor(options: BinderOptions = {}) {
    this.envPrefix = options.envPrefix ?? ""
    this.expandEnv = options.expandEnv ?? false
    this.env = options.env ?? process.env
    this.logger = (options.logger ?? createNullLogger()).child({ module: "binder" })
  }

  setEnvPrefix(prefix: string): void {
    this.envPrefix = prefix
  }

  setExpandEnv(expand: boolean): void {
    this.expandEnv = expand
  }

  bindEnvAlias(key: string, ...aliases: string[]): void {
    this.registry.bindEnvAlias(key, aliases)
  }

  bindFlag(path: string, flag: FlagHandle): void {
    this.registry.bindFlag(path, flag)
  }

  registerMarshaler<S extends z.core.$ZodType>(schema: S, marshal: Marshaler<z.output<S>>): void {
    this.registry.registerMarshaler(schema, marshal)
  }

  registerUnmarshaler<S extends z.core.$ZodType>(schema: S, unmarshal: Unmarshaler<z.output<S>>): void {
    this.registry.registerUnmarshaler(schema, unmarshal)
    // classification depends on registered unmarshalers
    this.plans = new WeakMap()
  }

  load<S extends ConfigSchema>(schema: S, text: string, target: z.output<S>): void {
    loadDocument(this.plan(schema), text, target, {
      expandEnv: this.expandEnv,
      env: this.env,
      logger: this.logger,
    })
  }

  async loadFile<S extends ConfigSchema>(schema: S, file: string, target: z.output<S>): Promise<void> {
    let text: string

    try {
      text = await readFile(file, "utf8")
    } catch (err) {
      throw DocumentError.readFailed(file, err)
    }

    this.load(schema, text, target)
    this.logger.debug("loaded config file", { source: "document", file })
  }

  bindEnv<S extends ConfigSchema>(schema: S, target: z.output<S>, prefix: string = this.envPrefix): void {
    bindEnvFields(this.plan(schema), target, prefix, {
      env: this.env,
      envPrefix: this.envPrefix,
      registry: this.registry,
      logger: this.logger,
    })
  }

  bindFlags<S extends ConfigSchema>(schema: S, target: z.output<S>): void {
    bindFlagFields(this.plan(schema), target, { registry: this.registry, logger: this.logger })
  }

  async resolve<S extends ConfigSchema>(schema: S, target: z.output<S>, sources: ResolveSources): Promise<void> {
    if (sources.document !== undefined) this.load(schema, sources.document, target)
    if (sources.file !== undefined) await this.loadFile(schema, sources.file, target)

    if (sources.env === true) this.bindEnv(schema, target)
    else if (sources.env) this.bindEnv(schema, target, sources.env.prefix)

    if (sources.flags) this.bindFlags(schema, target)
  }

  dump<S extends ConfigSchema>(schema: S, record: z.output<S>): string {
    return dumpDocument(this.plan(schema), record, this.registry)
  }

  describe(schema: ConfigSchema, prefix: string = this.envPrefix): FieldInfo[] {
    return describeFields(this.plan(schema), prefix)
  }

  private plan(schema: ConfigSchema): SchemaPlan {
    const cached = this.plans.get(schema)
    if (cached) return cached

    const plan = compilePlan(schema, (layer) => this.registry.unmarshalerFor(layer))
    this.plans.set(schema, plan)
    return plan
  }
}
