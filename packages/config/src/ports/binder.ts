import type { z } from "zod"
import type { Marshaler, Unmarshaler } from "./codec"
import type { FieldInfo } from "./field"
import type { FlagHandle } from "./flag"

/** Any zod schema; binders reject, at run time, roots that are not object schemas. */
export type ConfigSchema = z.ZodType

/** Sources applied by {@link IBinder.resolve}, in this order. */
export type ResolveSources = Readonly<{
  /** YAML text */
  document?: string
  /** Path of a YAML file, read after `document` */
  file?: string
  /** Bind environment variables; `true` uses the binder's prefix */
  env?: boolean | Readonly<{ prefix: string }>
  /** Bind registered flags */
  flags?: boolean
}>

/**
 * Populates a caller-owned record from YAML documents, environment variables
 * and command-line flags.
 *
 * Every binding call is independent; precedence is the order of the calls, the
 * last value written wins. Absent values never touch the record.
 *
 * @example
 * ```typescript
 * const schema = z.object({
 *   server: z.object({ port: z.int(), host: z.string() }),
 * })
 * const config: z.output<typeof schema> = { server: { port: 8080, host: "" } }
 *
 * const binder = new Binder({ envPrefix: "APP" })
 * await binder.loadFile(schema, "config.yaml", config)
 * binder.bindEnv(schema, config)   // APP_SERVER_PORT, APP_SERVER_HOST
 * binder.bindFlags(schema, config) // flags bound to "server.port", ...
 * ```
 */
export interface IBinder {
  /** Prefix of environment keys, also stripped before alias lookup. */
  setEnvPrefix(prefix: string): void

  /** Expand `${VAR}` references in documents before parsing them. */
  setExpandEnv(expand: boolean): void

  /**
   * Adds fallbacks for a canonical environment key (the full key without the
   * binder prefix). Aliases are tried in registration order, each under the prefix.
   */
  bindEnvAlias(key: string, ...aliases: string[]): void

  /** Binds a flag to a field path such as `"server.port"`. Rebinding replaces. */
  bindFlag(path: string, flag: FlagHandle): void

  /** Renders values of `schema` when dumping documents. */
  registerMarshaler<S extends z.core.$ZodType>(schema: S, marshal: Marshaler<z.output<S>>): void

  /**
   * Builds values of `schema` from raw text. Takes priority over every other
   * conversion, including recursing into an object schema.
   */
  registerUnmarshaler<S extends z.core.$ZodType>(schema: S, unmarshal: Unmarshaler<z.output<S>>): void

  /** Decodes YAML text into `target`. */
  load<S extends ConfigSchema>(schema: S, text: string, target: z.output<S>): void

  /** Reads a YAML file and decodes it into `target`. */
  loadFile<S extends ConfigSchema>(schema: S, file: string, target: z.output<S>): Promise<void>

  /**
   * Assigns fields from environment variables named `PREFIX_FIELD_SUBFIELD`.
   *
   * @param prefix - defaults to the binder's prefix
   */
  bindEnv<S extends ConfigSchema>(schema: S, target: z.output<S>, prefix?: string): void

  /** Assigns fields whose bound flag was changed on the command line. */
  bindFlags<S extends ConfigSchema>(schema: S, target: z.output<S>): void

  /** Applies document, file, environment and flags to `target`, in that order. */
  resolve<S extends ConfigSchema>(schema: S, target: z.output<S>, sources: ResolveSources): Promise<void>

  /** Renders `record` as YAML keyed by field keys. */
  dump<S extends ConfigSchema>(schema: S, record: z.output<S>): string

  /** Lists every leaf of `schema` with its flag path, environment key and document key. */
  describe(schema: ConfigSchema, prefix?: string): FieldInfo[]
}
