import { z } from "zod"
import type { Marshaler, Unmarshaler } from "../ports/codec"
import type { FlagHandle } from "../ports/flag"
import { schemaIdentity } from "./schema-identity"

/** Marshaler narrowed back from `unknown` by parsing against its schema. */
export type StoredMarshaler = (value: unknown) => Uint8Array

/**
 * Aliases, flags and custom converters of one binder.
 *
 * Aliases append; flags and converters overwrite earlier registrations.
 */
export class Registry {
  private readonly aliases = new Map<string, string[]>()
  private readonly flags = new Map<string, FlagHandle>()
  private readonly marshalers = new Map<object, StoredMarshaler>()
  private readonly unmarshalers = new Map<object, Unmarshaler<unknown>>()

  bindEnvAlias(key: string, aliases: readonly string[]): void {
    this.aliases.set(key, [...this.aliasesFor(key), ...aliases])
  }

  aliasesFor(key: string): readonly string[] {
    return this.aliases.get(key) ?? []
  }

  bindFlag(path: string, flag: FlagHandle): void {
    this.flags.set(path, flag)
  }

  flag(path: string): FlagHandle | undefined {
    return this.flags.get(path)
  }

  registerMarshaler<S extends z.core.$ZodType>(schema: S, marshal: Marshaler<z.output<S>>): void {
    this.marshalers.set(schemaIdentity(schema), (value) => {
      const parsed = z.safeParse(schema, value)
      if (!parsed.success) {
        throw new Error(`value does not match the marshaler's type: ${z.prettifyError(parsed.error)}`)
      }
      return marshal(parsed.data)
    })
  }

  registerUnmarshaler<S extends z.core.$ZodType>(schema: S, unmarshal: Unmarshaler<z.output<S>>): void {
    this.unmarshalers.set(schemaIdentity(schema), unmarshal)
  }

  marshalerFor(layers: readonly z.core.$ZodType[]): StoredMarshaler | undefined {
    for (const layer of layers) {
      const marshal = this.marshalers.get(schemaIdentity(layer))
      if (marshal) return marshal
    }

    return undefined
  }

  unmarshalerFor(schema: z.core.$ZodType): Unmarshaler<unknown> | undefined {
    return this.unmarshalers.get(schemaIdentity(schema))
  }
}
