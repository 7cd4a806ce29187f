import type { z } from "zod"
import type { ConfigSchema, ResolveSources } from "../ports/binder"
import type { Marshaler, Unmarshaler } from "../ports/codec"
import type { FieldInfo } from "../ports/field"
import type { FlagHandle } from "../ports/flag"
import { Binder } from "./binder"

let instance: Binder | undefined

/** The process-wide binder behind the free functions, created on first use. */
export function defaultBinder(): Binder {
  instance ??= new Binder()
  return instance
}

/** Drops the process-wide binder with everything registered on it. */
export function resetDefaultBinder(): void {
  instance = undefined
}

export function setEnvPrefix(prefix: string): void {
  defaultBinder().setEnvPrefix(prefix)
}

export function setExpandEnv(expand: boolean): void {
  defaultBinder().setExpandEnv(expand)
}

export function bindEnvAlias(key: string, ...aliases: string[]): void {
  defaultBinder().bindEnvAlias(key, ...aliases)
}

export function bindFlag(path: string, flag: FlagHandle): void {
  defaultBinder().bindFlag(path, flag)
}

export function registerMarshaler<S extends z.core.$ZodType>(schema: S, marshal: Marshaler<z.output<S>>): void {
  defaultBinder().registerMarshaler(schema, marshal)
}

export function registerUnmarshaler<S extends z.core.$ZodType>(
  schema: S,
  unmarshal: Unmarshaler<z.output<S>>,
): void {
  defaultBinder().registerUnmarshaler(schema, unmarshal)
}

export function load<S extends ConfigSchema>(schema: S, text: string, target: z.output<S>): void {
  defaultBinder().load(schema, text, target)
}

export function loadFile<S extends ConfigSchema>(schema: S, file: string, target: z.output<S>): Promise<void> {
  return defaultBinder().loadFile(schema, file, target)
}

export function bindEnv<S extends ConfigSchema>(schema: S, target: z.output<S>, prefix?: string): void {
  defaultBinder().bindEnv(schema, target, prefix)
}

export function bindFlags<S extends ConfigSchema>(schema: S, target: z.output<S>): void {
  defaultBinder().bindFlags(schema, target)
}

export function resolve<S extends ConfigSchema>(
  schema: S,
  target: z.output<S>,
  sources: ResolveSources,
): Promise<void> {
  return defaultBinder().resolve(schema, target, sources)
}

export function dump<S extends ConfigSchema>(schema: S, record: z.output<S>): string {
  return defaultBinder().dump(schema, record)
}

export function describeConfig(schema: ConfigSchema, prefix?: string): FieldInfo[] {
  return defaultBinder().describe(schema, prefix)
}
