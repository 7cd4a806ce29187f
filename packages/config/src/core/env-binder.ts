import type { Logger } from "@stratum/logger"
import { convertText } from "./convert"
import { FieldBindingError } from "./errors"
import type { SchemaPlan } from "./plan"
import type { Registry } from "./registry"
import { joinEnvKey, walkFields } from "./walk"

export type EnvMap = Readonly<Record<string, string | undefined>>

export type EnvBindingContext = Readonly<{
  env: EnvMap
  /** The binder's own prefix, stripped to find a key's aliases */
  envPrefix: string
  registry: Registry
  logger: Logger
}>

type EnvHit = Readonly<{ key: string; value: string }>

/**
 * Assigns every leaf whose environment variable, or one of its aliases, is set.
 *
 * Stops at the first value that does not convert; fields assigned before it keep
 * their new values.
 */
export function bindEnvFields(plan: SchemaPlan, target: unknown, prefix: string, ctx: EnvBindingContext): void {
  walkFields(plan, target, prefix, (leaf, slot, path, key) => {
    const hit = lookupEnv(key, path, ctx)
    if (!hit) return

    try {
      slot.set(convertText(leaf, hit.value, slot.get()))
    } catch (err) {
      throw new FieldBindingError("env", path, hit.key, err)
    }

    ctx.logger.debug("applied environment value", { source: "env", path, key: hit.key })
  })
}

function lookupEnv(key: string, path: string, ctx: EnvBindingContext): EnvHit | undefined {
  const value = ctx.env[key]
  if (value !== undefined) return { key, value }

  const canonical = canonicalKey(key, ctx.envPrefix)

  for (const alias of ctx.registry.aliasesFor(canonical)) {
    const aliasKey = joinEnvKey(ctx.envPrefix, alias)
    const aliasValue = ctx.env[aliasKey]

    if (aliasValue !== undefined) {
      ctx.logger.debug(`resolved ${key} through alias`, { source: "env", path, key: aliasKey })
      return { key: aliasKey, value: aliasValue }
    }
  }

  return undefined
}

function canonicalKey(key: string, envPrefix: string): string {
  const head = `${envPrefix}_`
  return envPrefix !== "" && key.startsWith(head) ? key.slice(head.length) : key
}
