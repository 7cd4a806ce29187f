import type { Logger } from "@stratum/logger"
import { convertText } from "./convert"
import { FieldBindingError } from "./errors"
import type { SchemaPlan } from "./plan"
import type { Registry } from "./registry"
import { walkFields } from "./walk"

export type FlagBindingContext = Readonly<{
  registry: Registry
  logger: Logger
}>

/** Assigns every leaf whose registered flag was set on the command line. */
export function bindFlagFields(plan: SchemaPlan, target: unknown, ctx: FlagBindingContext): void {
  walkFields(plan, target, "", (leaf, slot, path) => {
    const flag = ctx.registry.flag(path)
    if (!flag?.changed) return

    try {
      slot.set(convertText(leaf, flag.value(), slot.get()))
    } catch (err) {
      throw new FieldBindingError("flag", path, path, err)
    }

    ctx.logger.debug("applied flag value", { source: "flag", path, key: flag.name })
  })
}
