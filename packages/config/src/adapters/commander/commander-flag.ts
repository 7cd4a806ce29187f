import type { Command } from "commander"
import type { IBinder } from "../../ports/binder"
import type { FlagHandle } from "../../ports/flag"

/**
 * Exposes one commander option to the flag binder.
 *
 * The option counts as changed only when commander took its value from the
 * command line; defaults, environment fallbacks and implied values do not.
 */
export class CommanderFlag implements FlagHandle {
  readonly name: string

  constructor(
    private readonly command: Command,
    private readonly attribute: string,
  ) {
    const option = command.options.find((candidate) => candidate.attributeName() === attribute)
    this.name = option?.long ?? option?.short ?? attribute
  }

  get changed(): boolean {
    return this.command.getOptionValueSource(this.attribute) === "cli"
  }

  value(): string {
    return render(this.command.getOptionValue(this.attribute))
  }
}

function render(value: unknown): string {
  if (value === undefined || value === null) return ""
  if (typeof value === "string") return value
  if (Array.isArray(value)) return value.map(render).join(",")
  return String(value)
}

/**
 * Binds commander options to field paths.
 *
 * ```ts
 * bindCommanderOptions(binder, program, { "server.port": "port", "log.level": "logLevel" })
 * ```
 */
export function bindCommanderOptions(
  binder: Pick<IBinder, "bindFlag">,
  command: Command,
  options: Readonly<Record<string, string>>,
): void {
  for (const [path, attribute] of Object.entries(options)) {
    binder.bindFlag(path, new CommanderFlag(command, attribute))
  }
}
