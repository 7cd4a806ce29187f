import type { FlagHandle } from "../../ports/flag"

/** A flag held in memory, for programs that parse their own arguments and for tests. */
export class StaticFlag implements FlagHandle {
  private current: string
  private touched = false

  constructor(
    readonly name: string,
    private readonly defaultValue = "",
  ) {
    this.current = defaultValue
  }

  get changed(): boolean {
    return this.touched
  }

  value(): string {
    return this.current
  }

  /** Records a value given on the command line. */
  set(value: string): void {
    this.current = value
    this.touched = true
  }

  reset(): void {
    this.current = this.defaultValue
    this.touched = false
  }
}
