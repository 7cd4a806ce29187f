/**
 * A command-line flag as seen by the flag binder.
 *
 * The argument parser owns the flag; the binder only reads it. A flag that was
 * never `changed` (it still carries its declared default) leaves the record alone.
 */
export interface FlagHandle {
  /** Name as the user types it, used in log output */
  readonly name: string

  /** `true` once the user set the flag explicitly on the command line */
  readonly changed: boolean

  /** Current value rendered as text */
  value(): string
}
