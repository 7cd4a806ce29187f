import { bytesToText, type TextMarshaler, type TextUnmarshaler, textToBytes } from "@stratum/config"

const UNIT_MS = { ms: 1, s: 1000, m: 60_000, h: 3_600_000 } as const

type Unit = keyof typeof UNIT_MS

const PART = /(\d+)(ms|s|m|h)/g
const WHOLE = /^(?:\d+(?:ms|s|m|h))+$/

function isUnit(value: string): value is Unit {
  return Object.hasOwn(UNIT_MS, value)
}

/** A span of time written like "1h30m", "45s" or "250ms". */
export class Duration implements TextUnmarshaler, TextMarshaler {
  constructor(public milliseconds = 0) {}

  static parse(text: string): Duration {
    const duration = new Duration()
    duration.unmarshalText(textToBytes(text))
    return duration
  }

  unmarshalText(text: Uint8Array): void {
    const raw = bytesToText(text).trim()
    if (!WHOLE.test(raw)) throw new Error(`invalid duration "${raw}"`)

    let total = 0
    for (const [, amount = "0", unit = ""] of raw.matchAll(PART)) {
      if (isUnit(unit)) total += Number(amount) * UNIT_MS[unit]
    }

    this.milliseconds = total
  }

  marshalText(): Uint8Array {
    return textToBytes(this.toString())
  }

  toString(): string {
    let rest = this.milliseconds
    let text = ""

    for (const unit of ["h", "m", "s"] as const) {
      const count = Math.floor(rest / UNIT_MS[unit])
      if (count > 0) text += `${count}${unit}`
      rest -= count * UNIT_MS[unit]
    }

    if (rest > 0 || text === "") text += `${rest}ms`
    return text
  }
}
