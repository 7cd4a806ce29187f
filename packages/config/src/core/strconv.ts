import { ParseValueError } from "./errors"

const INT64_MIN = -(2n ** 63n)
const INT64_MAX = 2n ** 63n - 1n
const UINT64_MAX = 2n ** 64n - 1n

const SIGNED = /^[+-]?\d+$/
const UNSIGNED = /^\d+$/
const DECIMAL = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/
const HEX_FLOAT = /^([+-]?)0[xX]([\da-fA-F]*)(?:\.([\da-fA-F]*))?[pP]([+-]?\d+)$/
const INFINITY = /^([+-]?)(?:inf|infinity)$/i
const NAN = /^nan$/i

const TRUE = new Set(["1", "t", "T", "TRUE", "true", "True"])
const FALSE = new Set(["0", "f", "F", "FALSE", "false", "False"])

/** Parses a base-10 integer that fits in 64 signed bits. */
export function parseInt64(text: string): bigint {
  if (!SIGNED.test(text)) throw ParseValueError.syntax(text)

  const value = BigInt(text)
  if (value < INT64_MIN || value > INT64_MAX) throw ParseValueError.range(text)

  return value
}

/** Parses a base-10 integer that fits in 64 unsigned bits. No sign is accepted. */
export function parseUint64(text: string): bigint {
  if (!UNSIGNED.test(text)) throw ParseValueError.syntax(text)

  const value = BigInt(text)
  if (value > UINT64_MAX) throw ParseValueError.range(text)

  return value
}

/**
 * Parses a decimal float, with optional exponent, a hexadecimal float with a
 * binary exponent (`0x1.8p3`), or one of the special forms `inf`, `infinity`
 * (signed) and `nan`, in any letter case.
 */
export function parseFloat64(text: string): number {
  if (NAN.test(text)) return Number.NaN

  const infinity = INFINITY.exec(text)
  if (infinity) return infinity[1] === "-" ? Number.NEGATIVE_INFINITY : Number.POSITIVE_INFINITY

  const hex = HEX_FLOAT.exec(text)
  if (hex) return parseHexFloat(text, hex)

  if (!DECIMAL.test(text)) throw ParseValueError.syntax(text)

  const value = Number(text)
  if (!Number.isFinite(value)) throw ParseValueError.range(text)

  return value
}

function parseHexFloat(text: string, [, sign, whole = "", fraction = "", exponent = "0"]: RegExpExecArray): number {
  const digits = whole + fraction
  if (digits === "") throw ParseValueError.syntax(text)

  // Halve the scaling so tiny exponents do not underflow before the mantissa applies.
  const shift = Number(exponent) - 4 * fraction.length
  const half = Math.trunc(shift / 2)
  const magnitude = Number(BigInt(`0x${digits}`)) * 2 ** half * 2 ** (shift - half)
  if (!Number.isFinite(magnitude)) throw ParseValueError.range(text)

  return sign === "-" ? -magnitude : magnitude
}

export function parseBool(text: string): boolean {
  if (TRUE.has(text)) return true
  if (FALSE.has(text)) return false

  throw ParseValueError.syntax(text)
}

/** Rejects integers a `number` cannot hold exactly. */
export function toSafeInteger(value: bigint, text: string): number {
  if (value < BigInt(Number.MIN_SAFE_INTEGER) || value > BigInt(Number.MAX_SAFE_INTEGER)) {
    throw ParseValueError.range(text)
  }

  return Number(value)
}
