import { textToBytes } from "./bytes"
import { InvalidValueError, type ValueKind, UnmarshalError, UnsupportedTypeError } from "./errors"
import type { LeafNode } from "./plan"
import { parseBool, parseFloat64, parseInt64, parseUint64, toSafeInteger } from "./strconv"

/**
 * Turns raw text into the value a leaf field holds.
 *
 * `current` is the value already in the record; text-capable fields decode into
 * it in place when it is an instance of their class.
 */
export function convertText(leaf: LeafNode, raw: string, current: unknown): unknown {
  const { strategy } = leaf

  switch (strategy.kind) {
    case "custom":
      try {
        return strategy.unmarshal(textToBytes(raw))
      } catch (err) {
        throw UnmarshalError.custom(err)
      }

    case "text": {
      const target = current instanceof strategy.codec ? current : new strategy.codec()
      try {
        target.unmarshalText(textToBytes(raw))
      } catch (err) {
        throw UnmarshalError.text(err)
      }
      return target
    }

    case "string":
      return raw

    case "int":
      return parsing("int", () => {
        const value = parseInt64(raw)
        if (strategy.bits === 64) return value
        if (strategy.bits === 32) return Number(BigInt.asIntN(32, value))
        return toSafeInteger(value, raw)
      })

    case "uint":
      return parsing("uint", () => {
        const value = parseUint64(raw)
        return strategy.bits === 64 ? value : Number(BigInt.asUintN(32, value))
      })

    case "float":
      return parsing("float", () => {
        const value = parseFloat64(raw)
        return strategy.bits === 32 ? Math.fround(value) : value
      })

    case "bool":
      return parsing("bool", () => parseBool(raw))

    case "unsupported":
      throw new UnsupportedTypeError(strategy.typeName)
  }
}

function parsing<T>(kind: ValueKind, parse: () => T): T {
  try {
    return parse()
  } catch (err) {
    throw new InvalidValueError(kind, err)
  }
}
