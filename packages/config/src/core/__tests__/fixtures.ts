import { z } from "zod"
import type { TextMarshaler, TextUnmarshaler } from "../../ports/codec"
import { bytesToText, textToBytes } from "../bytes"
import { compilePlan, type LeafNode, type UnmarshalerLookup } from "../plan"
import { textual } from "../textual"

/** Milliseconds written as "250ms" or "2s". */
export class Millis implements TextUnmarshaler, TextMarshaler {
  constructor(public ms = 0) {}

  unmarshalText(text: Uint8Array): void {
    const raw = bytesToText(text)
    const match = /^(\d+)(ms|s)$/.exec(raw)
    if (!match) throw new Error(`invalid duration "${raw}"`)

    this.ms = Number(match[1]) * (match[2] === "s" ? 1000 : 1)
  }

  marshalText(): Uint8Array {
    return textToBytes(`${this.ms}ms`)
  }
}

export const millis = textual(Millis)

export const serverSchema = z.object({
  server: z.object({
    port: z.int(),
    host: z.string(),
  }),
})

export function serverConfig(): z.output<typeof serverSchema> {
  return { server: { port: 0, host: "" } }
}

/** Plans a one-field object schema and returns that field. */
export function leafOf(schema: z.core.$ZodType, unmarshalerFor: UnmarshalerLookup = () => undefined): LeafNode {
  const [field] = compilePlan(z.object({ field: schema }), unmarshalerFor).fields
  if (field?.type !== "leaf") throw new Error("expected a leaf field")
  return field
}
