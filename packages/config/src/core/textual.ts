import { z } from "zod"
import type { TextCodec, TextUnmarshaler } from "../ports/codec"
import { schemaIdentity } from "./schema-identity"

const codecs = new WeakMap<object, TextCodec>()

/**
 * Declares a field holding instances of a class that decodes itself from text.
 *
 * ```ts
 * const schema = z.object({ timeout: textual(Duration) })
 * ```
 */
export function textual<T extends TextUnmarshaler>(codec: TextCodec<T>) {
  const schema = z.instanceof(codec)
  codecs.set(schemaIdentity(schema), codec)
  return schema
}

export function textCodecOf(schema: z.core.$ZodType): TextCodec | undefined {
  return codecs.get(schemaIdentity(schema))
}
