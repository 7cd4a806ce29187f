import type { z } from "zod"

/**
 * Identity of a schema's type.
 *
 * `.meta()` and `.describe()` hand back clones sharing the definition object,
 * so keying on the definition lets a registration follow the annotated copy.
 */
export function schemaIdentity(schema: z.core.$ZodType): object {
  return schema._zod.def
}
