/** How a leaf field turns text into its value. */
export type FieldKind = "custom" | "text" | "string" | "int" | "uint" | "float" | "bool" | "unsupported"

/** Where one leaf field of a schema is found in each source. */
export type FieldInfo = Readonly<{
  /** Dot-joined property names, the key flags are registered under */
  path: string
  /** Environment variable consulted for the field */
  envKey: string
  /** Dot-joined field keys, as the field appears in documents */
  docKey: string
  kind: FieldKind
  /** Schema type name for unsupported fields, e.g. "array" */
  typeName?: string
}>
