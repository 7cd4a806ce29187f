import { z } from "zod"
import type { TextCodec, Unmarshaler } from "../ports/codec"
import { InvalidTargetError } from "./errors"
import { textCodecOf } from "./textual"

export type IntWidth = 32 | 53 | 64
export type UintWidth = 32 | 64
export type FloatWidth = 32 | 64

/**
 * Conversion strategy of a leaf field, fixed when the schema is planned.
 * Widths of 64 bits hold `bigint` values; 53 means the safe-integer range of `number`.
 */
export type LeafStrategy =
  | Readonly<{ kind: "custom"; unmarshal: Unmarshaler<unknown> }>
  | Readonly<{ kind: "text"; codec: TextCodec }>
  | Readonly<{ kind: "string" }>
  | Readonly<{ kind: "int"; bits: IntWidth }>
  | Readonly<{ kind: "uint"; bits: UintWidth }>
  | Readonly<{ kind: "float"; bits: FloatWidth }>
  | Readonly<{ kind: "bool" }>
  | Readonly<{ kind: "unsupported"; typeName: string }>

type FieldBase = Readonly<{
  /** Property name in the record */
  name: string
  /** Name in documents and environment keys */
  key: string
  /** The field schema followed by every schema found unwrapping it */
  layers: readonly z.core.$ZodType[]
}>

export type LeafNode = FieldBase &
  Readonly<{
    type: "leaf"
    strategy: LeafStrategy
    /** Field keys from the root to this leaf, as nested in documents */
    docPath: readonly string[]
  }>
export type ObjectNode = FieldBase & Readonly<{ type: "object"; fields: readonly FieldNode[] }>
export type FieldNode = LeafNode | ObjectNode

export type SchemaPlan = Readonly<{ fields: readonly FieldNode[] }>

/** Looks up the unmarshaler registered for one schema layer. */
export type UnmarshalerLookup = (schema: z.core.$ZodType) => Unmarshaler<unknown> | undefined

/**
 * Classifies every field of an object schema once.
 *
 * A registered unmarshaler wins over everything else, including recursing into
 * an object schema; then text-capable classes, then the built-in kinds.
 */
export function compilePlan(schema: z.core.$ZodType, unmarshalerFor: UnmarshalerLookup): SchemaPlan {
  const { inner: root } = unwrap(schema)

  if (!(root instanceof z.ZodObject)) {
    throw new InvalidTargetError(`config schema must be an object schema, got ${root._zod.def.type}`)
  }

  return { fields: compileFields(root, unmarshalerFor, []) }
}

function compileFields(
  object: z.ZodObject,
  unmarshalerFor: UnmarshalerLookup,
  docPath: readonly string[],
): FieldNode[] {
  const fields: FieldNode[] = []

  for (const [name, schema] of Object.entries(object.shape)) {
    fields.push(compileField(name, schema, unmarshalerFor, docPath))
  }

  return fields
}

function compileField(
  name: string,
  schema: z.core.$ZodType,
  unmarshalerFor: UnmarshalerLookup,
  parentDocPath: readonly string[],
): FieldNode {
  const { layers, inner } = unwrap(schema)
  const key = fieldKey(layers) ?? name
  const docPath = [...parentDocPath, key]

  for (const layer of layers) {
    const unmarshal = unmarshalerFor(layer)
    if (unmarshal) return { type: "leaf", name, key, layers, docPath, strategy: { kind: "custom", unmarshal } }
  }

  if (inner instanceof z.ZodObject) {
    return { type: "object", name, key, layers, fields: compileFields(inner, unmarshalerFor, docPath) }
  }

  return { type: "leaf", name, key, layers, docPath, strategy: leafStrategy(layers, inner) }
}

function leafStrategy(layers: readonly z.core.$ZodType[], inner: z.core.$ZodType): LeafStrategy {
  for (const layer of layers) {
    const codec = textCodecOf(layer)
    if (codec) return { kind: "text", codec }
  }

  if (inner instanceof z.ZodString) return { kind: "string" }
  if (inner instanceof z.ZodBoolean) return { kind: "bool" }
  if (inner instanceof z.ZodBigInt) {
    return inner.format === "uint64" ? { kind: "uint", bits: 64 } : { kind: "int", bits: 64 }
  }
  if (inner instanceof z.ZodNumber) {
    switch (inner.format) {
      case "int32":
        return { kind: "int", bits: 32 }
      case "uint32":
        return { kind: "uint", bits: 32 }
      case "safeint":
        return { kind: "int", bits: 53 }
      case "float32":
        return { kind: "float", bits: 32 }
      default:
        return { kind: "float", bits: 64 }
    }
  }

  return { kind: "unsupported", typeName: inner._zod.def.type }
}

function unwrap(schema: z.core.$ZodType): { layers: z.core.$ZodType[]; inner: z.core.$ZodType } {
  const layers: z.core.$ZodType[] = [schema]
  let inner: z.core.$ZodType = schema

  while (
    inner instanceof z.ZodOptional ||
    inner instanceof z.ZodNullable ||
    inner instanceof z.ZodDefault ||
    inner instanceof z.ZodReadonly
  ) {
    inner = inner.unwrap()
    layers.push(inner)
  }

  return { layers, inner }
}

function fieldKey(layers: readonly z.core.$ZodType[]): string | undefined {
  for (const layer of layers) {
    const meta: unknown = z.globalRegistry.get(layer)
    if (isMeta(meta) && typeof meta.key === "string") return meta.key
  }

  return undefined
}

function isMeta(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null
}
