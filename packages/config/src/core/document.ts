import type { Logger } from "@stratum/logger"
import { parse, stringify } from "yaml"
import { bytesToText } from "./bytes"
import { convertText } from "./convert"
import type { EnvMap } from "./env-binder"
import { DocumentError, FieldBindingError, MarshalError } from "./errors"
import { expandEnv } from "./expand-env"
import type { FieldNode, LeafNode, SchemaPlan } from "./plan"
import type { Registry } from "./registry"
import { assertHolder, type Holder, isHolder, joinPath, walkFields } from "./walk"

export type DocumentContext = Readonly<{
  expandEnv: boolean
  env: EnvMap
  logger: Logger
}>

type Lookup = { found: false } | { found: true; value: unknown }

/**
 * Decodes a YAML document into `target`, keyed by field keys.
 *
 * Keys the document leaves out, and `null` values, leave their fields alone.
 * Keys the schema does not know are ignored.
 */
export function loadDocument(plan: SchemaPlan, text: string, target: unknown, ctx: DocumentContext): void {
  assertHolder(target)

  const source = ctx.expandEnv ? expandEnv(text, (name) => ctx.env[name]) : text
  const document = parseDocument(source)
  if (document === undefined) return

  for (const path of unknownKeys(plan.fields, document, "")) {
    ctx.logger.debug("ignoring unknown document key", { source: "document", path })
  }

  try {
    walkFields(plan, target, "", (leaf, slot, path) => {
      const lookup = lookupDocument(document, leaf.docPath, path)
      if (!lookup.found) return

      try {
        slot.set(decodeLeaf(leaf, lookup.value, slot.get()))
      } catch (err) {
        throw new FieldBindingError("document", path, path, err)
      }

      ctx.logger.debug("applied document value", { source: "document", path })
    })
  } catch (err) {
    if (err instanceof FieldBindingError) throw DocumentError.parseFailed(err)
    throw err
  }
}

function parseDocument(source: string): Holder | undefined {
  let parsed: unknown

  try {
    parsed = parse(source, { intAsBigInt: true, merge: true })
  } catch (err) {
    throw DocumentError.parseFailed(err)
  }

  if (parsed === null || parsed === undefined) return undefined
  if (!isHolder(parsed)) throw DocumentError.parseFailed(new Error("document root must be a mapping"))

  return parsed
}

/** Follows a leaf's field keys through the document. */
function lookupDocument(document: Holder, docPath: readonly string[], path: string): Lookup {
  let node: unknown = document

  for (const [depth, segment] of docPath.entries()) {
    if (node === null || node === undefined) return { found: false }
    if (!isHolder(node)) {
      const at = docPath.slice(0, depth).join(".")
      throw new FieldBindingError("document", path, at, new Error(`expected a mapping, got ${typeLabel(node)}`))
    }
    node = Object.hasOwn(node, segment) ? node[segment] : undefined
  }

  return node === null || node === undefined ? { found: false } : { found: true, value: node }
}

/**
 * Scalars go through the converter as text; unsupported kinds take the parsed value.
 *
 * Integers arrive as bigints, so their text is exact. Floats have already been
 * resolved by YAML: `.inf` and overflowing literals both reach here as infinity.
 */
function decodeLeaf(leaf: LeafNode, value: unknown, current: unknown): unknown {
  const { kind } = leaf.strategy

  if (kind === "unsupported") return value
  if (typeof value === "string") return convertText(leaf, value, current)
  if (typeof value === "number" || typeof value === "boolean" || typeof value === "bigint") {
    return convertText(leaf, String(value), current)
  }
  if (kind === "custom" || kind === "text") return convertText(leaf, stringify(value), current)

  throw new Error(`cannot decode a ${typeLabel(value)} into a ${kind} field`)
}

function typeLabel(value: unknown): string {
  if (Array.isArray(value)) return "sequence"
  if (isHolder(value)) return "mapping"
  return typeof value
}

function unknownKeys(fields: readonly FieldNode[], node: Holder, docPath: string): string[] {
  const byKey = new Map(fields.map((field) => [field.key, field]))
  const unknown: string[] = []

  for (const [key, value] of Object.entries(node)) {
    const path = joinPath(docPath, key)
    const field = byKey.get(key)

    if (!field) {
      unknown.push(path)
    } else if (field.type === "object" && isHolder(value)) {
      unknown.push(...unknownKeys(field.fields, value, path))
    }
  }

  return unknown
}

/**
 * Renders a record as a YAML document keyed by field keys.
 *
 * Registered marshalers win, then `marshalText()` of text-capable values; other
 * values are written as they are.
 */
export function dumpDocument(plan: SchemaPlan, record: unknown, registry: Registry): string {
  assertHolder(record)
  return stringify(dumpFields(plan.fields, record, registry, ""))
}

function dumpFields(fields: readonly FieldNode[], holder: Holder, registry: Registry, path: string): Holder {
  const out: Holder = {}

  for (const field of fields) {
    const value = holder[field.name]
    if (value === undefined) continue

    const fieldPath = joinPath(path, field.name)
    const marshal = registry.marshalerFor(field.layers)

    if (marshal) {
      out[field.key] = marshalWith(() => marshal(value), fieldPath)
    } else if (field.type === "object") {
      if (isHolder(value)) out[field.key] = dumpFields(field.fields, value, registry, fieldPath)
    } else if (isTextMarshaler(value)) {
      out[field.key] = marshalWith(() => value.marshalText(), fieldPath)
    } else {
      out[field.key] = value
    }
  }

  return out
}

function marshalWith(marshal: () => Uint8Array, path: string): string {
  try {
    return bytesToText(marshal())
  } catch (err) {
    throw new MarshalError(path, err)
  }
}

function isTextMarshaler(value: unknown): value is { marshalText(): Uint8Array } {
  return isHolder(value) && typeof value.marshalText === "function"
}
