import type { FieldInfo } from "../ports/field"
import { InvalidTargetError } from "./errors"
import type { FieldNode, LeafNode, SchemaPlan } from "./plan"

export type Holder = Record<string, unknown>

/** Read and write access to one field of the record. */
export type FieldSlot = Readonly<{
  get(): unknown
  set(value: unknown): void
}>

/** Called once per settable leaf with its flag path and environment key. */
export type LeafVisitor = (leaf: LeafNode, slot: FieldSlot, path: string, key: string) => void

/** Finds the object holding a field; `create` materializes missing aggregates. */
type HolderRef = (create: boolean) => Holder | undefined

export function isHolder(value: unknown): value is Holder {
  return typeof value === "object" && value !== null && !Array.isArray(value)
}

export function assertHolder(target: unknown): asserts target is Holder {
  if (!isHolder(target)) {
    throw new InvalidTargetError(`config target must be a mutable object, got ${typeLabel(target)}`)
  }
}

export function joinPath(prefix: string, name: string): string {
  if (prefix === "") return name
  if (name === "") return prefix
  return `${prefix}.${name}`
}

export function joinEnvKey(prefix: string, segment: string): string {
  if (prefix === "") return segment
  if (segment === "") return prefix
  return `${prefix}_${segment}`
}

/**
 * Visits every settable leaf of `target` depth-first, in declaration order.
 *
 * Nested aggregates missing from the record are created as `{}` only when a
 * visitor assigns one of their leaves. Fields that cannot be written are skipped.
 */
export function walkFields(plan: SchemaPlan, target: unknown, prefix: string, visit: LeafVisitor): void {
  assertHolder(target)
  const root = target
  walkNodes(plan.fields, () => root, "", prefix, visit)
}

function walkNodes(
  fields: readonly FieldNode[],
  holder: HolderRef,
  path: string,
  key: string,
  visit: LeafVisitor,
): void {
  for (const field of fields) {
    const fieldPath = joinPath(path, field.name)
    const fieldKey = joinEnvKey(key, field.key.toUpperCase())

    if (field.type === "object") {
      walkNodes(field.fields, childHolder(holder, field.name, fieldPath), fieldPath, fieldKey, visit)
      continue
    }

    const parent = holder(false)
    if (parent && !isSettable(parent, field.name)) continue

    visit(field, slotOf(holder, field.name), fieldPath, fieldKey)
  }
}

function childHolder(parent: HolderRef, name: string, path: string): HolderRef {
  return (create) => {
    const holder = parent(create)
    if (!holder) return undefined

    const current = holder[name]
    if (isHolder(current)) return current
    if (current !== undefined && current !== null) {
      throw new InvalidTargetError(`expected an object at ${path}, got ${typeLabel(current)}`, path)
    }
    if (!create || !isSettable(holder, name)) return undefined

    const created: Holder = {}
    holder[name] = created
    return created
  }
}

function slotOf(holder: HolderRef, name: string): FieldSlot {
  return {
    get: () => holder(false)?.[name],
    set: (value) => {
      const target = holder(true)
      if (target) target[name] = value
    },
  }
}

function isSettable(holder: Holder, name: string): boolean {
  const descriptor = Object.getOwnPropertyDescriptor(holder, name)
  if (descriptor) return descriptor.writable === true || descriptor.set !== undefined

  return Object.isExtensible(holder)
}

function typeLabel(value: unknown): string {
  if (value === null) return "null"
  if (Array.isArray(value)) return "array"
  return typeof value
}

/** Lists every leaf of a plan in walk order, without touching a record. */
export function describeFields(plan: SchemaPlan, prefix: string): FieldInfo[] {
  const infos: FieldInfo[] = []

  const visit = (fields: readonly FieldNode[], path: string, key: string, docKey: string): void => {
    for (const field of fields) {
      const fieldPath = joinPath(path, field.name)
      const envKey = joinEnvKey(key, field.key.toUpperCase())
      const fieldDocKey = joinPath(docKey, field.key)

      if (field.type === "object") {
        visit(field.fields, fieldPath, envKey, fieldDocKey)
        continue
      }

      const { strategy } = field
      infos.push({
        path: fieldPath,
        envKey,
        docKey: fieldDocKey,
        kind: strategy.kind,
        ...(strategy.kind === "unsupported" && { typeName: strategy.typeName }),
      })
    }
  }

  visit(plan.fields, "", prefix, "")
  return infos
}
