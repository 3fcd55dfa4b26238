import {
  defineValue,
  isJsonObject,
  type JsonObject,
  type JsonValue,
  ownValue,
} from "../../ports/json-value"

export type Lookup = { kind: "found"; value: JsonValue } | { kind: "not_found" }

export function getAt(doc: JsonObject, path: readonly string[]): Lookup {
  let current: JsonValue = doc

  for (const key of path) {
    const next: JsonValue | undefined = isJsonObject(current) ? ownValue(current, key) : undefined
    if (next === undefined) return { kind: "not_found" }
    current = next
  }

  return { kind: "found", value: current }
}

/**
 * Writes `value` at `path`, replacing any non-object found on the way with
 * an empty container. Only own properties are followed or written.
 */
export function setAt(doc: JsonObject, path: readonly string[], value: JsonValue): void {
  const leaf = path.at(-1)
  if (leaf === undefined) {
    throw new RangeError("Cannot replace the document root")
  }

  let current = doc

  for (const key of path.slice(0, -1)) {
    const next = ownValue(current, key)

    if (isJsonObject(next)) {
      current = next
    } else {
      const created: JsonObject = {}
      defineValue(current, key, created)
      current = created
    }
  }

  defineValue(current, leaf, value)
}

/**
 * Removes the value at `path` and every container left empty by the removal.
 * An empty `path` empties the whole document.
 */
export function clearAt(doc: JsonObject, path: readonly string[]): void {
  if (path.length === 0) {
    for (const key of Object.keys(doc)) delete doc[key]
    return
  }

  const [head, ...rest] = path
  if (head === undefined || !Object.hasOwn(doc, head)) return

  if (rest.length === 0) {
    delete doc[head]
    return
  }

  const child = ownValue(doc, head)
  if (!isJsonObject(child)) return

  clearAt(child, rest)

  if (Object.keys(child).length === 0) {
    delete doc[head]
  }
}

export function cloneJson<T extends JsonValue>(value: T): T {
  return structuredClone(value)
}
