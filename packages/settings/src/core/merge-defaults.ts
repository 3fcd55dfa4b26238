import { defineValue, isJsonObject, type JsonObject, type JsonValue, ownValue } from "@layerconf/drivers"

/**
 * Deep-merges `stored` over `defaults`. Only plain objects merge; any other
 * stored value wins outright.
 */
export function mergeDefaults(defaults: JsonValue | undefined, stored: JsonValue): JsonValue {
  if (!isJsonObject(defaults) || !isJsonObject(stored)) return stored

  const out: JsonObject = structuredClone(defaults)

  for (const [key, value] of Object.entries(stored)) {
    defineValue(out, key, mergeDefaults(ownValue(out, key), value))
  }

  return out
}

export function lookupDefault(tree: JsonValue | undefined, path: readonly string[]): JsonValue | undefined {
  let current = tree

  for (const key of path) {
    if (!isJsonObject(current)) return undefined
    current = ownValue(current, key)
  }

  return current === undefined ? undefined : structuredClone(current)
}
