export type JsonPrimitive = string | number | boolean | null

export type JsonObject = { [key: string]: JsonValue }

export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value)
}

export function isJsonValue(value: unknown): value is JsonValue {
  switch (typeof value) {
    case "string":
    case "boolean":
      return true
    case "number":
      return Number.isFinite(value)
    case "object":
      if (value === null) return true
      if (Array.isArray(value)) return value.every(isJsonValue)
      return Object.values(value).every(isJsonValue)
    default:
      return false
  }
}

/** Reads `key` only when it is an own property, so `__proto__` never resolves to a prototype. */
export function ownValue(obj: JsonObject, key: string): JsonValue | undefined {
  return Object.hasOwn(obj, key) ? obj[key] : undefined
}

/** Writes `key` as an own data property; plain assignment to `__proto__` would swap the prototype. */
export function defineValue(obj: JsonObject, key: string, value: JsonValue): void {
  Object.defineProperty(obj, key, { value, enumerable: true, writable: true, configurable: true })
}
