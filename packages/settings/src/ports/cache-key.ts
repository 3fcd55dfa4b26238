/**
 * What a cached setting varies by: nothing (`global`) or one entity id.
 */
export type CacheKey = { kind: "global" } | { kind: "scoped"; id: string }

export const GLOBAL_KEY: CacheKey = Object.freeze({ kind: "global" })

export function scopedKey(id: string | number): CacheKey {
  return { kind: "scoped", id: String(id) }
}

export function cacheKeyString(key: CacheKey): string {
  return key.kind === "global" ? "global" : `scoped:${key.id}`
}

/** Passed to `set` to clear the stored value and fall back to the default. */
export const RESET_TO_DEFAULT: unique symbol = Symbol("RESET_TO_DEFAULT")

export type ResetToDefault = typeof RESET_TO_DEFAULT
