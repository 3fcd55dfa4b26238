import type { IdentifierData } from "../core/identifier/identifier-data"
import type { CustomGroupData } from "../core/identifier/categories"
import type { JsonValue } from "./json-value"

export type ImportRow = readonly [category: string, payload: JsonValue]

export type FailedLeaf = {
  category: string
  primaryKey: readonly string[]
  error: unknown
}

export type CategoryImport = {
  category: string
  mode: "bulk" | "split"
  written: number
}

export type ImportReport = {
  categories: CategoryImport[]
  failed: FailedLeaf[]
}

export type DeleteAllOptions = {
  confirm?: boolean
}

/**
 * Reads and writes the values of one namespace (`cogName`, `uuid`).
 *
 * All operations reject with `NotFoundError`, `TypeMismatchError` or
 * `BackendError`; none of them apply defaults on their own except
 * `increment` and `toggle`.
 */
export interface ConfigDriver {
  readonly cogName: string
  readonly uuid: string

  /** Rejects with `NotFoundError` when nothing is stored at the exact path. */
  get(id: IdentifierData): Promise<JsonValue>

  /** Replaces whatever is stored at `id` and returns the stored value. */
  set(id: IdentifierData, value: JsonValue): Promise<JsonValue>

  /** Removes the value or subtree at `id`. Absent paths are a no-op. */
  clear(id: IdentifierData): Promise<void>

  increment(id: IdentifierData, delta: number, defaultValue?: number): Promise<number>

  /** Flips the stored boolean, or stores `value` when one is given. */
  toggle(id: IdentifierData, value?: boolean, defaultValue?: boolean): Promise<boolean>

  /**
   * Writes each category payload in one call, falling back to one call per
   * primary-key leaf when the bulk write fails. Leaf failures are reported,
   * not thrown.
   */
  importData(rows: Iterable<ImportRow>, customGroups?: CustomGroupData): Promise<ImportReport>
}
