import type { ConfigDriver, IdentifierData, JsonValue } from "@layerconf/drivers"
import { NotFoundError } from "@layerconf/errors"
import { mergeDefaults } from "./merge-defaults"

export type ValueRefDeps = {
  driver: ConfigDriver
  /** Resolved at call time so later registrations are seen. */
  defaultValue: () => JsonValue | undefined
}

/**
 * Handle on one setting (or group of settings) at a fixed identifier.
 */
export class ValueRef {
  constructor(
    private readonly deps: ValueRefDeps,
    readonly identifier: IdentifierData,
  ) {}

  /**
   * Stored value merged over the registered default. Falls back to the
   * default when nothing is stored; rejects with `NotFoundError` when
   * neither exists.
   */
  async get(): Promise<JsonValue> {
    const fallback = this.deps.defaultValue()

    try {
      return mergeDefaults(fallback, await this.deps.driver.get(this.identifier))
    } catch (err) {
      if (err instanceof NotFoundError && fallback !== undefined) {
        return fallback
      }
      throw err
    }
  }

  set(value: JsonValue): Promise<JsonValue> {
    return this.deps.driver.set(this.identifier, value)
  }

  clear(): Promise<void> {
    return this.deps.driver.clear(this.identifier)
  }

  increment(delta = 1): Promise<number> {
    const fallback = this.deps.defaultValue()

    return this.deps.driver.increment(
      this.identifier,
      delta,
      typeof fallback === "number" ? fallback : 0,
    )
  }

  toggle(value?: boolean): Promise<boolean> {
    const fallback = this.deps.defaultValue()

    return this.deps.driver.toggle(
      this.identifier,
      value,
      typeof fallback === "boolean" ? fallback : false,
    )
  }

  defaultValue(): JsonValue | undefined {
    return this.deps.defaultValue()
  }
}
