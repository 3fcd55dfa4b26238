import type { JsonValue } from "@layerconf/drivers"
import type { ZodType } from "zod"
import { type CacheKey, GLOBAL_KEY, RESET_TO_DEFAULT } from "../../ports/cache-key"
import { SettingsRegistrationError } from "../settings-config"
import type { ValueRef } from "../value-ref"
import {
  SettingCacheManager,
  type SettingCacheManagerDeps,
  type SettingCacheManagerOptions,
} from "./setting-cache-manager"

export type GlobalSettingManagerDeps<T extends JsonValue> = SettingCacheManagerDeps & {
  ref: ValueRef
  schema: ZodType<T>
}

/**
 * A setting that is the same for every entity.
 */
export class GlobalSettingManager<T extends JsonValue, TEntity = unknown> extends SettingCacheManager<
  T,
  TEntity
> {
  constructor(
    protected override readonly deps: GlobalSettingManagerDeps<T>,
    opts: SettingCacheManagerOptions = {},
  ) {
    super(deps, opts)
  }

  getGlobal(): Promise<T> {
    return this.get(GLOBAL_KEY)
  }

  /** `null` resets the setting to its default. */
  setGlobal(value: T | null): Promise<void> {
    return this.set(GLOBAL_KEY, value === null ? RESET_TO_DEFAULT : value)
  }

  resetGlobal(): void {
    this.invalidate(GLOBAL_KEY)
  }

  protected override contextKey(_entity: TEntity): CacheKey {
    return GLOBAL_KEY
  }

  protected override async load(_key: CacheKey): Promise<T> {
    return this.deps.schema.parse(await this.deps.ref.get())
  }

  protected override async store(_key: CacheKey, value: T): Promise<void> {
    await this.deps.ref.set(this.deps.schema.parse(value))
  }

  protected override async reset(_key: CacheKey): Promise<void> {
    await this.deps.ref.clear()
  }

  protected override defaultFor(_key: CacheKey): T {
    const fallback = this.deps.ref.defaultValue()

    if (fallback === undefined) {
      throw new SettingsRegistrationError(`No default registered for ${this.deps.ref.identifier.toString()}`)
    }

    return this.deps.schema.parse(fallback)
  }
}
