import type { JsonValue } from "@layerconf/drivers"
import type { ZodType } from "zod"
import { type CacheKey, scopedKey } from "../../ports/cache-key"
import { type SettingsConfig, SettingsRegistrationError } from "../settings-config"
import type { ValueRef } from "../value-ref"
import {
  SettingCacheManager,
  type SettingCacheManagerDeps,
  type SettingCacheManagerOptions,
} from "./setting-cache-manager"

/** Anything with an id: a guild, channel, role or user. */
export type ContextEntity = { id: string | number }

export type ScopedSettingManagerDeps<T extends JsonValue> = SettingCacheManagerDeps & {
  settings: SettingsConfig
  /** A category keyed by a single id. */
  category: string
  path: readonly string[]
  schema: ZodType<T>
}

/**
 * A setting that varies by one entity, e.g. a per-guild volume.
 */
export class ScopedSettingManager<
  T extends JsonValue,
  TEntity extends ContextEntity = ContextEntity,
> extends SettingCacheManager<T, TEntity> {
  constructor(
    protected override readonly deps: ScopedSettingManagerDeps<T>,
    opts: SettingCacheManagerOptions = {},
  ) {
    super(deps, opts)
  }

  protected override contextKey(entity: TEntity): CacheKey {
    return scopedKey(entity.id)
  }

  protected override async load(key: CacheKey): Promise<T> {
    return this.deps.schema.parse(await this.refFor(key).get())
  }

  protected override async store(key: CacheKey, value: T): Promise<void> {
    await this.refFor(key).set(this.deps.schema.parse(value))
  }

  protected override async reset(key: CacheKey): Promise<void> {
    await this.refFor(key).clear()
  }

  protected override defaultFor(key: CacheKey): T {
    const ref = this.refFor(key)
    const fallback = ref.defaultValue()

    if (fallback === undefined) {
      throw new SettingsRegistrationError(`No default registered for ${ref.identifier.toString()}`)
    }

    return this.deps.schema.parse(fallback)
  }

  private refFor(key: CacheKey): ValueRef {
    if (key.kind !== "scoped") {
      throw new RangeError(`${this.deps.category} settings need a scoped cache key`)
    }

    return this.deps.settings.value(this.deps.category, [key.id], this.deps.path)
  }
}
