import type { Logger } from "@layerconf/logger"
import { type CacheKey, cacheKeyString, RESET_TO_DEFAULT, type ResetToDefault } from "../../ports/cache-key"

export type SettingCacheManagerOptions = {
  /** Fixed for the manager's lifetime. @default true */
  enableCache?: boolean
}

export type SettingCacheManagerDeps = {
  logger?: Logger
}

/**
 * Read-through cache for one setting. The map is only touched after the
 * backend call succeeds, so a failed write leaves the cached value as it was.
 *
 * Every write and invalidation bumps the key's generation; a read that
 * started under an older generation returns its value but does not cache it.
 */
export abstract class SettingCacheManager<TValue, TEntity> {
  readonly enableCache: boolean
  private readonly cache = new Map<string, TValue>()
  private readonly generations = new Map<string, number>()
  private epoch = 0

  protected constructor(
    protected readonly deps: SettingCacheManagerDeps,
    opts: SettingCacheManagerOptions = {},
  ) {
    this.enableCache = opts.enableCache ?? true
  }

  /** Maps an entity to the key this setting varies by. */
  protected abstract contextKey(entity: TEntity): CacheKey

  protected abstract load(key: CacheKey): Promise<TValue>
  protected abstract store(key: CacheKey, value: TValue): Promise<void>
  protected abstract reset(key: CacheKey): Promise<void>
  protected abstract defaultFor(key: CacheKey): TValue

  async get(key: CacheKey): Promise<TValue> {
    const k = cacheKeyString(key)

    if (this.enableCache && this.cache.has(k)) {
      const hit = this.cache.get(k)
      if (hit !== undefined) return hit
    }

    const started = this.generationOf(k)
    const value = await this.load(key)

    if (this.enableCache && this.generationOf(k) === started) {
      this.cache.set(k, value)
    }

    return value
  }

  async set(key: CacheKey, value: TValue | ResetToDefault): Promise<void> {
    const k = cacheKeyString(key)

    this.bump(k)
    try {
      if (value === RESET_TO_DEFAULT) {
        const fallback = this.defaultFor(key)
        await this.reset(key)
        if (this.enableCache) this.cache.set(k, fallback)
        this.deps.logger?.debug("Setting reset to default", { key: k })
        return
      }

      await this.store(key, value)
      if (this.enableCache) this.cache.set(k, value)
    } finally {
      this.bump(k)
    }
  }

  getContextValue(entity: TEntity): Promise<TValue> {
    return this.get(this.contextKey(entity))
  }

  invalidate(key?: CacheKey): void {
    if (key === undefined) {
      this.cache.clear()
      this.generations.clear()
      this.epoch += 1
    } else {
      const k = cacheKeyString(key)
      this.cache.delete(k)
      this.bump(k)
    }
  }

  private generationOf(k: string): string {
    return `${this.epoch}:${this.generations.get(k) ?? 0}`
  }

  private bump(k: string): void {
    this.generations.set(k, (this.generations.get(k) ?? 0) + 1)
  }
}
