import type { RedisDocumentClient, RedisMulti } from "../adapters/redis/redis-client"

type Op = () => void

/**
 * In-process stand-in for the node-redis commands the store issues.
 */
export class FakeRedisClient implements RedisDocumentClient {
  isOpen = false
  readonly strings = new Map<string, string>()
  readonly sets = new Map<string, Set<string>>()

  async connect(): Promise<void> {
    this.isOpen = true
  }

  async quit(): Promise<void> {
    this.isOpen = false
  }

  async get(key: string): Promise<string | null> {
    return this.strings.get(key) ?? null
  }

  async del(keys: string | readonly string[]): Promise<number> {
    return this.delSync(keys)
  }

  async sMembers(key: string): Promise<string[]> {
    return [...(this.sets.get(key) ?? [])]
  }

  multi(): RedisMulti {
    const ops: Op[] = []
    const tx: RedisMulti = {
      set: (key, value) => {
        ops.push(() => this.strings.set(key, value))
        return tx
      },
      del: (keys) => {
        ops.push(() => this.delSync(keys))
        return tx
      },
      sAdd: (key, members) => {
        ops.push(() => {
          const set = this.sets.get(key) ?? new Set<string>()
          for (const m of toArray(members)) set.add(m)
          this.sets.set(key, set)
        })
        return tx
      },
      sRem: (key, members) => {
        ops.push(() => {
          const set = this.sets.get(key)
          if (!set) return
          for (const m of toArray(members)) set.delete(m)
          if (set.size === 0) this.sets.delete(key)
        })
        return tx
      },
      exec: async () => {
        for (const op of ops) op()
        return []
      },
    }

    return tx
  }

  private delSync(keys: string | readonly string[]): number {
    let removed = 0

    for (const key of toArray(keys)) {
      if (this.strings.delete(key) || this.sets.delete(key)) removed += 1
    }

    return removed
  }
}

function toArray(value: string | readonly string[]): readonly string[] {
  return typeof value === "string" ? [value] : value
}
