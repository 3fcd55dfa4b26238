import type { Lock, LockKey } from "../../ports/lock"
import type { LockLease } from "../../ports/lock-lease"
import { MemoryLease } from "./memory-lock-lease"

type Grant = (lease: MemoryLease) => void

type HeldLock = {
  lease: MemoryLease
  waiters: Grant[]
}

export class MemoryLock implements Lock {
  private readonly locks = new Map<LockKey, HeldLock>()

  /** Number of keys currently held. */
  get size(): number {
    return this.locks.size
  }

  async acquire(key: LockKey): Promise<LockLease> {
    const held = this.locks.get(key)
    if (!held) return this.take(key, [])

    return new Promise<LockLease>((resolve) => {
      held.waiters.push(resolve)
    })
  }

  private take(key: LockKey, waiters: Grant[]): MemoryLease {
    const lease: MemoryLease = new MemoryLease(key, {
      onRelease: () => this.handOff(key, lease),
    })

    this.locks.set(key, { lease, waiters })
    return lease
  }

  private handOff(key: LockKey, lease: MemoryLease): void {
    const held = this.locks.get(key)
    if (held?.lease !== lease) return

    const next = held.waiters.shift()

    if (!next) {
      this.locks.delete(key)
      return
    }

    // The waiter list moves with the key so later arrivals keep their place.
    next(this.take(key, held.waiters))
  }
}

export function createMemoryLock(): MemoryLock {
  return new MemoryLock()
}
